import test from "node:test";
import assert from "node:assert/strict";
import { formatStats, navigationHint } from "@/memory/stats";
import { openTestStore } from "./helpers";

test("stats counts active rows and orders projects by recent activity", () => {
  const { store, advanceMinutes } = openTestStore();
  store.startSession("s1", "alpha", "/work");
  store.startSession("s2", "beta", "/work");
  store.createObservation({ sessionId: "s1", type: "note", title: "a", content: "alpha note", project: "alpha" });
  advanceMinutes(5);
  store.createObservation({ sessionId: "s2", type: "note", title: "b", content: "beta note", project: "beta" });
  const gone = store.createObservation({ sessionId: "s2", type: "note", title: "g", content: "gamma", project: "gamma" });
  store.createObservation({ sessionId: "s2", type: "note", title: "n", content: "no project" });
  store.deleteObservation(gone);
  store.addPrompt({ sessionId: "s1", content: "hello" });

  assert.deepEqual(store.stats(), {
    totalSessions: 2,
    totalObservations: 3,
    totalPrompts: 1,
    projects: ["beta", "alpha"],
  });
  store.close();
});

test("formatStats renders a markdown block", () => {
  assert.equal(
    formatStats({ totalSessions: 2, totalObservations: 3, totalPrompts: 1, projects: ["beta", "alpha"] }),
    "## Memory Statistics\n\n- **Sessions**: 2\n- **Observations**: 3\n- **User Prompts**: 1\n- **Projects** (2): beta, alpha\n",
  );
  assert.ok(
    formatStats({ totalSessions: 0, totalObservations: 0, totalPrompts: 0, projects: [] }).endsWith(
      "- **Projects**: none\n",
    ),
  );
});

test("formatContext summarises recent sessions, prompts and observations", () => {
  const { store } = openTestStore();
  assert.equal(store.formatContext(), "");

  store.startSession("s1", "alpha", "/work");
  store.addPrompt({ sessionId: "s1", content: "how to pool", project: "alpha" });
  store.createObservation({
    sessionId: "s1",
    type: "decision",
    title: "Use WAL",
    content: "WAL for readers",
    project: "alpha",
  });

  assert.equal(
    store.formatContext("alpha"),
    [
      "## Memory from Previous Sessions",
      "",
      "### Recent Sessions",
      "- **alpha** (2025-03-01 09:00:00) [1 observations]",
      "",
      "### Recent User Prompts",
      "- 2025-03-01 09:00:00: how to pool",
      "",
      "### Recent Observations",
      "- [decision] **Use WAL**: WAL for readers",
      "",
      "",
    ].join("\n"),
  );
  assert.equal(store.formatContext("other"), "");
  store.close();
});

test("navigationHint only appears when results are capped", () => {
  assert.equal(navigationHint(2, 5, "Use offset for more."), "📊 Showing 2 of 5 results. Use offset for more.");
  assert.equal(navigationHint(2, 5), "📊 Showing 2 of 5 results.");
  assert.equal(navigationHint(5, 5, "ignored"), "");
});
