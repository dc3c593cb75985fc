import test from "node:test";
import assert from "node:assert/strict";
import { cleanMarkdown, extractLearnings } from "@/memory/passive";
import { openTestStore } from "./helpers";

const FIRST = "Prepared statements must be finalized before the database handle closes.";
const SECOND = "Set busy_timeout so writers wait instead of failing.";

const REPORT = `Wrapped up the storage work.

## Key Learnings:
1. **Prepared statements** must be finalized before the database handle closes.
2. Set \`busy_timeout\` so writers wait instead of failing.
3. ok

## Next Steps
- something unrelated but long enough to qualify
`;

test("cleanMarkdown strips emphasis and code markers", () => {
  assert.equal(cleanMarkdown("**bold**  and `code`\n and *italic*"), "bold and code and italic");
});

test("extractLearnings keeps numbered items above the length floor", () => {
  assert.deepEqual(extractLearnings(REPORT), [FIRST, SECOND]);
});

test("extractLearnings drops short items after cleanup", () => {
  const sentence = "Always run **ensureSchema** before preparing `statements` on every *startup* path.";
  assert.deepEqual(extractLearnings(`## Key Learnings:\n1. ${sentence}\n2. ok`), [
    "Always run ensureSchema before preparing statements on every startup path.",
  ]);
});

test("extractLearnings falls back to bullets when no numbered item qualifies", () => {
  const text = "### Learnings\n1. short\n- Bullets are used when numbered items are too short.\n* tiny";
  assert.deepEqual(extractLearnings(text), ["Bullets are used when numbered items are too short."]);
});

test("extractLearnings prefers the last section that yields items", () => {
  const text = [
    "## Learnings",
    "- The earlier section has its own long learning.",
    "## Aprendizajes Clave",
    "1. La sección más reciente gana sobre las anteriores.",
  ].join("\n");
  assert.deepEqual(extractLearnings(text), ["La sección más reciente gana sobre las anteriores."]);

  const emptyLast = `${text}\n## Key Learning\n- nope`;
  assert.deepEqual(extractLearnings(emptyLast), ["La sección más reciente gana sobre las anteriores."]);
});

test("extractLearnings ignores other heading levels and missing headers", () => {
  assert.deepEqual(extractLearnings("# Key Learnings\n- A level one heading does not count here."), []);
  assert.deepEqual(extractLearnings("#### Key Learnings\n- A level four heading does not count."), []);
  assert.deepEqual(extractLearnings("just prose without any list"), []);
});

test("passiveCapture saves new learnings as passive observations", () => {
  const { store } = openTestStore();
  const result = store.passiveCapture({ sessionId: "s1", content: REPORT, project: "alpha", source: "session-end" });
  assert.deepEqual(result, { extracted: 2, saved: 2, duplicates: 0 });

  const saved = store.listObservations({ type: "passive" });
  assert.deepEqual(
    saved.map((o) => [o.title, o.content, o.toolName, o.project, o.scope]).reverse(),
    [
      [`${FIRST.slice(0, 60)}...`, FIRST, "session-end", "alpha", "project"],
      [SECOND, SECOND, "session-end", "alpha", "project"],
    ],
  );
  store.close();
});

test("passiveCapture counts repeats by content and project only", () => {
  const { store } = openTestStore();
  store.createObservation({ sessionId: "s0", type: "learning", title: "manual", content: FIRST, project: "alpha" });

  assert.deepEqual(store.passiveCapture({ sessionId: "s1", content: REPORT, project: "alpha" }), {
    extracted: 2,
    saved: 1,
    duplicates: 1,
  });
  assert.deepEqual(store.passiveCapture({ sessionId: "s1", content: REPORT, project: "alpha" }), {
    extracted: 2,
    saved: 0,
    duplicates: 2,
  });
  assert.deepEqual(store.passiveCapture({ sessionId: "s1", content: REPORT, project: "beta" }), {
    extracted: 2,
    saved: 2,
    duplicates: 0,
  });
  assert.deepEqual(store.passiveCapture({ sessionId: "s1", content: "no learnings here" }), {
    extracted: 0,
    saved: 0,
    duplicates: 0,
  });
  store.close();
});
