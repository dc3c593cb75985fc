import test from "node:test";
import assert from "node:assert/strict";
import { isMemoryError } from "@/memory/errors";
import type { MemoryStore } from "@/memory/store";
import { openTestStore } from "./helpers";

function seedSession(store: MemoryStore, sessionId: string, count: number): number[] {
  const ids: number[] = [];
  for (let i = 0; i < count; i++) {
    ids.push(store.createObservation({ sessionId, type: "note", title: `${sessionId} step ${i}`, content: `step ${i}` }));
    // Interleave another session so ids are not contiguous.
    store.createObservation({ sessionId: "noise", type: "note", title: `noise ${sessionId} ${i}`, content: "noise" });
  }
  return ids;
}

test("timeline returns a bounded window around the focus", () => {
  const { store } = openTestStore();
  store.startSession("s1", "alpha", "/work");
  const ids = seedSession(store, "s1", 7);
  const [o0, o1, o2, o3, o4, o5, o6] = ids;

  const narrow = store.timeline(o3 ?? 0, 2, 2);
  assert.equal(narrow.focus.id, o3);
  assert.deepEqual(
    narrow.before.map((o) => o.id),
    [o1, o2],
  );
  assert.deepEqual(
    narrow.after.map((o) => o.id),
    [o4, o5],
  );
  assert.equal(narrow.session?.project, "alpha");
  assert.equal(narrow.totalInSession, 7);

  const wide = store.timeline(o3 ?? 0, 0, -1);
  assert.deepEqual(
    wide.before.map((o) => o.id),
    [o0, o1, o2],
  );
  assert.deepEqual(
    wide.after.map((o) => o.id),
    [o4, o5, o6],
  );
  store.close();
});

test("timeline skips soft-deleted neighbours", () => {
  const { store } = openTestStore();
  const [o0, o1, o2, o3] = seedSession(store, "s1", 4);
  store.deleteObservation(o2 ?? 0);

  const result = store.timeline(o3 ?? 0, 2, 2);
  assert.deepEqual(
    result.before.map((o) => o.id),
    [o0, o1],
  );
  assert.deepEqual(result.after, []);
  assert.equal(result.totalInSession, 3);
  store.close();
});

test("timeline tolerates a missing session record", () => {
  const { store } = openTestStore();
  const [only = 0] = seedSession(store, "manual-save", 1);
  const result = store.timeline(only);
  assert.equal(result.session, null);
  assert.equal(result.totalInSession, 1);
  store.close();
});

test("timeline fails when the focus is missing or deleted", () => {
  const { store } = openTestStore();
  const [only = 0] = seedSession(store, "s1", 1);
  store.deleteObservation(only);
  assert.throws(() => store.timeline(only), (err) => isMemoryError(err, "not_found"));
  assert.throws(() => store.timeline(12345), (err) => isMemoryError(err, "not_found"));
  store.close();
});
