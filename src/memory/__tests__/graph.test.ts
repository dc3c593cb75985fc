import test from "node:test";
import assert from "node:assert/strict";
import { isMemoryError } from "@/memory/errors";
import { buildContext, clampDepth } from "@/memory/graph";
import { createObservation } from "@/memory/observations";
import { addRelation } from "@/memory/relations";
import type { MemoryStore } from "@/memory/store";
import { openTestContext, openTestStore } from "./helpers";

function seed(store: MemoryStore, count: number): number[] {
  const ids: number[] = [];
  for (let i = 0; i < count; i++) {
    ids.push(store.createObservation({ sessionId: "s1", type: "note", title: `N${i}`, content: `node ${i}` }));
  }
  return ids;
}

function chain(store: MemoryStore, count: number): number[] {
  const ids = seed(store, count);
  for (let i = 0; i + 1 < ids.length; i++) {
    store.addRelation({ fromId: ids[i] ?? 0, toId: ids[i + 1] ?? 0 });
  }
  return ids;
}

test("clampDepth defaults non-positive depths and caps at five", () => {
  assert.equal(clampDepth(undefined), 2);
  assert.equal(clampDepth(0), 2);
  assert.equal(clampDepth(-3), 2);
  assert.equal(clampDepth(3), 3);
  assert.equal(clampDepth(9), 5);
  assert.equal(clampDepth(0.5), 2);
  assert.equal(clampDepth(2.7), 2);
  assert.equal(clampDepth(Number.NaN), 2);
});

test("buildContext walks typed edges breadth first", () => {
  const { store } = openTestStore();
  const [a = 0, b = 0, c = 0] = seed(store, 3);
  store.addRelation({ fromId: a, toId: b, type: "depends_on", note: "needs the schema" });
  store.addRelation({ fromId: b, toId: c, type: "implements" });

  const two = store.buildContext(a, 2);
  assert.equal(two.root.id, a);
  assert.deepEqual(
    two.connected.map((n) => [n.id, n.depth, n.relationType, n.direction]),
    [
      [b, 1, "depends_on", "outgoing"],
      [c, 2, "implements", "outgoing"],
    ],
  );
  assert.equal(two.connected[0]?.note, "needs the schema");
  assert.equal(two.connected[0]?.title, "N1");
  assert.equal(two.totalNodes, 2);
  assert.equal(two.maxDepth, 2);

  const one = store.buildContext(a, 1);
  assert.deepEqual(
    one.connected.map((n) => [n.id, n.depth]),
    [[b, 1]],
  );
  assert.equal(one.maxDepth, 1);

  const fromC = store.buildContext(c, 1);
  assert.deepEqual(
    fromC.connected.map((n) => [n.id, n.direction]),
    [[b, "incoming"]],
  );
  store.close();
});

test("buildContext visits each node of a cycle once", () => {
  const { store } = openTestStore();
  const [a = 0, b = 0, c = 0] = seed(store, 3);
  store.addRelation({ fromId: a, toId: b });
  store.addRelation({ fromId: b, toId: c });
  store.addRelation({ fromId: c, toId: a });

  const result = store.buildContext(a, 5);
  const ids = result.connected.map((n) => n.id);
  assert.deepEqual(ids, [b, c]);
  assert.deepEqual(
    result.connected.map((n) => [n.depth, n.direction]),
    [
      [1, "outgoing"],
      [1, "incoming"],
    ],
  );
  assert.equal(result.maxDepth, 1);
  store.close();
});

test("buildContext clamps the requested depth", () => {
  const { store } = openTestStore();
  const [root = 0] = chain(store, 8);

  assert.deepEqual(store.buildContext(root, 0), store.buildContext(root, 2));
  assert.deepEqual(store.buildContext(root, -4), store.buildContext(root, 2));
  assert.equal(store.buildContext(root, 2).totalNodes, 2);
  assert.deepEqual(store.buildContext(root, 50), store.buildContext(root, 5));
  assert.equal(store.buildContext(root, 50).maxDepth, 5);
  store.close();
});

test("buildContext fails for a missing or soft-deleted root", () => {
  const { store } = openTestStore();
  const [a = 0] = seed(store, 1);
  store.deleteObservation(a);
  assert.throws(() => store.buildContext(a), (err) => isMemoryError(err, "not_found"));
  assert.throws(() => store.buildContext(404), (err) => isMemoryError(err, "not_found"));
  store.close();
});

test("buildContext reports soft-deleted neighbours", () => {
  const { store } = openTestStore();
  const [a = 0, b = 0] = seed(store, 2);
  store.addRelation({ fromId: a, toId: b });
  store.deleteObservation(b);
  assert.deepEqual(
    store.buildContext(a).connected.map((n) => n.id),
    [b],
  );
  store.close();
});

test("buildContext skips a neighbour whose row has vanished", () => {
  const ctx = openTestContext();
  const note = (title: string): number =>
    createObservation(ctx, { sessionId: "s1", type: "note", title, content: `about ${title}` });
  const a = note("A");
  const b = note("B");
  const c = note("C");
  addRelation(ctx, { fromId: a, toId: b });
  addRelation(ctx, { fromId: a, toId: c });

  // Leaves the edge to b dangling.
  ctx.db.pragma("foreign_keys = OFF");
  ctx.db.prepare(`DELETE FROM observations WHERE id = ?`).run(b);

  const result = buildContext(ctx, a);
  assert.deepEqual(
    result.connected.map((n) => n.id),
    [c],
  );
  assert.equal(result.totalNodes, 1);
  ctx.db.close();
});
