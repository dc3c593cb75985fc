import test from "node:test";
import assert from "node:assert/strict";
import { formatObservation, parseDetailLevel } from "@/memory/detail-level";
import type { Observation } from "@/memory/types";

const obs: Observation = {
  id: 7,
  sessionId: "s1",
  type: "bugfix",
  title: "Fix pool leak",
  content: "x".repeat(350),
  toolName: null,
  project: "alpha",
  scope: "project",
  topicKey: null,
  revisionCount: 1,
  duplicateCount: 1,
  lastSeenAt: null,
  createdAt: "2025-03-01 09:00:00",
  updatedAt: "2025-03-01 09:00:00",
  deletedAt: null,
};

test("parseDetailLevel falls back to standard", () => {
  assert.equal(parseDetailLevel("summary"), "summary");
  assert.equal(parseDetailLevel("full"), "full");
  assert.equal(parseDetailLevel("FULL"), "standard");
  assert.equal(parseDetailLevel(undefined), "standard");
});

test("formatObservation sizes content by level", () => {
  assert.equal(formatObservation(obs, "summary"), "#7 [bugfix] Fix pool leak (alpha)");
  assert.equal(formatObservation(obs), `#7 [bugfix] Fix pool leak (alpha)\n${"x".repeat(300)}...`);
  assert.equal(formatObservation({ ...obs, project: null }, "full"), `#7 [bugfix] Fix pool leak\n${"x".repeat(350)}`);
});
