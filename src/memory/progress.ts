import type { StoreContext } from "@/memory/db";
import { MemoryError } from "@/memory/errors";
import { MANUAL_SESSION_ID } from "@/memory/compact";
import { createObservation, findByTopicKey } from "@/memory/observations";
import type { Observation, SaveProgressParams } from "@/memory/types";
import { isValidJson } from "@/utils/parse-json";

export const PROGRESS_TYPE = "progress";

export function progressTopicKey(project: string): string {
  return `progress/${project}`;
}

/** Upserts the single progress document of a project. Content must be JSON. */
export function saveProgress(ctx: StoreContext, params: SaveProgressParams): number {
  if (!params.project.trim()) throw new MemoryError("invalid_argument", "project is required");
  if (!isValidJson(params.content)) {
    throw new MemoryError("invalid_argument", "progress content must be valid JSON");
  }
  return createObservation(ctx, {
    sessionId: params.sessionId || MANUAL_SESSION_ID,
    type: PROGRESS_TYPE,
    title: `Progress: ${params.project}`,
    content: params.content,
    project: params.project,
    scope: "project",
    topicKey: progressTopicKey(params.project),
  });
}

export function getProgress(ctx: StoreContext, project: string): Observation | null {
  return findByTopicKey(ctx, progressTopicKey(project), project, "project");
}
