import { log } from "@/logger";
import type { StoreContext } from "@/memory/db";
import { hashNormalized, nullable } from "@/memory/normalize";
import { createObservation } from "@/memory/observations";
import type { PassiveCaptureParams, PassiveCaptureResult } from "@/memory/types";

export const PASSIVE_TYPE = "passive";
export const MIN_LEARNING_LENGTH = 20;
const MAX_TITLE_LENGTH = 60;

// English and Spanish headings, level 2 or 3, optional trailing colon.
const LEARNING_HEADER = /^#{2,3}\s+(?:Aprendizajes(?:\s+Clave)?|Key\s+Learnings?|Learnings?):?\s*$/gim;
const NEXT_HEADER = /\n#{1,3} /;
const NUMBERED_ITEM = /^\s*\d+[.)]\s+(.+)/gm;
const BULLET_ITEM = /^\s*[-*]\s+(.+)/gm;

export function cleanMarkdown(text: string): string {
  return text
    .replace(/\*\*([^*]+)\*\*/g, "$1")
    .replace(/`([^`]+)`/g, "$1")
    .replace(/\*([^*]+)\*/g, "$1")
    .split(/\s+/)
    .filter(Boolean)
    .join(" ");
}

function qualifying(section: string, pattern: RegExp): string[] {
  const out: string[] = [];
  for (const match of section.matchAll(pattern)) {
    const cleaned = cleanMarkdown(match[1] ?? "");
    if (cleaned.length >= MIN_LEARNING_LENGTH) out.push(cleaned);
  }
  return out;
}

/**
 * Pulls list items out of the last "Key Learnings" style section that has
 * any. Numbered items win over bullets; sections are never merged.
 */
export function extractLearnings(text: string): string[] {
  const headers = [...text.matchAll(LEARNING_HEADER)];
  for (let i = headers.length - 1; i >= 0; i--) {
    const header = headers[i];
    if (!header || header.index === undefined) continue;
    let section = text.slice(header.index + header[0].length);
    const next = NEXT_HEADER.exec(section);
    if (next) section = section.slice(0, next.index);

    const numbered = qualifying(section, NUMBERED_ITEM);
    if (numbered.length > 0) return numbered;
    const bullets = qualifying(section, BULLET_ITEM);
    if (bullets.length > 0) return bullets;
  }
  return [];
}

function learningTitle(learning: string): string {
  return learning.length > MAX_TITLE_LENGTH ? `${learning.slice(0, MAX_TITLE_LENGTH)}...` : learning;
}

export function passiveCapture(ctx: StoreContext, params: PassiveCaptureParams): PassiveCaptureResult {
  const learnings = extractLearnings(params.content);
  const result: PassiveCaptureResult = { extracted: learnings.length, saved: 0, duplicates: 0 };
  const project = nullable(params.project);
  const existing = ctx.db.prepare(`
    SELECT 1 FROM observations
    WHERE normalized_hash = ?
      AND ifnull(project, '') = ifnull(?, '')
      AND deleted_at IS NULL
    LIMIT 1
  `);

  for (const learning of learnings) {
    if (existing.get(hashNormalized(learning), project) !== undefined) {
      result.duplicates++;
      continue;
    }
    createObservation(ctx, {
      sessionId: params.sessionId,
      type: PASSIVE_TYPE,
      title: learningTitle(learning),
      content: learning,
      project: params.project,
      scope: "project",
      toolName: params.source,
    });
    result.saved++;
  }

  if (result.extracted > 0) log.debug({ ...result, project }, "passive capture");
  return result;
}
