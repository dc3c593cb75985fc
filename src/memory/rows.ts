import { z } from "zod";
import { log } from "@/logger";
import { MemoryError } from "@/memory/errors";
import { normalizeScope } from "@/memory/normalize";
import type { Observation, ObservationMeta, Prompt, Relation, Session } from "@/memory/types";

// Column lists shared by every query that reads whole rows.
export const OBSERVATION_COLUMNS = `id, session_id, type, title, content, tool_name, project,
  scope, topic_key, revision_count, duplicate_count, last_seen_at, created_at, updated_at, deleted_at`;
export const OBSERVATION_META_COLUMNS = `id, title, type, project, created_at`;
export const SESSION_COLUMNS = `id, project, directory, started_at, ended_at, summary`;
export const PROMPT_COLUMNS = `id, session_id, content, project, created_at`;
export const RELATION_COLUMNS = `id, from_id, to_id, type, note, created_at`;

export const observationRowSchema = z.object({
  id: z.number().int(),
  session_id: z.string(),
  type: z.string(),
  title: z.string(),
  content: z.string(),
  tool_name: z.string().nullable(),
  project: z.string().nullable(),
  scope: z.string().nullable(),
  topic_key: z.string().nullable(),
  revision_count: z.number().nullable(),
  duplicate_count: z.number().nullable(),
  last_seen_at: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string().nullable(),
  deleted_at: z.string().nullable(),
});

const observationMetaRowSchema = observationRowSchema.pick({
  id: true,
  title: true,
  type: true,
  project: true,
  created_at: true,
});

export const sessionRowSchema = z.object({
  id: z.string(),
  project: z.string(),
  directory: z.string(),
  started_at: z.string(),
  ended_at: z.string().nullable(),
  summary: z.string().nullable(),
});

export const promptRowSchema = z.object({
  id: z.number().int(),
  session_id: z.string(),
  content: z.string(),
  project: z.string().nullable(),
  created_at: z.string(),
});

const relationRowSchema = z.object({
  id: z.number().int(),
  from_id: z.number().int(),
  to_id: z.number().int(),
  type: z.string(),
  note: z.string().nullable(),
  created_at: z.string(),
});

/** Stored row shapes, snake_case as in the database and the export document. */
export type ObservationRecord = z.infer<typeof observationRowSchema>;
export type SessionRecord = z.infer<typeof sessionRowSchema>;
export type PromptRecord = z.infer<typeof promptRowSchema>;

function toObservation(row: z.infer<typeof observationRowSchema>): Observation {
  return {
    id: row.id,
    sessionId: row.session_id,
    type: row.type,
    title: row.title,
    content: row.content,
    toolName: row.tool_name,
    project: row.project,
    scope: normalizeScope(row.scope),
    topicKey: row.topic_key || null,
    revisionCount: Math.max(1, row.revision_count ?? 1),
    duplicateCount: Math.max(1, row.duplicate_count ?? 1),
    lastSeenAt: row.last_seen_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at || row.created_at,
    deletedAt: row.deleted_at,
  };
}

function toObservationMeta(row: z.infer<typeof observationMetaRowSchema>): ObservationMeta {
  return { id: row.id, title: row.title, type: row.type, project: row.project, createdAt: row.created_at };
}

function toSession(row: z.infer<typeof sessionRowSchema>): Session {
  return {
    id: row.id,
    project: row.project,
    directory: row.directory,
    startedAt: row.started_at,
    endedAt: row.ended_at,
    summary: row.summary,
  };
}

function toPrompt(row: z.infer<typeof promptRowSchema>): Prompt {
  return {
    id: row.id,
    sessionId: row.session_id,
    content: row.content,
    project: row.project || null,
    createdAt: row.created_at,
  };
}

function toRelation(row: z.infer<typeof relationRowSchema>): Relation {
  return {
    id: row.id,
    fromId: row.from_id,
    toId: row.to_id,
    type: row.type,
    note: row.note || null,
    createdAt: row.created_at,
  };
}

export type RowReader<T> = {
  one(row: unknown): T;
  many(rows: unknown[]): T[];
};

export function reader<I, T>(entity: string, schema: z.ZodType<I, z.ZodTypeDef, unknown>, map: (row: I) => T): RowReader<T> {
  return {
    one(row) {
      const parsed = schema.safeParse(row);
      if (!parsed.success) {
        throw new MemoryError("internal", `unreadable ${entity} row: ${parsed.error.issues[0]?.message ?? "invalid"}`);
      }
      return map(parsed.data);
    },
    // Bulk scans skip rows that fail to parse so one bad record does not hide the rest.
    many(rows) {
      const out: T[] = [];
      for (const row of rows) {
        const parsed = schema.safeParse(row);
        if (!parsed.success) {
          log.warn({ entity, issues: parsed.error.issues }, `skipping unreadable ${entity} row`);
          continue;
        }
        out.push(map(parsed.data));
      }
      return out;
    },
  };
}

export const observationRows = reader("observation", observationRowSchema, toObservation);
export const observationMetaRows = reader("observation", observationMetaRowSchema, toObservationMeta);
export const sessionRows = reader("session", sessionRowSchema, toSession);
export const promptRows = reader("prompt", promptRowSchema, toPrompt);
export const relationRows = reader("relation", relationRowSchema, toRelation);

const rankSchema = z.object({ rank: z.number() });

/** Reads the `rank` column that search queries append to a row. */
export function rankOf(row: unknown): number {
  const parsed = rankSchema.safeParse(row);
  return parsed.success ? parsed.data.rank : 0;
}

export function countOf(value: unknown): number {
  return typeof value === "number" ? value : Number(value ?? 0) || 0;
}
