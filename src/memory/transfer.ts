import { z } from "zod";
import { log } from "@/logger";
import type { StoreContext } from "@/memory/db";
import { MemoryError, toMemoryError } from "@/memory/errors";
import { hashNormalized, normalizeScope, normalizeTopicKey, nullable } from "@/memory/normalize";
import {
  OBSERVATION_COLUMNS,
  observationRowSchema,
  PROMPT_COLUMNS,
  promptRowSchema,
  reader,
  SESSION_COLUMNS,
  sessionRowSchema,
  type ObservationRecord,
  type PromptRecord,
  type SessionRecord,
} from "@/memory/rows";
import type { ImportResult } from "@/memory/types";
import { formatTimestamp } from "@/utils/clock";
import { parseJsonStrict } from "@/utils/parse-json";

export const EXPORT_VERSION = "0.1.0";

export type ExportDocument = {
  version: string;
  exported_at: string;
  sessions: SessionRecord[];
  observations: ObservationRecord[];
  prompts: PromptRecord[];
};

const sessionRecords = reader("session", sessionRowSchema, (row) => row);
const observationRecords = reader("observation", observationRowSchema, (row) => row);
const promptRecords = reader("prompt", promptRowSchema, (row) => row);

// Import is looser than export: ids are ignored and optional columns may be absent.
const importDocumentSchema = z.object({
  version: z.string(),
  exported_at: z.string(),
  sessions: z.array(
    z.object({
      id: z.string().min(1),
      project: z.string(),
      directory: z.string(),
      started_at: z.string(),
      ended_at: z.string().nullish(),
      summary: z.string().nullish(),
    }),
  ),
  observations: z.array(
    z.object({
      session_id: z.string(),
      type: z.string(),
      title: z.string(),
      content: z.string(),
      tool_name: z.string().nullish(),
      project: z.string().nullish(),
      scope: z.string().nullish(),
      topic_key: z.string().nullish(),
      revision_count: z.number().nullish(),
      duplicate_count: z.number().nullish(),
      last_seen_at: z.string().nullish(),
      created_at: z.string(),
      updated_at: z.string().nullish(),
      deleted_at: z.string().nullish(),
    }),
  ),
  prompts: z.array(
    z.object({
      session_id: z.string(),
      content: z.string(),
      project: z.string().nullish(),
      created_at: z.string(),
    }),
  ),
});

type ImportDocument = z.infer<typeof importDocumentSchema>;

/** Full logical dump, soft-deleted observations included. */
export function exportData(ctx: StoreContext): ExportDocument {
  return {
    version: EXPORT_VERSION,
    exported_at: formatTimestamp(ctx.clock()),
    sessions: sessionRecords.many(
      ctx.db.prepare(`SELECT ${SESSION_COLUMNS} FROM sessions ORDER BY datetime(started_at), id`).all(),
    ),
    observations: observationRecords.many(
      ctx.db.prepare(`SELECT ${OBSERVATION_COLUMNS} FROM observations ORDER BY id`).all(),
    ),
    prompts: promptRecords.many(ctx.db.prepare(`SELECT ${PROMPT_COLUMNS} FROM user_prompts ORDER BY id`).all()),
  };
}

function parseDocument(input: unknown): ImportDocument {
  const raw = typeof input === "string" ? parseJsonStrict(input, "import document") : input;
  const parsed = importDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new MemoryError("invalid_argument", `malformed import document: ${issues}`);
  }
  return parsed.data;
}

/**
 * Loads an export document in one transaction. Sessions are insert-or-ignore;
 * observations and prompts are always inserted as new rows with fresh ids and
 * bypass dedup and topic upsert.
 */
export function importData(ctx: StoreContext, input: unknown): ImportResult {
  const doc = parseDocument(input);

  const insertSession = ctx.db.prepare(`
    INSERT OR IGNORE INTO sessions (id, project, directory, started_at, ended_at, summary)
    VALUES (?, ?, ?, ?, ?, ?)
  `);
  const insertObservation = ctx.db.prepare(`
    INSERT INTO observations
      (session_id, type, title, content, tool_name, project, scope, topic_key, normalized_hash,
       revision_count, duplicate_count, last_seen_at, created_at, updated_at, deleted_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);
  const insertPrompt = ctx.db.prepare(`
    INSERT INTO user_prompts (session_id, content, project, created_at) VALUES (?, ?, ?, ?)
  `);

  const run = ctx.db.transaction((): ImportResult => {
    const result: ImportResult = { sessionsImported: 0, observationsImported: 0, promptsImported: 0 };
    for (const s of doc.sessions) {
      result.sessionsImported += insertSession.run(
        s.id,
        s.project,
        s.directory,
        s.started_at,
        s.ended_at ?? null,
        nullable(s.summary),
      ).changes;
    }
    for (const o of doc.observations) {
      insertObservation.run(
        o.session_id,
        o.type,
        o.title,
        o.content,
        o.tool_name ?? null,
        o.project ?? null,
        normalizeScope(o.scope),
        nullable(normalizeTopicKey(o.topic_key)),
        hashNormalized(o.content),
        Math.max(1, o.revision_count ?? 1),
        Math.max(1, o.duplicate_count ?? 1),
        o.last_seen_at ?? null,
        o.created_at,
        o.updated_at || o.created_at,
        o.deleted_at ?? null,
      );
      result.observationsImported++;
    }
    for (const p of doc.prompts) {
      insertPrompt.run(p.session_id, p.content, p.project ?? null, p.created_at);
      result.promptsImported++;
    }
    return result;
  });

  try {
    const result = run();
    log.debug({ ...result }, "import complete");
    return result;
  } catch (error) {
    throw toMemoryError(error, "import");
  }
}
