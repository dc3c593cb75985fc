import { log } from "@/logger";
import type { StoreContext } from "@/memory/db";
import { MemoryError, toMemoryError } from "@/memory/errors";
import {
  capContent,
  hashNormalized,
  normalizeScope,
  normalizeTopicKey,
  nullable,
  stripPrivateTags,
} from "@/memory/normalize";
import { countOf, OBSERVATION_COLUMNS, observationRows } from "@/memory/rows";
import type {
  CreateObservationParams,
  Observation,
  ObservationListOptions,
  UpdateObservationParams,
} from "@/memory/types";
import { formatTimestamp, minutesBefore } from "@/utils/clock";

export type CreateOutcome = "upserted" | "deduplicated" | "inserted";

function requireText(value: string | undefined, field: string): void {
  if (!value?.trim()) throw new MemoryError("invalid_argument", `${field} is required`);
}

function idOf(row: unknown): number | null {
  if (typeof row === "object" && row !== null && "id" in row && typeof row.id === "number") return row.id;
  return null;
}

/**
 * Saves an observation through one of three paths, tried in order:
 *
 * 1. topic upsert: a non-empty topic key updates the newest active row with
 *    the same (topic_key, project, scope) and bumps its revision count;
 * 2. dedup: an identical (hash, project, scope, type, title) row created
 *    inside the dedup window has its duplicate count bumped;
 * 3. plain insert.
 *
 * Returns the id of the row written and which path was taken.
 */
export function saveObservation(
  ctx: StoreContext,
  params: CreateObservationParams,
): { id: number; outcome: CreateOutcome } {
  requireText(params.sessionId, "session_id");
  requireText(params.type, "type");
  requireText(params.title, "title");
  requireText(params.content, "content");

  const title = stripPrivateTags(params.title);
  const content = capContent(stripPrivateTags(params.content), ctx.config.maxObservationLength);
  const scope = normalizeScope(params.scope);
  const hash = hashNormalized(content);
  const topicKey = normalizeTopicKey(params.topicKey);
  const project = nullable(params.project);
  const toolName = nullable(params.toolName);
  const nowDate = ctx.clock();
  const now = formatTimestamp(nowDate);

  const run = ctx.db.transaction((): { id: number; outcome: CreateOutcome } => {
    if (topicKey) {
      const existing = idOf(
        ctx.db
          .prepare(`
            SELECT id FROM observations
            WHERE topic_key = ?
              AND ifnull(project, '') = ifnull(?, '')
              AND scope = ?
              AND deleted_at IS NULL
            ORDER BY datetime(updated_at) DESC, datetime(created_at) DESC, id DESC
            LIMIT 1
          `)
          .get(topicKey, project, scope),
      );
      if (existing !== null) {
        ctx.db
          .prepare(`
            UPDATE observations
            SET type = ?, title = ?, content = ?, tool_name = ?, topic_key = ?, normalized_hash = ?,
                revision_count = revision_count + 1, last_seen_at = ?, updated_at = ?
            WHERE id = ?
          `)
          .run(params.type, title, content, toolName, topicKey, hash, now, now, existing);
        return { id: existing, outcome: "upserted" };
      }
    }

    const cutoff = formatTimestamp(minutesBefore(nowDate, ctx.config.dedupeWindowMinutes));
    const duplicate = idOf(
      ctx.db
        .prepare(`
          SELECT id FROM observations
          WHERE normalized_hash = ?
            AND ifnull(project, '') = ifnull(?, '')
            AND scope = ?
            AND type = ?
            AND title = ?
            AND deleted_at IS NULL
            AND datetime(created_at) >= datetime(?)
          ORDER BY datetime(created_at) DESC, id DESC
          LIMIT 1
        `)
        .get(hash, project, scope, params.type, title, cutoff),
    );
    if (duplicate !== null) {
      ctx.db
        .prepare(`
          UPDATE observations
          SET duplicate_count = duplicate_count + 1, last_seen_at = ?, updated_at = ?
          WHERE id = ?
        `)
        .run(now, now, duplicate);
      return { id: duplicate, outcome: "deduplicated" };
    }

    const res = ctx.db
      .prepare(`
        INSERT INTO observations
          (session_id, type, title, content, tool_name, project, scope, topic_key, normalized_hash,
           revision_count, duplicate_count, last_seen_at, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, 1, 1, ?, ?, ?)
      `)
      .run(params.sessionId, params.type, title, content, toolName, project, scope, nullable(topicKey), hash, now, now, now);
    return { id: Number(res.lastInsertRowid), outcome: "inserted" };
  });

  try {
    const result = run.immediate();
    log.debug({ ...result, type: params.type, project }, "observation saved");
    return result;
  } catch (error) {
    throw toMemoryError(error, "save observation");
  }
}

export function createObservation(ctx: StoreContext, params: CreateObservationParams): number {
  return saveObservation(ctx, params).id;
}

/** Active observation by id, or null when absent or soft-deleted. */
export function findObservation(ctx: StoreContext, id: number): Observation | null {
  const row = ctx.db
    .prepare(`SELECT ${OBSERVATION_COLUMNS} FROM observations WHERE id = ? AND deleted_at IS NULL`)
    .get(id);
  return row === undefined ? null : observationRows.one(row);
}

export function getObservation(ctx: StoreContext, id: number): Observation {
  const obs = findObservation(ctx, id);
  if (!obs) throw new MemoryError("not_found", `observation ${id} not found`);
  return obs;
}

export function updateObservation(ctx: StoreContext, id: number, params: UpdateObservationParams): Observation {
  const current = getObservation(ctx, id);
  if (params.type !== undefined) requireText(params.type, "type");
  if (params.title !== undefined) requireText(params.title, "title");
  if (params.content !== undefined) requireText(params.content, "content");

  const type = params.type ?? current.type;
  const title = params.title !== undefined ? stripPrivateTags(params.title) : current.title;
  const content =
    params.content !== undefined
      ? capContent(stripPrivateTags(params.content), ctx.config.maxObservationLength)
      : current.content;
  const project = params.project !== undefined ? nullable(params.project) : current.project;
  const scope = params.scope !== undefined ? normalizeScope(params.scope) : current.scope;
  const topicKey = params.topicKey !== undefined ? nullable(normalizeTopicKey(params.topicKey)) : current.topicKey;

  let changes: number;
  try {
    changes = ctx.db
      .prepare(`
        UPDATE observations
        SET type = ?, title = ?, content = ?, project = ?, scope = ?, topic_key = ?, normalized_hash = ?,
            revision_count = revision_count + 1, updated_at = ?
        WHERE id = ? AND deleted_at IS NULL
      `)
      .run(type, title, content, project, scope, topicKey, hashNormalized(content), formatTimestamp(ctx.clock()), id)
      .changes;
  } catch (error) {
    throw toMemoryError(error, `update observation ${id}`);
  }
  if (changes === 0) throw new MemoryError("not_found", `observation ${id} not found`);
  log.debug({ id }, "observation updated");
  return getObservation(ctx, id);
}

/**
 * Soft delete hides the row from every live read but keeps it for export.
 * Hard delete removes it and, through the foreign keys, every relation
 * touching it.
 */
export function deleteObservation(ctx: StoreContext, id: number, hard = false): void {
  let changes: number;
  try {
    if (hard) {
      changes = ctx.db.prepare(`DELETE FROM observations WHERE id = ?`).run(id).changes;
    } else {
      const now = formatTimestamp(ctx.clock());
      changes = ctx.db
        .prepare(`UPDATE observations SET deleted_at = ?, updated_at = ? WHERE id = ? AND deleted_at IS NULL`)
        .run(now, now, id).changes;
    }
  } catch (error) {
    throw toMemoryError(error, `delete observation ${id}`);
  }
  if (changes === 0) throw new MemoryError("not_found", `observation ${id} not found`);
  log.debug({ id, hard }, "observation deleted");
}

export function findByTopicKey(ctx: StoreContext, key: string, project?: string, scope?: string): Observation | null {
  const topicKey = normalizeTopicKey(key);
  if (!topicKey) return null;
  const row = ctx.db
    .prepare(`
      SELECT ${OBSERVATION_COLUMNS} FROM observations
      WHERE topic_key = ?
        AND ifnull(project, '') = ifnull(?, '')
        AND scope = ?
        AND deleted_at IS NULL
      ORDER BY datetime(updated_at) DESC, datetime(created_at) DESC, id DESC
      LIMIT 1
    `)
    .get(topicKey, nullable(project), normalizeScope(scope));
  return row === undefined ? null : observationRows.one(row);
}

function activeFilters(opts: Pick<ObservationListOptions, "project" | "scope" | "type" | "sessionId">): {
  where: string;
  params: unknown[];
} {
  const clauses = ["deleted_at IS NULL"];
  const params: unknown[] = [];
  if (opts.project) {
    clauses.push("project = ?");
    params.push(opts.project);
  }
  if (opts.scope) {
    clauses.push("scope = ?");
    params.push(normalizeScope(opts.scope));
  }
  if (opts.type) {
    clauses.push("type = ?");
    params.push(opts.type);
  }
  if (opts.sessionId) {
    clauses.push("session_id = ?");
    params.push(opts.sessionId);
  }
  return { where: clauses.join(" AND "), params };
}

export function listObservations(ctx: StoreContext, opts: ObservationListOptions = {}): Observation[] {
  const { where, params } = activeFilters(opts);
  const limit = opts.limit && opts.limit > 0 ? opts.limit : ctx.config.maxContextResults;
  const offset = Math.max(0, opts.offset ?? 0);
  const rows = ctx.db
    .prepare(`
      SELECT ${OBSERVATION_COLUMNS} FROM observations
      WHERE ${where}
      ORDER BY datetime(created_at) DESC, id DESC
      LIMIT ? OFFSET ?
    `)
    .all(...params, limit, offset);
  return observationRows.many(rows);
}

export function recentObservations(ctx: StoreContext, project?: string, scope?: string, limit?: number): Observation[] {
  return listObservations(ctx, { project, scope, limit });
}

export function countObservations(ctx: StoreContext, project?: string, scope?: string): number {
  const { where, params } = activeFilters({ project, scope });
  return countOf(ctx.db.prepare(`SELECT COUNT(*) FROM observations WHERE ${where}`).pluck().get(...params));
}
