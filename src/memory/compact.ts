import { log } from "@/logger";
import type { StoreContext } from "@/memory/db";
import { MemoryError, toMemoryError } from "@/memory/errors";
import { normalizeScope } from "@/memory/normalize";
import { countObservations, createObservation } from "@/memory/observations";
import { OBSERVATION_COLUMNS, observationRows } from "@/memory/rows";
import type { CompactParams, CompactResult, Observation, StaleObservationOptions } from "@/memory/types";
import { formatTimestamp, minutesBefore } from "@/utils/clock";

export const COMPACTION_SUMMARY_TYPE = "compaction_summary";
export const MANUAL_SESSION_ID = "manual-save";
const DEFAULT_STALE_LIMIT = 200;
const MINUTES_PER_DAY = 24 * 60;

/** Active observations created more than `olderThanDays` ago, oldest first. */
export function findStaleObservations(ctx: StoreContext, opts: StaleObservationOptions): Observation[] {
  if (!(opts.olderThanDays > 0)) {
    throw new MemoryError("invalid_argument", "olderThanDays must be greater than 0");
  }
  const cutoff = formatTimestamp(minutesBefore(ctx.clock(), opts.olderThanDays * MINUTES_PER_DAY));
  const clauses = ["deleted_at IS NULL", "datetime(created_at) < datetime(?)"];
  const params: unknown[] = [cutoff];
  if (opts.project) {
    clauses.push("project = ?");
    params.push(opts.project);
  }
  if (opts.scope) {
    clauses.push("scope = ?");
    params.push(normalizeScope(opts.scope));
  }
  const limit = opts.limit && opts.limit > 0 ? opts.limit : DEFAULT_STALE_LIMIT;
  const rows = ctx.db
    .prepare(`
      SELECT ${OBSERVATION_COLUMNS} FROM observations
      WHERE ${clauses.join(" AND ")}
      ORDER BY datetime(created_at) ASC, id ASC
      LIMIT ?
    `)
    .all(...params, limit);
  return observationRows.many(rows);
}

/**
 * Soft-deletes the listed observations and optionally records one summary
 * observation in their place. Ids that are missing or already deleted are
 * not counted. Totals are scoped by `project` and `scope`.
 */
export function compactObservations(ctx: StoreContext, params: CompactParams): CompactResult {
  if (params.ids.length === 0) throw new MemoryError("invalid_argument", "ids must not be empty");
  const summaryTitle = params.summaryTitle?.trim() ?? "";
  if (params.summaryContent?.trim() && !summaryTitle) {
    throw new MemoryError("invalid_argument", "summaryContent requires summaryTitle");
  }

  const run = ctx.db.transaction((): CompactResult => {
    const totalBefore = countObservations(ctx, params.project, params.scope);
    const now = formatTimestamp(ctx.clock());
    const softDelete = ctx.db.prepare(
      `UPDATE observations SET deleted_at = ?, updated_at = ? WHERE id = ? AND deleted_at IS NULL`,
    );
    let deletedCount = 0;
    for (const id of new Set(params.ids)) {
      deletedCount += softDelete.run(now, now, id).changes;
    }

    let summaryId: number | null = null;
    if (summaryTitle) {
      summaryId = createObservation(ctx, {
        sessionId: params.sessionId || MANUAL_SESSION_ID,
        type: COMPACTION_SUMMARY_TYPE,
        title: summaryTitle,
        content: params.summaryContent?.trim() ? params.summaryContent : `Compacted ${deletedCount} observations.`,
        project: params.project,
        scope: params.scope,
      });
    }

    return { deletedCount, totalBefore, totalAfter: countObservations(ctx, params.project, params.scope), summaryId };
  });

  try {
    const result = run();
    log.debug({ ...result }, "observations compacted");
    return result;
  } catch (error) {
    throw toMemoryError(error, "compact observations");
  }
}
