import type { StoreContext } from "@/memory/db";
import { getObservation } from "@/memory/observations";
import { countOf, OBSERVATION_COLUMNS, observationRows } from "@/memory/rows";
import { getSession } from "@/memory/sessions";
import type { TimelineResult } from "@/memory/types";

const DEFAULT_WINDOW = 5;

/**
 * The focus observation with up to `before` older and `after` newer
 * neighbours from the same session, both sides in chronological order.
 */
export function timeline(ctx: StoreContext, observationId: number, before = DEFAULT_WINDOW, after = DEFAULT_WINDOW): TimelineResult {
  const focus = getObservation(ctx, observationId);
  const session = getSession(ctx, focus.sessionId);

  const older = observationRows.many(
    ctx.db
      .prepare(`
        SELECT ${OBSERVATION_COLUMNS} FROM observations
        WHERE session_id = ? AND id < ? AND deleted_at IS NULL
        ORDER BY id DESC
        LIMIT ?
      `)
      .all(focus.sessionId, focus.id, before > 0 ? before : DEFAULT_WINDOW),
  );
  const newer = observationRows.many(
    ctx.db
      .prepare(`
        SELECT ${OBSERVATION_COLUMNS} FROM observations
        WHERE session_id = ? AND id > ? AND deleted_at IS NULL
        ORDER BY id ASC
        LIMIT ?
      `)
      .all(focus.sessionId, focus.id, after > 0 ? after : DEFAULT_WINDOW),
  );
  const totalInSession = countOf(
    ctx.db
      .prepare(`SELECT COUNT(*) FROM observations WHERE session_id = ? AND deleted_at IS NULL`)
      .pluck()
      .get(focus.sessionId),
  );

  return { focus, before: older.reverse(), after: newer, session, totalInSession };
}
