import { log } from "@/logger";
import type { StoreContext } from "@/memory/db";
import { MemoryError, toMemoryError } from "@/memory/errors";
import { nullable } from "@/memory/normalize";
import { countOf, SESSION_COLUMNS, sessionRows } from "@/memory/rows";
import type { Session, SessionSummary } from "@/memory/types";
import { formatTimestamp } from "@/utils/clock";

/** Registers a session. A repeated id is ignored and the original row kept. */
export function startSession(ctx: StoreContext, id: string, project: string, directory: string): boolean {
  if (!id.trim()) throw new MemoryError("invalid_argument", "session id is required");
  try {
    const { changes } = ctx.db
      .prepare(`INSERT OR IGNORE INTO sessions (id, project, directory, started_at) VALUES (?, ?, ?, ?)`)
      .run(id, project, directory, formatTimestamp(ctx.clock()));
    log.debug({ id, project, created: changes > 0 }, "session started");
    return changes > 0;
  } catch (error) {
    throw toMemoryError(error, `start session ${id}`);
  }
}

export function endSession(ctx: StoreContext, id: string, summary?: string): void {
  let changes: number;
  try {
    changes = ctx.db
      .prepare(`UPDATE sessions SET ended_at = ?, summary = ? WHERE id = ?`)
      .run(formatTimestamp(ctx.clock()), nullable(summary), id).changes;
  } catch (error) {
    throw toMemoryError(error, `end session ${id}`);
  }
  if (changes === 0) throw new MemoryError("not_found", `session ${id} not found`);
}

export function getSession(ctx: StoreContext, id: string): Session | null {
  const row = ctx.db.prepare(`SELECT ${SESSION_COLUMNS} FROM sessions WHERE id = ?`).get(id);
  return row === undefined ? null : sessionRows.one(row);
}

export function recentSessions(ctx: StoreContext, project?: string, limit = 5): SessionSummary[] {
  const params: unknown[] = [];
  const where = project ? "WHERE s.project = ?" : "";
  if (project) params.push(project);

  const rows = ctx.db
    .prepare(`
      SELECT s.id, s.project, s.directory, s.started_at, s.ended_at, s.summary,
             COUNT(o.id) AS observation_count
      FROM sessions s
      LEFT JOIN observations o ON o.session_id = s.id AND o.deleted_at IS NULL
      ${where}
      GROUP BY s.id
      ORDER BY MAX(COALESCE(o.created_at, s.started_at)) DESC, s.started_at DESC
      LIMIT ?
    `)
    .all(...params, limit > 0 ? limit : 5);

  const out: SessionSummary[] = [];
  for (const row of rows) {
    const [session] = sessionRows.many([row]);
    if (!session) continue;
    const count = typeof row === "object" && row !== null && "observation_count" in row ? row.observation_count : 0;
    out.push({
      id: session.id,
      project: session.project,
      startedAt: session.startedAt,
      endedAt: session.endedAt,
      summary: session.summary,
      observationCount: countOf(count),
    });
  }
  return out;
}
