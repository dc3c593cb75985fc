import { log } from "@/logger";
import type { StoreContext } from "@/memory/db";
import { isUniqueViolation, MemoryError, toMemoryError } from "@/memory/errors";
import { nullable } from "@/memory/normalize";
import { RELATION_COLUMNS, relationRows } from "@/memory/rows";
import type { AddRelationParams, Relation } from "@/memory/types";
import { formatTimestamp } from "@/utils/clock";

export const DEFAULT_RELATION_TYPE = "relates_to";

function isActive(ctx: StoreContext, id: number): boolean {
  return ctx.db.prepare(`SELECT 1 FROM observations WHERE id = ? AND deleted_at IS NULL`).get(id) !== undefined;
}

/**
 * Adds a typed edge between two active observations. With `bidirectional`
 * both directions are written in one transaction and the ids come back as
 * [forward, reverse].
 */
export function addRelation(ctx: StoreContext, params: AddRelationParams): number[] {
  const { fromId, toId } = params;
  if (fromId === toId) {
    throw new MemoryError("invalid_argument", `cannot relate observation ${fromId} to itself`);
  }
  const type = params.type?.trim() || DEFAULT_RELATION_TYPE;
  for (const id of [fromId, toId]) {
    if (!isActive(ctx, id)) throw new MemoryError("not_found", `observation ${id} not found`);
  }

  const note = nullable(params.note);
  const now = formatTimestamp(ctx.clock());
  const insert = ctx.db.prepare(`INSERT INTO relations (from_id, to_id, type, note, created_at) VALUES (?, ?, ?, ?, ?)`);

  const insertEdge = (from: number, to: number): number => {
    try {
      return Number(insert.run(from, to, type, note, now).lastInsertRowid);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new MemoryError("already_exists", `relation ${from} -> ${to} (${type}) already exists`, { cause: error });
      }
      throw error;
    }
  };

  const run = ctx.db.transaction((): number[] =>
    params.bidirectional ? [insertEdge(fromId, toId), insertEdge(toId, fromId)] : [insertEdge(fromId, toId)],
  );

  try {
    const ids = run();
    log.debug({ ids, fromId, toId, type }, "relation added");
    return ids;
  } catch (error) {
    throw toMemoryError(error, "add relation");
  }
}

export function removeRelation(ctx: StoreContext, id: number): void {
  let changes: number;
  try {
    changes = ctx.db.prepare(`DELETE FROM relations WHERE id = ?`).run(id).changes;
  } catch (error) {
    throw toMemoryError(error, `remove relation ${id}`);
  }
  if (changes === 0) throw new MemoryError("not_found", `relation ${id} not found`);
  log.debug({ id }, "relation removed");
}

/** Every edge touching the observation, oldest first. Endpoints are not rechecked. */
export function getRelations(ctx: StoreContext, observationId: number): Relation[] {
  const rows = ctx.db
    .prepare(`
      SELECT ${RELATION_COLUMNS} FROM relations
      WHERE from_id = ? OR to_id = ?
      ORDER BY datetime(created_at) ASC, id ASC
    `)
    .all(observationId, observationId);
  return relationRows.many(rows);
}
