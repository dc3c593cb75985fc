import { log } from "@/logger";
import type { StoreContext } from "@/memory/db";
import { getObservation } from "@/memory/observations";
import { getRelations } from "@/memory/relations";
import { OBSERVATION_META_COLUMNS, observationMetaRows } from "@/memory/rows";
import type { ContextNode, ContextResult, Direction, ObservationMeta } from "@/memory/types";

export const DEFAULT_CONTEXT_DEPTH = 2;
export const MAX_CONTEXT_DEPTH = 5;

export function clampDepth(depth: number | undefined): number {
  const d = depth === undefined ? Number.NaN : Math.floor(depth);
  if (!Number.isFinite(d) || d <= 0) return DEFAULT_CONTEXT_DEPTH;
  return Math.min(d, MAX_CONTEXT_DEPTH);
}

// Deliberately not filtered on deleted_at: a soft-deleted neighbour still exists.
function neighbourMeta(ctx: StoreContext, id: number): ObservationMeta | null {
  const row = ctx.db.prepare(`SELECT ${OBSERVATION_META_COLUMNS} FROM observations WHERE id = ?`).get(id);
  if (row === undefined) return null;
  const [meta] = observationMetaRows.many([row]);
  return meta ?? null;
}

/**
 * Breadth-first walk of the relation graph from `rootId`. Nodes are reported
 * in discovery order, each at most once, and never expanded past `depth`.
 */
export function buildContext(ctx: StoreContext, rootId: number, depth?: number): ContextResult {
  const limit = clampDepth(depth);
  const root = getObservation(ctx, rootId);

  const visited = new Set<number>([rootId]);
  const queue: Array<{ id: number; depth: number }> = [{ id: rootId, depth: 0 }];
  const connected: ContextNode[] = [];
  let reached = 0;

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    if (!current || current.depth >= limit) continue;

    for (const rel of getRelations(ctx, current.id)) {
      const outgoing = rel.fromId === current.id;
      const otherId = outgoing ? rel.toId : rel.fromId;
      const direction: Direction = outgoing ? "outgoing" : "incoming";
      if (visited.has(otherId)) continue;
      visited.add(otherId);

      const meta = neighbourMeta(ctx, otherId);
      if (!meta) {
        log.warn({ rootId, neighbour: otherId }, "skipping vanished neighbour");
        continue;
      }

      const nodeDepth = current.depth + 1;
      connected.push({ ...meta, relationType: rel.type, direction, note: rel.note, depth: nodeDepth });
      reached = Math.max(reached, nodeDepth);
      queue.push({ id: otherId, depth: nodeDepth });
    }
  }

  return { root, connected, totalNodes: connected.length, maxDepth: reached };
}
