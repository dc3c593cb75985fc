import type { StoreContext } from "@/memory/db";
import { toMemoryError } from "@/memory/errors";
import { normalizeScope, sanitizeFts } from "@/memory/normalize";
import { OBSERVATION_COLUMNS, PROMPT_COLUMNS, observationRows, promptRows, rankOf } from "@/memory/rows";
import type { PromptSearchOptions, PromptSearchResult, SearchOptions, SearchResult } from "@/memory/types";

const DEFAULT_SEARCH_LIMIT = 10;

function qualified(columns: string, alias: string): string {
  return columns
    .split(",")
    .map((c) => `${alias}.${c.trim()}`)
    .join(", ");
}

function withRanks<T>(rows: unknown[], read: (rows: unknown[]) => T[]): Array<T & { rank: number }> {
  const out: Array<T & { rank: number }> = [];
  for (const row of rows) {
    const [item] = read([row]);
    if (item) out.push({ ...item, rank: rankOf(row) });
  }
  return out;
}

function clampLimit(ctx: StoreContext, limit: number | undefined): number {
  const requested = limit && limit > 0 ? limit : DEFAULT_SEARCH_LIMIT;
  return Math.min(requested, ctx.config.maxSearchResults);
}

function observationFilters(opts: SearchOptions, alias: string): { sql: string; params: unknown[] } {
  const prefix = alias ? `${alias}.` : "";
  let sql = `${prefix}deleted_at IS NULL`;
  const params: unknown[] = [];
  if (opts.type) {
    sql += ` AND ${prefix}type = ?`;
    params.push(opts.type);
  }
  if (opts.project) {
    sql += ` AND ${prefix}project = ?`;
    params.push(opts.project);
  }
  if (opts.scope) {
    sql += ` AND ${prefix}scope = ?`;
    params.push(normalizeScope(opts.scope));
  }
  return { sql, params };
}

/**
 * Ranked full-text search over observations. Every query token is matched
 * literally; a query with no tokens returns the newest matching rows with
 * rank 0 instead.
 */
export function search(ctx: StoreContext, query: string, opts: SearchOptions = {}): SearchResult[] {
  const limit = clampLimit(ctx, opts.limit);
  const match = sanitizeFts(query);

  if (!match) {
    const { sql, params } = observationFilters(opts, "");
    const rows = ctx.db
      .prepare(`
        SELECT ${OBSERVATION_COLUMNS}, 0 AS rank FROM observations
        WHERE ${sql}
        ORDER BY datetime(created_at) DESC, id DESC
        LIMIT ?
      `)
      .all(...params, limit);
    return withRanks(rows, observationRows.many);
  }

  const { sql, params } = observationFilters(opts, "o");
  try {
    const rows = ctx.db
      .prepare(`
        SELECT ${qualified(OBSERVATION_COLUMNS, "o")}, fts.rank AS rank
        FROM observations_fts fts
        JOIN observations o ON o.id = fts.rowid
        WHERE observations_fts MATCH ? AND ${sql}
        ORDER BY fts.rank
        LIMIT ?
      `)
      .all(match, ...params, limit);
    return withRanks(rows, observationRows.many);
  } catch (error) {
    throw toMemoryError(error, "search observations");
  }
}

export function searchPrompts(ctx: StoreContext, query: string, opts: PromptSearchOptions = {}): PromptSearchResult[] {
  const limit = clampLimit(ctx, opts.limit);
  const match = sanitizeFts(query);
  const params: unknown[] = [];

  if (!match) {
    let where = "";
    if (opts.project) {
      where = "WHERE project = ?";
      params.push(opts.project);
    }
    const rows = ctx.db
      .prepare(`
        SELECT ${PROMPT_COLUMNS}, 0 AS rank FROM user_prompts
        ${where}
        ORDER BY datetime(created_at) DESC, id DESC
        LIMIT ?
      `)
      .all(...params, limit);
    return withRanks(rows, promptRows.many);
  }

  let filter = "";
  if (opts.project) {
    filter = "AND p.project = ?";
    params.push(opts.project);
  }
  try {
    const rows = ctx.db
      .prepare(`
        SELECT ${qualified(PROMPT_COLUMNS, "p")}, fts.rank AS rank
        FROM prompts_fts fts
        JOIN user_prompts p ON p.id = fts.rowid
        WHERE prompts_fts MATCH ? ${filter}
        ORDER BY fts.rank
        LIMIT ?
      `)
      .all(match, ...params, limit);
    return withRanks(rows, promptRows.many);
  } catch (error) {
    throw toMemoryError(error, "search prompts");
  }
}
