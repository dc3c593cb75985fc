import { log } from "@/logger";
import type { StoreContext } from "@/memory/db";
import { MemoryError, toMemoryError } from "@/memory/errors";
import { capContent, nullable, stripPrivateTags } from "@/memory/normalize";
import { PROMPT_COLUMNS, promptRows } from "@/memory/rows";
import type { AddPromptParams, Prompt } from "@/memory/types";
import { formatTimestamp } from "@/utils/clock";

const DEFAULT_RECENT_PROMPTS = 20;

export function addPrompt(ctx: StoreContext, params: AddPromptParams): number {
  if (!params.sessionId.trim()) throw new MemoryError("invalid_argument", "session_id is required");
  const content = capContent(stripPrivateTags(params.content), ctx.config.maxObservationLength);
  if (!content) throw new MemoryError("invalid_argument", "prompt content is required");

  try {
    const res = ctx.db
      .prepare(`INSERT INTO user_prompts (session_id, content, project, created_at) VALUES (?, ?, ?, ?)`)
      .run(params.sessionId, content, nullable(params.project), formatTimestamp(ctx.clock()));
    const id = Number(res.lastInsertRowid);
    log.debug({ id, sessionId: params.sessionId }, "prompt saved");
    return id;
  } catch (error) {
    throw toMemoryError(error, "save prompt");
  }
}

export function recentPrompts(ctx: StoreContext, project?: string, limit = DEFAULT_RECENT_PROMPTS): Prompt[] {
  const params: unknown[] = [];
  let where = "";
  if (project) {
    where = "WHERE project = ?";
    params.push(project);
  }
  const rows = ctx.db
    .prepare(`
      SELECT ${PROMPT_COLUMNS} FROM user_prompts
      ${where}
      ORDER BY datetime(created_at) DESC, id DESC
      LIMIT ?
    `)
    .all(...params, limit > 0 ? limit : DEFAULT_RECENT_PROMPTS);
  return promptRows.many(rows);
}
