import { log } from "@/logger";
import type { StoreContext } from "@/memory/db";
import { truncate } from "@/memory/normalize";
import { recentObservations } from "@/memory/observations";
import { recentPrompts } from "@/memory/prompts";
import { countOf } from "@/memory/rows";
import { recentSessions } from "@/memory/sessions";
import type { MemoryStats } from "@/memory/types";

const CONTEXT_SESSIONS = 5;
const CONTEXT_PROMPTS = 10;

export function stats(ctx: StoreContext): MemoryStats {
  const count = (sql: string): number => countOf(ctx.db.prepare(sql).pluck().get());

  const projects: string[] = [];
  const rows = ctx.db
    .prepare(`
      SELECT project FROM observations
      WHERE project IS NOT NULL AND deleted_at IS NULL
      GROUP BY project
      ORDER BY MAX(datetime(created_at)) DESC, MAX(id) DESC
    `)
    .pluck()
    .all();
  for (const project of rows) {
    if (typeof project === "string") projects.push(project);
    else log.warn({ project }, "skipping unreadable project row");
  }

  return {
    totalSessions: count(`SELECT COUNT(*) FROM sessions`),
    totalObservations: count(`SELECT COUNT(*) FROM observations WHERE deleted_at IS NULL`),
    totalPrompts: count(`SELECT COUNT(*) FROM user_prompts`),
    projects,
  };
}

export function formatStats(s: MemoryStats): string {
  const lines = [
    "## Memory Statistics",
    "",
    `- **Sessions**: ${s.totalSessions}`,
    `- **Observations**: ${s.totalObservations}`,
    `- **User Prompts**: ${s.totalPrompts}`,
    s.projects.length > 0
      ? `- **Projects** (${s.projects.length}): ${s.projects.join(", ")}`
      : "- **Projects**: none",
  ];
  return `${lines.join("\n")}\n`;
}

/** Markdown digest of recent activity, or "" when there is nothing to show. */
export function formatContext(ctx: StoreContext, project?: string, scope?: string): string {
  const sessions = recentSessions(ctx, project, CONTEXT_SESSIONS);
  const observations = recentObservations(ctx, project, scope, ctx.config.maxContextResults);
  const prompts = recentPrompts(ctx, project, CONTEXT_PROMPTS);
  if (sessions.length === 0 && observations.length === 0 && prompts.length === 0) return "";

  let out = "## Memory from Previous Sessions\n\n";
  if (sessions.length > 0) {
    out += "### Recent Sessions\n";
    for (const s of sessions) {
      const summary = s.summary ? `: ${truncate(s.summary, 200)}` : "";
      out += `- **${s.project}** (${s.startedAt})${summary} [${s.observationCount} observations]\n`;
    }
    out += "\n";
  }
  if (prompts.length > 0) {
    out += "### Recent User Prompts\n";
    for (const p of prompts) out += `- ${p.createdAt}: ${truncate(p.content, 200)}\n`;
    out += "\n";
  }
  if (observations.length > 0) {
    out += "### Recent Observations\n";
    for (const o of observations) out += `- [${o.type}] **${o.title}**: ${truncate(o.content, 300)}\n`;
    out += "\n";
  }
  return out;
}

export function navigationHint(showing: number, total: number, hint = ""): string {
  if (showing >= total) return "";
  const base = `📊 Showing ${showing} of ${total} results.`;
  return hint ? `${base} ${hint}` : base;
}
