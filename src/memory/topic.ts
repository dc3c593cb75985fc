import { stripPrivateTags } from "@/memory/normalize";

const MAX_SEGMENT_LENGTH = 100;
const CONTENT_WORDS = 8;

const TYPE_FAMILIES = new Map<string, string>([
  ["architecture", "architecture"],
  ["design", "architecture"],
  ["adr", "architecture"],
  ["refactor", "architecture"],
  ["bug", "bug"],
  ["bugfix", "bug"],
  ["fix", "bug"],
  ["incident", "bug"],
  ["hotfix", "bug"],
  ["decision", "decision"],
  ["pattern", "pattern"],
  ["convention", "pattern"],
  ["guideline", "pattern"],
  ["config", "config"],
  ["setup", "config"],
  ["infra", "config"],
  ["infrastructure", "config"],
  ["ci", "config"],
  ["discovery", "discovery"],
  ["investigation", "discovery"],
  ["root_cause", "discovery"],
  ["root-cause", "discovery"],
  ["learning", "learning"],
  ["learn", "learning"],
  ["session_summary", "session"],
]);

// Checked in order; the first family with a keyword in the text wins.
const KEYWORD_FAMILIES: Array<[string, string[]]> = [
  ["bug", ["bug", "fix", "panic", "error", "crash", "regression", "incident", "hotfix"]],
  ["architecture", ["architecture", "design", "adr", "boundary", "hexagonal", "refactor"]],
  ["decision", ["decision", "tradeoff", "chose", "choose", "decide"]],
  ["pattern", ["pattern", "convention", "naming", "guideline"]],
  ["config", ["config", "setup", "environment", "env", "docker", "pipeline"]],
  ["discovery", ["discovery", "investigate", "investigation", "found", "root cause"]],
  ["learning", ["learned", "learning"]],
];

const TOOL_TYPES = new Map<string, string>([
  ["write", "file_change"],
  ["edit", "file_change"],
  ["patch", "file_change"],
  ["bash", "command"],
  ["read", "file_read"],
  ["view", "file_read"],
  ["grep", "search"],
  ["glob", "search"],
  ["ls", "search"],
]);

export function normalizeTopicSegment(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, " ")
    .split(" ")
    .filter(Boolean)
    .join("-")
    .slice(0, MAX_SEGMENT_LENGTH);
}

function inferTopicFamily(type: string, title: string, content: string): string {
  const t = type.trim().toLowerCase();
  const direct = TYPE_FAMILIES.get(t);
  if (direct) return direct;

  const text = `${title} ${content}`.toLowerCase();
  for (const [family, keywords] of KEYWORD_FAMILIES) {
    if (keywords.some((k) => text.includes(k))) return family;
  }

  if (t && t !== "manual") return normalizeTopicSegment(t) || "topic";
  return "topic";
}

/**
 * Proposes a stable `family/segment` topic key, e.g.
 * `suggestTopicKey("bugfix", "Fix N+1 in orders", "")` gives `bug/fix-n-1-in-orders`.
 */
export function suggestTopicKey(type: string, title: string, content: string): string {
  const family = inferTopicFamily(type, title, content);
  let segment = normalizeTopicSegment(stripPrivateTags(title));
  if (!segment) {
    const words = stripPrivateTags(content).toLowerCase().split(/\s+/).filter(Boolean).slice(0, CONTENT_WORDS);
    segment = normalizeTopicSegment(words.join(" "));
  }
  if (segment.startsWith(`${family}-`)) segment = segment.slice(family.length + 1);
  if (!segment || segment === family) segment = "general";
  return `${family}/${segment}`;
}

export function classifyTool(toolName: string): string {
  return TOOL_TYPES.get(toolName) ?? "tool_use";
}
