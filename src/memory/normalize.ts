import { createHash } from "crypto";
import type { Scope } from "@/memory/types";

export const REDACTION_TOKEN = "[REDACTED]";
export const TRUNCATION_MARKER = "... [truncated]";
const MAX_TOPIC_KEY_LENGTH = 120;

const PRIVATE_TAG = /<private>[\s\S]*?<\/private>/gi;
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/g;

function words(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

export function stripPrivateTags(text: string): string {
  return text.replace(PRIVATE_TAG, REDACTION_TOKEN).trim();
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

export function capContent(content: string, maxLength: number): string {
  if (content.length <= maxLength) return content;
  let end = maxLength;
  // Never split a surrogate pair.
  if (end > 0 && isHighSurrogate(content.charCodeAt(end - 1))) end -= 1;
  return content.slice(0, end) + TRUNCATION_MARKER;
}

export function normalizeScope(scope: string | null | undefined): Scope {
  return (scope ?? "").trim().toLowerCase() === "personal" ? "personal" : "project";
}

/** Returns "" for keys that are blank after normalisation. */
export function normalizeTopicKey(topic: string | null | undefined): string {
  const v = (topic ?? "").trim().toLowerCase();
  if (!v) return "";
  return words(v).join("-").slice(0, MAX_TOPIC_KEY_LENGTH);
}

export function hashNormalized(content: string): string {
  const normalized = words(content).join(" ").toLowerCase();
  return createHash("sha256").update(normalized).digest("hex");
}

/**
 * Quotes every whitespace-separated token so FTS5 treats it as a literal
 * phrase. "fix auth bug" becomes `"fix" "auth" "bug"`.
 */
export function sanitizeFts(query: string): string {
  return words(query)
    .map((w) => w.replace(CONTROL_CHARS, "").replace(/^"+|"+$/g, ""))
    .filter(Boolean)
    .map((w) => `"${w.replace(/"/g, '""')}"`)
    .join(" ");
}

export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  return `${text.slice(0, max)}...`;
}

export function nullable(value: string | null | undefined): string | null {
  return value ? value : null;
}
