import { truncate } from "@/memory/normalize";
import type { DetailLevel, Observation } from "@/memory/types";

export const DETAIL_LEVELS: readonly DetailLevel[] = ["summary", "standard", "full"];
export const STANDARD_CONTENT_LENGTH = 300;

export function parseDetailLevel(value: string | null | undefined): DetailLevel {
  return value === "summary" || value === "full" ? value : "standard";
}

function headline(obs: Observation): string {
  const project = obs.project ? ` (${obs.project})` : "";
  return `#${obs.id} [${obs.type}] ${obs.title}${project}`;
}

/**
 * summary: one headline line.
 * standard: headline plus content cut to 300 characters.
 * full: headline plus the whole content.
 */
export function formatObservation(obs: Observation, level: DetailLevel = "standard"): string {
  switch (level) {
    case "summary":
      return headline(obs);
    case "full":
      return `${headline(obs)}\n${obs.content}`;
    case "standard":
      return `${headline(obs)}\n${truncate(obs.content, STANDARD_CONTENT_LENGTH)}`;
  }
}
