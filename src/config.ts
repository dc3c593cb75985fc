import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { parse } from "@iarna/toml";
import { config as loadEnv } from "dotenv";
import { z } from "zod";
import { getHomeDir } from "@/home";
import { MemoryError } from "@/memory/errors";

export type MemoryConfig = {
  dataDir: string;
  maxObservationLength: number;
  maxContextResults: number;
  maxSearchResults: number;
  dedupeWindowMinutes: number;
  busyTimeoutMs: number;
};

const memorySectionSchema = z
  .object({
    data_dir: z.string().min(1).optional(),
    max_observation_length: z.number().int().positive().optional(),
    max_context_results: z.number().int().positive().optional(),
    max_search_results: z.number().int().positive().optional(),
    dedupe_window_minutes: z.number().int().positive().optional(),
    busy_timeout_ms: z.number().int().nonnegative().optional(),
  })
  .strict();

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
const logLevelSchema = z.enum(LOG_LEVELS);
export type LogLevel = z.infer<typeof logLevelSchema>;

const appConfigSchema = z.object({
  log_level: logLevelSchema.optional(),
  memory: memorySectionSchema.optional(),
});

type AppConfig = z.infer<typeof appConfigSchema>;

let _config: AppConfig | null = null;

export function defaultMemoryConfig(dataDir: string = getHomeDir()): MemoryConfig {
  return {
    dataDir,
    maxObservationLength: 2000,
    maxContextResults: 20,
    maxSearchResults: 20,
    dedupeWindowMinutes: 15,
    busyTimeoutMs: 5000,
  };
}

export function parseAppConfig(source: string, origin = "config.toml"): AppConfig {
  let raw: unknown;
  try {
    raw = parse(source);
  } catch (error) {
    throw new MemoryError("invalid_argument", `${origin}: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }
  const result = appConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `  - ${i.path.join(".")}: ${i.message}`).join("\n");
    throw new MemoryError("invalid_argument", `${origin} is invalid:\n${issues}`);
  }
  return result.data;
}

function loadConfig(): AppConfig {
  if (_config) return _config;
  const homeDir = getHomeDir();
  loadEnv({ path: join(homeDir, ".env") });
  const configPath = join(homeDir, "config.toml");
  if (!existsSync(configPath)) {
    _config = {};
    return _config;
  }
  _config = parseAppConfig(readFileSync(configPath, "utf-8"), configPath);
  return _config;
}

export function resetConfigCache(): void {
  _config = null;
}

function envNumber(key: string, fallback: number): number {
  const val = process.env[key];
  if (val === undefined || val.trim() === "") return fallback;
  const parsed = Number.parseInt(val, 10);
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

export function resolveMemoryConfig(cfg: AppConfig, homeDir: string = getHomeDir()): MemoryConfig {
  const defaults = defaultMemoryConfig(homeDir);
  const section = cfg.memory ?? {};
  return {
    dataDir: section.data_dir ?? defaults.dataDir,
    maxObservationLength: envNumber(
      "RECOLLECT_MAX_OBSERVATION_LENGTH",
      section.max_observation_length ?? defaults.maxObservationLength,
    ),
    maxContextResults: section.max_context_results ?? defaults.maxContextResults,
    maxSearchResults: envNumber("RECOLLECT_MAX_SEARCH_RESULTS", section.max_search_results ?? defaults.maxSearchResults),
    dedupeWindowMinutes: envNumber(
      "RECOLLECT_DEDUPE_WINDOW_MINUTES",
      section.dedupe_window_minutes ?? defaults.dedupeWindowMinutes,
    ),
    busyTimeoutMs: section.busy_timeout_ms ?? defaults.busyTimeoutMs,
  };
}

export function loadMemoryConfig(): MemoryConfig {
  return resolveMemoryConfig(loadConfig());
}

export function getLogLevel(): LogLevel {
  const fromEnv = logLevelSchema.safeParse(process.env.LOG_LEVEL?.trim().toLowerCase());
  if (fromEnv.success) return fromEnv.data;
  return loadConfig().log_level ?? "info";
}
