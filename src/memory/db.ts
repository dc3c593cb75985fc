import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, join } from "path";
import type { MemoryConfig } from "@/config";
import { log } from "@/logger";
import { toMemoryError } from "@/memory/errors";
import { ensureSchema } from "@/memory/schema";
import type { Clock } from "@/utils/clock";

export const MEMORY_DB_FILENAME = "memory.db";
export const IN_MEMORY = ":memory:";

/** Everything an engine operation needs: the connection, its limits and the time source. */
export type StoreContext = {
  db: Database.Database;
  config: MemoryConfig;
  clock: Clock;
};

export function resolveDbPath(config: MemoryConfig, path?: string): string {
  if (path) return path;
  return join(config.dataDir, MEMORY_DB_FILENAME);
}

export function openDatabase(path: string, busyTimeoutMs: number): Database.Database {
  if (path !== IN_MEMORY) {
    mkdirSync(dirname(path), { recursive: true, mode: 0o700 });
  }
  let db: Database.Database;
  try {
    db = new Database(path);
  } catch (error) {
    throw toMemoryError(error, `open ${path}`);
  }
  try {
    db.pragma("journal_mode = WAL");
    db.pragma(`busy_timeout = ${Math.max(0, Math.floor(busyTimeoutMs))}`);
    db.pragma("synchronous = NORMAL");
    db.pragma("foreign_keys = ON");
    db.pragma("temp_store = MEMORY");
    ensureSchema(db);
  } catch (error) {
    db.close();
    throw toMemoryError(error, "schema bootstrap");
  }
  log.debug({ path }, "memory database ready");
  return db;
}
