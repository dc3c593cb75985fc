import type Database from "better-sqlite3";
import { log } from "@/logger";

const SCHEMA_VERSION = 1;

function hasColumn(db: Database.Database, table: string, column: string): boolean {
  const rows = db.prepare(`PRAGMA table_info(${table});`).all();
  return rows.some((row) => typeof row === "object" && row !== null && "name" in row && row.name === column);
}

function hasTrigger(db: Database.Database, name: string): boolean {
  return db.prepare(`SELECT 1 FROM sqlite_master WHERE type = 'trigger' AND name = ?`).get(name) !== undefined;
}

// Columns added after the first release of the observations table. Each entry
// must carry a default so ADD COLUMN works against populated tables.
const OBSERVATION_COLUMNS: Array<[string, string]> = [
  ["tool_name", "TEXT"],
  ["project", "TEXT"],
  ["scope", "TEXT NOT NULL DEFAULT 'project'"],
  ["topic_key", "TEXT"],
  ["normalized_hash", "TEXT"],
  ["revision_count", "INTEGER NOT NULL DEFAULT 1"],
  ["duplicate_count", "INTEGER NOT NULL DEFAULT 1"],
  ["last_seen_at", "TEXT"],
  ["updated_at", "TEXT NOT NULL DEFAULT ''"],
  ["deleted_at", "TEXT"],
];

export function ensureSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      version INTEGER NOT NULL
    );
    INSERT OR IGNORE INTO schema_version(id, version) VALUES (1, 0);
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS sessions (
      id         TEXT PRIMARY KEY,
      project    TEXT NOT NULL,
      directory  TEXT NOT NULL,
      started_at TEXT NOT NULL DEFAULT (datetime('now')),
      ended_at   TEXT,
      summary    TEXT
    );

    CREATE TABLE IF NOT EXISTS observations (
      id              INTEGER PRIMARY KEY AUTOINCREMENT,
      session_id      TEXT    NOT NULL,
      type            TEXT    NOT NULL,
      title           TEXT    NOT NULL,
      content         TEXT    NOT NULL,
      tool_name       TEXT,
      project         TEXT,
      scope           TEXT    NOT NULL DEFAULT 'project',
      topic_key       TEXT,
      normalized_hash TEXT,
      revision_count  INTEGER NOT NULL DEFAULT 1,
      duplicate_count INTEGER NOT NULL DEFAULT 1,
      last_seen_at    TEXT,
      created_at      TEXT    NOT NULL DEFAULT (datetime('now')),
      updated_at      TEXT    NOT NULL DEFAULT (datetime('now')),
      deleted_at      TEXT
    );

    CREATE TABLE IF NOT EXISTS user_prompts (
      id         INTEGER PRIMARY KEY AUTOINCREMENT,
      session_id TEXT    NOT NULL,
      content    TEXT    NOT NULL,
      project    TEXT,
      created_at TEXT    NOT NULL DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS relations (
      id         INTEGER PRIMARY KEY AUTOINCREMENT,
      from_id    INTEGER NOT NULL,
      to_id      INTEGER NOT NULL,
      type       TEXT    NOT NULL DEFAULT 'relates_to',
      note       TEXT,
      created_at TEXT    NOT NULL DEFAULT (datetime('now')),
      FOREIGN KEY (from_id) REFERENCES observations(id) ON DELETE CASCADE,
      FOREIGN KEY (to_id)   REFERENCES observations(id) ON DELETE CASCADE
    );
  `);

  for (const [column, definition] of OBSERVATION_COLUMNS) {
    if (!hasColumn(db, "observations", column)) {
      db.exec(`ALTER TABLE observations ADD COLUMN ${column} ${definition}`);
    }
  }

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_obs_session ON observations(session_id);
    CREATE INDEX IF NOT EXISTS idx_obs_type    ON observations(type);
    CREATE INDEX IF NOT EXISTS idx_obs_project ON observations(project);
    CREATE INDEX IF NOT EXISTS idx_obs_created ON observations(created_at DESC);
    CREATE INDEX IF NOT EXISTS idx_obs_scope   ON observations(scope);
    CREATE INDEX IF NOT EXISTS idx_obs_topic   ON observations(topic_key, project, scope, updated_at DESC);
    CREATE INDEX IF NOT EXISTS idx_obs_deleted ON observations(deleted_at);
    CREATE INDEX IF NOT EXISTS idx_obs_dedupe  ON observations(normalized_hash, project, scope, type, title, created_at DESC);

    CREATE INDEX IF NOT EXISTS idx_prompts_session ON user_prompts(session_id);
    CREATE INDEX IF NOT EXISTS idx_prompts_project ON user_prompts(project);
    CREATE INDEX IF NOT EXISTS idx_prompts_created ON user_prompts(created_at DESC);

    CREATE INDEX IF NOT EXISTS idx_rel_from ON relations(from_id);
    CREATE INDEX IF NOT EXISTS idx_rel_to   ON relations(to_id);
    CREATE INDEX IF NOT EXISTS idx_rel_type ON relations(type);
    CREATE UNIQUE INDEX IF NOT EXISTS idx_rel_unique ON relations(from_id, to_id, type);

    CREATE VIRTUAL TABLE IF NOT EXISTS observations_fts USING fts5(
      title, content, tool_name, type, project,
      content='observations',
      content_rowid='id'
    );

    CREATE VIRTUAL TABLE IF NOT EXISTS prompts_fts USING fts5(
      content, project,
      content='user_prompts',
      content_rowid='id'
    );
  `);

  normalizeLegacyRows(db);

  if (!hasTrigger(db, "obs_fts_insert")) {
    db.exec(`
      CREATE TRIGGER obs_fts_insert AFTER INSERT ON observations BEGIN
        INSERT INTO observations_fts(rowid, title, content, tool_name, type, project)
        VALUES (new.id, new.title, new.content, new.tool_name, new.type, new.project);
      END;

      CREATE TRIGGER obs_fts_delete AFTER DELETE ON observations BEGIN
        INSERT INTO observations_fts(observations_fts, rowid, title, content, tool_name, type, project)
        VALUES ('delete', old.id, old.title, old.content, old.tool_name, old.type, old.project);
      END;

      CREATE TRIGGER obs_fts_update AFTER UPDATE ON observations BEGIN
        INSERT INTO observations_fts(observations_fts, rowid, title, content, tool_name, type, project)
        VALUES ('delete', old.id, old.title, old.content, old.tool_name, old.type, old.project);
        INSERT INTO observations_fts(rowid, title, content, tool_name, type, project)
        VALUES (new.id, new.title, new.content, new.tool_name, new.type, new.project);
      END;
    `);
    // Rows written before the triggers existed are not in the index yet.
    db.exec(`INSERT INTO observations_fts(observations_fts) VALUES ('rebuild')`);
  }

  if (!hasTrigger(db, "prompt_fts_insert")) {
    db.exec(`
      CREATE TRIGGER prompt_fts_insert AFTER INSERT ON user_prompts BEGIN
        INSERT INTO prompts_fts(rowid, content, project)
        VALUES (new.id, new.content, new.project);
      END;

      CREATE TRIGGER prompt_fts_delete AFTER DELETE ON user_prompts BEGIN
        INSERT INTO prompts_fts(prompts_fts, rowid, content, project)
        VALUES ('delete', old.id, old.content, old.project);
      END;

      CREATE TRIGGER prompt_fts_update AFTER UPDATE ON user_prompts BEGIN
        INSERT INTO prompts_fts(prompts_fts, rowid, content, project)
        VALUES ('delete', old.id, old.content, old.project);
        INSERT INTO prompts_fts(rowid, content, project)
        VALUES (new.id, new.content, new.project);
      END;
    `);
    db.exec(`INSERT INTO prompts_fts(prompts_fts) VALUES ('rebuild')`);
  }

  const current = db.prepare(`SELECT version FROM schema_version WHERE id = 1`).pluck().get();
  if (typeof current !== "number" || current < SCHEMA_VERSION) {
    db.prepare(`UPDATE schema_version SET version = ? WHERE id = 1`).run(SCHEMA_VERSION);
  }
}

const LEGACY_FIXES = [
  `UPDATE observations SET scope = 'project' WHERE scope IS NULL OR scope = ''`,
  `UPDATE observations SET topic_key = NULL WHERE topic_key = ''`,
  `UPDATE observations SET revision_count = 1 WHERE revision_count IS NULL OR revision_count < 1`,
  `UPDATE observations SET duplicate_count = 1 WHERE duplicate_count IS NULL OR duplicate_count < 1`,
  `UPDATE observations SET updated_at = created_at WHERE updated_at IS NULL OR updated_at = ''`,
];

// Runs before the FTS triggers exist on a fresh database, and on later
// startups only touches rows that still need repair.
function normalizeLegacyRows(db: Database.Database): void {
  for (const statement of LEGACY_FIXES) {
    try {
      const { changes } = db.prepare(statement).run();
      if (changes > 0) log.info({ changes, statement }, "normalized legacy observation rows");
    } catch (error) {
      log.warn({ err: error, statement }, "legacy normalization skipped");
    }
  }
}
