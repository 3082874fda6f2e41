// packages/core/src/memory/database.ts

import Database from 'better-sqlite3';
import { DatabaseError } from '../utils/errors.js';

const SCHEMA_VERSION = '2';

const MIGRATIONS = [
  // Recorded pattern runs
  `CREATE TABLE IF NOT EXISTS runs (
    id            TEXT PRIMARY KEY,
    pattern_id    TEXT NOT NULL,
    trace_id      TEXT NOT NULL,
    request_id    TEXT NOT NULL,
    status        TEXT NOT NULL CHECK(status IN ('completed','aborted')),
    error_code    TEXT,
    error_message TEXT,
    error_step    INTEGER,
    inputs_json   TEXT NOT NULL,
    outputs_json  TEXT,
    trace_json    TEXT NOT NULL,
    duration_ms   INTEGER NOT NULL DEFAULT 0,
    created_at    INTEGER NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_runs_pattern ON runs(pattern_id, created_at DESC)',
  'CREATE INDEX IF NOT EXISTS idx_runs_status ON runs(status)',
  'CREATE INDEX IF NOT EXISTS idx_runs_created ON runs(created_at DESC)',

  // One row per trace entry, for per-capability queries
  `CREATE TABLE IF NOT EXISTS run_steps (
    run_id      TEXT NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
    idx         INTEGER NOT NULL,
    capability  TEXT NOT NULL,
    status      TEXT NOT NULL CHECK(status IN ('succeeded','failed','skipped')),
    handler_id  TEXT,
    attempts    INTEGER NOT NULL DEFAULT 0,
    duration_ms INTEGER NOT NULL DEFAULT 0,
    PRIMARY KEY (run_id, idx)
  )`,
  'CREATE INDEX IF NOT EXISTS idx_run_steps_capability ON run_steps(capability, status)',

  // Schema meta
  `CREATE TABLE IF NOT EXISTS schema_meta (
    key   TEXT PRIMARY KEY,
    value TEXT NOT NULL
  )`,
];

/**
 * Open a SQLite database and run migrations.
 * Pass ':memory:' for in-memory databases (testing).
 */
export function openDatabase(dbPath: string): Database.Database {
  try {
    const db = new Database(dbPath);
    configurePragmas(db);
    runMigrations(db);
    return db;
  } catch (err) {
    throw new DatabaseError(
      `Failed to open database at "${dbPath}": ${err instanceof Error ? err.message : String(err)}`,
      'open',
    );
  }
}

function configurePragmas(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');
}

/**
 * Run all schema migrations. Idempotent (uses IF NOT EXISTS).
 */
export function runMigrations(db: Database.Database): void {
  db.transaction(() => {
    for (const sql of MIGRATIONS) {
      db.exec(sql);
    }

    // v2: request cache stats were added to recorded runs
    if (!hasColumn(db, 'runs', 'cache_hits')) {
      db.exec('ALTER TABLE runs ADD COLUMN cache_hits INTEGER NOT NULL DEFAULT 0');
    }

    db.prepare("INSERT OR REPLACE INTO schema_meta(key, value) VALUES ('version', ?)").run(
      SCHEMA_VERSION,
    );
    db.prepare(
      "INSERT OR IGNORE INTO schema_meta(key, value) VALUES ('created_at', datetime('now'))",
    ).run();
  })();
}

function hasColumn(db: Database.Database, table: string, column: string): boolean {
  const columns = db.prepare(`PRAGMA table_info(${table})`).all() as { name: string }[];
  return columns.some((c) => c.name === column);
}

/** Get the current schema version. */
export function getSchemaVersion(db: Database.Database): string | null {
  const row = db.prepare("SELECT value FROM schema_meta WHERE key = 'version'").get() as
    | { value: string }
    | undefined;
  return row?.value ?? null;
}
