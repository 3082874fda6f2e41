import Database from 'better-sqlite3';
import { describe, expect, it } from 'vitest';
import { getSchemaVersion, openDatabase, runMigrations } from '../../../src/memory/database.js';

function tableNames(db: Database.Database): string[] {
  const rows = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
    .all() as { name: string }[];
  return rows.map((r) => r.name);
}

function columnNames(db: Database.Database, table: string): string[] {
  const rows = db.prepare(`PRAGMA table_info(${table})`).all() as { name: string }[];
  return rows.map((r) => r.name);
}

describe('openDatabase', () => {
  it('creates the history tables in a :memory: database', () => {
    const db = openDatabase(':memory:');
    expect(tableNames(db)).toEqual(['run_steps', 'runs', 'schema_meta']);
    db.close();
  });

  it('adds the cache_hits column', () => {
    const db = openDatabase(':memory:');
    expect(columnNames(db, 'runs')).toContain('cache_hits');
    db.close();
  });

  it('enables foreign keys', () => {
    const db = openDatabase(':memory:');
    expect(db.pragma('foreign_keys', { simple: true })).toBe(1);
    db.close();
  });

  it('records the schema version', () => {
    const db = openDatabase(':memory:');
    expect(getSchemaVersion(db)).toBe('2');
    db.close();
  });

  it('wraps open failures in DatabaseError', () => {
    expect(() => openDatabase('/nonexistent-dir/deeper/runs.db')).toThrow(/Failed to open database/);
  });
});

describe('runMigrations', () => {
  it('is idempotent', () => {
    const db = openDatabase(':memory:');
    runMigrations(db);
    runMigrations(db);
    expect(getSchemaVersion(db)).toBe('2');
    expect(columnNames(db, 'runs').filter((c) => c === 'cache_hits')).toHaveLength(1);
    db.close();
  });

  it('upgrades a version 1 runs table', () => {
    const db = new Database(':memory:');
    db.exec(`CREATE TABLE runs (
      id TEXT PRIMARY KEY, pattern_id TEXT NOT NULL, trace_id TEXT NOT NULL, request_id TEXT NOT NULL,
      status TEXT NOT NULL, error_code TEXT, error_message TEXT, error_step INTEGER,
      inputs_json TEXT NOT NULL, outputs_json TEXT, trace_json TEXT NOT NULL,
      duration_ms INTEGER NOT NULL DEFAULT 0, created_at INTEGER NOT NULL
    )`);
    db.prepare(
      `INSERT INTO runs (id, pattern_id, trace_id, request_id, status, inputs_json, trace_json, created_at)
       VALUES ('run_old', 'p', 't', 'r', 'completed', '{}', '{}', 1)`,
    ).run();

    runMigrations(db);

    const row = db.prepare("SELECT cache_hits FROM runs WHERE id = 'run_old'").get() as {
      cache_hits: number;
    };
    expect(row.cache_hits).toBe(0);
    db.close();
  });
});
