import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import * as schema from './schema.js';

export type TraceDatabase = BetterSQLite3Database<typeof schema>;

export interface TraceDatabaseHandle {
  /** Drizzle ORM instance. Use this for all queries. */
  db: TraceDatabase;
  sqlite: Database.Database;
  close(): void;
}

/** Opens (or creates) the trace database. Pass ':memory:' for an in-process one. */
export function openTraceDatabase(dbPath: string): TraceDatabaseHandle {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const sqlite = new Database(dbPath);
  if (dbPath !== ':memory:') {
    // Enable WAL mode for better concurrent read performance
    sqlite.pragma('journal_mode = WAL');
  }

  // Create tables if they don't exist (simple migration for dev)
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS tool_traces (
      id TEXT PRIMARY KEY,
      created_at TEXT NOT NULL,
      session_id TEXT NOT NULL,
      tool_name TEXT NOT NULL,
      status TEXT NOT NULL,
      failure_kind TEXT,
      duration_ms INTEGER NOT NULL,
      params_json TEXT NOT NULL,
      updates_json TEXT,
      error_json TEXT
    );
    CREATE INDEX IF NOT EXISTS tool_traces_session_idx ON tool_traces(session_id, created_at);
  `);

  return {
    db: drizzle(sqlite, { schema }),
    sqlite,
    close: () => sqlite.close(),
  };
}
