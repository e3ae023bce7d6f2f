import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { mkdirSync } from 'node:fs';

export type PlannerDb = BetterSQLite3Database<typeof schema> & { $client: Database.Database };

export const APP_DIR_NAME = 'study-planner';
export const DB_FILE_NAME = 'planner.db';
export const DB_PATH_ENV = 'STUDY_PLANNER_DB';

/** Returns the platform-appropriate default database path */
export function getDefaultDbPath(): string {
  const platform = process.platform;
  let dir: string;

  if (platform === 'darwin') {
    dir = join(homedir(), 'Library', 'Application Support', APP_DIR_NAME);
  } else if (platform === 'win32') {
    dir = join(process.env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), APP_DIR_NAME);
  } else {
    // Linux / other
    dir = join(process.env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), APP_DIR_NAME);
  }

  return join(dir, DB_FILE_NAME);
}

/** Database path: explicit > STUDY_PLANNER_DB > platform default */
export function resolveDbPath(explicit?: string): string {
  if (explicit) return explicit;
  const fromEnv = process.env[DB_PATH_ENV];
  return fromEnv ? fromEnv : getDefaultDbPath();
}

/** The raw SQL to create the schema from scratch (for new databases and tests) */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS tasks (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    description TEXT,
    due_date TEXT NOT NULL,
    reminder_time TEXT,
    reminder_enabled INTEGER NOT NULL DEFAULT 0,
    position INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_tasks_due_date ON tasks(due_date);
CREATE INDEX IF NOT EXISTS idx_tasks_position ON tasks(position);

CREATE TABLE IF NOT EXISTS config (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
);
`;

/**
 * Create a Drizzle database connection with the schema applied.
 * If no path is given, uses the platform default.
 * Pass ':memory:' for in-memory databases (tests).
 */
export function createDb(path?: string): PlannerDb {
  const dbPath = path ?? getDefaultDbPath();

  // Ensure directory exists for file-based databases
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);

  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('busy_timeout = 5000');

  // Idempotent: all statements use IF NOT EXISTS
  sqlite.exec(CREATE_SCHEMA_SQL);

  return drizzle(sqlite, { schema });
}

/** Create an in-memory database with schema applied. For tests. */
export function createTestDb(): PlannerDb {
  return createDb(':memory:');
}

/**
 * Get the raw Database instance from a Drizzle instance.
 * Useful for operations not supported by Drizzle (pragma, close).
 */
export function getRawDb(db: PlannerDb): Database.Database {
  return db.$client;
}

export function closeDb(db: PlannerDb): void {
  const raw = getRawDb(db);
  if (raw.open) raw.close();
}
