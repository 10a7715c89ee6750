/**
 * SQLite Database Schema and Migrations
 */

import Database from 'better-sqlite3';
import { homedir } from 'os';
import { join } from 'path';
import { mkdirSync, existsSync } from 'fs';

const FDO_HOME = process.env.FDO_COMPILER_HOME || join(homedir(), '.fdo-compiler');
const LIBRARY_DB_PATH = join(FDO_HOME, 'library.db');

// Current schema version
const SCHEMA_VERSION = 2;

/**
 * Ensure the tool home directory exists
 */
export function ensureDirectories(): void {
  if (!existsSync(FDO_HOME)) {
    mkdirSync(FDO_HOME, { recursive: true });
  }
}

/**
 * Initialize database with schema
 */
export function initializeSchema(db: Database.Database): void {
  // Enable foreign keys
  db.pragma('foreign_keys = ON');

  // Create schema version table
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY
    );
  `);

  // Check current version
  const versionRow = db.prepare<[], { version: number }>('SELECT version FROM schema_version LIMIT 1').get();
  const currentVersion = versionRow?.version ?? 0;

  if (currentVersion < SCHEMA_VERSION) {
    migrate(db, currentVersion, SCHEMA_VERSION);
  }
}

/**
 * Current schema version of a database
 */
export function getSchemaVersion(db: Database.Database): number {
  return db.prepare<[], { version: number }>('SELECT version FROM schema_version LIMIT 1').get()?.version ?? 0;
}

/**
 * Run migrations from one version to another
 */
function migrate(db: Database.Database, from: number, to: number): void {
  const migrations: Array<(db: Database.Database) => void> = [
    migrateV0toV1,
    migrateV1toV2,
  ];

  db.transaction(() => {
    for (let v = from; v < to; v++) {
      migrations[v](db);
    }

    // Update schema version
    db.prepare('DELETE FROM schema_version').run();
    db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(to);
  })();
}

/**
 * Migration from v0 (fresh) to v1 - script library
 */
function migrateV0toV1(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS scripts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      content TEXT NOT NULL,
      is_favorite INTEGER NOT NULL DEFAULT 0 CHECK(is_favorite IN (0, 1)),
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_scripts_favorite ON scripts(is_favorite DESC, updated_at DESC);
  `);
}

/**
 * Migration from v1 to v2 - compile history
 */
function migrateV1toV2(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS compile_history (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      script_id INTEGER NOT NULL,
      variant TEXT NOT NULL CHECK(variant IN ('debug', 'production')),
      success INTEGER NOT NULL CHECK(success IN (0, 1)),
      size INTEGER,
      error TEXT,
      compiled_at INTEGER NOT NULL,
      FOREIGN KEY (script_id) REFERENCES scripts(id) ON DELETE CASCADE
    );

    CREATE INDEX IF NOT EXISTS idx_history_script ON compile_history(script_id, compiled_at DESC);
  `);
}

/**
 * Open a library database; defaults to the one in the tool home directory
 */
export function openLibraryDb(path: string = LIBRARY_DB_PATH): Database.Database {
  if (path !== ':memory:') {
    ensureDirectories();
  }
  const db = new Database(path);
  initializeSchema(db);
  return db;
}

export { FDO_HOME, LIBRARY_DB_PATH, SCHEMA_VERSION };
