/**
 * SQLite connection and migrations
 *
 * Opens a better-sqlite3 database (WAL, foreign keys on) and applies the SQL
 * files under database/migrations/ that have not been applied yet.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readdirSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { logInfo, logWarn } from './logger.js';

export type SqliteDatabase = Database.Database;

const MIGRATIONS_DIR = join(__dirname, '..', '..', '..', 'database', 'migrations');

/**
 * Open (and migrate) a database. Pass ':memory:' for a throwaway database.
 */
export function openDatabase(databasePath: string, migrationsDir: string = MIGRATIONS_DIR): SqliteDatabase {
  if (databasePath !== ':memory:') {
    const dbDir = dirname(databasePath);
    if (!existsSync(dbDir)) {
      mkdirSync(dbDir, { recursive: true });
    }
  }

  const db = new Database(databasePath);

  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  runMigrations(db, migrationsDir);
  return db;
}

function runMigrations(db: SqliteDatabase, migrationsDir: string): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS migrations (
      id INTEGER PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  if (!existsSync(migrationsDir)) {
    logWarn('No migrations directory found, skipping migrations', { migrations_dir: migrationsDir });
    return;
  }

  const applied = new Set(
    db
      .prepare<[], { name: string }>('SELECT name FROM migrations')
      .all()
      .map((row) => row.name)
  );

  const migrationFiles = readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql'))
    .sort();

  const recordMigration = db.prepare<[string]>('INSERT INTO migrations (name) VALUES (?)');

  for (const file of migrationFiles) {
    if (applied.has(file)) {
      continue;
    }

    const sql = readFileSync(join(migrationsDir, file), 'utf-8');
    db.transaction(() => {
      db.exec(sql);
      recordMigration.run(file);
    })();
    logInfo('Migration applied', { migration: file });
  }
}
