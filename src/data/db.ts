/**
 * SQLite Database initialization and management
 * Uses better-sqlite3 for synchronous operations
 */

import Database from 'better-sqlite3';
import { readFileSync, existsSync, mkdirSync, readdirSync } from 'fs';
import { dirname, isAbsolute, join } from 'path';
import { getEnvConfig } from '@/core/env';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('db');

export type SqliteDatabase = Database.Database;

let db: SqliteDatabase | null = null;

function getDbPath(): string {
  const projectRoot = process.cwd();
  const configured = getEnvConfig().databasePath;
  const dbPath = configured
    ? isAbsolute(configured)
      ? configured
      : join(projectRoot, configured)
    : join(projectRoot, 'data', 'ticker-health.db');

  const dataDir = dirname(dbPath);
  if (!existsSync(dataDir)) {
    mkdirSync(dataDir, { recursive: true });
  }

  return dbPath;
}

/**
 * Opens a standalone connection with migrations applied.
 * Pass ':memory:' for an in-process database.
 */
export function openDatabase(path: string, options: { readonly?: boolean } = {}): SqliteDatabase {
  const database = new Database(path, { readonly: options.readonly ?? false });
  if (!options.readonly) {
    if (path !== ':memory:') {
      // Enable WAL mode for better concurrency
      database.pragma('journal_mode = WAL');
    }
    runMigrations(database);
  }
  return database;
}

export function initializeDatabase(): SqliteDatabase {
  if (db) {
    return db;
  }

  const dbPath = getDbPath();
  const isNew = !existsSync(dbPath);

  logger.info({ dbPath, isNew }, 'Initializing database');

  db = openDatabase(dbPath);
  return db;
}

export function runMigrations(database: SqliteDatabase): void {
  const migrationsDir = join(process.cwd(), 'src', 'data', 'migrations');
  if (!existsSync(migrationsDir)) {
    logger.warn({ migrationsDir }, 'Migrations directory not found');
    return;
  }

  const files = readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  logger.debug({ migrationsDir, files }, 'Running database migrations');

  for (const file of files) {
    const sql = readFileSync(join(migrationsDir, file), 'utf-8');
    database.exec(sql);
  }
}

export function getDatabase(): SqliteDatabase {
  if (!db) {
    return initializeDatabase();
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.info('Database connection closed');
  }
}
