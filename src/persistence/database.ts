import Database from 'better-sqlite3';
import { createLogger } from '../utils/logger.js';
import { join, dirname as pathDirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { mkdirSync } from 'node:fs';

const __filename = fileURLToPath(import.meta.url);
const __dirname = pathDirname(__filename);

const logger = createLogger({ component: 'database' });

export const DEFAULT_DATABASE_PATH = join(__dirname, '../../data', 'weather.db');

let db: Database.Database | null = null;

export function getDatabase(dbPath: string = DEFAULT_DATABASE_PATH): Database.Database {
  if (db) {
    return db;
  }
  db = openDatabase(dbPath);
  return db;
}

/** Opens (and migrates) a database; pass ':memory:' for a throwaway one. */
export function openDatabase(dbPath: string): Database.Database {
  logger.info({ dbPath }, 'Initializing database');

  if (dbPath !== ':memory:') {
    mkdirSync(pathDirname(dbPath), { recursive: true });
  }

  const database = new Database(dbPath);
  database.pragma('journal_mode = WAL');

  runMigrations(database);

  return database;
}

function runMigrations(database: Database.Database): void {
  logger.info('Running database migrations');

  database.exec(`
    CREATE TABLE IF NOT EXISTS favourites (
      position INTEGER NOT NULL,
      city TEXT NOT NULL,
      country TEXT NOT NULL,
      lat REAL NOT NULL,
      lon REAL NOT NULL,
      created_at INTEGER DEFAULT (strftime('%s', 'now'))
    );

    CREATE UNIQUE INDEX IF NOT EXISTS idx_favourites_city ON favourites(city COLLATE NOCASE);
  `);

  database.exec(`
    CREATE TABLE IF NOT EXISTS settings (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      updated_at INTEGER DEFAULT (strftime('%s', 'now'))
    );
  `);

  logger.info('Database migrations completed');
}
