import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { createLogger } from '../utils/logger.js';

const logger = createLogger({ component: 'database' });

/** Opens (creating if needed) the SQLite file and brings its schema up to date. */
export function openDatabase(dbPath: string): Database.Database {
  logger.info({ dbPath }, 'Initializing database');

  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }

  runMigrations(db);
  return db;
}

export function runMigrations(db: Database.Database): void {
  logger.info('Running database migrations');

  db.exec(`
    CREATE TABLE IF NOT EXISTS user_settings (
      user_id TEXT PRIMARY KEY,
      default_city TEXT,
      state TEXT NOT NULL DEFAULT 'idle',
      state_data TEXT,
      push_daily_weather INTEGER NOT NULL DEFAULT 0,
      push_weekend_weather INTEGER NOT NULL DEFAULT 0,
      push_typhoon_alert INTEGER NOT NULL DEFAULT 0,
      push_solar_terms INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER DEFAULT (strftime('%s', 'now')),
      updated_at INTEGER DEFAULT (strftime('%s', 'now'))
    );

    CREATE INDEX IF NOT EXISTS idx_user_settings_city ON user_settings(default_city);

    CREATE TABLE IF NOT EXISTS system_metadata (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      updated_at INTEGER DEFAULT (strftime('%s', 'now'))
    );
  `);

  // Push columns added after the first release
  const columns = new Set(
    db
      .prepare<[], { name: string }>('PRAGMA table_info(user_settings)')
      .all()
      .map((column) => column.name)
  );
  for (const column of ['push_typhoon_alert', 'push_solar_terms']) {
    if (!columns.has(column)) {
      logger.info({ column }, 'Adding user_settings column');
      db.exec(`ALTER TABLE user_settings ADD COLUMN ${column} INTEGER NOT NULL DEFAULT 0`);
    }
  }

  logger.info('Database migrations completed');
}
