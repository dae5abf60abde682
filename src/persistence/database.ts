import Database from 'better-sqlite3';
import { createLogger } from '../utils/logger.js';
import { join, dirname as pathDirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { mkdirSync } from 'node:fs';

const __filename = fileURLToPath(import.meta.url);
const __dirname = pathDirname(__filename);

const logger = createLogger({ component: 'database' });

let db: Database.Database | null = null;

/** Open a database at `path` (or `:memory:`) and bring its schema up to date. */
export function openDatabase(path: string): Database.Database {
  if (path !== ':memory:') {
    mkdirSync(pathDirname(path), { recursive: true });
  }

  const database = new Database(path);
  // WAL lets dashboard reads run alongside poller and executor writes
  database.pragma('journal_mode = WAL');
  database.pragma('busy_timeout = 5000');
  runMigrations(database);
  return database;
}

/** Process-wide connection, opened on first use. `path` only matters on that first call. */
export function getDatabase(path?: string): Database.Database {
  if (db) {
    return db;
  }

  const dbPath = path ?? (process.env.DATABASE_PATH || join(__dirname, '../../data', 'assistant.db'));
  logger.info({ dbPath }, 'Initializing database');
  db = openDatabase(dbPath);
  return db;
}

export function runMigrations(database: Database.Database): void {
  logger.info('Running database migrations');

  database.exec(`
    CREATE TABLE IF NOT EXISTS commands (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      raw_text TEXT NOT NULL,
      intent TEXT,
      parameters TEXT NOT NULL DEFAULT '{}',
      status TEXT NOT NULL CHECK (status IN ('pending', 'processing', 'completed', 'failed')),
      result_text TEXT,
      error_detail TEXT,
      created_at INTEGER NOT NULL,
      completed_at INTEGER
    );

    CREATE INDEX IF NOT EXISTS idx_commands_created ON commands(created_at);
    CREATE INDEX IF NOT EXISTS idx_commands_status ON commands(status, created_at);
  `);

  database.exec(`
    CREATE TABLE IF NOT EXISTS reply_logs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      channel TEXT NOT NULL,
      external_id TEXT NOT NULL,
      sender TEXT NOT NULL,
      original_body TEXT NOT NULL,
      generated_text TEXT NOT NULL,
      send_status TEXT NOT NULL CHECK (send_status IN ('sent', 'failed')),
      attempt_count INTEGER NOT NULL,
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_reply_logs_created ON reply_logs(created_at);
    CREATE UNIQUE INDEX IF NOT EXISTS idx_reply_logs_sent_once
      ON reply_logs(channel, external_id) WHERE send_status = 'sent';
  `);

  database.exec(`
    CREATE TABLE IF NOT EXISTS social_posts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      platform TEXT NOT NULL,
      topic TEXT NOT NULL,
      content TEXT NOT NULL,
      image_reference TEXT,
      platform_post_id TEXT,
      status TEXT NOT NULL CHECK (status IN ('posted', 'failed')),
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_social_posts_created ON social_posts(created_at);
  `);

  database.exec(`
    CREATE TABLE IF NOT EXISTS dedup_entries (
      channel TEXT NOT NULL,
      external_id TEXT NOT NULL,
      state TEXT NOT NULL CHECK (state IN ('reserved', 'retry', 'committed', 'exhausted')),
      attempt_count INTEGER NOT NULL DEFAULT 0,
      reserved_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL,
      PRIMARY KEY (channel, external_id)
    );
  `);

  database.exec(`
    CREATE TABLE IF NOT EXISTS checkpoints (
      channel TEXT PRIMARY KEY,
      last_received_at INTEGER NOT NULL,
      last_external_id TEXT,
      updated_at INTEGER NOT NULL
    );
  `);

  database.exec(`
    CREATE TABLE IF NOT EXISTS settings (
      key TEXT PRIMARY KEY,
      value TEXT,
      updated_at INTEGER DEFAULT (strftime('%s', 'now'))
    );
  `);

  logger.info('Database migrations completed');
}

export function closeDatabase(): void {
  if (db) {
    logger.info('Closing database connection');
    db.close();
    db = null;
  }
}
