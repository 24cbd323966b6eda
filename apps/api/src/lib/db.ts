import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { logger } from './logger.js';
import { ensureMigrations } from './migrations.js';

export type Db = Database.Database;

export interface OpenDatabaseOptions {
  /** How long a writer waits for another connection's lock before SQLITE_BUSY */
  busyTimeoutMs?: number;
}

/**
 * Open (or create) the ledger database and bring its schema up to date.
 * Pass ':memory:' for a private in-process database.
 */
export function openDatabase(filename: string, options: OpenDatabaseOptions = {}): Db {
  if (filename !== ':memory:') {
    const dir = path.dirname(filename);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(filename, { timeout: options.busyTimeoutMs ?? 5000 });
  if (filename !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');

  const applied = ensureMigrations(db);
  if (applied.length > 0) {
    logger.debug({ filename, applied }, 'database migrations applied');
  }
  return db;
}

/**
 * Another connection held the write lock for longer than the busy timeout.
 */
export function isBusyError(err: unknown): boolean {
  return (
    err instanceof Error &&
    'code' in err &&
    typeof err.code === 'string' &&
    (err.code.startsWith('SQLITE_BUSY') || err.code.startsWith('SQLITE_LOCKED'))
  );
}
