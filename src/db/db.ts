import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { resolvePath } from '../shared/utils.js';
import { DbError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export type Db = Database.Database;

let dbInstance: Db | null = null;

/**
 * Open the SQLite database once per process. WAL plus a busy timeout lets a
 * second process (e.g. `postwatch run` while `serve` is up) wait for the
 * writer instead of failing.
 */
export function initDb(dbPath: string): Db {
  if (dbInstance) return dbInstance;

  const resolved = dbPath === ':memory:' ? ':memory:' : resolvePath(dbPath);

  if (resolved !== ':memory:') {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
  }

  try {
    const db = new Database(resolved);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.pragma('busy_timeout = 5000');

    dbInstance = db;
    logger.debug({ path: resolved }, 'Database initialized');
    return db;
  } catch (err) {
    throw new DbError(`Failed to initialize database at ${resolved}`, {
      path: resolved,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}

export function closeDb(): void {
  if (dbInstance) {
    dbInstance.close();
    dbInstance = null;
  }
}
