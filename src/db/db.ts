import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { resolvePath } from '../shared/utils.js';
import { DbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { migrate } from './migrate.js';

export interface OpenedDb {
  db: Database.Database;
  /** Migration files applied while opening. */
  applied: string[];
}

/**
 * Open the posts database, creating its directory, and bring the schema up
 * to date. The caller owns the handle and closes it.
 */
export function openDb(dbPath: string): OpenedDb {
  const resolved = dbPath === ':memory:' ? dbPath : resolvePath(dbPath);
  if (resolved !== ':memory:') {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
  }

  let db: Database.Database;
  try {
    db = new Database(resolved);
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 5000');
  } catch (err) {
    throw new DbError(`Cannot open database at ${resolved}`, { path: resolved, cause: errorMessage(err) });
  }

  try {
    const applied = migrate(db);
    logger.debug({ path: resolved, applied }, 'Database opened');
    return { db, applied };
  } catch (err) {
    db.close();
    throw err;
  }
}
