import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { DbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

const MIGRATION_FILE_RE = /^(\d+)_[\w-]+\.sql$/;

export interface Migration {
  version: number;
  file: string;
}

export function migrationsDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

/**
 * Numbered `NNN_name.sql` files, in version order.
 */
export function listMigrations(dir: string = migrationsDir()): Migration[] {
  if (!fs.existsSync(dir)) {
    throw new DbError(`Migrations directory not found: ${dir}`);
  }

  const migrations: Migration[] = [];
  for (const file of fs.readdirSync(dir)) {
    const match = MIGRATION_FILE_RE.exec(file);
    if (match) migrations.push({ version: parseInt(match[1], 10), file });
  }
  return migrations.sort((a, b) => a.version - b.version);
}

export function schemaVersion(db: Database.Database): number {
  const version = db.pragma('user_version', { simple: true });
  return typeof version === 'number' ? version : 0;
}

/**
 * Apply every migration newer than the database's `user_version`, each in its
 * own transaction. Returns the files applied.
 */
export function migrate(db: Database.Database, dir: string = migrationsDir()): string[] {
  const current = schemaVersion(db);
  const applied: string[] = [];

  for (const { version, file } of listMigrations(dir)) {
    if (version <= current) continue;
    const sql = fs.readFileSync(path.join(dir, file), 'utf-8');
    try {
      db.transaction(() => {
        db.exec(sql);
        db.pragma(`user_version = ${version}`);
      })();
    } catch (err) {
      throw new DbError(`Migration failed: ${file}`, { migration: file, cause: errorMessage(err) });
    }
    applied.push(file);
    logger.debug({ migration: file, version }, 'Migration applied');
  }

  return applied;
}
