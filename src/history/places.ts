import Database from 'better-sqlite3';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { PLACES_DB } from './profile.js';
import { normalizeUrl } from '../source/normalize.js';
import { HistoryError, errorMessage } from '../shared/errors.js';
import { daysAgo } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

const COMPANION_SUFFIXES = ['-wal', '-shm'] as const;

const VISITED_SQL = `
  SELECT DISTINCT p.url AS url
  FROM moz_places p
  JOIN moz_historyvisits v ON p.id = v.place_id
  WHERE v.visit_date > ?
`;

/**
 * Copy `places.sqlite` and its WAL/SHM companions into a fresh temp
 * directory, so a running browser's lock does not get in the way.
 * Returns the path of the copied database.
 */
export function snapshotPlacesDb(profileDir: string): string {
  const source = path.join(profileDir, PLACES_DB);
  if (!fs.existsSync(source)) {
    throw new HistoryError(`${PLACES_DB} not found in ${profileDir}`, { profileDir });
  }

  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'blogwatch-'));
  const target = path.join(tmpDir, PLACES_DB);
  try {
    fs.copyFileSync(source, target);
    for (const suffix of COMPANION_SUFFIXES) {
      const companion = `${source}${suffix}`;
      if (fs.existsSync(companion)) {
        fs.copyFileSync(companion, `${target}${suffix}`);
      }
    }
  } catch (err) {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    throw new HistoryError(`Could not copy ${PLACES_DB}: ${errorMessage(err)}`, { profileDir });
  }
  return target;
}

/**
 * Normalized URLs visited after `now - lookbackDays`, read from a copied
 * history database opened read-only. Visit timestamps are microseconds since
 * the epoch.
 */
export function queryVisitedUrls(dbPath: string, lookbackDays: number, now: Date = new Date()): Set<string> {
  const cutoffUs = daysAgo(lookbackDays, now).getTime() * 1000;
  const visited = new Set<string>();

  let db: Database.Database | null = null;
  try {
    db = new Database(dbPath, { readonly: true, fileMustExist: true });
    const rows = db.prepare<[number], { url: string }>(VISITED_SQL).all(cutoffUs);
    for (const row of rows) {
      visited.add(normalizeUrl(row.url));
    }
  } catch (err) {
    throw new HistoryError(`Error reading Firefox history: ${errorMessage(err)}`, { dbPath });
  } finally {
    db?.close();
  }

  return visited;
}

/**
 * Snapshot the profile's history, query it, and always remove the snapshot.
 */
export function readProfileHistory(profileDir: string, lookbackDays: number, now?: Date): Set<string> {
  const snapshot = snapshotPlacesDb(profileDir);
  try {
    return queryVisitedUrls(snapshot, lookbackDays, now);
  } finally {
    fs.rmSync(path.dirname(snapshot), { recursive: true, force: true });
    logger.debug({ snapshot }, 'Removed history snapshot');
  }
}
