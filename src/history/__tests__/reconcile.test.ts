import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { queryVisitedUrls, readProfileHistory, snapshotPlacesDb } from '../places.js';
import { getVisitedUrls, markReadPosts } from '../reconcile.js';
import { FixedProfileLocator, PLACES_DB, type ProfileLocator } from '../profile.js';
import { HistoryError } from '../../shared/errors.js';
import type { BlogPost } from '../../source/model.js';

const NOW = new Date('2024-01-10T12:00:00Z');
const DAY_MS = 24 * 3600 * 1000;

function visitTime(daysBefore: number): number {
  return (NOW.getTime() - daysBefore * DAY_MS) * 1000;
}

function writePlaces(profileDir: string, visits: Array<{ url: string; daysBefore: number[] }>): void {
  const db = new Database(path.join(profileDir, PLACES_DB));
  db.exec(`
    CREATE TABLE moz_places (id INTEGER PRIMARY KEY, url TEXT NOT NULL);
    CREATE TABLE moz_historyvisits (id INTEGER PRIMARY KEY, place_id INTEGER NOT NULL, visit_date INTEGER NOT NULL);
  `);
  const insertPlace = db.prepare('INSERT INTO moz_places (url) VALUES (?)');
  const insertVisit = db.prepare('INSERT INTO moz_historyvisits (place_id, visit_date) VALUES (?, ?)');
  for (const visit of visits) {
    const placeId = insertPlace.run(visit.url).lastInsertRowid;
    for (const days of visit.daysBefore) {
      insertVisit.run(placeId, visitTime(days));
    }
  }
  db.close();
}

function makePost(url: string): BlogPost {
  return {
    title: 'Post',
    author: 'Jane',
    url,
    published: null,
    summary: '',
    likes: null,
    comments: null,
    source_name: 'Example',
    is_read: false,
  };
}

let profileDir: string;

beforeEach(() => {
  profileDir = fs.mkdtempSync(path.join(os.tmpdir(), 'blogwatch-profile-'));
  writePlaces(profileDir, [
    { url: 'https://Example.com/read-post/?utm_source=rss', daysBefore: [1] },
    { url: 'https://example.com/twice', daysBefore: [2, 3] },
    { url: 'https://example.com/long-ago', daysBefore: [40] },
  ]);
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(profileDir, { recursive: true, force: true });
});

describe('queryVisitedUrls', () => {
  it('returns normalized URLs visited inside the window', () => {
    const visited = queryVisitedUrls(path.join(profileDir, PLACES_DB), 30, NOW);

    expect([...visited].sort()).toEqual(['https://example.com/read-post', 'https://example.com/twice']);
  });

  it('narrows with a shorter window', () => {
    const visited = queryVisitedUrls(path.join(profileDir, PLACES_DB), 1.5, NOW);

    expect([...visited]).toEqual(['https://example.com/read-post']);
  });

  it('throws HistoryError for a file that is not a history database', () => {
    const bogus = path.join(profileDir, 'bogus.sqlite');
    fs.writeFileSync(bogus, 'not sqlite');

    expect(() => queryVisitedUrls(bogus, 30, NOW)).toThrow(HistoryError);
  });
});

describe('snapshotPlacesDb', () => {
  it('throws HistoryError when the profile has no history', () => {
    const empty = fs.mkdtempSync(path.join(os.tmpdir(), 'blogwatch-empty-'));
    try {
      expect(() => snapshotPlacesDb(empty)).toThrow(HistoryError);
    } finally {
      fs.rmSync(empty, { recursive: true, force: true });
    }
  });

  it('copies the database out of the profile', () => {
    const snapshot = snapshotPlacesDb(profileDir);
    try {
      expect(path.dirname(snapshot)).not.toBe(profileDir);
      expect(fs.existsSync(snapshot)).toBe(true);
    } finally {
      fs.rmSync(path.dirname(snapshot), { recursive: true, force: true });
    }
  });
});

describe('readProfileHistory', () => {
  it('removes the snapshot directory afterwards', () => {
    const mkdtemp = vi.spyOn(fs, 'mkdtempSync');

    const visited = readProfileHistory(profileDir, 30, NOW);

    expect(visited.size).toBe(2);
    expect(mkdtemp).toHaveBeenCalledTimes(1);
    const snapshotDir = String(mkdtemp.mock.results[0].value);
    expect(fs.existsSync(snapshotDir)).toBe(false);
  });

  it('removes the snapshot directory when the query fails', () => {
    const broken = fs.mkdtempSync(path.join(os.tmpdir(), 'blogwatch-broken-'));
    fs.writeFileSync(path.join(broken, PLACES_DB), 'not sqlite');
    const mkdtemp = vi.spyOn(fs, 'mkdtempSync');

    try {
      expect(() => readProfileHistory(broken, 30, NOW)).toThrow(HistoryError);
      expect(mkdtemp).toHaveBeenCalledTimes(1);
      const snapshotDir = String(mkdtemp.mock.results[0].value);
      expect(snapshotDir.startsWith(path.join(os.tmpdir(), 'blogwatch-'))).toBe(true);
      expect(fs.existsSync(snapshotDir)).toBe(false);
    } finally {
      fs.rmSync(broken, { recursive: true, force: true });
    }
  });
});

describe('getVisitedUrls', () => {
  it('reads history from the located profile', () => {
    const visited = getVisitedUrls('/unused', 30, { locator: new FixedProfileLocator(profileDir), now: NOW });

    expect(visited.has('https://example.com/twice')).toBe(true);
  });

  it('returns an empty set when no profile is found', () => {
    expect(getVisitedUrls('/unused', 30, { locator: new FixedProfileLocator(null) }).size).toBe(0);
  });

  it('returns an empty set when the history cannot be read', () => {
    const empty = fs.mkdtempSync(path.join(os.tmpdir(), 'blogwatch-empty-'));
    try {
      expect(getVisitedUrls('/unused', 30, { locator: new FixedProfileLocator(empty) }).size).toBe(0);
    } finally {
      fs.rmSync(empty, { recursive: true, force: true });
    }
  });

  it('returns an empty set when the locator fails', () => {
    const failing: ProfileLocator = {
      findProfile: () => {
        throw new Error('permission denied');
      },
    };

    expect(getVisitedUrls('/unused', 30, { locator: failing }).size).toBe(0);
  });
});

describe('markReadPosts', () => {
  it('marks posts whose normalized URL was visited', () => {
    const posts = [makePost('https://example.com/read-post?ref=feed'), makePost('https://example.com/unread')];

    const marked = markReadPosts(posts, new Set(['https://example.com/read-post']));

    expect(marked).toBe(1);
    expect(posts.map((p) => p.is_read)).toEqual([true, false]);
  });
});
