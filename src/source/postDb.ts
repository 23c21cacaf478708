import type Database from 'better-sqlite3';
import type { BlogPost, StoredPost } from './model.js';
import { DbError, errorMessage } from '../shared/errors.js';
import { daysAgo, nowISO } from '../shared/utils.js';

interface PostRow {
  url: string;
  title: string;
  author: string;
  published: string | null;
  summary: string;
  likes: number | null;
  comments: number | null;
  source_name: string;
  is_read: number;
  first_seen: string;
  last_seen: string;
}

function rowToPost(row: PostRow): StoredPost {
  return {
    title: row.title,
    author: row.author,
    url: row.url,
    published: row.published ? new Date(row.published) : null,
    summary: row.summary,
    likes: row.likes,
    comments: row.comments,
    source_name: row.source_name,
    is_read: row.is_read !== 0,
    first_seen: row.first_seen,
    last_seen: row.last_seen,
  };
}

// ================================================================
// Posts
// ================================================================

/**
 * Insert or update posts keyed by URL. Content fields are overwritten,
 * `is_read` is OR-merged so a read post never becomes unread again.
 * Returns the number of URLs that were not stored before.
 */
export function upsertPosts(db: Database.Database, posts: readonly BlogPost[], now: Date = new Date()): number {
  const seenAt = nowISO(now);
  const exists = db.prepare<[string], { is_read: number }>('SELECT is_read FROM posts WHERE url = ?');
  const update = db.prepare(
    `UPDATE posts SET title = ?, author = ?, published = ?, summary = ?, likes = ?, comments = ?,
       source_name = ?, is_read = ?, last_seen = ?
     WHERE url = ?`,
  );
  const insert = db.prepare(
    `INSERT INTO posts
       (url, title, author, published, summary, likes, comments, source_name, is_read, first_seen, last_seen)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  );

  const run = db.transaction((batch: readonly BlogPost[]): number => {
    let newCount = 0;
    for (const post of batch) {
      const published = post.published ? post.published.toISOString() : null;
      const existing = exists.get(post.url);
      if (existing) {
        const isRead = existing.is_read !== 0 || post.is_read ? 1 : 0;
        update.run(
          post.title,
          post.author,
          published,
          post.summary,
          post.likes,
          post.comments,
          post.source_name,
          isRead,
          seenAt,
          post.url,
        );
      } else {
        insert.run(
          post.url,
          post.title,
          post.author,
          published,
          post.summary,
          post.likes,
          post.comments,
          post.source_name,
          post.is_read ? 1 : 0,
          seenAt,
          seenAt,
        );
        newCount++;
      }
    }
    return newCount;
  });

  try {
    return run(posts);
  } catch (err) {
    throw new DbError(`Failed to upsert posts: ${errorMessage(err)}`, { count: posts.length });
  }
}

export interface PostQuery {
  lookbackDays?: number;
  sourceName?: string;
  now?: Date;
}

/**
 * Stored posts newest first, undated last. The lookback window keeps
 * undated posts.
 */
export function getPosts(db: Database.Database, query: PostQuery = {}): StoredPost[] {
  const conditions: string[] = [];
  const params: string[] = [];

  if (query.lookbackDays !== undefined) {
    conditions.push('(published >= ? OR published IS NULL)');
    params.push(daysAgo(query.lookbackDays, query.now).toISOString());
  }
  if (query.sourceName) {
    conditions.push('source_name = ?');
    params.push(query.sourceName);
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  return db
    .prepare<string[], PostRow>(
      `SELECT * FROM posts ${where}
       ORDER BY CASE WHEN published IS NULL THEN 1 ELSE 0 END, published DESC, rowid ASC`,
    )
    .all(...params)
    .map(rowToPost);
}

export function getPostCount(db: Database.Database): number {
  const row = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM posts').get();
  return row?.count ?? 0;
}

// ================================================================
// Digests
// ================================================================

export interface StoredDigest {
  content: string;
  created_at: string;
  lookback_days: number;
}

export function saveDigest(db: Database.Database, content: string, lookbackDays = 3, now: Date = new Date()): void {
  db.prepare('INSERT INTO digests (created_at, content, lookback_days) VALUES (?, ?, ?)').run(
    nowISO(now),
    content,
    lookbackDays,
  );
}

export function getLatestDigest(db: Database.Database): StoredDigest | null {
  const row = db
    .prepare<[], StoredDigest>(
      'SELECT content, created_at, lookback_days FROM digests ORDER BY created_at DESC, id DESC LIMIT 1',
    )
    .get();
  return row ?? null;
}

// ================================================================
// Suggestion reasons
// ================================================================

export function saveSuggestionReasons(
  db: Database.Database,
  reasons: Readonly<Record<string, string>>,
  now: Date = new Date(),
): void {
  const stmt = db.prepare('INSERT OR REPLACE INTO suggestion_reasons (url, reason, created_at) VALUES (?, ?, ?)');
  const createdAt = nowISO(now);
  db.transaction(() => {
    for (const [url, reason] of Object.entries(reasons)) {
      stmt.run(url, reason, createdAt);
    }
  })();
}

export function getSuggestionReasons(db: Database.Database): Record<string, string> {
  const rows = db.prepare<[], { url: string; reason: string }>('SELECT url, reason FROM suggestion_reasons').all();
  return Object.fromEntries(rows.map((r) => [r.url, r.reason]));
}

// ================================================================
// Store boundary
// ================================================================

/**
 * The persistence collaborator of a check run and of the CLI.
 */
export interface PostStore {
  upsert(posts: readonly BlogPost[]): number;
  query(query?: PostQuery): StoredPost[];
  count(): number;
  saveDigest(content: string, lookbackDays: number): void;
  latestDigest(): StoredDigest | null;
  saveSuggestionReasons(reasons: Readonly<Record<string, string>>): void;
  suggestionReasons(): Record<string, string>;
}

export class SqlitePostStore implements PostStore {
  constructor(private readonly db: Database.Database) {}

  upsert(posts: readonly BlogPost[]): number {
    return upsertPosts(this.db, posts);
  }

  query(query: PostQuery = {}): StoredPost[] {
    return getPosts(this.db, query);
  }

  count(): number {
    return getPostCount(this.db);
  }

  saveDigest(content: string, lookbackDays: number): void {
    saveDigest(this.db, content, lookbackDays);
  }

  latestDigest(): StoredDigest | null {
    return getLatestDigest(this.db);
  }

  saveSuggestionReasons(reasons: Readonly<Record<string, string>>): void {
    saveSuggestionReasons(this.db, reasons);
  }

  suggestionReasons(): Record<string, string> {
    return getSuggestionReasons(this.db);
  }
}
