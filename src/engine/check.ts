import { fetchAllFeeds } from '../source/aggregate.js';
import type { FeedFetcher } from '../source/rss.js';
import type { BlogPost, FeedSource } from '../source/model.js';
import type { PostStore } from '../source/postDb.js';
import { getVisitedUrls, markReadPosts } from '../history/reconcile.js';
import type { ProfileLocator } from '../history/profile.js';
import { errorMessage } from '../shared/errors.js';
import { nowISO } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

/**
 * What one check hands to the next: the posts it produced and when.
 */
export interface RunState {
  readonly lastPosts: readonly BlogPost[];
  readonly lastCheckedAt: string | null;
}

export function initialRunState(): RunState {
  return { lastPosts: [], lastCheckedAt: null };
}

export interface HistoryOptions {
  enabled: boolean;
  browserDir: string;
  lookbackDays: number;
  locator?: ProfileLocator;
}

export interface CheckOptions {
  sources: readonly FeedSource[];
  lookbackDays: number;
  concurrency?: number;
  timeoutMs?: number;
  userAgent?: string;
  history?: HistoryOptions;
  store?: PostStore | null;
  fetcher?: FeedFetcher;
  now?: Date;
}

export interface CheckStats {
  sources: number;
  posts: number;
  newPosts: number;
  readPosts: number;
  visitedUrls: number;
  stored: boolean;
  durationMs: number;
}

export interface CheckResult {
  posts: BlogPost[];
  stats: CheckStats;
  state: RunState;
}

/**
 * Count posts whose URL the previous run did not produce. Used when no store
 * is attached.
 */
function countUnseen(posts: readonly BlogPost[], previous: RunState): number {
  const known = new Set(previous.lastPosts.map((p) => p.url));
  return posts.filter((p) => !known.has(p.url)).length;
}

/**
 * Run one check:
 * 1. Fetch every source through the bounded pool, newest first
 * 2. Mark posts visited in the browser history as read
 * 3. Upsert into the store, if any
 *
 * Feed, history and storage failures are logged and never abort the run.
 */
export async function runCheck(options: CheckOptions, previous: RunState = initialRunState()): Promise<CheckResult> {
  const startTime = Date.now();
  const now = options.now ?? new Date();

  const posts = await fetchAllFeeds(options.sources, {
    lookbackDays: options.lookbackDays,
    concurrency: options.concurrency,
    timeoutMs: options.timeoutMs,
    userAgent: options.userAgent,
    fetcher: options.fetcher,
    now,
  });

  let visitedCount = 0;
  let readCount = 0;
  const history = options.history;
  if (history?.enabled) {
    // Posts inside the fetch window must be matchable against history too
    const historyDays = Math.max(options.lookbackDays, history.lookbackDays);
    const visited = getVisitedUrls(history.browserDir, historyDays, { locator: history.locator, now });
    visitedCount = visited.size;
    readCount = markReadPosts(posts, visited);
  } else {
    logger.debug('History check disabled');
  }

  let newCount = countUnseen(posts, previous);
  let stored = false;
  if (options.store) {
    try {
      newCount = options.store.upsert(posts);
      stored = true;
    } catch (err) {
      logger.warn({ error: errorMessage(err) }, 'Could not store posts, continuing without persistence');
    }
  }

  const stats: CheckStats = {
    sources: options.sources.length,
    posts: posts.length,
    newPosts: newCount,
    readPosts: readCount,
    visitedUrls: visitedCount,
    stored,
    durationMs: Date.now() - startTime,
  };
  logger.info(stats, 'Check complete');

  return {
    posts,
    stats,
    state: { lastPosts: posts, lastCheckedAt: nowISO(now) },
  };
}
