import Parser from 'rss-parser';
import {
  extractAuthor,
  extractComments,
  extractLikes,
  extractSummary,
  parseEntryDate,
  textOf,
  type FeedEntry,
  type FeedEntryFields,
} from './entry.js';
import { resolveFeedUrl, sortPostsNewestFirst, type BlogPost, type FeedSource } from './model.js';
import { SourceError, errorMessage } from '../shared/errors.js';
import { daysAgo } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export const DEFAULT_USER_AGENT = 'blogwatch/0.1 (+https://www.npmjs.com/package/blogwatch)';

const parser = new Parser<Record<string, unknown>, FeedEntryFields>({
  customFields: {
    item: ['slash:comments', 'thr:total', 'dc:date', 'description', 'published', 'updated'],
  },
});

export interface ParsedFeed {
  entries: FeedEntry[];
  /** Structural problem reported while parsing, if any. */
  warning: string | null;
}

/**
 * Make the common breakages of hand-rolled feeds well-formed: bare or
 * HTML-only entity references and stray control characters.
 */
export function repairXml(xml: string): string {
  return xml
    .replace(/&(?!(?:amp|lt|gt|quot|apos|#\d+|#x[0-9a-fA-F]+);)/g, '&amp;')
    .replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g, '');
}

/**
 * Parse an RSS or Atom document. A document that fails strict parsing is
 * repaired and parsed once more; the original error is kept as `warning`.
 */
export async function parseFeedDocument(xml: string): Promise<ParsedFeed> {
  try {
    const feed = await parser.parseString(xml);
    return { entries: feed.items ?? [], warning: null };
  } catch (err) {
    const warning = errorMessage(err);
    const repaired = repairXml(xml);
    if (repaired === xml) {
      return { entries: [], warning };
    }
    try {
      const feed = await parser.parseString(repaired);
      return { entries: feed.items ?? [], warning };
    } catch (retryErr) {
      logger.debug({ error: errorMessage(retryErr) }, 'Repaired feed still unparseable');
      return { entries: [], warning };
    }
  }
}

export interface FeedFetcherOptions {
  timeoutMs?: number;
  userAgent?: string;
}

export class FeedFetcher {
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: FeedFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  /**
   * GET and parse the feed of `source`. Throws SourceError on transport
   * failure, timeout, non-2xx status or an unusable document.
   */
  async fetchEntries(source: FeedSource): Promise<FeedEntry[]> {
    const feedUrl = resolveFeedUrl(source);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let xml: string;
    try {
      const response = await fetch(feedUrl, {
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
        },
        signal: controller.signal,
        redirect: 'follow',
      });

      if (!response.ok) {
        throw new SourceError(`Feed fetch failed: ${response.status} from ${source.name}`, {
          url: feedUrl,
          status: response.status,
        });
      }

      xml = await response.text();
    } catch (err) {
      if (err instanceof SourceError) throw err;
      if (err instanceof Error && err.name === 'AbortError') {
        throw new SourceError(`Feed fetch timed out after ${this.timeoutMs}ms: ${feedUrl}`, {
          url: feedUrl,
          timeout: this.timeoutMs,
        });
      }
      throw new SourceError(`Feed fetch failed: ${errorMessage(err)}`, { url: feedUrl });
    } finally {
      clearTimeout(timer);
    }

    const { entries, warning } = await parseFeedDocument(xml);
    if (warning !== null) {
      if (entries.length === 0) {
        throw new SourceError(`Feed parse error for ${source.name}: ${warning}`, { url: feedUrl });
      }
      logger.warn({ source: source.name, warning }, 'Feed is malformed, using recovered entries');
    }
    return entries;
  }
}

export interface FetchFeedOptions extends FeedFetcherOptions {
  lookbackDays?: number;
  now?: Date;
  fetcher?: FeedFetcher;
}

export function toBlogPost(entry: FeedEntry, source: FeedSource): BlogPost {
  return {
    title: textOf(entry.title)?.trim() || 'Untitled',
    author: extractAuthor(entry, source.name),
    url: (textOf(entry.link) ?? textOf(entry.guid) ?? '').trim(),
    published: parseEntryDate(entry),
    summary: extractSummary(entry),
    likes: extractLikes(entry),
    comments: extractComments(entry),
    source_name: source.name,
    is_read: false,
  };
}

/**
 * Apply the recency window, then `min_comments`, then `max_posts`.
 */
export function filterPosts(
  posts: BlogPost[],
  source: Pick<FeedSource, 'max_posts' | 'min_comments'>,
  cutoff: Date,
): BlogPost[] {
  let kept = posts.filter((p) => p.published === null || p.published.getTime() >= cutoff.getTime());

  const minComments = source.min_comments;
  if (minComments !== undefined) {
    kept = kept.filter((p) => p.comments !== null && p.comments >= minComments);
  }

  if (source.max_posts !== undefined && kept.length > source.max_posts) {
    kept = sortPostsNewestFirst(kept).slice(0, source.max_posts);
  }
  return kept;
}

/**
 * Fetch one feed and return its recent posts. Never rejects: any failure is
 * logged and yields an empty list.
 */
export async function fetchFeed(source: FeedSource, options: FetchFeedOptions = {}): Promise<BlogPost[]> {
  const lookbackDays = options.lookbackDays ?? 3;
  const fetcher = options.fetcher ?? new FeedFetcher(options);
  logger.info({ source: source.name, url: resolveFeedUrl(source) }, 'Fetching feed');

  let entries: FeedEntry[];
  try {
    entries = await fetcher.fetchEntries(source);
  } catch (err) {
    logger.warn({ source: source.name, error: errorMessage(err) }, 'Feed fetch failed');
    return [];
  }

  const cutoff = daysAgo(lookbackDays, options.now);
  let posts: BlogPost[];
  try {
    posts = filterPosts(
      entries.map((entry) => toBlogPost(entry, source)),
      source,
      cutoff,
    );
  } catch (err) {
    logger.warn({ source: source.name, error: errorMessage(err) }, 'Feed entries could not be read');
    return [];
  }

  logger.info({ source: source.name, count: posts.length }, 'Found recent posts');
  return posts;
}
