import { z } from 'zod';

export const FeedTypeSchema = z.enum(['rss', 'atom', 'html_scrape']);
export type FeedType = z.infer<typeof FeedTypeSchema>;

/**
 * A blog or feed the user follows. `feed_type` is informational; the parser
 * detects the dialect from the document itself.
 */
export const FeedSourceSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  feed_url: z.string().url().optional(),
  feed_type: FeedTypeSchema.default('rss'),
  tags: z.array(z.string()).default([]),
  // Per-source limits for prolific authors
  max_posts: z.number().int().positive().optional(),
  min_comments: z.number().int().nonnegative().optional(),
});

export type FeedSource = Readonly<z.infer<typeof FeedSourceSchema>>;
export type FeedSourceInput = z.input<typeof FeedSourceSchema>;

export function defineSource(input: FeedSourceInput): FeedSource {
  return Object.freeze(FeedSourceSchema.parse(input));
}

/**
 * Explicit feed URL, or `<site>/feed`.
 */
export function resolveFeedUrl(source: Pick<FeedSource, 'url' | 'feed_url'>): string {
  if (source.feed_url) return source.feed_url;
  return `${source.url.replace(/\/+$/, '')}/feed`;
}

export interface BlogPost {
  title: string;
  author: string;
  url: string;
  published: Date | null;
  summary: string;
  likes: number | null;
  comments: number | null;
  source_name: string;
  is_read: boolean;
}

/**
 * A post as kept by the store, with first/last sighting timestamps.
 */
export interface StoredPost extends BlogPost {
  first_seen: string;
  last_seen: string;
}

export function ageInDays(post: Pick<BlogPost, 'published'>, now: Date = new Date()): number | null {
  if (!post.published) return null;
  return Math.floor((now.getTime() - post.published.getTime()) / (24 * 3600 * 1000));
}

export function shortSummary(post: Pick<BlogPost, 'summary'>, maxLength = 120): string {
  if (post.summary.length <= maxLength) return post.summary;
  return `${post.summary.slice(0, maxLength - 3)}...`;
}

/**
 * Newest first; undated posts rank as the oldest possible value.
 */
export function comparePostsNewestFirst(a: Pick<BlogPost, 'published'>, b: Pick<BlogPost, 'published'>): number {
  const ta = a.published ? a.published.getTime() : Number.NEGATIVE_INFINITY;
  const tb = b.published ? b.published.getTime() : Number.NEGATIVE_INFINITY;
  if (ta === tb) return 0;
  return ta > tb ? -1 : 1;
}

/**
 * Stable newest-first sort returning a new array.
 */
export function sortPostsNewestFirst<T extends Pick<BlogPost, 'published'>>(posts: readonly T[]): T[] {
  return [...posts].sort(comparePostsNewestFirst);
}
