import { fetchFeed, FeedFetcher, type FetchFeedOptions } from './rss.js';
import { sortPostsNewestFirst, type BlogPost, type FeedSource } from './model.js';
import { withConcurrency } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export interface AggregateOptions extends FetchFeedOptions {
  concurrency?: number;
}

/**
 * Fetch every source with at most `concurrency` requests in flight and
 * return all posts newest first, undated posts last.
 *
 * Results are gathered per source slot, so posts that tie on date keep
 * source order no matter which fetch finished first.
 */
export async function fetchAllFeeds(
  sources: readonly FeedSource[],
  options: AggregateOptions = {},
): Promise<BlogPost[]> {
  const startTime = Date.now();
  const concurrency = options.concurrency ?? 5;
  const fetcher = options.fetcher ?? new FeedFetcher(options);
  const perSource: BlogPost[][] = sources.map(() => []);

  await withConcurrency(sources, concurrency, async (source, index) => {
    perSource[index] = await fetchFeed(source, { ...options, fetcher });
  });

  const posts = sortPostsNewestFirst(perSource.flat());
  logger.info(
    { sources: sources.length, posts: posts.length, durationMs: Date.now() - startTime },
    'Aggregation complete',
  );
  return posts;
}
