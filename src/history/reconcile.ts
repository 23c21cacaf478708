import { FirefoxProfileLocator, type ProfileLocator } from './profile.js';
import { readProfileHistory } from './places.js';
import { normalizeUrl } from '../source/normalize.js';
import type { BlogPost } from '../source/model.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface VisitedUrlsOptions {
  locator?: ProfileLocator;
  now?: Date;
}

/**
 * Normalized URLs visited in the browser within the lookback window. Never
 * throws: a missing profile or an unreadable history yields an empty set.
 */
export function getVisitedUrls(
  browserDir: string,
  lookbackDays = 30,
  options: VisitedUrlsOptions = {},
): Set<string> {
  const locator = options.locator ?? new FirefoxProfileLocator();

  let profileDir: string | null;
  try {
    profileDir = locator.findProfile(browserDir);
  } catch (err) {
    logger.warn({ browserDir, error: errorMessage(err) }, 'Could not locate browser profile');
    return new Set();
  }

  if (profileDir === null) {
    logger.info({ browserDir }, 'No Firefox profile found, history check disabled');
    return new Set();
  }

  try {
    const visited = readProfileHistory(profileDir, lookbackDays, options.now);
    logger.info({ count: visited.size }, 'Read visited URLs from Firefox history');
    return visited;
  } catch (err) {
    logger.warn({ profileDir, error: errorMessage(err) }, 'Could not read Firefox history');
    return new Set();
  }
}

/**
 * Set `is_read` on every post whose normalized URL was visited. Returns the
 * number of posts marked.
 */
export function markReadPosts(posts: BlogPost[], visited: ReadonlySet<string>): number {
  let marked = 0;
  for (const post of posts) {
    if (visited.has(normalizeUrl(post.url))) {
      post.is_read = true;
      marked++;
    }
  }
  return marked;
}
