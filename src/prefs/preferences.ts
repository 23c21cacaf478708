import { z } from 'zod';
import fs from 'node:fs';
import path from 'node:path';
import { FeedSourceSchema, type FeedSource } from '../source/model.js';
import { normalizeUrl } from '../source/normalize.js';
import { PreferencesError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const PreferencesSchema = z.object({
  liked: z.array(FeedSourceSchema).default([]),
  discarded_urls: z.array(z.string()).default([]),
});

export type Preferences = z.infer<typeof PreferencesSchema>;

export function emptyPreferences(): Preferences {
  return { liked: [], discarded_urls: [] };
}

export function isDiscarded(prefs: Preferences, url: string): boolean {
  const key = normalizeUrl(url);
  return prefs.discarded_urls.some((u) => normalizeUrl(u) === key);
}

export function isLiked(prefs: Preferences, url: string): boolean {
  const key = normalizeUrl(url);
  return prefs.liked.some((f) => normalizeUrl(f.url) === key);
}

/**
 * Add to liked, removing any discard of the same URL.
 */
export function like(prefs: Preferences, source: FeedSource): Preferences {
  const key = normalizeUrl(source.url);
  const discarded = prefs.discarded_urls.filter((u) => normalizeUrl(u) !== key);
  const liked = isLiked(prefs, source.url) ? prefs.liked : [...prefs.liked, { ...source }];
  return { liked, discarded_urls: discarded };
}

/**
 * Add to discarded, removing any like of the same URL.
 */
export function discard(prefs: Preferences, url: string): Preferences {
  const key = normalizeUrl(url);
  const liked = prefs.liked.filter((f) => normalizeUrl(f.url) !== key);
  const discarded = isDiscarded(prefs, url) ? prefs.discarded_urls : [...prefs.discarded_urls, url];
  return { liked, discarded_urls: discarded };
}

export function likedTagCounts(prefs: Preferences): Map<string, number> {
  const counts = new Map<string, number>();
  for (const source of prefs.liked) {
    for (const tag of source.tags) {
      counts.set(tag, (counts.get(tag) ?? 0) + 1);
    }
  }
  return counts;
}

/**
 * Catalog entries the user neither follows, liked nor discarded, ranked by
 * how often their tags appear among liked blogs, then by name.
 */
export function rankSuggestions(
  catalog: readonly FeedSource[],
  prefs: Preferences,
  followedUrls: ReadonlySet<string>,
): FeedSource[] {
  const tagCounts = likedTagCounts(prefs);

  return catalog
    .filter((feed) => !followedUrls.has(normalizeUrl(feed.url)))
    .filter((feed) => !isDiscarded(prefs, feed.url) && !isLiked(prefs, feed.url))
    .map((feed) => ({
      feed,
      score: feed.tags.reduce((sum, tag) => sum + (tagCounts.get(tag) ?? 0), 0),
    }))
    .sort((a, b) => b.score - a.score || a.feed.name.localeCompare(b.feed.name))
    .map((c) => c.feed);
}

/**
 * Load preferences; a missing or invalid file yields empty preferences.
 */
export function loadPreferences(filePath: string): Preferences {
  if (!fs.existsSync(filePath)) return emptyPreferences();
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    const parsed = PreferencesSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn({ path: filePath, issues: parsed.error.issues.length }, 'Invalid preferences file, ignoring');
      return emptyPreferences();
    }
    return parsed.data;
  } catch (err) {
    logger.warn({ path: filePath, error: errorMessage(err) }, 'Could not load preferences');
    return emptyPreferences();
  }
}

export function savePreferences(prefs: Preferences, filePath: string): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, `${JSON.stringify(prefs, null, 2)}\n`, 'utf-8');
  } catch (err) {
    throw new PreferencesError(`Could not save preferences: ${errorMessage(err)}`, { path: filePath });
  }
  logger.debug({ path: filePath }, 'Saved preferences');
}
