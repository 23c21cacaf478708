import { JSDOM } from 'jsdom';
import { FeedSourceSchema, type FeedSource, type FeedSourceInput } from './model.js';
import { sourceKey } from './normalize.js';
import { DEFAULT_USER_AGENT } from './rss.js';
import { errorMessage } from '../shared/errors.js';
import { withConcurrency } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

const SUBSTACK_MARKERS = ['substackcdn.com', 'substack-post'];
const BLOGROLL_PATHS = ['/blogroll', '/links', '/recommended', '/friends'];
const NON_BLOG_DOMAINS = new Set([
  'twitter.com',
  'x.com',
  'facebook.com',
  'youtube.com',
  'instagram.com',
  'linkedin.com',
  'amazon.com',
  'wikipedia.org',
  'github.com',
]);

export interface DiscoveryOptions {
  timeoutMs?: number;
  userAgent?: string;
  concurrency?: number;
}

interface PageFetch {
  status: number;
  body: string;
}

async function getPage(url: string, options: DiscoveryOptions): Promise<PageFetch | null> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs ?? 15000);
  try {
    const response = await fetch(url, {
      headers: { 'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT, Accept: 'text/html' },
      signal: controller.signal,
      redirect: 'follow',
    });
    return { status: response.status, body: await response.text() };
  } catch (err) {
    logger.debug({ url, error: errorMessage(err) }, 'Discovery fetch failed');
    return null;
  } finally {
    clearTimeout(timer);
  }
}

function anchors(html: string, selector: string): Array<{ href: string; text: string }> {
  const doc = new JSDOM(html).window.document;
  return Array.from(doc.querySelectorAll(selector)).map((a) => ({
    href: (a.getAttribute('href') ?? '').trim(),
    text: (a.textContent ?? '').replace(/\s+/g, ' ').trim(),
  }));
}

function trimSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * A Substack publication root: absolute, on substack.com, not a post (`/p/`)
 * or section (`/s/`) link.
 */
export function isSubstackPublicationUrl(url: string): boolean {
  if (!url || !url.startsWith('http')) return false;
  if (url.includes('/p/') || url.includes('/s/')) return false;
  return url.includes('substack.com');
}

/**
 * Roughly a blog homepage: not a well-known non-blog domain and a short path.
 */
export function looksLikeBlog(url: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }
  const domain = parsed.hostname.toLowerCase().replace(/^www\./, '');
  if (NON_BLOG_DOMAINS.has(domain)) return false;
  return (parsed.pathname.match(/\//g) ?? []).length <= 2;
}

export async function isSubstack(source: FeedSource, options: DiscoveryOptions = {}): Promise<boolean> {
  if (source.url.includes('substack.com')) return true;
  const page = await getPage(trimSlash(source.url), options);
  return page !== null && SUBSTACK_MARKERS.some((m) => page.body.includes(m));
}

// Scraped links are untrusted; one that does not validate is skipped.
function toSource(input: FeedSourceInput): FeedSource | null {
  const parsed = FeedSourceSchema.safeParse(input);
  if (!parsed.success) {
    logger.debug({ url: input.url }, 'Skipping invalid discovered link');
    return null;
  }
  return Object.freeze(parsed.data);
}

function uniqueByUrl(feeds: FeedSource[]): FeedSource[] {
  const seen = new Set<string>();
  return feeds.filter((feed) => {
    const key = sourceKey(feed.url);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Publications listed on a Substack's `/recommendations` page.
 */
export async function discoverSubstackRecommendations(
  source: FeedSource,
  options: DiscoveryOptions = {},
): Promise<FeedSource[]> {
  if (!(await isSubstack(source, options))) return [];

  const page = await getPage(`${trimSlash(source.url)}/recommendations`, options);
  if (!page || page.status !== 200) return [];

  const found: FeedSource[] = [];
  for (const { href, text } of anchors(page.body, 'a[href*="substack.com"]')) {
    if (!text || !isSubstackPublicationUrl(href)) continue;
    const url = trimSlash(href);
    const feed = toSource({ name: text, url, feed_url: `${url}/feed`, tags: ['discovered'] });
    if (feed) found.push(feed);
  }

  const unique = uniqueByUrl(found);
  logger.info({ source: source.name, count: unique.length }, 'Discovered Substack recommendations');
  return unique;
}

/**
 * External blog links from conventional blogroll pages.
 */
export async function discoverBlogrollLinks(
  source: FeedSource,
  options: DiscoveryOptions = {},
): Promise<FeedSource[]> {
  const base = trimSlash(source.url);
  const found: FeedSource[] = [];

  for (const blogrollPath of BLOGROLL_PATHS) {
    const page = await getPage(`${base}${blogrollPath}`, options);
    if (!page || page.status !== 200) continue;

    for (const { href, text } of anchors(page.body, 'article a[href], .entry-content a[href]')) {
      if (!href.startsWith('http') || text.length <= 2 || !looksLikeBlog(href)) continue;
      const feed = toSource({ name: text, url: trimSlash(href), tags: ['discovered', 'blogroll'] });
      if (feed) found.push(feed);
    }
  }

  logger.info({ source: source.name, count: found.length }, 'Discovered blogroll links');
  return found;
}

/**
 * Run every discovery method over every source and return feeds that are
 * neither already followed nor duplicated.
 */
export async function discoverRelatedFeeds(
  sources: readonly FeedSource[],
  options: DiscoveryOptions = {},
): Promise<FeedSource[]> {
  const perSource: FeedSource[][] = sources.map(() => []);

  await withConcurrency(sources, options.concurrency ?? 3, async (source, index) => {
    const recommendations = await discoverSubstackRecommendations(source, options);
    const blogroll = await discoverBlogrollLinks(source, options);
    perSource[index] = [...recommendations, ...blogroll];
  });

  const seen = new Set(sources.map((s) => sourceKey(s.url)));
  const unique: FeedSource[] = [];
  for (const feed of perSource.flat()) {
    const key = sourceKey(feed.url);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(feed);
  }

  logger.info({ count: unique.length }, 'Total newly discovered feeds');
  return unique;
}
