import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  discoverBlogrollLinks,
  discoverRelatedFeeds,
  discoverSubstackRecommendations,
  isSubstack,
  isSubstackPublicationUrl,
  looksLikeBlog,
} from '../discovery.js';
import { makeSource } from './fixtures.js';

const RECOMMENDATIONS_HTML = `<html><body>
  <a href="https://other.substack.com/">Other Writer</a>
  <a href="https://other.substack.com">Other Writer Again</a>
  <a href="https://third.substack.com/p/some-post">A post</a>
  <a href="https://fourth.substack.com"></a>
  <a href="/relative.substack.com">Relative</a>
</body></html>`;

const BLOGROLL_HTML = `<html><body>
  <article>
    <a href="https://friend.example.org/">Friend Blog</a>
    <a href="https://twitter.com/someone">Twitter</a>
    <a href="https://deep.example.org/a/b/c">Deep link</a>
    <a href="https://ok.example.net/blog">OK</a>
    <a href="https://writer.substack.com/">Writer</a>
  </article>
  <a href="https://outside.example.com">Outside the article</a>
</body></html>`;

function routePages(pages: Record<string, string>) {
  return vi.fn(async (input: RequestInfo | URL) => {
    const body = pages[String(input)];
    return body !== undefined
      ? new Response(body, { status: 200, headers: { 'Content-Type': 'text/html' } })
      : new Response('Not Found', { status: 404 });
  });
}

describe('looksLikeBlog', () => {
  it('accepts short paths on unknown domains', () => {
    expect(looksLikeBlog('https://friend.example.org/')).toBe(true);
    expect(looksLikeBlog('https://friend.example.org/x/y')).toBe(true);
  });

  it('rejects well-known non-blog domains, deep paths and junk', () => {
    expect(looksLikeBlog('https://www.twitter.com/someone')).toBe(false);
    expect(looksLikeBlog('https://github.com/org')).toBe(false);
    expect(looksLikeBlog('https://deep.example.org/a/b/c')).toBe(false);
    expect(looksLikeBlog('not a url')).toBe(false);
  });
});

describe('isSubstackPublicationUrl', () => {
  it('accepts publication roots only', () => {
    expect(isSubstackPublicationUrl('https://other.substack.com')).toBe(true);
    expect(isSubstackPublicationUrl('https://other.substack.com/p/post')).toBe(false);
    expect(isSubstackPublicationUrl('https://other.substack.com/s/section')).toBe(false);
    expect(isSubstackPublicationUrl('/other.substack.com')).toBe(false);
  });
});

describe('discovery', () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it('detects custom-domain Substacks from the homepage', async () => {
    globalThis.fetch = routePages({
      'https://custom.example.com': '<html><script src="https://substackcdn.com/bundle.js"></script></html>',
      'https://plain.example.com': '<html><body>Hello</body></html>',
    });

    expect(await isSubstack(makeSource({ url: 'https://custom.example.com/' }))).toBe(true);
    expect(await isSubstack(makeSource({ url: 'https://plain.example.com' }))).toBe(false);
  });

  it('reads Substack recommendations', async () => {
    globalThis.fetch = routePages({ 'https://writer.substack.com/recommendations': RECOMMENDATIONS_HTML });

    const found = await discoverSubstackRecommendations(makeSource({ name: 'Writer', url: 'https://writer.substack.com/' }));

    expect(found).toEqual([
      {
        name: 'Other Writer',
        url: 'https://other.substack.com',
        feed_url: 'https://other.substack.com/feed',
        feed_type: 'rss',
        tags: ['discovered'],
      },
    ]);
  });

  it('reads blogroll links', async () => {
    globalThis.fetch = routePages({ 'https://blog.example.com/blogroll': BLOGROLL_HTML });

    const found = await discoverBlogrollLinks(makeSource({ url: 'https://blog.example.com' }));

    expect(found.map((f) => f.url)).toEqual(['https://friend.example.org', 'https://writer.substack.com']);
    expect(found[0].tags).toEqual(['discovered', 'blogroll']);
  });

  it('merges methods and drops known and duplicate blogs', async () => {
    globalThis.fetch = routePages({
      'https://writer.substack.com/recommendations': RECOMMENDATIONS_HTML,
      'https://blog.example.com': '<html><body>Not a Substack</body></html>',
      'https://blog.example.com/blogroll': BLOGROLL_HTML,
      'https://blog.example.com/links': BLOGROLL_HTML,
    });

    const found = await discoverRelatedFeeds([
      makeSource({ name: 'Writer', url: 'https://writer.substack.com/' }),
      makeSource({ name: 'Blog', url: 'https://blog.example.com' }),
    ]);

    expect(found.map((f) => f.name)).toEqual(['Other Writer', 'Friend Blog']);
  });

  it('swallows network failures', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new TypeError('fetch failed'));

    await expect(discoverRelatedFeeds([makeSource({ url: 'https://blog.example.com' })])).resolves.toEqual([]);
  });
});
