import { describe, it, expect } from 'vitest';
import { normalizeUrl, sourceKey } from '../normalize.js';

describe('normalizeUrl', () => {
  it('lowercases scheme and host, drops query and fragment and trailing slash', () => {
    expect(normalizeUrl('HTTPS://Example.COM/Post/?utm_source=rss#comments')).toBe('https://example.com/Post');
  });

  it('keeps an explicit port and drops the default one', () => {
    expect(normalizeUrl('http://localhost:8080/a/')).toBe('http://localhost:8080/a');
    expect(normalizeUrl('https://example.com:443/a')).toBe('https://example.com/a');
  });

  it('maps the root with and without slash to the same key', () => {
    expect(normalizeUrl('https://example.com/')).toBe('https://example.com');
    expect(normalizeUrl('https://example.com')).toBe('https://example.com');
  });

  it('is idempotent', () => {
    for (const url of ['https://Example.com//a//', 'https://example.com/p?x=1', 'not a url/?q']) {
      const once = normalizeUrl(url);
      expect(normalizeUrl(once)).toBe(once);
    }
  });

  it('trims unparseable input and cuts query and fragment', () => {
    expect(normalizeUrl('  relative/path/?x=1#y ')).toBe('relative/path');
  });
});

describe('sourceKey', () => {
  it('ignores case and trailing slashes', () => {
    expect(sourceKey('https://Example.com/')).toBe(sourceKey('https://example.com'));
    expect(sourceKey(' https://Example.com/blog// ')).toBe('https://example.com/blog');
  });
});
