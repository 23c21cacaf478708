import { defineSource, type FeedSource, type FeedSourceInput } from '../model.js';

export interface ItemFixture {
  title: string;
  link: string;
  pubDate?: string;
  comments?: number;
  description?: string;
  creator?: string;
}

export function rssItem(item: ItemFixture): string {
  return [
    '<item>',
    `<title>${item.title}</title>`,
    `<link>${item.link}</link>`,
    item.pubDate ? `<pubDate>${item.pubDate}</pubDate>` : '',
    item.comments !== undefined ? `<slash:comments>${item.comments}</slash:comments>` : '',
    item.description ? `<description><![CDATA[${item.description}]]></description>` : '',
    item.creator ? `<dc:creator>${item.creator}</dc:creator>` : '',
    '</item>',
  ].join('');
}

export function rssFeed(items: ItemFixture[]): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:slash="http://purl.org/rss/1.0/modules/slash/" xmlns:dc="http://purl.org/dc/elements/1.1/">
  <channel>
    <title>Test Blog</title>
    <link>https://example.com</link>
    ${items.map(rssItem).join('\n    ')}
  </channel>
</rss>`;
}

export function makeSource(overrides: Partial<FeedSourceInput> = {}): FeedSource {
  return defineSource({
    name: 'Test Blog',
    url: 'https://example.com/',
    ...overrides,
  });
}

export function feedResponse(body: string, status = 200): Response {
  return new Response(body, {
    status,
    headers: { 'Content-Type': 'application/rss+xml' },
  });
}
