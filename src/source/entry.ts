import { JSDOM } from 'jsdom';
import type Parser from 'rss-parser';

/**
 * Extra entry fields requested from rss-parser on top of its defaults.
 */
export interface FeedEntryFields {
  'slash:comments'?: unknown;
  'thr:total'?: unknown;
  'content:encoded'?: unknown;
  'dc:date'?: unknown;
  description?: unknown;
  published?: unknown;
  updated?: unknown;
  author?: unknown;
}

export type FeedEntry = FeedEntryFields & Parser.Item;

/**
 * Text of an XML field as handed over by xml2js: a string, or an object whose
 * character data sits under `_`.
 */
export function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  if (value !== null && typeof value === 'object' && '_' in value) {
    const inner = value._;
    if (typeof inner === 'string') return inner;
  }
  return undefined;
}

// ================================================================
// Dates
// ================================================================

const RFC2822_RE =
  /^(?:[A-Za-z]{3},?\s+)?\d{1,2}\s+[A-Za-z]{3,9}\s+\d{2,4}\s+\d{1,2}:\d{2}(?::\d{2})?(?:\s+.*)?$/;
const RFC2822_ZONE_RE = /(?:[+-]\d{4}|\b(?:GMT|UTC?|[ECMP][SD]T|Z))\s*$/i;
const ISO_RE = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)?(?:Z|[+-]\d{2}:?\d{2})?$/i;
const ISO_ZONE_RE = /(?:Z|[+-]\d{2}:?\d{2})$/i;

function validDate(ms: number): Date | null {
  return Number.isNaN(ms) ? null : new Date(ms);
}

/**
 * RFC-2822 date (`Mon, 01 Jan 2024 10:00:00 GMT`). A missing zone means UTC.
 */
export function parseRfc2822(raw: string): Date | null {
  const value = raw.trim();
  if (!RFC2822_RE.test(value)) return null;
  const zoned = RFC2822_ZONE_RE.test(value) ? value : `${value} GMT`;
  return validDate(Date.parse(zoned));
}

/**
 * ISO-8601 date. A trailing `Z` is rewritten to `+00:00`; a missing zone
 * means UTC.
 */
export function parseIso8601(raw: string): Date | null {
  const value = raw.trim();
  if (!ISO_RE.test(value)) return null;
  let normalized = value.replace(/z$/i, '+00:00').replace(' ', 'T');
  if (normalized.includes('T') && !ISO_ZONE_RE.test(normalized)) {
    normalized += '+00:00';
  }
  return validDate(Date.parse(normalized));
}

export function parseDateString(raw: string): Date | null {
  return parseRfc2822(raw) ?? parseIso8601(raw);
}

/**
 * Publish date of an entry: the published/updated timestamps first, then the
 * parser's own normalized `isoDate`. Null when nothing parses.
 */
export function parseEntryDate(entry: FeedEntry): Date | null {
  const candidates = [entry.published, entry.pubDate, entry.updated, entry['dc:date']];
  for (const candidate of candidates) {
    const raw = textOf(candidate);
    if (!raw) continue;
    const parsed = parseDateString(raw);
    if (parsed) return parsed;
  }

  if (entry.isoDate) {
    return validDate(Date.parse(entry.isoDate));
  }
  return null;
}

// ================================================================
// Summary
// ================================================================

let decoder: HTMLTextAreaElement | null = null;

/**
 * Decode HTML character references with the full HTML5 table. Text set as a
 * textarea's markup is parsed as RCDATA, so references are resolved and tags
 * stay literal text.
 */
export function unescapeHtml(text: string): string {
  if (!text.includes('&')) return text;
  if (!decoder) {
    decoder = new JSDOM('').window.document.createElement('textarea');
  }
  decoder.innerHTML = text;
  return decoder.textContent ?? '';
}

/**
 * Plain text from an HTML fragment. Markup is decoded and stripped only when
 * the text contains a tag delimiter; whitespace is always collapsed.
 */
export function htmlToText(html: string): string {
  let text = html;
  if (text.includes('<')) {
    text = unescapeHtml(text);
    text = text.replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, '');
    text = text.replace(/<[^>]+>/g, '');
  }
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Dedicated summary (Atom `summary`, RSS `description`) or else the first
 * content block (Atom `content`, RSS `content:encoded`).
 */
export function extractSummary(entry: FeedEntry): string {
  const summary =
    textOf(entry.summary) ||
    textOf(entry.description) ||
    textOf(entry['content:encoded']) ||
    textOf(entry.content) ||
    '';
  return htmlToText(summary);
}

// ================================================================
// Engagement
// ================================================================

const COUNT_FIELDS = ['slash:comments', 'thr:total'] as const;

function parseCount(value: unknown): number | null {
  const raw = textOf(value);
  if (raw === undefined || !/^\s*[+-]?\d+\s*$/.test(raw)) return null;
  return parseInt(raw, 10);
}

function extractCount(entry: FeedEntry): number | null {
  for (const field of COUNT_FIELDS) {
    const count = parseCount(entry[field]);
    if (count !== null) return count;
  }
  return null;
}

/**
 * Comment count from the WordPress `slash:comments` or threading `thr:total`
 * extension.
 */
export function extractComments(entry: FeedEntry): number | null {
  return extractCount(entry);
}

/**
 * Like/reaction count. Feeds seen so far only publish comment counts, so this
 * reads the same fields as `extractComments`.
 */
export function extractLikes(entry: FeedEntry): number | null {
  return extractCount(entry);
}

export function extractAuthor(entry: FeedEntry, fallback: string): string {
  const author = textOf(entry.author)?.trim() || textOf(entry.creator)?.trim();
  return author || fallback;
}
