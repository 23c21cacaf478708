import type { FeedSource } from '../source/model.js';

/**
 * Read `NAME: reason` lines and map each to the URL of the candidate whose
 * name contains, or is contained in, NAME (case-insensitive). Lines that
 * match no candidate are dropped.
 */
export function parseReasonLines(
  text: string,
  candidates: readonly Pick<FeedSource, 'name' | 'url'>[],
): Record<string, string> {
  const reasons: Record<string, string> = {};

  for (const line of text.trim().split('\n')) {
    const colon = line.indexOf(':');
    if (colon === -1) continue;

    const name = line.slice(0, colon).trim().replace(/^[-*]\s*/, '').toLowerCase();
    const reason = line.slice(colon + 1).trim();
    if (!name || !reason) continue;

    const match = candidates.find((c) => {
      const candidate = c.name.toLowerCase();
      return candidate.includes(name) || name.includes(candidate);
    });
    if (match) reasons[match.url] = reason;
  }

  return reasons;
}
