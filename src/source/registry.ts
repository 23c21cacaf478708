import { z } from 'zod';
import fs from 'node:fs';
import path from 'node:path';
import { parse as yamlParse } from 'yaml';
import { FeedSourceSchema, type FeedSource } from './model.js';
import { getPackageRoot } from '../shared/utils.js';
import { ConfigError, errorMessage } from '../shared/errors.js';

const FeedListSchema = z.array(FeedSourceSchema);

function getFeedsDir(): string {
  return path.join(getPackageRoot(), 'feeds');
}

/**
 * Parse a YAML (or JSON, which YAML accepts) list of feed sources.
 */
export function parseFeedList(content: string, origin: string): FeedSource[] {
  let raw: unknown;
  try {
    raw = yamlParse(content);
  } catch (err) {
    throw new ConfigError(`Feed list is not valid YAML/JSON: ${origin}`, {
      cause: errorMessage(err),
    });
  }

  const parsed = FeedListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid feed list: ${origin}`, {
      errors: parsed.error.flatten().formErrors,
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return parsed.data.map((s) => Object.freeze(s));
}

export function loadFeedFile(filePath: string): FeedSource[] {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Feed file not found: ${filePath}`, { path: filePath });
  }
  return parseFeedList(fs.readFileSync(filePath, 'utf-8'), filePath);
}

export function loadDefaultFeeds(): FeedSource[] {
  return loadFeedFile(path.join(getFeedsDir(), 'default.yaml'));
}

/**
 * Curated blogs outside the user's usual niche, ranked by `rankSuggestions`.
 */
export function loadSuggestedFeeds(): FeedSource[] {
  return loadFeedFile(path.join(getFeedsDir(), 'suggested.yaml'));
}

/**
 * Sources from `feedsFile` when given, otherwise the bundled defaults.
 */
export function resolveSources(feedsFile?: string): FeedSource[] {
  return feedsFile ? loadFeedFile(feedsFile) : loadDefaultFeeds();
}
