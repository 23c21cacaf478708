#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { getBlogwatchDir, resolvePath } from '../shared/utils.js';
import { errorMessage } from '../shared/errors.js';
import { openDb } from '../db/db.js';
import { SqlitePostStore, type PostStore } from '../source/postDb.js';
import { defineSource, type FeedSource } from '../source/model.js';
import { loadSuggestedFeeds, resolveSources } from '../source/registry.js';
import { discoverRelatedFeeds } from '../source/discovery.js';
import { normalizeUrl } from '../source/normalize.js';
import { runCheck } from '../engine/check.js';
import { LlmTextGenerator } from '../engine/textgen.js';
import { FirefoxProfileLocator, FixedProfileLocator } from '../history/profile.js';
import {
  discard,
  isLiked,
  like,
  loadPreferences,
  rankSuggestions,
  savePreferences,
} from '../prefs/preferences.js';
import { formatPost, formatSource } from './format.js';

const program = new Command();

program.name('blogwatch').description('Follow blogs, skip what you already read').version('0.1.0');

function parsePositiveInt(value: string): number {
  const n = parseInt(value, 10);
  if (!Number.isInteger(n) || n < 1 || String(n) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

// === init ===
program
  .command('init')
  .description('Create config and database under ~/.blogwatch')
  .action(async () => {
    const configPath = path.join(getBlogwatchDir(), 'config.yaml');

    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const config = await loadConfig();
    const dbPath = resolvePath(config.db.path);
    const { db, applied } = openDb(dbPath);
    db.close();
    if (applied.length > 0) {
      log(`✓ ${dbPath} created (${applied.length} migrations applied)`);
    } else {
      log(`✓ ${dbPath} already up to date`);
    }
  });

// === check ===
program
  .command('check')
  .description('Fetch recent posts from every followed blog and mark the ones you have read')
  .option('-d, --days <n>', 'Lookback days', parsePositiveInt)
  .option('--no-history', 'Skip the Firefox history check')
  .option('-u, --unread-only', 'Only print unread posts', false)
  .option('--discover', 'Also look for related blogs', false)
  .option('-f, --feeds-file <path>', 'YAML or JSON list of feed sources')
  .option('-c, --concurrency <n>', 'Concurrent feed fetches', parsePositiveInt)
  .option('-p, --profile <dir>', 'Firefox profile directory to read history from')
  .action(
    async (opts: {
      days?: number;
      history: boolean;
      unreadOnly: boolean;
      discover: boolean;
      feedsFile?: string;
      concurrency?: number;
      profile?: string;
    }) => {
      const config = await loadConfig();
      const sources = loadSources(config, opts.feedsFile);
      const lookbackDays = opts.days ?? config.fetch.lookback_days;
      const opened = openStoreBestEffort(config);

      try {
        log(`Checking ${sources.length} blogs for posts from the last ${lookbackDays} days...`);
        const { posts, stats } = await runCheck({
          sources,
          lookbackDays,
          concurrency: opts.concurrency ?? config.fetch.concurrency,
          timeoutMs: config.fetch.timeout_ms,
          userAgent: config.fetch.user_agent,
          history: {
            enabled: opts.history && config.history.enabled,
            browserDir: resolvePath(config.history.firefox_dir),
            lookbackDays: config.history.lookback_days,
            locator: opts.profile
              ? new FixedProfileLocator(resolvePath(opts.profile))
              : new FirefoxProfileLocator(),
          },
          store: opened?.store,
        });

        const shown = opts.unreadOnly ? posts.filter((p) => !p.is_read) : posts;
        log('');
        for (const post of shown) {
          log(formatPost(post).join('\n'));
        }

        const unread = posts.filter((p) => !p.is_read).length;
        log(`\n✓ ${posts.length} posts, ${unread} unread, ${stats.newPosts} new (${stats.durationMs}ms)`);

        if (opts.discover) {
          await printDiscovered(sources, config);
        }
      } finally {
        opened?.close();
      }
    },
  );

// === posts ===
program
  .command('posts')
  .description('List stored posts')
  .option('-d, --days <n>', 'Lookback days', parsePositiveInt)
  .option('-s, --source <name>', 'Only posts from this blog')
  .option('-u, --unread-only', 'Only unread posts', false)
  .action(async (opts: { days?: number; source?: string; unreadOnly: boolean }) => {
    const { store, cleanup } = await getStore();
    try {
      const posts = store.query({ lookbackDays: opts.days, sourceName: opts.source });
      const shown = opts.unreadOnly ? posts.filter((p) => !p.is_read) : posts;
      if (shown.length === 0) {
        log('No stored posts. Run: blogwatch check');
        return;
      }
      for (const post of shown) {
        log(formatPost(post).join('\n'));
      }
      log(`\n${shown.length} of ${store.count()} stored posts`);
    } finally {
      cleanup();
    }
  });

// === digest ===
program
  .command('digest')
  .description('Summarize recent stored posts with the configured LLM')
  .option('-d, --days <n>', 'Lookback days', parsePositiveInt)
  .option('--latest', 'Print the last generated digest instead', false)
  .action(async (opts: { days?: number; latest: boolean }) => {
    const { store, config, cleanup } = await getStore();
    try {
      if (opts.latest) {
        const latest = store.latestDigest();
        log(latest ? `Digest of ${latest.created_at}\n\n${latest.content}` : 'No digest yet.');
        return;
      }

      const generator = LlmTextGenerator.fromConfig(config.llm);
      if (!generator.available) {
        log('LLM not configured. Set llm.api_key in config or BLOGWATCH_LLM_API_KEY.');
        process.exitCode = 1;
        return;
      }

      const lookbackDays = opts.days ?? config.fetch.lookback_days;
      const posts = store.query({ lookbackDays });
      if (posts.length === 0) {
        log('No stored posts in that window. Run: blogwatch check');
        return;
      }

      log(`Summarizing ${posts.length} posts...`);
      const digest = await generator.summarize(posts, lookbackDays);
      if (!digest) {
        log('Digest generation failed. See the log for details.');
        process.exitCode = 1;
        return;
      }
      store.saveDigest(digest, lookbackDays);
      log(`\n${digest}`);
    } finally {
      cleanup();
    }
  });

// === discover ===
program
  .command('discover')
  .description('Find blogs recommended by the blogs you follow')
  .option('-f, --feeds-file <path>', 'YAML or JSON list of feed sources')
  .action(async (opts: { feedsFile?: string }) => {
    const config = await loadConfig();
    await printDiscovered(loadSources(config, opts.feedsFile), config);
  });

// === suggest ===
program
  .command('suggest')
  .description('Suggest blogs from the curated catalog, ranked by what you liked')
  .option('-n, --limit <n>', 'How many suggestions', parsePositiveInt, 10)
  .option('-f, --feeds-file <path>', 'YAML or JSON list of feed sources')
  .action(async (opts: { limit: number; feedsFile?: string }) => {
    const { store, config, cleanup } = await getStore();
    try {
      const sources = loadSources(config, opts.feedsFile);
      const prefs = loadPreferences(resolvePath(config.preferences_path));
      const followed = new Set(sources.map((s) => normalizeUrl(s.url)));
      const ranked = rankSuggestions(loadSuggestedFeeds(), prefs, followed).slice(0, opts.limit);

      if (ranked.length === 0) {
        log('No suggestions left. Try: blogwatch discover');
        return;
      }

      const reasons = store.suggestionReasons();
      const missing = ranked.filter((s) => !reasons[s.url]);
      if (missing.length > 0) {
        const generated = await LlmTextGenerator.fromConfig(config.llm).explain(missing, prefs.liked, sources);
        if (Object.keys(generated).length > 0) {
          store.saveSuggestionReasons(generated);
          Object.assign(reasons, generated);
        }
      }

      for (const source of ranked) {
        log(formatSource(source, reasons[source.url]).join('\n'));
      }
      log('\nUse "blogwatch like <url>" or "blogwatch discard <url>" to tune suggestions.');
    } finally {
      cleanup();
    }
  });

// === like / discard ===
program
  .command('like <url>')
  .description('Mark a suggested blog as liked')
  .option('--name <name>', 'Name to record when the blog is not in the catalog')
  .action(async (url: string, opts: { name?: string }) => {
    const config = await loadConfig();
    const prefsPath = resolvePath(config.preferences_path);
    const prefs = loadPreferences(prefsPath);

    if (isLiked(prefs, url)) {
      log(`Already liked: ${url}`);
      return;
    }

    const source = findCatalogSource(url) ?? defineSource({ name: opts.name ?? new URL(url).hostname, url });
    savePreferences(like(prefs, source), prefsPath);
    log(`✓ Liked ${source.name}`);
  });

program
  .command('discard <url>')
  .description('Never suggest this blog again')
  .action(async (url: string) => {
    const config = await loadConfig();
    const prefsPath = resolvePath(config.preferences_path);
    savePreferences(discard(loadPreferences(prefsPath), url), prefsPath);
    log(`✓ Discarded ${url}`);
  });

// === doctor ===
program
  .command('doctor')
  .description('Check system health: config, database, feeds, history, LLM')
  .action(async () => {
    const results: string[] = [];

    let config: Config;
    try {
      config = await loadConfig();
      results.push('Config: ok');
    } catch (err) {
      log(`✗ Config: error (${errorMessage(err)})`);
      process.exitCode = 1;
      return;
    }

    const dbPath = resolvePath(config.db.path);
    if (!fs.existsSync(dbPath)) {
      results.push('DB: missing (run blogwatch init)');
    } else {
      try {
        const { db } = openDb(dbPath);
        try {
          results.push(`DB: ok (${new SqlitePostStore(db).count()} posts)`);
        } finally {
          db.close();
        }
      } catch (err) {
        results.push(`DB: error (${errorMessage(err)})`);
      }
    }

    try {
      results.push(`Feeds: ${loadSources(config).length}`);
    } catch (err) {
      results.push(`Feeds: error (${errorMessage(err)})`);
    }

    if (!config.history.enabled) {
      results.push('History: disabled');
    } else {
      const profile = new FirefoxProfileLocator().findProfile(resolvePath(config.history.firefox_dir));
      results.push(profile ? `History: ${profile}` : 'History: no Firefox profile found');
    }

    results.push(config.llm.api_key ? `LLM: ${config.llm.model}` : 'LLM: (unconfigured)');

    log(`✓ ${results.join(' | ')}`);
  });

// === Helpers ===

function loadSources(config: Config, feedsFile?: string): FeedSource[] {
  const file = feedsFile ?? config.feeds_file;
  return resolveSources(file ? resolvePath(file) : undefined);
}

function findCatalogSource(url: string): FeedSource | undefined {
  const key = normalizeUrl(url);
  return loadSuggestedFeeds().find((s) => normalizeUrl(s.url) === key);
}

async function printDiscovered(sources: readonly FeedSource[], config: Config): Promise<void> {
  log(`\nLooking for blogs related to ${sources.length} sources...`);
  const found = await discoverRelatedFeeds(sources, {
    timeoutMs: config.fetch.timeout_ms,
    userAgent: config.fetch.user_agent,
    concurrency: config.fetch.concurrency,
  });
  if (found.length === 0) {
    log('No new blogs found.');
    return;
  }
  for (const source of found) {
    log(formatSource(source).join('\n'));
  }
  log(`\n✓ ${found.length} related blogs found`);
}

/**
 * Open the store for a check. A store that cannot be opened is skipped.
 */
function openStoreBestEffort(config: Config): { store: PostStore; close: () => void } | null {
  try {
    const { db } = openDb(config.db.path);
    return { store: new SqlitePostStore(db), close: () => db.close() };
  } catch (err) {
    log(`Warning: posts will not be stored (${errorMessage(err)})`);
    return null;
  }
}

async function getStore(): Promise<{ store: PostStore; config: Config; cleanup: () => void }> {
  const config = await loadConfig();
  const dbPath = resolvePath(config.db.path);

  if (!fs.existsSync(dbPath)) {
    log('Database not found. Run blogwatch init first.');
    process.exit(1);
  }

  const { db } = openDb(dbPath);
  return { store: new SqlitePostStore(db), config, cleanup: () => db.close() };
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  log(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
});
