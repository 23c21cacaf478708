import { fileURLToPath } from 'node:url';
import fs from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';

export function resolvePath(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return path.join(homedir(), p.slice(1));
  }
  return path.resolve(p);
}

export function nowISO(now: Date = new Date()): string {
  return now.toISOString();
}

export function daysAgo(days: number, now: Date = new Date()): Date {
  return new Date(now.getTime() - days * 24 * 3600 * 1000);
}

/**
 * Walk up from this file to the directory holding package.json.
 * Works from both src/shared/utils.ts and dist/shared/utils.js.
 */
export function getPackageRoot(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (true) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');
}

export function getBlogwatchDir(): string {
  return resolvePath('~/.blogwatch');
}

/**
 * Run `fn` over `items` with at most `concurrency` calls in flight.
 */
export async function withConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<void>,
): Promise<void> {
  let next = 0;
  const workers: Promise<void>[] = [];
  const size = Math.max(1, Math.min(concurrency, items.length));

  for (let i = 0; i < size; i++) {
    workers.push(
      (async () => {
        while (next < items.length) {
          const index = next++;
          await fn(items[index], index);
        }
      })(),
    );
  }

  await Promise.all(workers);
}
