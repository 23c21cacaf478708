import fs from 'node:fs';
import path from 'node:path';
import { logger } from '../shared/logger.js';

export const PLACES_DB = 'places.sqlite';

/**
 * Finds the browser profile whose history should be read. Swappable so that
 * reconciliation can run against a fixed directory layout in tests.
 */
export interface ProfileLocator {
  findProfile(rootDir: string): string | null;
}

export type IniSections = Map<string, Map<string, string>>;

/**
 * Parse INI text into sections, in file order. Keys are lowercased; values
 * are trimmed. Lines outside a section and comment lines are ignored.
 */
export function parseIni(content: string): IniSections {
  const sections: IniSections = new Map();
  let current: Map<string, string> | null = null;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith(';') || line.startsWith('#')) continue;

    const header = /^\[(.+)\]$/.exec(line);
    if (header) {
      const name = header[1].trim();
      current = sections.get(name) ?? new Map<string, string>();
      sections.set(name, current);
      continue;
    }

    const eq = line.indexOf('=');
    if (eq <= 0 || current === null) continue;
    current.set(line.slice(0, eq).trim().toLowerCase(), line.slice(eq + 1).trim());
  }

  return sections;
}

function iniBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  const v = value.toLowerCase();
  if (['1', 'yes', 'true', 'on'].includes(v)) return true;
  if (['0', 'no', 'false', 'off'].includes(v)) return false;
  return fallback;
}

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Reads Firefox's `profiles.ini`. Preference order: a `[Profile*]` marked
 * `Default=1`, the `Default=` of an `[Install*]` section, the first profile
 * that exists. Without `profiles.ini`, the first subdirectory holding
 * `places.sqlite` is used.
 */
export class FirefoxProfileLocator implements ProfileLocator {
  findProfile(rootDir: string): string | null {
    const profilesIni = path.join(rootDir, 'profiles.ini');

    if (!fs.existsSync(profilesIni)) {
      const scanned = this.scanForPlaces(rootDir);
      if (!scanned) logger.debug({ path: profilesIni }, 'profiles.ini not found');
      return scanned;
    }

    const sections = parseIni(fs.readFileSync(profilesIni, 'utf-8'));
    let defaultPath: string | null = null;
    let firstPath: string | null = null;

    for (const [name, values] of sections) {
      if (!name.startsWith('Profile')) continue;

      const pathValue = values.get('path');
      if (pathValue === undefined) continue;

      const isRelative = iniBoolean(values.get('isrelative'), true);
      const profilePath = isRelative ? path.join(rootDir, pathValue) : pathValue;
      const exists = isDirectory(profilePath);

      if (firstPath === null && exists) firstPath = profilePath;

      if (iniBoolean(values.get('default'), false) && exists) {
        defaultPath = profilePath;
        break;
      }
    }

    if (defaultPath === null) {
      for (const [name, values] of sections) {
        if (!name.startsWith('Install')) continue;
        const pathValue = values.get('default');
        if (!pathValue) continue;
        const candidate = path.join(rootDir, pathValue);
        if (isDirectory(candidate)) {
          defaultPath = candidate;
          break;
        }
      }
    }

    const result = defaultPath ?? firstPath;
    if (result) {
      logger.debug({ profile: result }, 'Using Firefox profile');
    } else {
      logger.debug({ rootDir }, 'No Firefox profile found');
    }
    return result;
  }

  private scanForPlaces(rootDir: string): string | null {
    if (!isDirectory(rootDir)) return null;
    const children = fs.readdirSync(rootDir, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name));
    for (const child of children) {
      if (!child.isDirectory()) continue;
      const candidate = path.join(rootDir, child.name);
      if (fs.existsSync(path.join(candidate, PLACES_DB))) return candidate;
    }
    return null;
  }
}

/**
 * A locator that always answers with the same directory.
 */
export class FixedProfileLocator implements ProfileLocator {
  constructor(private readonly profileDir: string | null) {}

  findProfile(): string | null {
    return this.profileDir;
  }
}
