import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getBlogwatchDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export function defaultFirefoxDir(platform: NodeJS.Platform = process.platform): string {
  const home = homedir();
  switch (platform) {
    case 'darwin':
      return path.join(home, 'Library', 'Application Support', 'Firefox', 'Profiles');
    case 'win32':
      return path.join(home, 'AppData', 'Roaming', 'Mozilla', 'Firefox', 'Profiles');
    default:
      return path.join(home, '.mozilla', 'firefox');
  }
}

export const ConfigSchema = z.object({
  fetch: z
    .object({
      lookback_days: z.number().int().min(1).max(90).default(3),
      timeout_ms: z.number().int().min(1000).max(120000).default(15000),
      concurrency: z.number().int().min(1).max(20).default(5),
      user_agent: z.string().default('blogwatch/0.1 (+https://www.npmjs.com/package/blogwatch)'),
    })
    .default({}),

  history: z
    .object({
      enabled: z.boolean().default(true),
      firefox_dir: z.string().default(defaultFirefoxDir()),
      lookback_days: z.number().int().min(1).default(30),
    })
    .default({}),

  llm: z
    .object({
      base_url: z.string().default(''),
      api_key: z.string().default(''),
      model: z.string().default('gpt-4.1-mini'),
      max_tokens: z.number().int().min(1).default(1024),
      temperature: z.number().min(0).max(2).default(0.4),
      timeout_ms: z.number().int().min(1000).default(60000),
      max_concurrent: z.number().int().min(1).max(16).default(2),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.blogwatch/posts.db'),
    })
    .default({}),

  feeds_file: z.string().optional(),
  preferences_path: z.string().default('~/.blogwatch/preferences.json'),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Apply BLOGWATCH_LLM_* environment overrides on top of a raw config object.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const envApiKey = env['BLOGWATCH_LLM_API_KEY'];
  const envBaseUrl = env['BLOGWATCH_LLM_BASE_URL'];
  const envModel = env['BLOGWATCH_LLM_MODEL'];

  if (!envApiKey && !envBaseUrl && !envModel) return rawConfig;

  const existing = rawConfig['llm'];
  const llm: Record<string, unknown> = isRecord(existing) ? { ...existing } : {};
  if (envApiKey) llm['api_key'] = envApiKey;
  if (envBaseUrl) llm['base_url'] = envBaseUrl;
  if (envModel) llm['model'] = envModel;
  return { ...rawConfig, llm };
}

export function parseConfig(rawConfig: unknown): Config {
  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('blogwatch', {
    searchPlaces: ['blogwatch.config.yaml', 'blogwatch.config.yml', '.blogwatchrc.yaml', '.blogwatchrc.yml'],
  });

  const envConfigPath = process.env['BLOGWATCH_CONFIG'];
  const defaultConfigPath = path.join(getBlogwatchDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const loaded: unknown = (await explorer.load(resolved))?.config;
    if (isRecord(loaded)) rawConfig = loaded;
  } else if (fs.existsSync(defaultConfigPath)) {
    const loaded: unknown = (await explorer.load(defaultConfigPath))?.config;
    if (isRecord(loaded)) rawConfig = loaded;
  } else {
    logger.debug('No config file found, using defaults');
  }

  cachedConfig = parseConfig(applyEnvOverrides(rawConfig));
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
