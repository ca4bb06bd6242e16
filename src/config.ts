import fs from 'fs/promises';
import path from 'path';
import { ConfigError, describeError } from './errors.js';
import { isLogLevel } from './logger.js';
import { DEFAULT_USER_AGENT } from './scrapers/forum/fetcher.js';
import { DEFAULT_IGNORED_THREAD_IDS } from './scrapers/forum/listing.js';
import type { CrawlerConfig, SessionCookie } from './types.js';

type ConfigOverrides = Partial<CrawlerConfig>;

interface CliOverrides {
  configPath?: string;
  infinite: boolean;
  values: ConfigOverrides;
}

const NUMBER_KEYS = [
  'existingPageSize',
  'requestDelayMs',
  'batchSize',
  'concurrency',
  'startPage',
  'maxPages',
  'maxThreads',
  'timeoutMs',
  'maxAttempts',
  'retryBaseDelayMs'
] as const;

const STRING_KEYS = [
  'forumBaseUrl',
  'categoryUrl',
  'attachmentHost',
  'catalogUrl',
  'apiKey',
  'imageProxyBase',
  'userAgent',
  'logFile'
] as const;

type NumberKey = (typeof NUMBER_KEYS)[number];
type StringKey = (typeof STRING_KEYS)[number];

/** Settings that may be zero; every other number must be positive. */
const NON_NEGATIVE_KEYS: ReadonlySet<NumberKey> = new Set(['requestDelayMs', 'retryBaseDelayMs']);

const ENV_NUMBERS: Record<string, NumberKey> = {
  CRAWLER_EXISTING_PAGE_SIZE: 'existingPageSize',
  CRAWLER_DELAY_MS: 'requestDelayMs',
  CRAWLER_BATCH_SIZE: 'batchSize',
  CRAWLER_CONCURRENCY: 'concurrency',
  CRAWLER_START_PAGE: 'startPage',
  CRAWLER_MAX_PAGES: 'maxPages',
  CRAWLER_MAX_THREADS: 'maxThreads',
  CRAWLER_TIMEOUT_MS: 'timeoutMs',
  CRAWLER_MAX_ATTEMPTS: 'maxAttempts'
};

const ENV_STRINGS: Record<string, StringKey> = {
  CRAWLER_FORUM_URL: 'forumBaseUrl',
  CRAWLER_CATEGORY_URL: 'categoryUrl',
  CRAWLER_ATTACHMENT_HOST: 'attachmentHost',
  CRAWLER_CATALOG_URL: 'catalogUrl',
  CRAWLER_API_KEY: 'apiKey',
  CRAWLER_IMAGE_PROXY_BASE: 'imageProxyBase',
  CRAWLER_USER_AGENT: 'userAgent',
  CRAWLER_LOG_FILE: 'logFile'
};

const ARG_NUMBERS: Record<string, NumberKey> = {
  '--pages': 'maxPages',
  '--start-page': 'startPage',
  '--max-threads': 'maxThreads',
  '--batch-size': 'batchSize',
  '--concurrency': 'concurrency',
  '--delay': 'requestDelayMs'
};

export const DEFAULT_CONFIG_PATH = 'config.json';

function defaults(): Omit<CrawlerConfig, 'catalogUrl' | 'apiKey' | 'imageProxyBase'> {
  return {
    forumBaseUrl: 'https://f95zone.to',
    categoryUrl: 'https://f95zone.to/forums/games.2/',
    attachmentHost: 'attachments.f95zone.to',
    cookies: [],
    existingPageSize: 2000,
    requestDelayMs: 2000,
    batchSize: 10,
    concurrency: 1,
    startPage: 1,
    maxPages: undefined,
    maxThreads: undefined,
    ignoreThreadIds: [...DEFAULT_IGNORED_THREAD_IDS],
    timeoutMs: 30000,
    maxAttempts: 3,
    retryBaseDelayMs: 1000,
    userAgent: DEFAULT_USER_AGENT,
    logLevel: 'info',
    logFile: undefined
  };
}

function parseNumber(raw: string, source: string): number {
  const value = Number(raw.trim());
  if (!raw.trim() || !Number.isInteger(value)) {
    throw new ConfigError(`${source} must be an integer, got "${raw}"`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseCookieList(raw: unknown, defaultDomain: string, source: string): SessionCookie[] {
  if (!Array.isArray(raw)) {
    throw new ConfigError(`${source} must be a list of cookies`);
  }
  return raw.map((entry, index) => {
    if (!isRecord(entry) || typeof entry.name !== 'string' || typeof entry.value !== 'string') {
      throw new ConfigError(`${source}[${index}] needs string "name" and "value"`);
    }
    const domain = typeof entry.domain === 'string' && entry.domain ? entry.domain : defaultDomain;
    return { name: entry.name, value: entry.value, domain };
  });
}

/** `name=value; other=value` cookie string, scoped to one domain. */
export function parseCookieHeader(raw: string, domain: string): SessionCookie[] {
  return raw
    .split(';')
    .map(part => part.trim())
    .filter(Boolean)
    .flatMap(part => {
      const idx = part.indexOf('=');
      if (idx <= 0) {
        return [];
      }
      return [{ name: part.slice(0, idx).trim(), value: part.slice(idx + 1).trim(), domain }];
    });
}

function hostnameOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return url;
  }
}

export function fromConfigObject(raw: unknown, source: string): ConfigOverrides {
  if (!isRecord(raw)) {
    throw new ConfigError(`${source} must contain a JSON object`);
  }
  const overrides: ConfigOverrides = {};

  for (const key of NUMBER_KEYS) {
    const value = raw[key];
    if (value === undefined || value === null) continue;
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw new ConfigError(`${source}: "${key}" must be an integer`);
    }
    overrides[key] = value;
  }

  for (const key of STRING_KEYS) {
    const value = raw[key];
    if (value === undefined || value === null) continue;
    if (typeof value !== 'string') {
      throw new ConfigError(`${source}: "${key}" must be a string`);
    }
    overrides[key] = value;
  }

  const logLevel = raw.logLevel;
  if (logLevel !== undefined) {
    if (typeof logLevel !== 'string' || !isLogLevel(logLevel)) {
      throw new ConfigError(`${source}: "logLevel" must be one of debug, info, warn, error, silent`);
    }
    overrides.logLevel = logLevel;
  }

  const ignoreThreadIds = raw.ignoreThreadIds;
  if (ignoreThreadIds !== undefined) {
    if (!Array.isArray(ignoreThreadIds)) {
      throw new ConfigError(`${source}: "ignoreThreadIds" must be a list`);
    }
    overrides.ignoreThreadIds = ignoreThreadIds.map((id: unknown) => String(id));
  }

  if (raw.cookies !== undefined) {
    const forumHost = hostnameOf(overrides.forumBaseUrl ?? defaults().forumBaseUrl);
    overrides.cookies = parseCookieList(raw.cookies, forumHost, `${source}: "cookies"`);
  }

  return overrides;
}

export async function readConfigFile(filePath: string, required: boolean): Promise<ConfigOverrides> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (!required) {
      return {};
    }
    throw new ConfigError(`Config file ${filePath} could not be read: ${describeError(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in config file ${filePath}: ${describeError(error)}`);
  }
  return fromConfigObject(parsed, filePath);
}

export function fromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
  const overrides: ConfigOverrides = {};

  for (const [name, key] of Object.entries(ENV_NUMBERS)) {
    const raw = env[name];
    if (raw) {
      overrides[key] = parseNumber(raw, name);
    }
  }
  for (const [name, key] of Object.entries(ENV_STRINGS)) {
    const raw = env[name];
    if (raw) {
      overrides[key] = raw;
    }
  }

  const level = env.LOG_LEVEL;
  if (level) {
    if (!isLogLevel(level)) {
      throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error, silent, got "${level}"`);
    }
    overrides.logLevel = level;
  }

  if (env.CRAWLER_COOKIES) {
    const forumHost = hostnameOf(overrides.forumBaseUrl ?? defaults().forumBaseUrl);
    overrides.cookies = parseCookieHeader(env.CRAWLER_COOKIES, forumHost);
  }

  return overrides;
}

export function parseArgs(args: string[]): CliOverrides {
  const result: CliOverrides = { infinite: false, values: {} };
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    const next = args[i + 1];
    const numberKey = ARG_NUMBERS[arg];
    if (numberKey && next !== undefined) {
      result.values[numberKey] = parseNumber(next, arg);
      i += 1;
    } else if (arg === '--config' && next) {
      result.configPath = next;
      i += 1;
    } else if (arg === '--log-file' && next) {
      result.values.logFile = next;
      i += 1;
    } else if (arg === '--log-level' && next) {
      if (!isLogLevel(next)) {
        throw new ConfigError(`--log-level must be one of debug, info, warn, error, silent, got "${next}"`);
      }
      result.values.logLevel = next;
      i += 1;
    } else if (arg === '--infinite') {
      result.infinite = true;
    }
  }
  return result;
}

function validate(config: CrawlerConfig): CrawlerConfig {
  if (!config.catalogUrl) {
    throw new ConfigError('catalogUrl is required (config file "catalogUrl" or CRAWLER_CATALOG_URL)');
  }
  if (!config.apiKey) {
    throw new ConfigError('apiKey is required (config file "apiKey" or CRAWLER_API_KEY)');
  }
  for (const key of NUMBER_KEYS) {
    const value = config[key];
    if (value === undefined) continue;
    const floor = NON_NEGATIVE_KEYS.has(key) ? 0 : 1;
    if (value < floor) {
      throw new ConfigError(`${key} must be ${floor === 0 ? 'zero or more' : 'positive'}, got ${value}`);
    }
  }
  return config;
}

/**
 * Defaults, then the JSON config file, then the environment, then CLI flags.
 * The config file is optional unless named with `--config`.
 */
export async function buildConfig(
  args: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Promise<CrawlerConfig> {
  const cli = parseArgs(args);
  const configPath = cli.configPath ?? env.CRAWLER_CONFIG ?? path.join(process.cwd(), DEFAULT_CONFIG_PATH);
  const fromFile = await readConfigFile(configPath, Boolean(cli.configPath ?? env.CRAWLER_CONFIG));

  const merged = {
    ...defaults(),
    catalogUrl: '',
    apiKey: '',
    imageProxyBase: '',
    ...fromFile,
    ...fromEnv(env),
    ...cli.values
  };

  const config: CrawlerConfig = {
    ...merged,
    catalogUrl: merged.catalogUrl.replace(/\/+$/, ''),
    imageProxyBase: (merged.imageProxyBase || merged.catalogUrl).replace(/\/+$/, ''),
    maxPages: cli.infinite ? undefined : merged.maxPages
  };

  return validate(config);
}
