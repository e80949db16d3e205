/**
 * Configuration loader for reelbridge
 * Loads from YAML config file with environment variable expansion.
 * Every setting has a default, so a missing config file is not an error.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { parse } from 'yaml';

import { isLogLevel } from './logger.js';
import type { ReelbridgeConfig } from './types.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_USER_AGENTS: string[] = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36 Edg/124.0.0.0',
];

export function defaultDbPath(): string {
  return path.join(os.homedir(), '.reelbridge', 'reelbridge.db');
}

export function defaultConfig(): ReelbridgeConfig {
  return {
    imdb: {
      baseUrl: 'https://www.imdb.com',
      minDelayMs: 1000,
      maxDelayMs: 3000,
      softBlockRetryDelayMs: 2000,
      timeoutMs: 30_000,
      userAgents: [...DEFAULT_USER_AGENTS],
    },
    matching: {
      yearTolerance: 1,
      candidateYearTolerance: 2,
      acceptWhenMetadataMissing: true,
    },
    store: {
      dbPath: defaultDbPath(),
    },
    refresh: {
      concurrency: 2,
    },
    logging: {
      level: 'info',
    },
  };
}

/**
 * Expand environment variables in a string
 * Supports ${VAR} syntax
 */
function expandEnv(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  return value.replace(/\$\{([^}]+)\}/g, (_, name: string) => process.env[name] ?? '');
}

function deepExpand(obj: unknown): unknown {
  if (Array.isArray(obj)) return obj.map(deepExpand);
  if (obj && typeof obj === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      out[k] = deepExpand(v);
    }
    return out;
  }
  return expandEnv(obj);
}

function findConfigFile(baseDir: string): string | null {
  const candidates = [
    process.env.REELBRIDGE_CONFIG,
    path.join(baseDir, 'config/config.yaml'),
    path.join(baseDir, 'config.yaml'),
    path.join(process.cwd(), 'reelbridge.yaml'),
  ].filter((c): c is string => Boolean(c));

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

// ── Field readers ────────────────────────────────────────────────────

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Section, key: string): Section {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isSection(value)) {
    throw new ConfigError(`${key} must be a mapping`);
  }
  return value;
}

function readNumber(sec: Section, key: string, where: string, fallback: number): number {
  const value = sec[key];
  if (value === undefined || value === null || value === '') return fallback;
  const n = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(n) || n < 0) {
    throw new ConfigError(`${where}.${key} must be a non-negative number`);
  }
  return n;
}

function readInteger(sec: Section, key: string, where: string, fallback: number): number {
  const n = readNumber(sec, key, where, fallback);
  if (!Number.isInteger(n)) {
    throw new ConfigError(`${where}.${key} must be an integer`);
  }
  return n;
}

function readBoolean(sec: Section, key: string, where: string, fallback: boolean): boolean {
  const value = sec[key];
  if (value === undefined || value === null || value === '') return fallback;
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw new ConfigError(`${where}.${key} must be true or false`);
}

function readString(sec: Section, key: string, fallback: string): string {
  const value = sec[key];
  return typeof value === 'string' && value.trim() !== '' ? value : fallback;
}

function readStringList(sec: Section, key: string, where: string, fallback: string[]): string[] {
  const value = sec[key];
  if (value === undefined || value === null) return fallback;
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ConfigError(`${where}.${key} must be a list of strings`);
  }
  const list = value.map(v => v.trim()).filter(v => v !== '');
  return list.length > 0 ? list : fallback;
}

/**
 * Build a validated config from an already-parsed document.
 * Exposed separately so callers can feed config that did not come from disk.
 */
export function buildConfig(doc: unknown): ReelbridgeConfig {
  const defaults = defaultConfig();
  if (doc === undefined || doc === null) return defaults;
  if (!isSection(doc)) {
    throw new ConfigError('config root must be a mapping');
  }
  const raw = doc;

  const imdb = section(raw, 'imdb');
  const matching = section(raw, 'matching');
  const store = section(raw, 'store');
  const refresh = section(raw, 'refresh');
  const logging = section(raw, 'logging');

  const level = logging.level ?? defaults.logging.level;
  if (!isLogLevel(level)) {
    throw new ConfigError('logging.level must be one of debug, info, warn, error, silent');
  }

  const config: ReelbridgeConfig = {
    imdb: {
      baseUrl: readString(imdb, 'baseUrl', defaults.imdb.baseUrl).replace(/\/$/, ''),
      minDelayMs: readNumber(imdb, 'minDelayMs', 'imdb', defaults.imdb.minDelayMs),
      maxDelayMs: readNumber(imdb, 'maxDelayMs', 'imdb', defaults.imdb.maxDelayMs),
      softBlockRetryDelayMs: readNumber(imdb, 'softBlockRetryDelayMs', 'imdb', defaults.imdb.softBlockRetryDelayMs),
      timeoutMs: readNumber(imdb, 'timeoutMs', 'imdb', defaults.imdb.timeoutMs),
      userAgents: readStringList(imdb, 'userAgents', 'imdb', defaults.imdb.userAgents),
    },
    matching: {
      yearTolerance: readInteger(matching, 'yearTolerance', 'matching', defaults.matching.yearTolerance),
      candidateYearTolerance: readInteger(
        matching, 'candidateYearTolerance', 'matching', defaults.matching.candidateYearTolerance
      ),
      acceptWhenMetadataMissing: readBoolean(
        matching, 'acceptWhenMetadataMissing', 'matching', defaults.matching.acceptWhenMetadataMissing
      ),
    },
    store: {
      dbPath: readString(store, 'dbPath', defaults.store.dbPath).replace(/^~/, os.homedir()),
    },
    refresh: {
      concurrency: readInteger(refresh, 'concurrency', 'refresh', defaults.refresh.concurrency),
    },
    logging: {
      level,
    },
  };

  if (config.imdb.minDelayMs > config.imdb.maxDelayMs) {
    throw new ConfigError('imdb.minDelayMs must not exceed imdb.maxDelayMs');
  }
  if (config.imdb.timeoutMs === 0) {
    throw new ConfigError('imdb.timeoutMs must be greater than zero');
  }
  if (config.refresh.concurrency < 1) {
    throw new ConfigError('refresh.concurrency must be at least 1');
  }

  return config;
}

/**
 * Load configuration from the first config file found, or defaults.
 */
export function loadConfig(baseDir: string): ReelbridgeConfig {
  const configPath = findConfigFile(baseDir);
  if (!configPath) return defaultConfig();

  const content = fs.readFileSync(configPath, 'utf-8');
  return buildConfig(deepExpand(parse(content)));
}

/**
 * Get config file path for display
 */
export function getConfigPath(baseDir: string): string | null {
  return findConfigFile(baseDir);
}
