/**
 * Shared setup for CLI commands: config, log level, paths, Ctrl-C.
 */

import os from 'node:os';

import { red } from 'colorette';

import type { ReelbridgeConfig } from '../shared/types.js';
import { loadConfig } from '../shared/config.js';
import { setDefaultLogLevel } from '../shared/logger.js';

export function loadCliConfig(baseDir: string): ReelbridgeConfig {
  const config = loadConfig(baseDir);
  setDefaultLogLevel(config.logging.level);
  return config;
}

export function expandHome(p: string): string {
  return p.replace(/^~/, os.homedir());
}

/** "4" → 4; anything but a whole number above zero throws */
export function parseConcurrency(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isInteger(n) || n < 1) {
    throw new Error(`--concurrency must be a positive integer, got "${value}"`);
  }
  return n;
}

/** Abort signal tripped by the first SIGINT */
export function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort(new Error('Interrupted')));
  return controller.signal;
}

export function fail(err: unknown): never {
  console.error(red(err instanceof Error ? err.message : String(err)));
  process.exit(1);
}
