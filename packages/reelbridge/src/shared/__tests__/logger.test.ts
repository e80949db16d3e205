import { afterEach, describe, expect, it, vi } from 'vitest';

import { createLogger, isLogLevel } from '../logger.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('filters below its level and prefixes the scope', () => {
    const write = vi.spyOn(console, 'error').mockImplementation(() => {});
    const log = createLogger('imdb', 'warn');

    log.info('hidden');
    log.warn('shown');

    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0][0])).toContain('[imdb]');
    expect(String(write.mock.calls[0][0])).toContain('shown');
  });

  it('nests child scopes', () => {
    const write = vi.spyOn(console, 'error').mockImplementation(() => {});
    createLogger('imdb', 'debug').child('search').debug('query');
    expect(String(write.mock.calls[0][0])).toContain('[imdb:search]');
  });

  it('writes nothing when silent', () => {
    const write = vi.spyOn(console, 'error').mockImplementation(() => {});
    createLogger('x', 'silent').error('boom');
    expect(write).not.toHaveBeenCalled();
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
