import { afterEach, describe, expect, it, vi } from 'vitest';

import { Logger, resolveLogLevel } from '../../src/core/logger.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('Logger', () => {
  it('drops messages below its level', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const logger = new Logger('warn');
    logger.info('hidden');
    logger.warn('shown');

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toMatch(/^\d{4}-\d{2}-\d{2}T\S+ WARN shown$/);
  });

  it('prefixes nested scopes and forwards metadata', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const cause = new Error('disk full');

    new Logger('info', 'ctflow').child('indexer').error('commit failed', cause);

    expect(String(error.mock.calls[0][0])).toMatch(/ ERROR \[ctflow:indexer\] commit failed$/);
    expect(error.mock.calls[0][1]).toBe(cause);
  });

  it('keeps the level in children', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    new Logger('info').child('decoder').debug('noise');
    new Logger('debug').child('decoder').debug('detail');
    expect(debug).toHaveBeenCalledTimes(1);
  });
});

describe('resolveLogLevel', () => {
  it('accepts known levels in any case', () => {
    expect(resolveLogLevel(' Debug ')).toBe('debug');
    expect(resolveLogLevel('loud')).toBe('info');
    expect(resolveLogLevel(undefined, 'error')).toBe('error');
  });
});
