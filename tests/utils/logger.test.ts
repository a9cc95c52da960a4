import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { getLogLevel, logger, setLogLevel } from '../../src/utils/logger.js';
import type { LogLevel } from '../../src/utils/logger.js';

describe('logger', () => {
  let previousLevel: LogLevel;

  beforeEach(() => {
    previousLevel = getLogLevel();
    setLogLevel('debug');
  });

  afterEach(() => {
    setLogLevel(previousLevel);
    vi.restoreAllMocks();
  });

  it('writes every level to stderr and nothing to stdout', () => {
    const stdout = vi.spyOn(console, 'log').mockImplementation(() => {});
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});

    logger.debug('d');
    logger.info('i');
    logger.success('s');
    logger.warn('w');
    logger.error('e');

    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledTimes(5);
  });

  it('drops messages below the current level', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('warn');

    logger.info('hidden');
    logger.warn('shown');

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0][0])).toContain('[WARN] shown');
  });
});
