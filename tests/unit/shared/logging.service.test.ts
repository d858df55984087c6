/**
 * LoggingService Unit Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import {
  LoggingService,
  getLogger,
  logLevelFromEnv,
  setLogger,
} from '../../../src/shared/services/logging.service.js';

describe('LoggingService', () => {
  let consoleError: MockInstance<typeof console.error>;

  beforeEach(() => {
    consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleError.mockRestore();
  });

  it('should drop entries below the minimum level', () => {
    const logger = new LoggingService('warning', 10, 'test');

    logger.info('ignored');
    logger.warning('kept');

    expect(logger.getRecentLogs().map((entry) => entry.message)).toEqual(['kept']);
    expect(consoleError).toHaveBeenCalledTimes(1);
  });

  it('should write level, logger name, message and context to stderr', () => {
    const logger = new LoggingService('debug', 10, 'test');

    logger.info('hello', { a: 1 });

    expect(consoleError).toHaveBeenCalledWith(expect.stringMatching(/^\[.+\] INFO {4}\[test\] hello\n {2}Context: \{"a":1\}$/));
  });

  it('should include the error message', () => {
    const logger = new LoggingService('debug', 10, 'test');
    const error = new Error('boom');
    error.stack = undefined;

    logger.error('failed', error);

    expect(consoleError).toHaveBeenCalledWith(expect.stringMatching(/\[test\] failed\n {2}Error: boom$/));
  });

  it('should tag entries of a child logger', () => {
    const logger = new LoggingService('debug', 10, 'test');

    logger.child('transport').debug('sent', { id: 0 });

    expect(logger.getRecentLogs()).toEqual([
      expect.objectContaining({ level: 'debug', logger: 'test:transport', message: 'sent', context: { id: 0 } }),
    ]);
  });

  it('should keep only the most recent entries', () => {
    const logger = new LoggingService('debug', 2, 'test');

    logger.info('one');
    logger.info('two');
    logger.info('three');

    expect(logger.getRecentLogs().map((entry) => entry.message)).toEqual(['two', 'three']);
  });

  it('should filter recent entries by level', () => {
    const logger = new LoggingService('debug', 10, 'test');

    logger.debug('detail');
    logger.error('failure');

    expect(logger.getRecentLogs(100, 'warning').map((entry) => entry.message)).toEqual(['failure']);
  });

  it('should log nothing when silent', () => {
    const logger = new LoggingService('silent', 10, 'test');

    logger.error('failure');

    expect(logger.getRecentLogs()).toEqual([]);
    expect(consoleError).not.toHaveBeenCalled();
  });

  it('should clear the buffer', () => {
    const logger = new LoggingService('debug', 10, 'test');
    logger.info('one');

    logger.clearLogs();

    expect(logger.getRecentLogs()).toEqual([]);
  });
});

describe('logLevelFromEnv()', () => {
  it.each([
    [{ CDP_LOG_LEVEL: 'DEBUG' }, 'debug'],
    [{ CDP_LOG_LEVEL: 'silent' }, 'silent'],
    [{ CDP_LOG_LEVEL: 'verbose' }, 'info'],
    [{}, 'info'],
  ])('should read %j as %s', (env, level) => {
    expect(logLevelFromEnv(env)).toBe(level);
  });
});

describe('getLogger() / setLogger()', () => {
  const original = getLogger();

  afterEach(() => {
    setLogger(original);
  });

  it('should return the installed logger', () => {
    const replacement = new LoggingService('silent');

    setLogger(replacement);

    expect(getLogger()).toBe(replacement);
  });
});
