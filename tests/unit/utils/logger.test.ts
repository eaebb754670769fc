/**
 * Tests for logger utility.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger, logger } from '../../../src/utils/logger.js';

describe('Logger', () => {
  const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    logger.setLevel('info');
  });

  describe('log levels', () => {
    it('should log debug when level is debug', () => {
      const log = new Logger();
      log.setLevel('debug');

      log.debug('test message');

      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(String(errorSpy.mock.calls[0]?.[0])).toContain('[DEBUG] test message');
    });

    it('should not log debug when level is info', () => {
      const log = new Logger();

      log.debug('test message');

      expect(errorSpy).not.toHaveBeenCalled();
    });

    it('should not log info when level is warn', () => {
      const log = new Logger();
      log.setLevel('warn');

      log.info('test message');
      log.warn('kept');

      expect(errorSpy).toHaveBeenCalledTimes(1);
    });

    it('should log nothing when silent', () => {
      const log = new Logger();
      log.setLevel('silent');

      log.error('failure');

      expect(errorSpy).not.toHaveBeenCalled();
    });
  });

  it('should write to stderr only', () => {
    const log = new Logger();

    log.info('message');
    log.error('message');

    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(logSpy).not.toHaveBeenCalled();
  });

  describe('child', () => {
    it('should prefix messages with the child name', () => {
      const child = new Logger().child('index');

      child.info('built');

      expect(String(errorSpy.mock.calls[0]?.[0])).toContain('[INFO] [index] built');
    });

    it('should nest prefixes', () => {
      const child = new Logger().child('cache').child('update');

      child.warn('stale');

      expect(String(errorSpy.mock.calls[0]?.[0])).toContain('[cache:update] stale');
    });

    it('should follow the level of its parent', () => {
      const parent = new Logger();
      const child = parent.child('index');

      parent.setLevel('error');
      child.info('hidden');
      parent.setLevel('debug');
      child.debug('shown');

      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(String(errorSpy.mock.calls[0]?.[0])).toContain('[index] shown');
    });

    it('should set the level of the root it came from', () => {
      const parent = new Logger();

      parent.child('watch').setLevel('warn');

      expect(parent.getLevel()).toBe('warn');
    });
  });
});
