/**
 * Tests for logger utility.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger, logger } from '../../../src/utils/logger.js';

describe('Logger', () => {
  const consoleSpy = {
    warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
  };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    logger.setLevel('info');
    logger.setPrefix('');
  });

  describe('log levels', () => {
    it('logs debug when level is debug', () => {
      const log = new Logger();
      log.setLevel('debug');

      log.debug('test message');

      expect(consoleSpy.error).toHaveBeenCalledTimes(1);
    });

    it('does not log debug when level is info', () => {
      const log = new Logger();

      log.debug('test message');

      expect(consoleSpy.error).not.toHaveBeenCalled();
    });

    it('does not log info when level is warn', () => {
      const log = new Logger();
      log.setLevel('warn');

      log.info('test message');

      expect(consoleSpy.error).not.toHaveBeenCalled();
    });

    it('writes warnings to console.warn', () => {
      const log = new Logger();

      log.warn('careful');

      expect(consoleSpy.warn).toHaveBeenCalledTimes(1);
      expect(String(consoleSpy.warn.mock.calls[0][0])).toContain('[WARN] careful');
    });

    it('logs nothing when silent', () => {
      const log = new Logger();
      log.setLevel('silent');

      log.error('broken');
      log.warn('careful');
      log.success('done');

      expect(consoleSpy.error).not.toHaveBeenCalled();
      expect(consoleSpy.warn).not.toHaveBeenCalled();
    });
  });

  describe('data payloads', () => {
    it('prints data as JSON after the message', () => {
      const log = new Logger();

      log.info('with data', { key: 'value' });

      expect(consoleSpy.error).toHaveBeenCalledTimes(2);
      expect(String(consoleSpy.error.mock.calls[1][0])).toContain('"key": "value"');
    });
  });

  describe('child', () => {
    it('prefixes messages and inherits the level', () => {
      const parent = new Logger();
      parent.setLevel('warn');
      parent.setPrefix('app');
      const child = parent.child('templates');

      expect(child.getLevel()).toBe('warn');
      child.warn('hello');

      expect(String(consoleSpy.warn.mock.calls[0][0])).toContain('[app:templates] hello');
    });
  });
});
