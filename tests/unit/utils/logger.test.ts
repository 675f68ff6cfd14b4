/**
 * Tests for logger utility.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger, logger } from '../../../src/utils/logger.js';

describe('Logger', () => {
  let errorSpy: ReturnType<typeof vi.spyOn>;
  let logSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    errorSpy.mockRestore();
    logSpy.mockRestore();
    logger.setLevel('warn');
    logger.setPrefix('');
  });

  describe('log levels', () => {
    it('should default to warn', () => {
      const log = new Logger();

      log.info('hidden');
      log.warn('shown');

      expect(log.getLevel()).toBe('warn');
      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('[WARN] shown'));
    });

    it('should log debug when level is debug', () => {
      const log = new Logger();
      log.setLevel('debug');

      log.debug('test message');

      expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('[DEBUG] test message'));
    });

    it('should not log info when level is warn', () => {
      const log = new Logger();
      log.setLevel('warn');

      log.info('test message');

      expect(errorSpy).not.toHaveBeenCalled();
    });

    it('should log nothing when silent', () => {
      const log = new Logger();
      log.setLevel('silent');

      log.error('test message');

      expect(errorSpy).not.toHaveBeenCalled();
    });

    it('should never write to stdout', () => {
      const log = new Logger();
      log.setLevel('debug');

      log.debug('a');
      log.info('b');
      log.warn('c');
      log.error('d');

      expect(logSpy).not.toHaveBeenCalled();
      expect(errorSpy).toHaveBeenCalledTimes(4);
    });
  });

  describe('data and errors', () => {
    it('should print attached data as JSON', () => {
      const log = new Logger();

      log.warn('with data', { files: 2 });

      expect(errorSpy).toHaveBeenCalledTimes(2);
      expect(errorSpy).toHaveBeenLastCalledWith(expect.stringContaining('"files": 2'));
    });

    it('should print the stack of an error', () => {
      const log = new Logger();

      log.error('failed', new Error('boom'));

      expect(errorSpy).toHaveBeenLastCalledWith(expect.stringContaining('Error: boom'));
    });
  });

  describe('prefix', () => {
    it('should prefix messages', () => {
      const log = new Logger();
      log.setPrefix('corpus');

      log.warn('slow');

      expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('[WARN] [corpus] slow'));
    });

    it('should nest child prefixes and inherit the level', () => {
      const parent = new Logger();
      parent.setLevel('info');
      parent.setPrefix('cli');
      const child = parent.child('search');

      child.info('done');

      expect(child.getLevel()).toBe('info');
      expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('[INFO] [cli:search] done'));
    });

    it('should follow later level changes of the parent', () => {
      const parent = new Logger();
      const child = parent.child('corpus');

      parent.setLevel('silent');
      child.error('hidden');

      expect(child.getLevel()).toBe('silent');
      expect(errorSpy).not.toHaveBeenCalled();
    });
  });
});
