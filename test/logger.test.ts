import { describe, it, expect, vi, afterEach } from 'vitest';
import { consoleLogger, createLevelLogger, silentLogger, type Logger } from '../src/types/logger.js';
import { createLogger } from '../src/utils/logger.js';

function createRecordingLogger() {
  const calls: string[] = [];
  const logger: Logger = {
    debug: (_obj, message) => calls.push(`debug:${message}`),
    info: (_obj, message) => calls.push(`info:${message}`),
    warn: (_obj, message) => calls.push(`warn:${message}`),
    error: (_obj, message) => calls.push(`error:${message}`),
  };
  return { logger, calls };
}

function logAll(logger: Logger) {
  logger.debug({}, 'a');
  logger.info({}, 'b');
  logger.warn({}, 'c');
  logger.error({}, 'd');
}

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('createLevelLogger', () => {
    it('should forward everything at debug', () => {
      const { logger, calls } = createRecordingLogger();
      logAll(createLevelLogger(logger, 'debug'));
      expect(calls).toEqual(['debug:a', 'info:b', 'warn:c', 'error:d']);
    });

    it('should drop messages below the minimum level', () => {
      const { logger, calls } = createRecordingLogger();
      logAll(createLevelLogger(logger, 'warn'));
      expect(calls).toEqual(['warn:c', 'error:d']);
    });

    it('should drop everything when silent', () => {
      const { logger, calls } = createRecordingLogger();
      logAll(createLevelLogger(logger, 'silent'));
      expect(calls).toEqual([]);
    });
  });

  describe('consoleLogger', () => {
    it('should write the message before the object', () => {
      const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      consoleLogger.warn({ server: 'whois.example' }, 'slow server');
      expect(spy).toHaveBeenCalledWith('slow server', { server: 'whois.example' });
    });
  });

  describe('silentLogger', () => {
    it('should not touch the console', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
      silentLogger.error({ anything: true }, 'ignored');
      expect(spy).not.toHaveBeenCalled();
    });
  });

  describe('createLogger', () => {
    it('should build a pino logger that takes structured calls', () => {
      const logger = createLogger('silent');
      expect(() => logAll(logger)).not.toThrow();
    });
  });
});
