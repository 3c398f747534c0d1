import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createLogger, loggerFromEnv, silentLogger, RUNTIME_LOG_PREFIX } from './logger.js';

describe('Logger', () => {
  let consoleSpy: {
    debug: ReturnType<typeof vi.spyOn>;
    info: ReturnType<typeof vi.spyOn>;
    warn: ReturnType<typeof vi.spyOn>;
  };

  beforeEach(() => {
    consoleSpy = {
      debug: vi.spyOn(console, 'debug').mockImplementation(() => {}),
      info: vi.spyOn(console, 'info').mockImplementation(() => {}),
      warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('createLogger', () => {
    it('should use default prefix of [Nexus Runtime]', () => {
      const logger = createLogger();
      logger.info('replay store ready');

      expect(consoleSpy.info).toHaveBeenCalledWith(
        expect.stringMatching(/^\d{4}-\d{2}-\d{2}T\S+ INFO {2}\[Nexus Runtime\] replay store ready$/),
      );
    });

    it('should filter logs below minimum level', () => {
      const logger = createLogger('info', '[tool]');

      logger.debug('hidden');
      logger.warn('shown');

      expect(consoleSpy.debug).not.toHaveBeenCalled();
      expect(consoleSpy.warn).toHaveBeenCalledWith(expect.stringContaining('WARN  [tool] shown'));
    });

    it('should honour setLevel', () => {
      const logger = createLogger('warn');
      logger.setLevel('debug');
      logger.debug('now visible', { nonce: 'n1' });

      expect(consoleSpy.debug).toHaveBeenCalledWith(expect.stringContaining(RUNTIME_LOG_PREFIX), { nonce: 'n1' });
    });
  });

  describe('loggerFromEnv', () => {
    it('should be silent when NEXUS_LOG_LEVEL is unset or unknown', () => {
      expect(loggerFromEnv({})).toBe(silentLogger);
      expect(loggerFromEnv({ NEXUS_LOG_LEVEL: 'verbose' })).toBe(silentLogger);
    });

    it('should log at the configured level', () => {
      const logger = loggerFromEnv({ NEXUS_LOG_LEVEL: ' DEBUG ' });
      logger.debug('polling');

      expect(consoleSpy.debug).toHaveBeenCalledWith(expect.stringContaining('DEBUG [Nexus Runtime] polling'));
    });
  });

  describe('silentLogger', () => {
    it('should not write anything', () => {
      silentLogger.info('quiet');
      silentLogger.warn('quiet');

      expect(consoleSpy.info).not.toHaveBeenCalled();
      expect(consoleSpy.warn).not.toHaveBeenCalled();
    });
  });
});
