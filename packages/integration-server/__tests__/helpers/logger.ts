import { vi } from 'vitest';
import { LoggerService } from '../../src/core/services/logger.service';

/** LoggerService whose methods are spies that print nothing. */
export const createSilentLogger = (): LoggerService => {
  const logger = new LoggerService();
  vi.spyOn(logger, 'info').mockImplementation(() => undefined);
  vi.spyOn(logger, 'debug').mockImplementation(() => undefined);
  vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
  vi.spyOn(logger, 'error').mockImplementation(() => undefined);
  return logger;
};
