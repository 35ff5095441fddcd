import winston from 'winston';
import { defaultConfig } from '../../src/config/defaults.js';
import { createLogger } from '../../src/utils/logger.js';

describe('createLogger', () => {
  it('should use the configured level', () => {
    const logger = createLogger({ ...defaultConfig.logging, level: 'warn' });

    expect(logger.level).toBe('warn');
  });

  it('should force debug level in verbose mode', () => {
    const logger = createLogger({ ...defaultConfig.logging, level: 'error' }, true);

    expect(logger.level).toBe('debug');
  });

  it('should log to the console by default', () => {
    const logger = createLogger(defaultConfig.logging);

    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0]).toBeInstanceOf(winston.transports.Console);
    expect(logger.transports[0].silent).toBeFalsy();
  });

  it('should fall back to a silent transport when every output is disabled', () => {
    const logger = createLogger({
      ...defaultConfig.logging,
      console: { enabled: false, colorize: false },
    });

    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0].silent).toBe(true);
  });
});
