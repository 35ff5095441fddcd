import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { LoggingConfig } from '../config/types.js';

export type Logger = winston.Logger;

/**
 * Build the process logger from resolved logging configuration.
 * Verbose mode forces debug level regardless of LOG_LEVEL.
 *
 * The logger is handed to each component explicitly; nothing imports a
 * shared instance.
 */
export function createLogger(config: LoggingConfig, verbose = false): Logger {
  const logger = winston.createLogger({
    level: verbose ? 'debug' : config.level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
  });

  if (config.file.enabled) {
    // Error log with daily rotation
    logger.add(
      new DailyRotateFile({
        filename: `${config.file.path}/error-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        level: 'error',
        maxSize: config.file.maxSize,
        maxFiles: `${config.file.maxFiles}d`, // Keep logs for N days
        zippedArchive: true,
        auditFile: `${config.file.path}/.audit-error.json`,
      })
    );

    // Application log with daily rotation
    logger.add(
      new DailyRotateFile({
        filename: `${config.file.path}/app-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        maxSize: config.file.maxSize,
        maxFiles: `${config.file.maxFiles}d`,
        zippedArchive: true,
        auditFile: `${config.file.path}/.audit-app.json`,
      })
    );
  }

  if (config.console.enabled) {
    logger.add(
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.timestamp(),
          winston.format.colorize({ all: config.console.colorize }),
          winston.format.simple()
        ),
      })
    );
  }

  // winston warns when asked to log with no transports at all
  if (!config.file.enabled && !config.console.enabled) {
    logger.add(new winston.transports.Console({ silent: true }));
  }

  return logger;
}
