import morgan from 'morgan';
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import type { LoggingConfig } from '../config/types.js';

// Created with defaults first so modules can log before configuration is loaded.
// initializeLogger() swaps in the configured transports.
export const logger = winston.createLogger({
  level: 'info',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(winston.format.colorize({ all: true }), winston.format.simple()),
    }),
  ],
});

let isInitialized = false;

/**
 * Apply the logging section of the loaded configuration
 */
export function initializeLogger(config: LoggingConfig): void {
  if (isInitialized) {
    return;
  }

  logger.level = config.level;
  logger.clear();

  if (config.file.enabled) {
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
          winston.format.colorize({ all: config.console.colorize }),
          winston.format.simple()
        ),
      })
    );
  }

  isInitialized = true;
  logger.info('Logger initialized with configuration');
}

// Morgan middleware for HTTP request logging
export const requestLoggingMiddleware = morgan('combined', {
  stream: {
    write: (message: string) => {
      logger.info(message.trim());
    },
  },
});
