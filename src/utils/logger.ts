/**
 * Logger utility using Winston
 *
 * Provides structured logging with debug mode support.
 * All logs go to stderr so stdout only ever carries the test report.
 */

import winston from 'winston';
import chalk from 'chalk';

export type LogMeta = Record<string, unknown>;

let logger: winston.Logger | undefined;
let debugMode = false;

function colorLevel(level: string): string {
  const tag = `[${level.toUpperCase()}]`;
  switch (level.toUpperCase()) {
    case 'ERROR':
      return chalk.red(tag);
    case 'WARN':
      return chalk.yellow(tag);
    case 'INFO':
      return chalk.green(tag);
    case 'DEBUG':
      return chalk.blue(tag);
    default:
      return tag;
  }
}

function buildLogger(debug: boolean): winston.Logger {
  return winston.createLogger({
    level: debug ? 'debug' : 'info',
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ level, message, timestamp, component, ...meta }) => {
        // Timestamps only in debug mode
        const timestampStr = debug ? `[${String(timestamp)}] ` : '';
        const componentStr = component ? ` ${chalk.cyan(`[${String(component)}]`)}` : '';
        const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';

        return `${timestampStr}${colorLevel(level)}${componentStr} ${String(message)}${metaStr}`.trim();
      })
    ),
    transports: [
      new winston.transports.Stream({ stream: process.stderr }),
    ],
  });
}

/**
 * Initialize the logger
 */
export function initializeLogger(debug: boolean = false): void {
  debugMode = debug;
  logger = buildLogger(debug);
}

/**
 * Get the logger instance
 */
export function getLogger(): winston.Logger {
  if (!logger) {
    logger = buildLogger(debugMode);
  }
  return logger;
}

export function logInfo(message: string, meta?: LogMeta): void {
  getLogger().info(message, meta);
}

export function logDebug(message: string, meta?: LogMeta): void {
  getLogger().debug(message, meta);
}

export function logWarn(message: string, meta?: LogMeta): void {
  getLogger().warn(message, meta);
}

/**
 * Log an error message; an Error's message and stack are flattened into the metadata
 */
export function logError(message: string, error?: unknown, meta?: LogMeta): void {
  if (error instanceof Error) {
    getLogger().error(message, { ...meta, error: error.message, stack: error.stack });
  } else if (error !== undefined) {
    getLogger().error(message, { ...meta, error: String(error) });
  } else {
    getLogger().error(message, meta);
  }
}
