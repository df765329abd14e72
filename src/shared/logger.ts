import pino from 'pino';

/**
 * Structured Logger using Pino
 *
 * Logs go to stderr so they never interleave with the interactive menu on
 * stdout.
 *
 * **Configuration:**
 * - LOG_LEVEL: Set log level (error, warn, info, debug, silent) - defaults to 'warn'
 * - NODE_ENV: 'development' uses pretty-printing, anything else uses JSON;
 *   'test' defaults the level to 'silent'
 *
 * **Usage:**
 * ```typescript
 * import { logger } from './shared/logger';
 *
 * logger.warn({
 *   msg: 'Time source request failed',
 *   endpoint: 'https://worldtimeapi.org/api/ip',
 *   error: error.message,
 * });
 * ```
 */

const isDevelopment = process.env.NODE_ENV === 'development';
const isTest = process.env.NODE_ENV === 'test';
const logLevel = process.env.LOG_LEVEL || (isTest ? 'silent' : 'warn');

const options: pino.LoggerOptions = {
  level: logLevel,
  base: {
    env: process.env.NODE_ENV || 'production',
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

export const logger = isDevelopment
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  : pino(options, pino.destination(2));

/**
 * Logger interface for dependency injection
 * Matches Pino logger structure
 */
export interface ILogger {
  info(msg: string): void;
  info(obj: Record<string, unknown>): void;
  warn(msg: string): void;
  warn(obj: Record<string, unknown>): void;
  error(msg: string): void;
  error(obj: Record<string, unknown>): void;
  debug(msg: string): void;
  debug(obj: Record<string, unknown>): void;
}
