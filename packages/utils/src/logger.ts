/**
 * Logger
 *
 * Pino-based structured logger shared by every package. Options come from
 * LOG_LEVEL and NODE_ENV as they are when this module is first evaluated.
 */

import { pino, type LoggerOptions } from 'pino';

const REDACTED_KEYS = ['token', 'botToken', '*.token', '*.botToken'];

/**
 * Logger options for an environment; pretty output in development only
 */
export function loggerOptions(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  const nodeEnv = env['NODE_ENV'] ?? 'development';

  return {
    level: env['LOG_LEVEL'] ?? 'info',
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'video-audio-relay',
      env: nodeEnv,
    },
    redact: { paths: REDACTED_KEYS, censor: '<token>' },
    transport: nodeEnv === 'development' ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
      },
    } : undefined,
  };
}

export const logger = pino(loggerOptions());

export type Logger = typeof logger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
