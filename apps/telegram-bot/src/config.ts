/**
 * Telegram Bot Configuration
 */

import { z } from 'zod';
import { ConfigurationError } from '@relay/core';
import type { HttpClientConfig } from '@relay/acquisition';

export const DEFAULT_API_ROOT = 'https://api.telegram.org';
export const DEFAULT_CACHE_ROOT = '/var/lib/telegram-bot-api/';

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

function flag(defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((value) => (value === undefined ? defaultValue : TRUTHY.has(value.trim().toLowerCase())));
}

function seconds(defaultValue: number) {
  return z.coerce.number().finite().nonnegative().default(defaultValue);
}

function interval(defaultValue: number) {
  return z.coerce.number().finite().positive().default(defaultValue);
}

function count(defaultValue: number) {
  return z.coerce.number().int().positive().default(defaultValue);
}

/**
 * Split a comma/space separated list of numeric ids, dropping invalid entries
 */
export function parseIdList(raw: string | undefined): number[] {
  if (!raw) {
    return [];
  }
  return raw
    .split(/[\s,]+/)
    .filter((entry) => /^-?\d+$/.test(entry))
    .map((entry) => Number.parseInt(entry, 10));
}

/**
 * Bot API root without a trailing slash or `/bot` segment
 */
export function normalizeApiRoot(raw: string): string {
  return raw.trim().replace(/\/+$/, '').replace(/\/bot$/, '');
}

/**
 * `<file base>/file/bot<token>`
 */
export function buildFileUrlPrefix(fileBase: string, token: string): string {
  const base = fileBase.trim().replace(/\/+$/, '').replace(/\/file\/bot$/, '').replace(/\/bot$/, '');
  return `${base}/file/bot${token}`;
}

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Telegram
  BOT_TOKEN: z.string().trim().min(1, 'BOT_TOKEN is required'),
  TG_BASE_URL: z.string().trim().optional(),
  TG_FILE_BASE_URL: z.string().trim().optional(),
  BOT_API_LOCAL_ROOT: z.string().trim().min(1).default(DEFAULT_CACHE_ROOT),

  // Connection pool and timeouts (seconds)
  TG_CONNECT_TIMEOUT: seconds(30),
  TG_READ_TIMEOUT: seconds(600),
  TG_WRITE_TIMEOUT: seconds(600),
  TG_POOL_TIMEOUT: seconds(60),
  TG_MAX_CONNECTIONS: count(100),
  TG_MAX_KEEPALIVE: count(20),

  // Transcoding
  FFMPEG_BIN: z.string().trim().min(1).default('ffmpeg'),
  FFMPEG_TIMEOUT: seconds(7200),
  AUDIO_EXT: z.string().trim().min(1).default('mp3'),
  AUDIO_BITRATE: z.string().default('192k'),

  // Behaviour
  CLEANUP_OUTPUT: flag(true),
  CLEANUP_LOCAL_SOURCE: flag(true),
  ALLOWED_USER_IDS: z.string().optional(),
  ALLOWED_CHAT_IDS: z.string().optional(),
  PROGRESS_INTERVAL: interval(1),
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface BotConfig {
  readonly nodeEnv: 'development' | 'production' | 'test';
  readonly logLevel: LogLevel;
  readonly botToken: string;
  readonly telegram: {
    readonly apiRoot: string;
    readonly fileUrlPrefix: string;
    readonly cacheRoot: string;
  };
  readonly http: Readonly<HttpClientConfig>;
  readonly ffmpeg: {
    readonly path: string;
    /** 0 disables the limit */
    readonly timeoutMs: number;
  };
  readonly audio: {
    readonly extension: string;
    readonly bitrate: string;
  };
  readonly cleanup: {
    readonly output: boolean;
    readonly localSource: boolean;
  };
  readonly access: {
    readonly allowedUserIds: readonly number[];
    readonly allowedChatIds: readonly number[];
  };
  readonly progressIntervalMs: number;
}

/**
 * Validate an environment into a frozen configuration
 */
export function parseConfig(env: NodeJS.ProcessEnv): BotConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError('Invalid environment configuration', issues);
  }

  const data = result.data;
  const apiRoot = data.TG_BASE_URL ? normalizeApiRoot(data.TG_BASE_URL) : DEFAULT_API_ROOT;
  const fileBase = data.TG_FILE_BASE_URL || apiRoot;

  return Object.freeze({
    nodeEnv: data.NODE_ENV,
    logLevel: data.LOG_LEVEL,
    botToken: data.BOT_TOKEN,
    telegram: Object.freeze({
      apiRoot,
      fileUrlPrefix: buildFileUrlPrefix(fileBase, data.BOT_TOKEN),
      cacheRoot: data.BOT_API_LOCAL_ROOT,
    }),
    http: Object.freeze({
      connectTimeoutMs: data.TG_CONNECT_TIMEOUT * 1000,
      readTimeoutMs: data.TG_READ_TIMEOUT * 1000,
      writeTimeoutMs: data.TG_WRITE_TIMEOUT * 1000,
      poolTimeoutMs: data.TG_POOL_TIMEOUT * 1000,
      maxConnections: data.TG_MAX_CONNECTIONS,
      maxKeepalive: data.TG_MAX_KEEPALIVE,
    }),
    ffmpeg: Object.freeze({
      path: data.FFMPEG_BIN,
      timeoutMs: data.FFMPEG_TIMEOUT * 1000,
    }),
    audio: Object.freeze({
      extension: data.AUDIO_EXT.replace(/^\.+/, '').toLowerCase(),
      bitrate: data.AUDIO_BITRATE.trim(),
    }),
    cleanup: Object.freeze({
      output: data.CLEANUP_OUTPUT,
      localSource: data.CLEANUP_LOCAL_SOURCE,
    }),
    access: Object.freeze({
      allowedUserIds: Object.freeze(parseIdList(data.ALLOWED_USER_IDS)),
      allowedChatIds: Object.freeze(parseIdList(data.ALLOWED_CHAT_IDS)),
    }),
    progressIntervalMs: data.PROGRESS_INTERVAL * 1000,
  });
}

/**
 * Parse process.env (already merged with .env by ./env.ts), exiting on error
 */
export function loadConfig(): BotConfig {
  try {
    return parseConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error('Invalid environment configuration:');
      for (const issue of error.issues) {
        console.error(`  - ${issue}`);
      }
      process.exit(1);
    }
    throw error;
  }
}
