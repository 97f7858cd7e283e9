/**
 * Progress Downloader
 * 
 * Streams a URL to a local file chunk by chunk, reporting throttled
 * progress and a single completion event.
 */

import { createWriteStream } from 'node:fs';
import { Transform, type TransformCallback } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { request, type Dispatcher } from 'undici';
import { DownloadFailedError, errorMessage, type DownloadProgress } from '@relay/core';
import { logger as defaultLogger, type Logger } from '@relay/utils';
import { ProgressThrottle } from './progress.js';

export interface DownloadListener {
  /** Throttled; must not throw */
  onProgress?: (progress: DownloadProgress) => void;
  /** Called exactly once, after the file is fully written */
  onComplete?: (progress: DownloadProgress) => void;
}

export type DownloadResult =
  | { success: true; bytesWritten: number; totalBytes: number; durationMs: number }
  | { success: false; error: DownloadFailedError };

export interface ProgressDownloaderOptions {
  dispatcher?: Dispatcher;
  progressIntervalMs?: number;
  now?: () => number;
  logger?: Logger;
}

/**
 * Parse a content-length header, 0 when absent or invalid
 */
export function parseContentLength(header: string | string[] | undefined): number {
  const value = Array.isArray(header) ? header[0] : header;
  const parsed = value ? Number.parseInt(value, 10) : 0;
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 0;
}

export class ProgressDownloader {
  private readonly dispatcher: Dispatcher | undefined;
  private readonly progressIntervalMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: ProgressDownloaderOptions = {}) {
    this.dispatcher = options.dispatcher;
    this.progressIntervalMs = options.progressIntervalMs ?? 1000;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Download `url` into `destPath`
   */
  async download(url: string, destPath: string, listener: DownloadListener = {}): Promise<DownloadResult> {
    const startTime = this.now();

    let response: Dispatcher.ResponseData;
    try {
      response = await request(url, { method: 'GET', dispatcher: this.dispatcher });
    } catch (error) {
      return this.failure(`Request failed: ${errorMessage(error)}`);
    }

    if (response.statusCode < 200 || response.statusCode >= 300) {
      // Release the connection
      await response.body.dump();
      return this.failure(`Unexpected HTTP status ${response.statusCode}`, response.statusCode);
    }

    const totalBytes = parseContentLength(response.headers['content-length']);
    const throttle = new ProgressThrottle(totalBytes, {
      intervalMs: this.progressIntervalMs,
      now: this.now,
    });

    const report = (progress: DownloadProgress | undefined) => {
      if (!progress || !listener.onProgress) return;
      try {
        listener.onProgress(progress);
      } catch (error) {
        this.logger.warn({ error: errorMessage(error) }, 'Progress listener threw');
      }
    };

    const meter = new Transform({
      transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
        report(throttle.track(chunk.length));
        callback(null, chunk);
      },
    });

    try {
      await pipeline(response.body, meter, createWriteStream(destPath));
    } catch (error) {
      return this.failure(`Transfer interrupted: ${errorMessage(error)}`);
    }

    const final = throttle.snapshot();
    listener.onComplete?.(final);

    return {
      success: true,
      bytesWritten: final.bytesTransferred,
      totalBytes,
      durationMs: this.now() - startTime,
    };
  }

  // The URL carries the bot token, so it is never logged or attached here
  private failure(message: string, statusCode?: number): DownloadResult {
    this.logger.warn({ statusCode, error: message }, 'Download failed');
    return { success: false, error: new DownloadFailedError(message, { statusCode }) };
  }
}
