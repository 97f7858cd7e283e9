/**
 * Progress Throttle
 * 
 * Turns a stream of byte counts into rate-limited progress reports.
 * A report is due when the last one is at least `intervalMs` old, or
 * as soon as the integer percentage goes up (known total only).
 */

import type { DownloadProgress } from '@relay/core';

export interface ProgressThrottleOptions {
  intervalMs: number;
  /** Clock in milliseconds, replaceable in tests */
  now?: () => number;
}

export class ProgressThrottle {
  private readonly totalBytes: number;
  private readonly intervalMs: number;
  private readonly now: () => number;
  private readonly startedAt: number;
  private bytesTransferred = 0;
  private lastReportAt: number;
  private lastPercentage = 0;

  constructor(totalBytes: number, options: ProgressThrottleOptions) {
    this.totalBytes = totalBytes > 0 ? totalBytes : 0;
    this.intervalMs = options.intervalMs;
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
    this.lastReportAt = this.startedAt;
  }

  /**
   * Record a received chunk. Returns a snapshot when a report is due.
   */
  track(chunkBytes: number): DownloadProgress | undefined {
    this.bytesTransferred += chunkBytes;

    const now = this.now();
    const progress = this.snapshot(now);
    const percentageRose = progress.percentage !== undefined && progress.percentage > this.lastPercentage;
    const intervalElapsed = now - this.lastReportAt >= this.intervalMs;

    if (!percentageRose && !intervalElapsed) {
      return undefined;
    }

    this.lastReportAt = now;
    if (progress.percentage !== undefined) {
      this.lastPercentage = progress.percentage;
    }
    return progress;
  }

  /**
   * Current state, without affecting throttling
   */
  snapshot(now: number = this.now()): DownloadProgress {
    const elapsedMs = Math.max(0, now - this.startedAt);
    const speedBytesPerSec = elapsedMs > 0 ? this.bytesTransferred / (elapsedMs / 1000) : 0;
    const progress: DownloadProgress = {
      bytesTransferred: this.bytesTransferred,
      totalBytes: this.totalBytes,
      speedBytesPerSec,
      elapsedMs,
    };

    if (this.totalBytes > 0) {
      progress.percentage = Math.min(100, Math.floor((this.bytesTransferred * 100) / this.totalBytes));
    }

    return progress;
  }
}
