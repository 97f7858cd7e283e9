/**
 * Audio Transcoder
 * 
 * Runs ffmpeg to extract the audio track of a video and classifies the
 * result. Success means exit code 0 AND an output file on disk.
 */

import { basename } from 'node:path';
import { TranscodeFailedError, errorMessage, type TranscodeSpec } from '@relay/core';
import { logger as defaultLogger, pathExists, tail, type CommandResult, type Logger } from '@relay/utils';
import { FFmpeg } from './ffmpeg.js';
import { buildExtractAudioArgs } from './presets.js';

/** Characters of stderr kept as the failure diagnostic */
export const DIAGNOSTIC_TAIL_CHARS = 2000;

export type TranscodeResult =
  | { success: true; outputPath: string; durationMs: number }
  | { success: false; error: TranscodeFailedError };

export interface AudioTranscoderOptions {
  ffmpeg?: FFmpeg;
  /** Hard limit for one ffmpeg run in milliseconds, 0 disables */
  timeoutMs?: number;
  outputExists?: (path: string) => Promise<boolean>;
  logger?: Logger;
}

export class AudioTranscoder {
  private readonly ffmpeg: FFmpeg;
  private readonly timeoutMs: number;
  private readonly outputExists: (path: string) => Promise<boolean>;
  private readonly logger: Logger;

  constructor(options: AudioTranscoderOptions = {}) {
    this.ffmpeg = options.ffmpeg ?? new FFmpeg();
    this.timeoutMs = options.timeoutMs ?? 0;
    this.outputExists = options.outputExists ?? pathExists;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Whether the ffmpeg binary can be run at all
   */
  async isAvailable(): Promise<boolean> {
    return this.ffmpeg.isAvailable();
  }

  /**
   * Convert `inputPath` into `outputPath` according to `spec`
   */
  async transcode(inputPath: string, outputPath: string, spec: TranscodeSpec): Promise<TranscodeResult> {
    const args = buildExtractAudioArgs(inputPath, outputPath, spec);

    this.logger.info({
      codec: spec.codec,
      bitrate: spec.bitrate,
      vbr: spec.variableBitrate,
      output: basename(outputPath),
    }, 'Running ffmpeg');

    let result: CommandResult;
    try {
      result = await this.ffmpeg.execute(args, {
        timeout: this.timeoutMs,
        maxOutputSize: DIAGNOSTIC_TAIL_CHARS * 4,
      });
    } catch (error) {
      return this.failure(`Could not start ${this.ffmpeg.path}: ${errorMessage(error)}`, {});
    }

    if (result.timedOut) {
      return this.failure(
        `${result.stderr}\nffmpeg timed out after ${this.timeoutMs}ms`,
        { exitCode: result.exitCode, timedOut: true }
      );
    }

    if (result.exitCode !== 0) {
      return this.failure(result.stderr, { exitCode: result.exitCode });
    }

    if (!(await this.outputExists(outputPath))) {
      return this.failure(
        result.stderr || 'ffmpeg exited successfully but produced no output file',
        { exitCode: result.exitCode }
      );
    }

    this.logger.info({ duration: result.duration, output: basename(outputPath) }, 'ffmpeg completed');
    return { success: true, outputPath, durationMs: result.duration };
  }

  private failure(stderr: string, details: { exitCode?: number; timedOut?: boolean }): TranscodeResult {
    const diagnostic = tail(stderr, DIAGNOSTIC_TAIL_CHARS);
    this.logger.error({ ...details, diagnostic }, 'ffmpeg failed');
    return { success: false, error: new TranscodeFailedError(diagnostic, details) };
  }
}
