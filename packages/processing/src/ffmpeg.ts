/**
 * FFmpeg Wrapper
 * 
 * Thin layer over the command runner: availability probe and
 * execution with stderr capture.
 */

import { executeCommand, type CommandResult, type CommandRunner } from '@relay/utils';

export interface FFmpegExecuteOptions {
  /** Milliseconds, 0 disables */
  timeout?: number;
  /** Characters of stderr kept */
  maxOutputSize?: number;
}

export class FFmpeg {
  private readonly ffmpegPath: string;
  private readonly run: CommandRunner;

  constructor(ffmpegPath: string = 'ffmpeg', runner: CommandRunner = executeCommand) {
    this.ffmpegPath = ffmpegPath;
    this.run = runner;
  }

  get path(): string {
    return this.ffmpegPath;
  }

  /**
   * Execute an FFmpeg command. stdout is not captured.
   * Rejects only when the binary cannot be spawned.
   */
  async execute(args: string[], options: FFmpegExecuteOptions = {}): Promise<CommandResult> {
    return this.run(this.ffmpegPath, args, {
      timeout: options.timeout ?? 0,
      maxOutputSize: options.maxOutputSize ?? 64 * 1024,
      captureStdout: false,
    });
  }

  /**
   * Check if FFmpeg is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await this.run(this.ffmpegPath, ['-version'], {
        timeout: 5000,
        captureStdout: false,
      });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}
