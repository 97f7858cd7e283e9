/**
 * Conversion Orchestrator
 *
 * Runs one inbound video through the pipeline:
 *
 *   IDLE → RESOLVING → [DOWNLOADING] → TRANSCODING → SENDING → DONE
 *
 * with FAILED reachable from every non-terminal state. Every run ends in
 * exactly one ConversionOutcome; nothing thrown inside escapes `run`.
 */

import { randomUUID } from 'node:crypto';
import { join } from 'node:path';
import {
  ConversionStateMachine,
  errorMessage,
  type ConversionOutcome,
  type ConversionState,
  type MediaRequest,
  type ResolvedSource,
  type TranscodeSpec,
} from '@relay/core';
import type { DownloadListener, DownloadResult } from '@relay/acquisition';
import type { TranscodeResult } from '@relay/processing';
import {
  logger as defaultLogger,
  redactSecret,
  suggestFilename,
  withTempDir,
  type Logger,
  type TempDirRunner,
} from '@relay/utils';
import type { ChatTransport } from '../lib/transport.js';
import { bestEffort } from '../lib/notify.js';
import { MESSAGES, audioCaption, formatDownloadProgress } from '../messages.js';
import { StatusMessage } from './statusMessage.js';

export const WORKSPACE_PREFIX = 'v2a-';
export const DEFAULT_OUTPUT_STEM = 'audio';
const INPUT_FILENAME = 'input_video';

export interface Transcoder {
  isAvailable(): Promise<boolean>;
  transcode(inputPath: string, outputPath: string, spec: TranscodeSpec): Promise<TranscodeResult>;
}

export interface Downloader {
  download(url: string, destPath: string, listener?: DownloadListener): Promise<DownloadResult>;
}

export interface Resolver {
  resolve(rawPath: string | undefined): ResolvedSource;
}

export interface Cleaner {
  cleanupOutput(filePath: string): Promise<unknown>;
  cleanupSource(source: ResolvedSource): Promise<unknown>;
}

export interface OrchestratorDeps {
  transcoder: Transcoder;
  downloader: Downloader;
  resolver: Resolver;
  cleanup: Cleaner;
  workspace?: TempDirRunner;
  logger?: Logger;
}

export interface OrchestratorSettings {
  spec: TranscodeSpec;
  /** Redacted from anything logged (the bot token) */
  secret?: string;
}

export interface ConversionReport {
  outcome: ConversionOutcome;
  /** States visited, starting with IDLE */
  states: ConversionState[];
}

interface RunContext {
  request: MediaRequest;
  transport: ChatTransport;
  machine: ConversionStateMachine;
  status: StatusMessage;
  log: Logger;
}

export class ConversionOrchestrator {
  private readonly transcoder: Transcoder;
  private readonly downloader: Downloader;
  private readonly resolver: Resolver;
  private readonly cleanup: Cleaner;
  private readonly workspace: TempDirRunner;
  private readonly logger: Logger;
  private readonly spec: TranscodeSpec;
  private readonly secret: string;

  constructor(deps: OrchestratorDeps, settings: OrchestratorSettings) {
    this.transcoder = deps.transcoder;
    this.downloader = deps.downloader;
    this.resolver = deps.resolver;
    this.cleanup = deps.cleanup;
    this.workspace = deps.workspace ?? withTempDir;
    this.logger = deps.logger ?? defaultLogger;
    this.spec = settings.spec;
    this.secret = settings.secret ?? '';
  }

  /**
   * Convert the video in `request` and deliver the audio through `transport`.
   * A missing request (the message carried no video) is ignored silently.
   */
  async run(
    request: MediaRequest | undefined,
    transport: ChatTransport,
    logContext: Record<string, unknown> = {}
  ): Promise<ConversionReport> {
    if (!request) {
      return { outcome: { kind: 'ignored' }, states: [] };
    }

    const conversionId = randomUUID();
    const machine = new ConversionStateMachine(conversionId);
    const log = this.logger.child({ ...logContext, conversionId, fileId: request.fileId, media: request.kind });
    let status: StatusMessage | undefined;

    try {
      if (!(await this.transcoder.isAvailable())) {
        log.error('ffmpeg is not available, refusing conversion');
        machine.fail('transcoder unavailable');
        await bestEffort(log, 'reply ffmpeg missing', () => transport.reply(MESSAGES.ffmpegMissing));
        return { outcome: { kind: 'precondition_unavailable' }, states: machine.getPath() };
      }

      machine.transitionTo('RESOLVING');
      status = await StatusMessage.open(transport, MESSAGES.received, log);
      await bestEffort(log, 'typing action', () => transport.sendChatAction('typing'));

      const file = await transport.getFile(request.fileId);
      const source = this.resolver.resolve(file.filePath);
      log.info({
        filePath: this.redact(file.filePath ?? ''),
        fileSize: file.fileSize ?? request.fileSize,
        source: source.kind,
      }, 'Resolved video source');

      const context: RunContext = { request, transport, machine, status, log };
      const outcome = await this.inWorkspace(source, context);

      await status.finish(this.finalText(outcome));
      log.info({ outcome: outcome.kind, path: machine.getPath() }, 'Conversion finished');
      return { outcome, states: machine.getPath() };
    } catch (error) {
      log.error({ err: error, state: machine.getState() }, 'Processing error');
      machine.fail(errorMessage(error));

      if (status) {
        await status.finish(MESSAGES.processingFailed);
      } else {
        await bestEffort(log, 'reply processing failed', () => transport.reply(MESSAGES.processingFailed));
      }
      return { outcome: { kind: 'unexpected_error', error }, states: machine.getPath() };
    }
  }

  /**
   * The source is cleaned up on every exit, including a failed workspace
   */
  private async inWorkspace(source: ResolvedSource, run: RunContext): Promise<ConversionOutcome> {
    try {
      return await this.workspace(WORKSPACE_PREFIX, (dir) => this.convertIn(dir, source, run));
    } finally {
      await this.cleanup.cleanupSource(source);
    }
  }

  /**
   * Stages that need the workspace; the output is removed on every exit
   */
  private async convertIn(dir: string, source: ResolvedSource, run: RunContext): Promise<ConversionOutcome> {
    const outputName = suggestFilename(run.request.fileName, DEFAULT_OUTPUT_STEM, this.spec.extension);
    const outputPath = join(dir, outputName);

    try {
      return await this.stages(dir, source, outputPath, outputName, run);
    } finally {
      await this.cleanup.cleanupOutput(outputPath);
    }
  }

  private async stages(
    dir: string,
    source: ResolvedSource,
    outputPath: string,
    outputName: string,
    run: RunContext
  ): Promise<ConversionOutcome> {
    const { machine, status, transport, log } = run;

    // Acquire
    let inputPath: string;
    if (source.kind === 'local') {
      machine.transitionTo('TRANSCODING', 'local cache hit');
      inputPath = source.path;
    } else {
      machine.transitionTo('DOWNLOADING');
      status.update(MESSAGES.downloading);
      inputPath = join(dir, INPUT_FILENAME);

      const failure = await this.acquire(source.url, inputPath, run);
      if (failure !== undefined) {
        machine.fail(failure);
        return { kind: 'download_failed', reason: failure };
      }
      machine.transitionTo('TRANSCODING');
    }

    // Transcode
    status.update(MESSAGES.transcoding);
    const result = await this.transcoder.transcode(inputPath, outputPath, this.spec);
    if (!result.success) {
      log.error({ diagnostic: result.error.diagnostic }, 'Transcoding failed');
      machine.fail('transcode failed');
      return { kind: 'transcode_failed', diagnostic: result.error.diagnostic };
    }

    // Deliver
    machine.transitionTo('SENDING');
    status.update(MESSAGES.sending);
    await bestEffort(log, 'upload action', () => transport.sendChatAction('upload_document'));

    const sendFailure = await this.deliver(outputPath, outputName, run);
    if (sendFailure !== undefined) {
      machine.fail(sendFailure);
      return { kind: 'send_failed', reason: sendFailure };
    }

    machine.transitionTo('DONE');
    return { kind: 'success', outputPath };
  }

  /**
   * Streamed download first, the transport download when there is no URL
   * or the stream failed. Returns the first failure reason when both fail.
   */
  private async acquire(url: string | undefined, destPath: string, run: RunContext): Promise<string | undefined> {
    if (url === undefined) {
      return this.fetchWithoutProgress(destPath, run);
    }

    const failure = await this.download(url, destPath, run);
    if (failure === undefined) {
      return undefined;
    }

    run.log.warn('Streamed download failed, retrying through the Bot API');
    const retryFailure = await this.fetchWithoutProgress(destPath, run);
    return retryFailure === undefined ? undefined : failure;
  }

  /**
   * Streamed download with progress edits; returns a failure reason
   */
  private async download(url: string, destPath: string, run: RunContext): Promise<string | undefined> {
    const { status, log } = run;
    const result = await this.downloader.download(url, destPath, {
      onProgress: (progress) => status.update(formatDownloadProgress(progress)),
      onComplete: (progress) => {
        log.info({ bytes: progress.bytesTransferred, elapsedMs: progress.elapsedMs }, 'Download complete');
        status.update(MESSAGES.transcoding);
      },
    });

    if (!result.success) {
      log.error({ error: this.redact(result.error.message) }, 'Download failed');
      return result.error.message;
    }
    return undefined;
  }

  /**
   * Transport-level download for files the Bot API gave no usable path for
   */
  private async fetchWithoutProgress(destPath: string, run: RunContext): Promise<string | undefined> {
    try {
      await run.transport.downloadFile(run.request.fileId, destPath);
      return undefined;
    } catch (error) {
      const reason = this.redact(errorMessage(error));
      run.log.error({ error: reason }, 'Download failed');
      return reason;
    }
  }

  /**
   * Audio first, document as fallback; returns a failure reason
   */
  private async deliver(outputPath: string, outputName: string, run: RunContext): Promise<string | undefined> {
    const { transport, log } = run;
    const caption = audioCaption(this.spec.extension);

    try {
      await transport.sendAudio(outputPath, outputName, caption);
      return undefined;
    } catch (error) {
      log.warn({ error: errorMessage(error) }, 'Sending as audio failed, retrying as document');
    }

    try {
      await transport.sendDocument(outputPath, outputName, caption);
      return undefined;
    } catch (error) {
      log.error({ error: errorMessage(error) }, 'Sending as document failed');
      return errorMessage(error);
    }
  }

  private finalText(outcome: ConversionOutcome): string | undefined {
    switch (outcome.kind) {
      case 'success':
        return undefined;
      case 'download_failed':
        return MESSAGES.downloadFailed;
      case 'transcode_failed':
        return MESSAGES.transcodeFailed;
      case 'send_failed':
        return MESSAGES.sendFailed;
      default:
        return MESSAGES.processingFailed;
    }
  }

  private redact(text: string): string {
    return redactSecret(text, this.secret);
  }
}
