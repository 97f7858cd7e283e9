/**
 * Custom Error Classes
 */

import type { ConversionState } from '../stateMachine.js';

/**
 * Base error class for all relay errors
 */
export class RelayError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RelayError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Fetching the source media failed
 */
export class DownloadFailedError extends RelayError {
  constructor(message: string, details?: { statusCode?: number }) {
    super(message, 'DOWNLOAD_FAILED', details);
    this.name = 'DownloadFailedError';
  }
}

/**
 * The transcoder exited non-zero, timed out, or produced no output
 */
export class TranscodeFailedError extends RelayError {
  public readonly diagnostic: string;

  constructor(diagnostic: string, details?: { exitCode?: number; timedOut?: boolean }) {
    super('Transcoding failed', 'TRANSCODE_FAILED', details);
    this.name = 'TranscodeFailedError';
    this.diagnostic = diagnostic;
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends RelayError {
  constructor(
    conversionId: string,
    fromState: ConversionState,
    toState: ConversionState,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      { conversionId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * Invalid environment configuration
 */
export class ConfigurationError extends RelayError {
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[]) {
    super(message, 'CONFIGURATION_ERROR', { issues });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Extract a loggable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
