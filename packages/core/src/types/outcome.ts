/**
 * Conversion Outcome
 * 
 * Terminal result of one conversion run. Exactly one is produced per
 * inbound message.
 */

export type ConversionOutcome =
  | { kind: 'success'; outputPath: string }
  | { kind: 'download_failed'; reason: string }
  | { kind: 'transcode_failed'; diagnostic: string }
  | { kind: 'send_failed'; reason: string }
  | { kind: 'precondition_unavailable' }
  | { kind: 'unexpected_error'; error: unknown }
  | { kind: 'ignored' };
