/**
 * @relay/core
 * 
 * Core package containing:
 * - Conversion state machine
 * - Cleanup service
 * - Error handling
 * - Shared types
 */

// State machine
export {
  CONVERSION_STATES,
  ConversionStateMachine,
  isValidTransition,
} from './stateMachine.js';

export type {
  ConversionState,
  ConversionStateTransition,
} from './stateMachine.js';

// Types
export type {
  MediaKind,
  MediaRequest,
  ResolvedSource,
  DownloadProgress,
  TranscodeSpec,
} from './types/media.js';

export type {
  ConversionOutcome,
} from './types/outcome.js';

// Services
export {
  CleanupService,
  type CleanupPolicy,
  type CleanupDecision,
  type CacheOwnership,
} from './services/cleanupService.js';

// Errors
export {
  RelayError,
  DownloadFailedError,
  TranscodeFailedError,
  StateTransitionError,
  ConfigurationError,
  errorMessage,
} from './errors/index.js';
