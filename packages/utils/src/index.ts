/**
 * @relay/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File and temp-dir helpers
 * - Path and formatting utilities
 * - Logger
 */

// Command execution
export {
  executeCommand,
  type CommandResult,
  type CommandOptions,
  type CommandRunner,
} from './command.js';

// File operations
export {
  isNotFound,
  pathExists,
  withTempDir,
  type TempDirRunner,
} from './file.js';

// Path utilities
export {
  normalizeExtension,
  suggestFilename,
} from './path.js';

// Formatting
export {
  formatBytes,
  tail,
  redactSecret,
} from './format.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
