/**
 * @bookbinder/utils
 *
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations and scoped temp directories
 * - Path utilities
 * - Type guards
 * - Time formatting
 * - Logger
 */

// Command execution
export {
  executeCommand,
  formatCommand,
  type CommandResult,
  type CommandOptions,
} from './command.js';

// File operations
export {
  ensureDir,
  safeReadFile,
  fileExists,
  getFileSizeBytes,
  moveFile,
  withTempDir,
} from './file.js';

// Path utilities
export {
  sanitizeFilename,
} from './path.js';

// Type guards
export {
  isPositiveInteger,
} from './guards.js';

// Time utilities
export {
  formatDuration,
  formatTimestamp,
  parseTimecode,
  secondsToMillis,
} from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
