/**
 * @dualcut/utils
 *
 * Shared utilities package containing:
 * - Command execution wrapper
 * - Diagnostic line splitting
 * - File operations
 * - Path and time utilities
 * - Logger
 */

// Command execution
export {
  executeCommand,
  streamCommand,
  processRunner,
  type CommandResult,
  type CommandOptions,
  type StreamCommandOptions,
  type CommandRunner,
} from './command.js';

// Line splitting
export { LineSplitter, splitLines } from './lines.js';

// File operations
export {
  ensureDir,
  getFileSizeBytes,
  tryGetFileSizeBytes,
  pathExists,
  formatFileSize,
} from './file.js';

// Path utilities
export { getExtension, getBasename } from './path.js';

// Time utilities
export { formatDuration, formatClock } from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
