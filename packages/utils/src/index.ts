/**
 * @debkit/utils
 *
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Type guards
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
  ensureDir,
  safeReadFile,
  pathExists,
  isFile,
  getFileMode,
  copyFile,
  removePath,
  isErrnoException,
} from './file.js';

// Type guards
export {
  isString,
  isNonEmptyString,
} from './guards.js';

// Logger
export { logger, type Logger } from './logger.js';
