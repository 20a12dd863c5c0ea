/**
 * @mediastage/utils
 * 
 * Shared utilities package containing:
 * - Structured logger
 * - File operations (atomic writes, cache lookup, cleanup)
 * - Command execution
 * - Path, size and time helpers
 * - Type guards
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
  PART_SUFFIX,
  ensureDir,
  pathExists,
  getFileSizeBytes,
  moveFile,
  writeStreamAtomic,
  concatFiles,
  findFileByStem,
  isDirectoryWritable,
  removeFiles,
  IncompleteTransferError,
  type AtomicWriteOptions,
} from './file.js';

// Path utilities
export {
  sanitizeFilename,
  getExtension,
  stripQueryAndFragment,
} from './path.js';

// Size helpers
export { bytesToMb, mbToBytes, formatSizeMb } from './size.js';

// Type guards
export {
  isDefined,
  isErrnoException,
  errorMessage,
} from './guards.js';

// Time utilities
export { formatDuration } from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
