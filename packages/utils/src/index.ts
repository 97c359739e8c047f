/**
 * @cruise-packager/utils
 * 
 * Shared utilities package containing:
 * - File operations
 * - Hashing utilities
 * - Size and ratio formatting
 * - Type guards
 * - Logger
 */

// File operations
export {
  ensureDir,
  safeWriteFile,
  safeReadFile,
  pathExists,
  calculateFileHash,
  getFileSizeBytes,
  copyFile,
  HASH_CHUNK_SIZE,
  type HashAlgorithm,
} from './file.js';

// Formatting
export { formatBytes, formatRatio, compressionRatio } from './format.js';

// Type guards
export {
  isString,
  isObject,
  isNonEmptyString,
  isErrnoException,
} from './guards.js';

// Time utilities
export { formatDuration } from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
