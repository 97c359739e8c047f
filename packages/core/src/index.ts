/**
 * @cruise-packager/core
 * 
 * Core package containing:
 * - Error handling
 * - Result type
 * - Shared packaging types
 * - Packaging configuration schema
 */

// Types
export type {
  CruiseDataset,
  DatasetClass,
  PackageDescriptor,
  ItemFailure,
  ItemFailureKind,
  PackagingRun,
} from './types/packaging.js';

export { ok, err, type Result } from './types/result.js';

// Errors
export { 
  PackagerError,
  LookupError,
  SourceNotFoundError,
  ArchiveError,
  ChecksumError,
  CopyError,
  NotificationError,
  describeCause,
} from './errors/index.js';

// Configuration
export {
  packagingConfigSchema,
  checksumAlgorithmSchema,
  parsePackagingConfig,
  parseDatasetList,
  type PackagingConfig,
  type PackagingConfigInput,
  type ChecksumAlgorithm,
} from './config/packaging.js';
