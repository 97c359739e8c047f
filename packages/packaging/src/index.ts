/**
 * @cruise-packager/packaging
 * 
 * Archive packaging layer.
 * 
 * Responsibilities:
 * - Size dataset directories
 * - Build gzip-compressed tar archives
 * - Checksum archives and write the digest manifest
 * - Render the summary report
 */

export {
  PackagePlanner,
  archiveName,
  manifestName,
  summaryName,
  GENERAL_PACKAGE_SUFFIX,
  type PlannerDependencies,
  type DatasetPlan,
  type PackagingStep,
  type StepEvent,
  type ArchiveStartEvent,
  type ArchiveProgressEvent,
} from './planner.js';
export {
  TarArchiver,
  type Archiver,
  type ArchiveRequest,
  type ArchiveResult,
  type FileArchivedListener,
} from './archiver.js';
export { FileChecksumComputer, type ChecksumComputer } from './checksum.js';
export {
  probeDirectorySize,
  countRegularFiles,
  type SizeProbe,
  type SizeProbeResult,
} from './sizeProbe.js';
export { walkRegularFiles, type WalkEntry, type WalkFailure } from './walk.js';
export {
  formatManifest,
  parseManifest,
  readManifest,
  writeManifest,
  verifyManifest,
  type ManifestEntry,
  type VerifyEntry,
  type VerifyResult,
  type VerifyStatus,
} from './manifest.js';
export { buildReport, summarizeTotals, type ReportTotals } from './report.js';
