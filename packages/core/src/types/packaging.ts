/**
 * Packaging Types
 */

/**
 * A named top-level directory under a cruise's data root
 */
export interface CruiseDataset {
  name: string;
  path: string;
  size?: number;
}

export type DatasetClass = 'general' | 'large';

/**
 * Record of one produced archive
 */
export type PackageDescriptor = Readonly<{
  name: string;
  path: string;
  sourceSize: number;
  compressedSize: number;
  digest: string;
}>;

export type ItemFailureKind = 'copy' | 'size' | 'archive' | 'checksum';

/**
 * A per-item failure that was logged and excluded from the report
 */
export interface ItemFailure {
  kind: ItemFailureKind;
  target: string;
  message: string;
}

/**
 * Outcome of one packaging invocation
 */
export interface PackagingRun {
  cruiseId: string;
  sourceDir: string;
  outputDir: string;
  copiedFiles: string[];
  packages: PackageDescriptor[];
  failures: ItemFailure[];
  missingDatasets: string[];
  manifestPath: string;
  summaryPath: string;
  report: string;
  startedAt: Date;
  completedAt: Date;
}
