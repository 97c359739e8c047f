/**
 * Package Planner
 *
 * Turns a cruise data directory into R2R submission packages.
 *
 * Responsibilities:
 * - Copy root-level files verbatim
 * - Bundle every ordinary directory into one general archive
 * - Archive each configured large dataset on its own, smallest first
 * - Checksum each archive and write the digest manifest
 * - Render and persist the summary report
 *
 * Runs strictly one step at a time. A failed copy, probe, archive or
 * checksum is recorded on the run and the remaining work continues.
 */

import { EventEmitter } from 'node:events';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import {
  ArchiveError,
  ChecksumError,
  CopyError,
  SourceNotFoundError,
  describeCause,
  ok,
  err,
  type CruiseDataset,
  type DatasetClass,
  type ItemFailure,
  type PackageDescriptor,
  type PackagingConfig,
  type PackagingRun,
  type Result,
} from '@cruise-packager/core';
import {
  copyFile,
  createLogger,
  ensureDir,
  formatBytes,
  safeWriteFile,
  type Logger,
} from '@cruise-packager/utils';
import { TarArchiver, type Archiver, type ArchiveResult } from './archiver.js';
import { FileChecksumComputer, type ChecksumComputer } from './checksum.js';
import { probeDirectorySize, type SizeProbe } from './sizeProbe.js';
import { writeManifest } from './manifest.js';
import { buildReport } from './report.js';

export interface PlannerDependencies {
  archiver?: Archiver;
  checksum?: ChecksumComputer;
  probeSize?: SizeProbe;
  logger?: Logger;
}

export interface DatasetPlan extends Record<DatasetClass, CruiseDataset[]> {
  missing: string[];
}

export type PackagingStep = 'copy' | 'size' | 'general' | 'large';

// Event payloads
export interface StepEvent {
  step: PackagingStep;
  count: number;
}

export interface ArchiveStartEvent {
  name: string;
  index: number;
  total: number;
  sourceSize: number;
  datasets: string[];
}

export interface ArchiveProgressEvent {
  name: string;
  count: number;
  total: number;
}

export const GENERAL_PACKAGE_SUFFIX = 'general';

export function archiveName(cruiseId: string, label: string): string {
  return `${cruiseId}_${label}.tar.gz`;
}

export function manifestName(cruiseId: string): string {
  return `${cruiseId}_r2r_packages.md5`;
}

export function summaryName(cruiseId: string): string {
  return `${cruiseId}_r2r_summary.txt`;
}

export class PackagePlanner extends EventEmitter {
  private config: PackagingConfig;
  private archiver: Archiver;
  private checksum: ChecksumComputer;
  private probeSize: SizeProbe;
  private logger: Logger;

  constructor(config: PackagingConfig, deps: PlannerDependencies = {}) {
    super();

    this.config = config;
    this.logger = deps.logger ?? createLogger({ module: 'planner' });
    this.archiver = deps.archiver ?? new TarArchiver({ logger: this.logger });
    this.checksum = deps.checksum ?? new FileChecksumComputer(config.checksumAlgorithm);
    this.probeSize = deps.probeSize ?? probeDirectorySize;
  }

  /**
   * Package one cruise. Throws only when the source directory cannot be listed.
   */
  async run(cruiseId: string, sourceDir: string): Promise<PackagingRun> {
    const startedAt = new Date();
    const outputDir = join(this.config.outputRoot, cruiseId);

    const { files, directories } = await this.listSource(sourceDir);

    await ensureDir(outputDir);
    this.logger.info({ outputDir }, 'R2R output directory');
    await this.warnOnExistingArchives(outputDir);

    const failures: ItemFailure[] = [];
    const packages: PackageDescriptor[] = [];

    const copiedFiles = await this.copyRootFiles(files, sourceDir, outputDir, failures);

    const plan = this.classify(directories, sourceDir);
    const largeDatasets = await this.sizeLargeDatasets(plan.large, failures);

    // STEP 1: every ordinary directory in one bundle
    if (plan.general.length > 0) {
      this.emit('step', { step: 'general', count: plan.general.length } satisfies StepEvent);
      const descriptor = await this.packageGeneral(cruiseId, sourceDir, outputDir, plan.general, failures);
      if (descriptor) {
        packages.push(descriptor);
      }
    }

    // STEP 2: large datasets individually, smallest to largest
    if (largeDatasets.length > 0) {
      this.emit('step', { step: 'large', count: largeDatasets.length } satisfies StepEvent);
      for (const [index, dataset] of largeDatasets.entries()) {
        const descriptor = await this.buildPackage({
          name: archiveName(cruiseId, dataset.name),
          cwd: sourceDir,
          entries: [dataset.name],
          outputDir,
          sourceSize: dataset.size ?? 0,
          index: index + 1,
          total: largeDatasets.length,
          failures,
        });
        if (descriptor) {
          packages.push(descriptor);
        }
      }
    }

    if (plan.missing.length > 0) {
      this.logger.info({ missing: plan.missing }, `Large datasets not found (skipped): ${plan.missing.join(', ')}`);
    }

    const manifestPath = join(outputDir, manifestName(cruiseId));
    await writeManifest(manifestPath, packages);

    const report = buildReport(cruiseId, packages, outputDir, this.checksum.algorithm.toUpperCase());
    const summaryPath = join(outputDir, summaryName(cruiseId));
    await safeWriteFile(summaryPath, report);

    this.logger.info(
      { cruiseId, packages: packages.length, failures: failures.length },
      'R2R packaging completed'
    );

    return {
      cruiseId,
      sourceDir,
      outputDir,
      copiedFiles,
      packages,
      failures,
      missingDatasets: plan.missing,
      manifestPath,
      summaryPath,
      report,
      startedAt,
      completedAt: new Date(),
    };
  }

  /**
   * Split allow-listed datasets from ordinary directories
   */
  classify(directories: string[], sourceDir: string): DatasetPlan {
    const present = new Set(directories);
    const allowList = new Set(this.config.largeDatasets);

    const general = directories
      .filter((name) => !allowList.has(name) && name !== this.config.reservedDirName)
      .map((name) => ({ name, path: join(sourceDir, name) }));

    const large = this.config.largeDatasets
      .filter((name) => present.has(name))
      .map((name) => ({ name, path: join(sourceDir, name) }));

    const missing = this.config.largeDatasets.filter((name) => !present.has(name));

    return { general, large, missing };
  }

  private async listSource(sourceDir: string): Promise<{ files: string[]; directories: string[] }> {
    try {
      const entries = await readdir(sourceDir, { withFileTypes: true });

      return {
        files: entries.filter((entry) => entry.isFile()).map((entry) => entry.name).sort(),
        directories: entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name).sort(),
      };
    } catch (error) {
      const sourceError = new SourceNotFoundError(sourceDir, error);
      this.logger.error({ sourceDir, err: error }, 'Error reading source directory');
      throw sourceError;
    }
  }

  private async warnOnExistingArchives(outputDir: string): Promise<void> {
    const existing = (await readdir(outputDir)).filter((name) => name.endsWith('.tar.gz'));
    if (existing.length > 0) {
      this.logger.warn({ outputDir, existing }, 'Output directory already holds archives; they will be overwritten');
    }
  }

  private async copyRootFiles(
    files: string[],
    sourceDir: string,
    outputDir: string,
    failures: ItemFailure[]
  ): Promise<string[]> {
    if (files.length === 0) {
      return [];
    }

    this.emit('step', { step: 'copy', count: files.length } satisfies StepEvent);
    const copied: string[] = [];

    for (const fileName of files) {
      const result = await this.copyOne(join(sourceDir, fileName), join(outputDir, fileName));
      if (result.ok) {
        copied.push(fileName);
        this.logger.info({ file: fileName }, `Copied ${fileName}`);
        this.emit('file:copied', fileName);
      } else {
        failures.push({ kind: 'copy', target: fileName, message: result.error.message });
        this.logger.error({ file: fileName, err: result.error.cause }, result.error.message);
        this.emit('file:failed', { name: fileName, message: result.error.message });
      }
    }

    return copied;
  }

  private async copyOne(source: string, destination: string): Promise<Result<string, CopyError>> {
    try {
      await copyFile(source, destination);
      return ok(destination);
    } catch (error) {
      return err(new CopyError(source, destination, error));
    }
  }

  /**
   * Probe each large dataset and order them by ascending size
   */
  private async sizeLargeDatasets(
    datasets: CruiseDataset[],
    failures: ItemFailure[]
  ): Promise<CruiseDataset[]> {
    if (datasets.length === 0) {
      return [];
    }

    this.emit('step', { step: 'size', count: datasets.length } satisfies StepEvent);
    const sized: CruiseDataset[] = [];

    for (const dataset of datasets) {
      try {
        const probe = await this.probeSize(dataset.path);
        for (const failure of probe.unreadable) {
          this.logger.warn({ dataset: dataset.name, path: failure.path, code: failure.code }, 'Skipping unreadable path while sizing');
        }
        sized.push({ ...dataset, size: probe.bytes });
        this.emit('dataset:sized', { name: dataset.name, size: probe.bytes });
      } catch (error) {
        const message = `Error sizing ${dataset.name}: ${describeCause(error)}`;
        failures.push({ kind: 'size', target: dataset.name, message });
        this.logger.error({ dataset: dataset.name, err: error }, message);
      }
    }

    // Array.prototype.sort is stable, so equal sizes keep allow-list order
    return sized.sort((a, b) => (a.size ?? 0) - (b.size ?? 0));
  }

  private async packageGeneral(
    cruiseId: string,
    sourceDir: string,
    outputDir: string,
    general: CruiseDataset[],
    failures: ItemFailure[]
  ): Promise<PackageDescriptor | null> {
    const name = archiveName(cruiseId, GENERAL_PACKAGE_SUFFIX);
    let sourceSize = 0;

    try {
      for (const dataset of general) {
        const probe = await this.probeSize(dataset.path);
        sourceSize += probe.bytes;
        this.logger.info({ dataset: dataset.name }, `Adding ${dataset.name} to general package`);
      }
    } catch (error) {
      const message = `Error sizing general package: ${describeCause(error)}`;
      failures.push({ kind: 'size', target: name, message });
      this.logger.error({ err: error }, message);
      this.emit('archive:failed', { name, message });
      return null;
    }

    return this.buildPackage({
      name,
      cwd: sourceDir,
      entries: general.map((dataset) => dataset.name),
      outputDir,
      sourceSize,
      index: 1,
      total: 1,
      failures,
    });
  }

  private async buildPackage(options: {
    name: string;
    cwd: string;
    entries: string[];
    outputDir: string;
    sourceSize: number;
    index: number;
    total: number;
    failures: ItemFailure[];
  }): Promise<PackageDescriptor | null> {
    const { name, cwd, entries, outputDir, sourceSize, index, total, failures } = options;
    const destination = join(outputDir, name);

    this.emit('archive:start', {
      name,
      index,
      total,
      sourceSize,
      datasets: entries,
    } satisfies ArchiveStartEvent);
    this.logger.info({ destination, sourceSize: formatBytes(sourceSize) }, `Creating ${name}`);

    const archived = await this.archive(cwd, entries, destination, name);
    if (!archived.ok) {
      failures.push({ kind: 'archive', target: name, message: archived.error.message });
      this.emit('archive:failed', { name, message: archived.error.message });
      return null;
    }

    const digest = await this.digest(destination);
    if (!digest.ok) {
      failures.push({ kind: 'checksum', target: name, message: digest.error.message });
      this.logger.error({ destination, err: digest.error.cause }, digest.error.message);
      this.emit('archive:failed', { name, message: digest.error.message });
      return null;
    }

    const descriptor: PackageDescriptor = Object.freeze({
      name,
      path: destination,
      sourceSize,
      compressedSize: archived.value.compressedSize,
      digest: digest.value,
    });

    this.logger.info(
      { name, compressedSize: formatBytes(descriptor.compressedSize) },
      `Successfully created ${name}`
    );
    this.emit('archive:complete', descriptor);

    return descriptor;
  }

  private async archive(
    cwd: string,
    entries: string[],
    destination: string,
    name: string
  ): Promise<Result<ArchiveResult, ArchiveError>> {
    const onFileArchived = this.config.showProgress
      ? (count: number, total: number) => {
          this.emit('archive:progress', { name, count, total } satisfies ArchiveProgressEvent);
        }
      : undefined;

    try {
      return ok(await this.archiver.create({ cwd, entries, destination, onFileArchived }));
    } catch (error) {
      if (error instanceof ArchiveError) {
        return err(error);
      }
      const archiveError = new ArchiveError(destination, error);
      this.logger.error({ destination, err: error }, archiveError.message);
      return err(archiveError);
    }
  }

  private async digest(filePath: string): Promise<Result<string, ChecksumError>> {
    try {
      return ok(await this.checksum.compute(filePath));
    } catch (error) {
      return err(error instanceof ChecksumError ? error : new ChecksumError(filePath, error));
    }
  }
}
