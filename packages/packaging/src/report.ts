/**
 * Report Builder
 * 
 * Fixed-width summary of the produced archives: one row per package,
 * a totals row, then the checksum listing.
 */

import type { PackageDescriptor } from '@cruise-packager/core';
import { formatBytes, formatRatio } from '@cruise-packager/utils';
import { formatManifest } from './manifest.js';

const REPORT_WIDTH = 70;
const NAME_WIDTH = 40;
const SIZE_WIDTH = 15;
const RATIO_WIDTH = 10;

export interface ReportTotals {
  sourceSize: number;
  compressedSize: number;
}

export function summarizeTotals(packages: readonly PackageDescriptor[]): ReportTotals {
  return packages.reduce<ReportTotals>(
    (totals, info) => ({
      sourceSize: totals.sourceSize + info.sourceSize,
      compressedSize: totals.compressedSize + info.compressedSize,
    }),
    { sourceSize: 0, compressedSize: 0 }
  );
}

function row(name: string, sourceSize: number, compressedSize: number): string {
  return (
    `${name.padEnd(NAME_WIDTH)} ` +
    `${formatBytes(sourceSize).padEnd(SIZE_WIDTH)} ` +
    `${formatBytes(compressedSize).padEnd(SIZE_WIDTH)} ` +
    formatRatio(sourceSize, compressedSize)
  );
}

export function buildReport(
  cruiseId: string,
  packages: readonly PackageDescriptor[],
  outputDir: string,
  checksumLabel = 'MD5'
): string {
  const banner = '='.repeat(REPORT_WIDTH);
  const rule = '-'.repeat(REPORT_WIDTH);
  const totals = summarizeTotals(packages);

  const lines = [
    '',
    banner,
    `R2R Package Summary - ${cruiseId}`,
    banner,
    '',
    `Output Directory: ${outputDir}`,
    '',
    `${'Package'.padEnd(NAME_WIDTH)} ${'Original'.padEnd(SIZE_WIDTH)} ` +
      `${'Compressed'.padEnd(SIZE_WIDTH)} ${'Ratio'.padEnd(RATIO_WIDTH)}`,
    rule,
    ...packages.map((info) => row(info.name, info.sourceSize, info.compressedSize)),
    rule,
    row('TOTAL', totals.sourceSize, totals.compressedSize),
    '',
    `${checksumLabel} Checksums:`,
    rule,
  ];

  return `${lines.join('\n')}\n${formatManifest(packages)}\n${banner}\n`;
}
