/**
 * Digest Manifest
 * 
 * One `<digest>  <filename>` line per archive, in creation order.
 * The format is the one `md5sum -c` reads.
 */

import { join, dirname } from 'node:path';
import type { PackageDescriptor } from '@cruise-packager/core';
import { safeReadFile, safeWriteFile, pathExists } from '@cruise-packager/utils';
import type { ChecksumComputer } from './checksum.js';

export interface ManifestEntry {
  digest: string;
  name: string;
}

export type VerifyStatus = 'ok' | 'mismatch' | 'missing';

export interface VerifyEntry extends ManifestEntry {
  status: VerifyStatus;
  actual?: string;
}

export interface VerifyResult {
  manifestPath: string;
  valid: boolean;
  entries: VerifyEntry[];
}

const MANIFEST_LINE = /^([0-9a-fA-F]+) [ *](.+)$/;

export function formatManifest(packages: readonly PackageDescriptor[]): string {
  return packages.map((info) => `${info.digest}  ${info.name}\n`).join('');
}

export async function writeManifest(
  manifestPath: string,
  packages: readonly PackageDescriptor[]
): Promise<void> {
  await safeWriteFile(manifestPath, formatManifest(packages));
}

/**
 * Parse manifest text; blank lines are ignored, malformed lines throw
 */
export function parseManifest(content: string): ManifestEntry[] {
  const entries: ManifestEntry[] = [];
  const lines = content.split(/\r?\n/);

  lines.forEach((line, index) => {
    if (line.trim().length === 0) {
      return;
    }
    const match = MANIFEST_LINE.exec(line);
    if (!match || match[1] === undefined || match[2] === undefined) {
      throw new Error(`Malformed manifest line ${index + 1}: ${line}`);
    }
    entries.push({ digest: match[1].toLowerCase(), name: match[2] });
  });

  return entries;
}

export async function readManifest(manifestPath: string): Promise<ManifestEntry[] | null> {
  const content = await safeReadFile(manifestPath);
  return content === null ? null : parseManifest(content);
}

/**
 * Recompute the digest of every archive the manifest lists.
 * Archives are looked up beside the manifest.
 */
export async function verifyManifest(
  manifestPath: string,
  checksum: ChecksumComputer
): Promise<VerifyResult> {
  const listed = await readManifest(manifestPath);
  if (listed === null) {
    throw new Error(`Manifest not found: ${manifestPath}`);
  }

  const baseDir = dirname(manifestPath);
  const entries: VerifyEntry[] = [];

  for (const entry of listed) {
    const archivePath = join(baseDir, entry.name);
    if (!(await pathExists(archivePath))) {
      entries.push({ ...entry, status: 'missing' });
      continue;
    }
    const actual = await checksum.compute(archivePath);
    entries.push({
      ...entry,
      actual,
      status: actual === entry.digest ? 'ok' : 'mismatch',
    });
  }

  return {
    manifestPath,
    valid: entries.every((entry) => entry.status === 'ok'),
    entries,
  };
}
