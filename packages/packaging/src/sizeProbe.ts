/**
 * Size Probe
 * 
 * Total bytes of regular files under a directory. Unreadable subtrees
 * contribute nothing and are listed on the result instead of failing
 * the probe.
 */

import { walkRegularFiles, type WalkFailure } from './walk.js';

export interface SizeProbeResult {
  path: string;
  bytes: number;
  fileCount: number;
  unreadable: WalkFailure[];
}

export type SizeProbe = (path: string) => Promise<SizeProbeResult>;

export async function probeDirectorySize(path: string): Promise<SizeProbeResult> {
  let bytes = 0;
  let fileCount = 0;
  const unreadable: WalkFailure[] = [];

  for await (const entry of walkRegularFiles(path)) {
    if (entry.type === 'file') {
      bytes += entry.size;
      fileCount++;
    } else {
      unreadable.push(entry.failure);
    }
  }

  return { path, bytes, fileCount, unreadable };
}

/**
 * Count regular files across several roots (used for progress totals)
 */
export async function countRegularFiles(paths: string[]): Promise<number> {
  let total = 0;
  for (const path of paths) {
    for await (const entry of walkRegularFiles(path)) {
      if (entry.type === 'file') {
        total++;
      }
    }
  }
  return total;
}
