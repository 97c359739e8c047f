/**
 * Packaging Configuration
 * 
 * Fixed at deployment and passed explicitly into the planner.
 */

import { z } from 'zod';

export const checksumAlgorithmSchema = z.enum(['md5', 'sha1', 'sha256']);

export const packagingConfigSchema = z.object({
  outputRoot: z.string().min(1),
  largeDatasets: z.array(z.string().min(1)).default([]),
  reservedDirName: z.string().min(1).default('r2r'),
  checksumAlgorithm: checksumAlgorithmSchema.default('md5'),
  showProgress: z.boolean().default(false),
});

export type PackagingConfig = z.infer<typeof packagingConfigSchema>;
export type PackagingConfigInput = z.input<typeof packagingConfigSchema>;
export type ChecksumAlgorithm = z.infer<typeof checksumAlgorithmSchema>;

/**
 * Validate and fill defaults for a packaging configuration
 */
export function parsePackagingConfig(input: PackagingConfigInput): PackagingConfig {
  return packagingConfigSchema.parse(input);
}

/**
 * Split a comma-delimited dataset list, dropping blanks and duplicates
 */
export function parseDatasetList(value: string): string[] {
  const names = value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  return [...new Set(names)];
}
