/**
 * Size and Ratio Formatting
 */

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const;

/**
 * Format a byte count as a human-readable string, scaling by 1024
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  for (const unit of BYTE_UNITS) {
    if (value < 1024) {
      return `${value.toFixed(2)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(2)} PB`;
}

/**
 * Compressed size as a percentage of the original; 0 when the original is empty
 */
export function compressionRatio(originalSize: number, compressedSize: number): number {
  if (originalSize <= 0) {
    return 0;
  }
  return (compressedSize / originalSize) * 100;
}

/**
 * Format a compression ratio with one decimal place, e.g. "42.5%"
 */
export function formatRatio(originalSize: number, compressedSize: number): string {
  return `${compressionRatio(originalSize, compressedSize).toFixed(1)}%`;
}
