/**
 * File Operations
 * 
 * Safe file operations with proper error handling.
 */

import { 
  mkdir, 
  writeFile, 
  readFile, 
  stat, 
  utimes,
  access,
  copyFile as fsCopyFile,
} from 'node:fs/promises';
import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { dirname } from 'node:path';

// Archives can be tens of gigabytes; hashing never holds more than one chunk
export const HASH_CHUNK_SIZE = 64 * 1024;

export type HashAlgorithm = 'md5' | 'sha1' | 'sha256';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Safely write a file, ensuring the directory exists
 */
export async function safeWriteFile(
  filePath: string,
  content: string | Buffer
): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, content, 'utf8');
}

/**
 * Safely read a file, returning null if it doesn't exist
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Check whether a path exists
 */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Calculate the hash of a file, reading it in fixed-size chunks
 */
export async function calculateFileHash(
  filePath: string,
  algorithm: HashAlgorithm = 'sha256'
): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash(algorithm);
    const stream = createReadStream(filePath, { highWaterMark: HASH_CHUNK_SIZE });
    
    stream.on('data', (data) => hash.update(data));
    stream.on('end', () => resolve(hash.digest('hex')));
    stream.on('error', reject);
  });
}

/**
 * Get file size in bytes
 */
export async function getFileSizeBytes(filePath: string): Promise<number> {
  const stats = await stat(filePath);
  return stats.size;
}

/**
 * Copy a file to a new location, keeping its access and modification times
 */
export async function copyFile(
  source: string,
  destination: string
): Promise<void> {
  await ensureDir(dirname(destination));
  await fsCopyFile(source, destination);
  const stats = await stat(source);
  await utimes(destination, stats.atime, stats.mtime);
}
