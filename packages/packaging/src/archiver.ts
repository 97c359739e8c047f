/**
 * Archiver
 * 
 * Builds one gzip-compressed tar archive from entries under a common
 * working directory. Entry paths double as their names inside the archive.
 * 
 * With an `onFileArchived` subscriber the archiver first counts the regular
 * files across all entries, then reports `(count, total)` as each regular
 * file is added. Without one it streams straight into the archive.
 */

import * as tar from 'tar';
import { createWriteStream } from 'node:fs';
import { dirname, join } from 'node:path';
import { ArchiveError } from '@cruise-packager/core';
import { ensureDir, getFileSizeBytes, createLogger, type Logger } from '@cruise-packager/utils';
import { countRegularFiles } from './sizeProbe.js';

export type FileArchivedListener = (count: number, total: number) => void;

export interface ArchiveRequest {
  cwd: string;
  entries: string[];
  destination: string;
  onFileArchived?: FileArchivedListener;
}

export interface ArchiveResult {
  destination: string;
  compressedSize: number;
  fileCount: number;
}

export interface Archiver {
  create(request: ArchiveRequest): Promise<ArchiveResult>;
}

export class TarArchiver implements Archiver {
  private logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? createLogger({ module: 'archiver' });
  }

  /**
   * Create the archive; rejects with ArchiveError and leaves any partial file in place
   */
  async create(request: ArchiveRequest): Promise<ArchiveResult> {
    const { cwd, entries, destination, onFileArchived } = request;

    this.logger.info({ destination, entries }, 'Creating archive');

    try {
      await ensureDir(dirname(destination));

      const total = onFileArchived
        ? await countRegularFiles(entries.map((entry) => join(cwd, entry)))
        : 0;
      let fileCount = 0;

      // Entries go straight to the packer: tar.create would read a name
      // starting with '@' as another archive to concatenate
      const pack = new tar.Pack({
        cwd,
        gzip: true,
        // Unreadable entries fail the archive rather than being skipped
        strict: true,
        filter: (_path, stat) => {
          const isRegularFile = 'type' in stat ? stat.type === 'File' : stat.isFile();
          if (isRegularFile) {
            fileCount++;
            onFileArchived?.(fileCount, total);
          }
          return true;
        },
      });
      const output = createWriteStream(destination);

      const written = new Promise<void>((resolve, reject) => {
        output.on('close', () => resolve());
        output.on('error', reject);
        pack.on('error', (error: unknown) => {
          output.destroy();
          reject(error);
        });
      });

      pack.pipe(output);
      for (const entry of entries) {
        pack.add(entry);
      }
      pack.end();
      await written;

      const compressedSize = await getFileSizeBytes(destination);
      this.logger.info({ destination, compressedSize, fileCount }, 'Archive created');

      return { destination, compressedSize, fileCount };
    } catch (error) {
      const archiveError = new ArchiveError(destination, error);
      this.logger.error({ destination, err: error }, archiveError.message);
      throw archiveError;
    }
  }
}
