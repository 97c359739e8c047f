/**
 * Checksum Computer
 * 
 * Streaming digest of a completed archive.
 */

import { ChecksumError, type ChecksumAlgorithm } from '@cruise-packager/core';
import { calculateFileHash } from '@cruise-packager/utils';

export interface ChecksumComputer {
  readonly algorithm: ChecksumAlgorithm;
  compute(filePath: string): Promise<string>;
}

export class FileChecksumComputer implements ChecksumComputer {
  constructor(public readonly algorithm: ChecksumAlgorithm = 'md5') {}

  async compute(filePath: string): Promise<string> {
    try {
      return await calculateFileHash(filePath, this.algorithm);
    } catch (error) {
      throw new ChecksumError(filePath, error);
    }
  }
}
