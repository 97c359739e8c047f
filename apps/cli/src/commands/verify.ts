/**
 * Verify Command
 * 
 * Recomputes every archive digest listed in a cruise's manifest.
 */

import ora from 'ora';
import chalk from 'chalk';
import { join } from 'node:path';
import { describeCause } from '@cruise-packager/core';
import { FileChecksumComputer, manifestName, verifyManifest } from '@cruise-packager/packaging';
import { config } from '../config/index.js';
import { logger } from '../lib/logger.js';
import { printError, printSuccess } from '../lib/output.js';

export async function verifyCommand(cruiseId: string): Promise<void> {
  const manifestPath = join(config.packaging.outputRoot, cruiseId, manifestName(cruiseId));
  const checksum = new FileChecksumComputer(config.packaging.checksumAlgorithm);

  const spinner = ora(`Verifying ${manifestPath}...`).start();

  try {
    const result = await verifyManifest(manifestPath, checksum);
    spinner.stop();

    for (const entry of result.entries) {
      const status =
        entry.status === 'ok'
          ? chalk.green('OK')
          : entry.status === 'missing'
            ? chalk.red('MISSING')
            : chalk.red('MISMATCH');
      console.log(`  ${status.padEnd(18)} ${entry.name}`);
    }

    logger.info(
      { manifestPath, valid: result.valid, checked: result.entries.length },
      'Manifest verification finished'
    );

    if (result.valid) {
      printSuccess(`All ${result.entries.length} archive(s) match ${manifestPath}`);
    } else {
      printError(`Some archives do not match ${manifestPath}`);
      process.exitCode = 1;
    }
  } catch (error) {
    spinner.fail('Verification failed');
    logger.error({ manifestPath, err: error }, 'Manifest verification failed');
    printError(describeCause(error));
    process.exitCode = 1;
  }
}
