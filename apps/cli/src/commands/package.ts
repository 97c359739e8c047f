/**
 * Package Command
 * 
 * Resolves the cruise, packages its data directory for R2R submission,
 * prints the summary and emails it.
 */

import { join } from 'node:path';
import { SourceNotFoundError, type PackagingRun } from '@cruise-packager/core';
import { EmailNotifier } from '@cruise-packager/notification';
import { PackagePlanner } from '@cruise-packager/packaging';
import { formatDuration, pathExists } from '@cruise-packager/utils';
import { config } from '../config/index.js';
import { fetchCruiseId } from '../lib/cruiseClient.js';
import { resolveCruiseId } from '../lib/cruiseId.js';
import { logger } from '../lib/logger.js';
import { printError, printHeader, printInfo, printKeyValue, printSuccess, printWarning } from '../lib/output.js';
import { attachConsoleReporter } from '../lib/progress.js';
import { prompt } from '../lib/prompt.js';

interface PackageOptions {
  cruiseId?: string;
  source?: string;
  email: boolean;
}

export async function packageCommand(options: PackageOptions): Promise<void> {
  const interactive = process.stdin.isTTY === true;
  logger.info({ interactive }, 'Starting R2R packaging');

  printHeader('R2R Packaging Tool');

  if (!options.cruiseId) {
    printInfo('Fetching current cruise info from the data warehouse...');
  }

  const cruiseId = await resolveCruiseId({
    explicitId: options.cruiseId,
    interactive,
    lookup: () => fetchCruiseId({ ...config.cruiseApi, logger }),
    ask: prompt,
  });

  if (!cruiseId) {
    logger.error('No valid cruise ID found. Exiting.');
    printError('No cruise ID provided. Exiting.');
    process.exitCode = 1;
    return;
  }

  const sourceDir = options.source ?? join(config.sourceRoot, cruiseId);
  printKeyValue('Cruise ID', cruiseId);
  printKeyValue('Source', sourceDir);

  if (!(await pathExists(sourceDir))) {
    logger.error({ sourceDir }, `Source directory ${sourceDir} does not exist. Exiting.`);
    printError(`Source directory ${sourceDir} does not exist.`);
    process.exitCode = 1;
    return;
  }

  logger.info({ sourceDir }, `Source directory: ${sourceDir}`);

  const planner = new PackagePlanner(
    { ...config.packaging, showProgress: interactive },
    { logger }
  );
  attachConsoleReporter(planner, { interactive });

  let run: PackagingRun;
  try {
    run = await planner.run(cruiseId, sourceDir);
  } catch (error) {
    if (error instanceof SourceNotFoundError) {
      printError(error.message);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  console.log(run.report);

  for (const failure of run.failures) {
    printWarning(`${failure.kind} failed for ${failure.target}: ${failure.message}`);
  }
  if (run.missingDatasets.length > 0) {
    printInfo(`Large datasets not found (skipped): ${run.missingDatasets.join(', ')}`);
  }

  if (options.email) {
    const notifier = new EmailNotifier(config.notification, { logger });
    const sent = await notifier.send(cruiseId, run.report);
    if (sent.ok) {
      printSuccess(`Email sent successfully to ${sent.value.recipient}`);
    } else {
      printWarning(`Could not send email - ${sent.error.message}`);
    }
  }

  const elapsed = run.completedAt.getTime() - run.startedAt.getTime();
  logger.info({ cruiseId, elapsed }, `Script execution completed in ${formatDuration(elapsed)}`);
  printSuccess(`Packaged ${run.packages.length} archive(s) into ${run.outputDir} in ${formatDuration(elapsed)}`);
}
