/**
 * Console Progress Reporter
 * 
 * Subscribes to planner events and renders them. Interactive sessions get
 * an ora spinner with a file-count bar per archive; unattended runs get
 * plain lines.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { PackageDescriptor } from '@cruise-packager/core';
import type {
  ArchiveProgressEvent,
  ArchiveStartEvent,
  PackagePlanner,
  StepEvent,
} from '@cruise-packager/packaging';
import { formatBytes, formatRatio } from '@cruise-packager/utils';
import { printBanner, printError, printInfo, printSuccess } from './output.js';

const BAR_LENGTH = 40;

export function renderProgressBar(count: number, total: number, length = BAR_LENGTH): string {
  if (total <= 0) {
    return `Progress: [${'-'.repeat(length)}] 0.0% (0/0 files)`;
  }
  const fraction = Math.min(count / total, 1);
  const filled = Math.floor(length * fraction);
  const bar = '='.repeat(filled) + '-'.repeat(length - filled);
  return `Progress: [${bar}] ${(fraction * 100).toFixed(1)}% (${count}/${total} files)`;
}

export function attachConsoleReporter(planner: PackagePlanner, options: { interactive: boolean }): void {
  let spinner: Ora | null = null;

  planner.on('step', (event: StepEvent) => {
    switch (event.step) {
      case 'copy':
        printInfo(`Copying root files (${event.count} files) to output directory...`);
        break;
      case 'size':
        printInfo('Calculating directory sizes...');
        break;
      case 'general':
        printBanner(`STEP 1: Packaging general data (${event.count} directories)`);
        break;
      case 'large':
        printBanner('STEP 2: Packaging large datasets (smallest to largest)');
        break;
    }
  });

  planner.on('file:failed', (event: { name: string; message: string }) => {
    printError(event.message);
  });

  planner.on('dataset:sized', (event: { name: string; size: number }) => {
    console.log(`  ${event.name}: ${formatBytes(event.size)}`);
  });

  planner.on('archive:start', (event: ArchiveStartEvent) => {
    const label = `[${event.index}/${event.total}] Packaging ${event.name} (${formatBytes(event.sourceSize)})...`;
    if (options.interactive) {
      spinner = ora(label).start();
    } else {
      console.log(label);
    }
  });

  planner.on('archive:progress', (event: ArchiveProgressEvent) => {
    if (spinner) {
      spinner.text = `${event.name} ${renderProgressBar(event.count, event.total)}`;
    }
  });

  planner.on('archive:complete', (descriptor: PackageDescriptor) => {
    const message =
      `${descriptor.name}: compressed to ${formatBytes(descriptor.compressedSize)} ` +
      `(${formatRatio(descriptor.sourceSize, descriptor.compressedSize)} of original)`;
    if (spinner) {
      spinner.succeed(message);
      spinner = null;
    } else {
      printSuccess(message);
    }
  });

  planner.on('archive:failed', (event: { name: string; message: string }) => {
    const message = `${event.name}: ${chalk.red(event.message)}`;
    if (spinner) {
      spinner.fail(message);
      spinner = null;
    } else {
      printError(message);
    }
  });
}
