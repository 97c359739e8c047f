#!/usr/bin/env node
/**
 * CLI Entry Point
 * 
 * Command-line interface for R2R cruise packaging.
 * Runs interactively at a terminal and unattended from cron.
 */

import { Command } from 'commander';
import chalk from 'chalk';

// Commands
import { packageCommand } from './commands/package.js';
import { verifyCommand } from './commands/verify.js';

const program = new Command();

program
  .name('cruise-packager')
  .description('Package cruise data for R2R submission')
  .version('1.0.0');

program
  .command('package', { isDefault: true })
  .description('Archive the cruise data directory, write checksums and email the summary')
  .option('-c, --cruise-id <id>', 'Cruise ID (skips the warehouse lookup)')
  .option('-s, --source <dir>', 'Cruise data directory (defaults to <source root>/<cruise ID>)')
  .option('--no-email', 'Do not email the summary')
  .action(packageCommand);

program
  .command('verify <cruiseId>')
  .description('Check archive digests against a cruise manifest')
  .action(verifyCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('cruise-packager --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

// Parse and execute
try {
  await program.parseAsync();
} catch (error) {
  console.error(chalk.red('Unexpected error:'), error instanceof Error ? error.message : error);
  process.exit(1);
}
