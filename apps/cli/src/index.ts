#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Command-line interface for the mediastage pipeline.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadDotenv } from '@mediastage/core';

// Commands
import { classifyCommand } from './commands/classify.js';
import { probeCommand } from './commands/probe.js';
import { stageCommand } from './commands/stage.js';

loadDotenv();

const program = new Command();

program
  .name('mediastage')
  .description('Probe, fetch and stage the media of a post for delivery')
  .version('0.1.0');

program
  .command('classify <url...>')
  .description('Show the media kind of each URL')
  .option('--json', 'Output in JSON format')
  .action(classifyCommand);

program
  .command('probe <url>')
  .description('Check reachability, validity and size of a media URL')
  .option('--json', 'Output in JSON format')
  .option('--proxy <url>', 'Send the probe through a proxy')
  .option('--range', 'Probe as a range-capable URL')
  .action(probeCommand);

program
  .command('stage <text...>')
  .description('Recognize media links in text and stage each post')
  .option('--json', 'Output in JSON format')
  .option('--keep', 'Keep cached files after staging')
  .option('--cache-dir <path>', 'Cache directory')
  .option('--max-size <mb>', 'Reject posts whose largest video exceeds this size (0 = unlimited)')
  .option('--large-threshold <mb>', 'Fetch videos above this size locally (0 = always)')
  .option('--prefetch', 'Download every slot instead of sending direct links')
  .option('--concurrency <count>', 'Concurrent downloads (1-32)')
  .option('--no-ffmpeg', 'Concatenate HLS segments without ffmpeg')
  .action(stageCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('mediastage --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('Fatal error:'), error);
  process.exit(1);
});
