/**
 * Saved export management: list and clean JSON reports
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_EXPORT_DIR, cleanExports, listExports } from '../export.js';

interface ExportsCommandOptions {
  dir: string;
}

const listCommand = new Command('list')
  .description('List saved JSON exports, newest first')
  .option('--dir <path>', 'Export directory', DEFAULT_EXPORT_DIR)
  .action(async (options: ExportsCommandOptions) => {
    const files = await listExports(options.dir);

    if (files.length === 0) {
      console.log(chalk.yellow('No JSON exports found.'));
      return;
    }

    console.log(chalk.white('Existing exports:'));
    for (const file of files) {
      console.log(chalk.gray('  - ') + chalk.cyan(file));
    }
  });

const cleanCommand = new Command('clean')
  .description('Delete every saved JSON export')
  .option('--dir <path>', 'Export directory', DEFAULT_EXPORT_DIR)
  .action(async (options: ExportsCommandOptions) => {
    const deleted = await cleanExports(options.dir);
    console.log(chalk.green(`${deleted} JSON file(s) deleted.`));
  });

export const exportsCommand = new Command('exports')
  .description('Manage saved JSON exports')
  .addCommand(listCommand)
  .addCommand(cleanCommand);
