#!/usr/bin/env node

/**
 * portprobe CLI Entry Point
 */

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { exportsCommand } from './commands/exports.js';
import { scanCommand } from './commands/scan.js';

const program = new Command();

program
  .name('portprobe')
  .description('Multi-protocol port prober: TCP connect, HTTP server detection, TLS certificates')
  .version('1.0.0');

const banner = `
${chalk.cyan('╔═══════════════════════════════════════════════╗')}
${chalk.cyan('║')}  ${chalk.bold.white('PORTPROBE')} ${chalk.gray('v1.0.0')}                             ${chalk.cyan('║')}
${chalk.cyan('║')}  ${chalk.gray('TCP · HTTP · TLS reconnaissance')}              ${chalk.cyan('║')}
${chalk.cyan('╚═══════════════════════════════════════════════╝')}
`;

program.addHelpText('beforeAll', banner);

program.addCommand(scanCommand);
program.addCommand(exportsCommand);

// Error handling
program.exitOverride();

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof CommanderError) {
    // commander already printed help, version or the usage error
    process.exit(error.exitCode);
  }
  if (error instanceof Error) {
    console.error(chalk.red(`\n❌ Error: ${error.message}\n`));
    process.exit(1);
  }
  throw error;
}
