/**
 * Scan command implementation
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { parsePortRange } from '../../core/config.js';
import { ConfigurationError, HostResolutionError } from '../../core/errors.js';
import { ScanOrchestrator } from '../../core/orchestrator.js';
import { logger } from '../../utils/logger.js';
import { formatReport } from '../display.js';
import {
  DEFAULT_EXPORT_DIR,
  PathTraversalError,
  exportReport,
  timestampedFilename,
} from '../export.js';
import {
  CliValidationError,
  parseInteger,
  parseNumber,
  validateHost,
  validateTimeout,
} from '../validators.js';

interface ScanCommandOptions {
  modules: string[];
  timeout: number;
  sslPort: number;
  verify: boolean;
  preset: string;
  delay?: number;
  concurrency: number;
  json?: string | boolean;
  exportDir: string;
  printJson: boolean;
  verbose: boolean;
  quiet: boolean;
  debug: boolean;
}

/**
 * Map a failure to the label shown to the operator
 */
export function describeFailure(error: unknown): string {
  if (error instanceof CliValidationError) return 'Invalid argument';
  if (error instanceof ConfigurationError) return 'Invalid configuration';
  if (error instanceof HostResolutionError) return 'Host resolution failed';
  if (error instanceof PathTraversalError) return 'Export rejected';
  return 'Unexpected error';
}

export const scanCommand = new Command('scan')
  .description('Probe a host across a port range with TCP, HTTP and TLS modules')
  .argument('<host>', 'Target host (IP address or domain name)')
  .argument('<ports>', "Port range, e.g. '20-80'")
  .option('-m, --modules <names...>', 'Modules to run: tcp http ssl', ['tcp'])
  .option('-t, --timeout <seconds>', 'Timeout per probe in seconds', parseNumber, 0.5)
  .option('--ssl-port <port>', 'Port for the TLS certificate probe', parseInteger, 443)
  .option('--no-verify', 'Disable TLS certificate verification')
  .option('--preset <name>', 'Pacing preset: stealth|normal|aggressive|none', 'normal')
  .option('--delay <seconds>', 'Fixed delay between probes (overrides --preset)', parseNumber)
  .option('-c, --concurrency <number>', 'Probes in flight per module', parseInteger, 1)
  .option('--json [file]', 'Export results to a JSON file (timestamped name when omitted)')
  .option('--export-dir <path>', 'Directory JSON exports are written to', DEFAULT_EXPORT_DIR)
  .option('--print-json', 'Print results as JSON', false)
  .option('--verbose', 'Show closed ports too', false)
  .option('-q, --quiet', 'Suppress log output', false)
  .option('--debug', 'Enable debug logging', false)
  .action(async (host: string, ports: string, options: ScanCommandOptions) => {
    const controller = new AbortController();
    const onInterrupt = () => {
      logger.warn('Interrupt received, stopping after in-flight probes');
      controller.abort();
    };

    try {
      const target = validateHost(host);
      const portRange = parsePortRange(ports);
      const timeout = validateTimeout(options.timeout);

      logger.setQuiet(options.quiet);
      if (options.debug) logger.setLevel('debug');

      if (!options.quiet) {
        console.log(
          chalk.bold('\n   Target') +
            chalk.gray(' ──▶ ') +
            chalk.cyan.bold(target) +
            chalk.gray(` ports ${portRange.start}-${portRange.end}\n`)
        );
        console.log(chalk.gray('   ├─ Modules     : ') + chalk.white.bold(options.modules.join(', ')));
        console.log(chalk.gray('   ├─ Timeout     : ') + chalk.white(`${timeout}s`));
        console.log(
          chalk.gray('   ├─ Pacing      : ') +
            chalk.magenta(options.delay !== undefined ? `${options.delay}s fixed` : options.preset)
        );
        console.log(chalk.gray('   └─ Concurrency : ') + chalk.white(String(options.concurrency)) + '\n');
      }

      process.once('SIGINT', onInterrupt);
      const orchestrator = new ScanOrchestrator({ sink: logger });
      const report = await orchestrator.run({
        host: target,
        portRange,
        modules: options.modules,
        timeout,
        tlsVerify: options.verify,
        tlsPort: options.sslPort,
        pacing: { preset: options.preset, delay: options.delay },
        concurrency: options.concurrency,
        signal: controller.signal,
      });
      process.off('SIGINT', onInterrupt);

      console.log(`\n${formatReport(report, { verbose: options.verbose })}\n`);

      if (options.printJson) {
        console.log(JSON.stringify(report, null, 2));
      }
      if (options.json !== undefined) {
        const file = typeof options.json === 'string' ? options.json : timestampedFilename();
        const written = await exportReport(report, file, options.exportDir);
        logger.success(`Results exported to: ${written}`);
      }

      process.exit(0);
    } catch (error) {
      process.off('SIGINT', onInterrupt);
      console.error(
        chalk.red.bold(`\n   ✘ ${describeFailure(error)}: `) +
          chalk.white(error instanceof Error ? error.message : String(error))
      );
      if (!(error instanceof CliValidationError || error instanceof ConfigurationError)) {
        console.error(chalk.dim('\n   Check the target host or network connectivity.\n'));
      }
      process.exit(1);
    }
  });
