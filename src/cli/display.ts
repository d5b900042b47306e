/**
 * Human-readable rendering of a scan report
 */

import chalk from 'chalk';
import type {
  CertificateProbeResult,
  HttpScanResult,
  ScanReport,
  TcpScanResult,
} from '../core/types.js';

export interface DisplayOptions {
  /** Include closed and errored ports */
  verbose?: boolean;
}

function formatTcp(result: TcpScanResult, options: DisplayOptions): string[] {
  const lines: string[] = [chalk.bold('   TCP')];
  const open = result.scan_results.filter((r) => r.status === 'open');

  if (open.length > 0) {
    lines.push(chalk.green('   Open ports found:'));
    for (const r of open) {
      lines.push(`     Port ${r.port}${r.service ? chalk.gray(` (${r.service})`) : ''}`);
    }
  } else {
    lines.push(chalk.yellow('   No open ports found.'));
  }

  if (options.verbose) {
    for (const r of result.scan_results) {
      if (r.status === 'closed') lines.push(chalk.dim(`     Port ${r.port} closed`));
      if (r.status === 'error') lines.push(chalk.red(`     Port ${r.port} error: ${r.error}`));
    }
  }

  lines.push(chalk.gray(`   Scan complete: ${result.scan_results.length} ports scanned.`));
  return lines;
}

function formatHttp(result: HttpScanResult, options: DisplayOptions): string[] {
  const lines: string[] = [chalk.bold('   HTTP')];

  for (const r of result.scan_results) {
    if (r.status === 'open') {
      lines.push(
        `     Port ${r.port} ${chalk.green(String(r.status_code))} ${chalk.cyan(r.server)}` +
          chalk.gray(` (${r.content_type ?? 'Unknown'})`)
      );
    } else if (options.verbose) {
      const detail = r.error ?? `HTTP ${r.status_code}`;
      lines.push(chalk.dim(`     Port ${r.port} closed: ${detail}`));
    }
  }

  if (result.open_ports.length === 0) {
    lines.push(chalk.yellow('   No HTTP services found.'));
  }
  lines.push(chalk.gray(`   Probe complete: ${result.scan_results.length} ports probed.`));
  return lines;
}

function formatSsl(result: CertificateProbeResult): string[] {
  const lines: string[] = [chalk.bold('   TLS certificate')];

  if (!result.ok) {
    lines.push(chalk.red(`     ${result.error ?? 'Unknown error'}`));
    return lines;
  }

  lines.push(`     Issued to   : ${result.issued_to ?? chalk.dim('n/a')}`);
  lines.push(`     Issued by   : ${result.issued_by ?? chalk.dim('n/a')}`);
  lines.push(`     Valid from  : ${result.valid_from ?? chalk.dim('n/a')}`);
  lines.push(`     Valid until : ${result.valid_until ?? chalk.dim('n/a')}`);

  if (result.days_left === null) {
    lines.push(`     Days left   : ${chalk.dim('n/a')}`);
  } else if (result.expired) {
    lines.push(`     Days left   : ${chalk.red.bold(`${result.days_left} (EXPIRED)`)}`);
  } else {
    lines.push(`     Days left   : ${chalk.green(String(result.days_left))}`);
  }
  return lines;
}

export function formatReport(report: ScanReport, options: DisplayOptions = {}): string {
  const sections: string[][] = [];
  if (report.tcp) sections.push(formatTcp(report.tcp, options));
  if (report.http) sections.push(formatHttp(report.http, options));
  if (report.ssl) sections.push(formatSsl(report.ssl));

  return sections.map((lines) => lines.join('\n')).join('\n\n');
}
