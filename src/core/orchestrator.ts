/**
 * Scan orchestrator: fans one validated request out to the selected modules
 */

import { expandPorts, portCount, resolveScanConfig } from './config.js';
import { HttpProber, type HttpProberOptions } from './http-probe.js';
import { createPacer, type PacingHooks } from './pacing.js';
import { HostResolver } from './resolver.js';
import { TcpProber, type TcpProberOptions } from './tcp-probe.js';
import { TlsProber, type TlsProberOptions } from './tls-probe.js';
import { logger } from '../utils/logger.js';
import type {
  LogSink,
  ModuleName,
  PortRange,
  ResolvedScanConfig,
  ScanReport,
  ScanRequest,
} from './types.js';

/**
 * One module's unit of work, tagged by module name
 */
export type ProbeTask =
  | { module: 'tcp'; host: string; range: PortRange }
  | { module: 'http'; host: string; ports: number[] }
  | { module: 'ssl'; host: string; port: number };

export interface ProberFactories {
  tcp: (options: TcpProberOptions) => Pick<TcpProber, 'scan'>;
  http: (options: HttpProberOptions) => Pick<HttpProber, 'scan'>;
  ssl: (options: TlsProberOptions) => Pick<TlsProber, 'scan'>;
}

const defaultFactories: ProberFactories = {
  tcp: (options) => new TcpProber(options),
  http: (options) => new HttpProber(options),
  ssl: (options) => new TlsProber(options),
};

export interface OrchestratorOptions {
  sink?: LogSink;
  factories?: Partial<ProberFactories>;
  pacingHooks?: PacingHooks;
  /** Shared by every TCP scan this orchestrator runs */
  resolver?: HostResolver;
}

/**
 * Build the task for a selected module
 */
export function planTask(module: ModuleName, config: ResolvedScanConfig): ProbeTask {
  switch (module) {
    case 'tcp':
      return { module, host: config.host, range: config.portRange };
    case 'http':
      return { module, host: config.host, ports: expandPorts(config.portRange) };
    case 'ssl':
      return { module, host: config.host, port: config.tlsPort };
  }
}

export class ScanOrchestrator {
  private sink: LogSink;
  private factories: ProberFactories;
  private pacingHooks?: PacingHooks;
  private resolver: HostResolver;

  constructor(options: OrchestratorOptions = {}) {
    this.sink = options.sink ?? logger;
    this.factories = { ...defaultFactories, ...options.factories };
    this.pacingHooks = options.pacingHooks;
    this.resolver = options.resolver ?? new HostResolver();
  }

  /**
   * Run every selected module in order (tcp, http, ssl) and merge their results.
   *
   * Configuration errors are thrown before any network activity. Per-port and
   * per-handshake failures are folded into the report; host-resolution
   * failures and unexpected errors propagate.
   */
  async run(request: ScanRequest): Promise<ScanReport> {
    const config = resolveScanConfig(request);
    const pacer = createPacer(
      { ...config.pacing, portCount: portCount(config.portRange) },
      this.sink,
      this.pacingHooks
    );

    this.sink.log('info', `Starting scan of ${config.host}`, {
      modules: config.modules.join(','),
      ports: `${config.portRange.start}-${config.portRange.end}`,
      timeoutMs: config.timeoutMs,
    });

    const shared = {
      timeoutMs: config.timeoutMs,
      pacer,
      sink: this.sink,
    };
    const batch = { ...shared, concurrency: config.concurrency, signal: config.signal };

    const report: ScanReport = {};

    for (const module of config.modules) {
      if (config.signal?.aborted) {
        this.sink.log('warn', `Scan interrupted, skipping module '${module}'`);
        break;
      }

      const task = planTask(module, config);
      switch (task.module) {
        case 'tcp':
          report.tcp = await this.factories
            .tcp({ ...batch, resolver: this.resolver })
            .scan(task.host, task.range);
          break;
        case 'http':
          report.http = await this.factories.http(batch).scan(task.host, task.ports);
          break;
        case 'ssl':
          report.ssl = await this.factories
            .ssl({ ...shared, verify: config.tlsVerify })
            .scan(task.host, task.port);
          break;
      }
    }

    this.sink.log('info', 'Scan complete', { modules: Object.keys(report).join(',') });
    return report;
  }
}
