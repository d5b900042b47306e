/**
 * portprobe - Multi-protocol port probe engine
 * Main entry point for programmatic usage
 */

import { ScanOrchestrator } from './core/orchestrator.js';
import { parsePortRange } from './core/config.js';
import { createLogger } from './utils/logger.js';

export { ScanOrchestrator, parsePortRange, createLogger };
export { planTask } from './core/orchestrator.js';
export type { ProbeTask, ProberFactories, OrchestratorOptions } from './core/orchestrator.js';
export { TcpProber, socketConnector } from './core/tcp-probe.js';
export type { TcpConnector, TcpProberOptions } from './core/tcp-probe.js';
export { HttpProber, identifyServer } from './core/http-probe.js';
export type { HttpProberOptions } from './core/http-probe.js';
export {
  TlsProber,
  tlsSocketConnector,
  flattenDistinguishedName,
  parseCertificateDate,
} from './core/tls-probe.js';
export type { TlsConnector, TlsProberOptions, CertificateSnapshot } from './core/tls-probe.js';
export { PacingController, PACING_PRESETS, createPacer } from './core/pacing.js';
export { HostResolver } from './core/resolver.js';
export { resolveScanConfig, DEFAULTS } from './core/config.js';
export * from './core/errors.js';
export * from './core/types.js';
export { Logger } from './utils/logger.js';

/**
 * Version information
 */
export const VERSION = '1.0.0';

/**
 * Quick scan interface for programmatic usage
 * @example
 * ```typescript
 * import { quickScan } from 'portprobe';
 *
 * const report = await quickScan('192.0.2.10', '20-443', {
 *   modules: ['tcp', 'ssl'],
 *   preset: 'stealth',
 * });
 * ```
 */
export async function quickScan(
  host: string,
  ports: string,
  options: {
    modules?: string[];
    timeout?: number;
    preset?: string;
    quiet?: boolean;
  } = {}
) {
  const orchestrator = new ScanOrchestrator({
    sink: createLogger({ quiet: options.quiet ?? true }),
  });

  return await orchestrator.run({
    host,
    portRange: parsePortRange(ports),
    modules: options.modules,
    timeout: options.timeout,
    pacing: { preset: options.preset ?? 'normal' },
  });
}
