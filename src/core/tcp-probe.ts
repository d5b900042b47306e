/**
 * src/core/tcp-probe.ts
 *
 * TCP connect prober: one bounded-timeout connection per port.
 * - refused / timed out → closed
 * - any other socket error → error, with the socket's message
 * - connected → open, named from the well-known port table
 */

import { Socket } from 'node:net';
import { expandPorts, portCount, validatePortRange } from './config.js';
import { classifyError, errorMessage, isSystemError } from './errors.js';
import { HostResolver } from './resolver.js';
import { ResultCollector, portResult } from './results.js';
import { lookupService } from './services.js';
import { runBounded } from '../utils/concurrency.js';
import { logger } from '../utils/logger.js';
import type {
  LogSink,
  Pacer,
  PortRange,
  PortResult,
  BatchProberOptions,
  TcpScanResult,
} from './types.js';

export const DEFAULT_TCP_TIMEOUT_MS = 500;

/**
 * Resolves once connected, rejects with the socket error otherwise.
 * Implementations must release the connection before settling.
 */
export type TcpConnector = (host: string, port: number, timeoutMs: number) => Promise<void>;

/**
 * Plain net.Socket connect, destroyed as soon as the outcome is known
 */
export const socketConnector: TcpConnector = (host, port, timeoutMs) =>
  new Promise<void>((resolve, reject) => {
    const socket = new Socket();

    const finish = (err?: Error) => {
      socket.destroy();
      if (err) reject(err);
      else resolve();
    };

    socket.setTimeout(timeoutMs, () => {
      finish(
        Object.assign(new Error(`connect ETIMEDOUT ${host}:${port}`), { code: 'ETIMEDOUT' })
      );
    });
    socket.once('connect', () => finish());
    socket.once('error', (err) => finish(err));
    socket.connect(port, host);
  });

export interface TcpProberOptions extends BatchProberOptions {
  connector?: TcpConnector;
  resolver?: HostResolver;
}

export class TcpProber {
  private timeoutMs: number;
  private pacer: Pacer | null;
  private sink: LogSink;
  private concurrency: number;
  private signal?: AbortSignal;
  private connect: TcpConnector;
  private resolver: HostResolver;

  constructor(options: TcpProberOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TCP_TIMEOUT_MS;
    this.pacer = options.pacer ?? null;
    this.sink = options.sink ?? logger;
    this.concurrency = options.concurrency ?? 1;
    this.signal = options.signal;
    this.connect = options.connector ?? socketConnector;
    this.resolver = options.resolver ?? new HostResolver();
  }

  /**
   * Scan an inclusive port range in ascending order.
   *
   * @throws PortRangeError for an invalid range
   * @throws HostResolutionError when the host does not resolve (before any probe)
   */
  async scan(host: string, range: PortRange): Promise<TcpScanResult> {
    validatePortRange(range);
    const address = await this.resolver.resolve(host);
    const total = portCount(range);

    this.sink.log('info', `TCP connect scan of ${host}`, {
      address,
      ports: `${range.start}-${range.end}`,
      total,
    });

    const collector = new ResultCollector<PortResult>({ sortByPort: this.concurrency > 1 });
    await runBounded(
      expandPorts(range),
      async (port) => collector.add(await this.probePort(address, port)),
      this.concurrency,
      this.signal
    );

    if (this.signal?.aborted) {
      this.sink.log('warn', 'TCP scan interrupted, returning partial results', {
        completed: collector.size,
        total,
      });
    }

    const result = collector.build();
    this.sink.log('info', 'TCP scan finished', {
      scanned: collector.size,
      open: result.open_ports.length,
    });
    return result;
  }

  /**
   * Probe one port (pacing included)
   */
  async probePort(address: string, port: number): Promise<PortResult> {
    await this.pacer?.wait();

    try {
      await this.connect(address, port, this.timeoutMs);
    } catch (err) {
      if (!isSystemError(err)) throw err;

      const category = classifyError(err);
      if (category === 'refused' || category === 'timeout') {
        return portResult(port, 'closed');
      }

      this.sink.log('debug', `Port ${port} probe failed`, { category, code: err.code });
      return portResult(port, 'error', { error: errorMessage(err) });
    }

    return portResult(port, 'open', { service: lookupService(port) ?? 'unknown' });
  }
}
