/**
 * src/core/http-probe.ts
 *
 * Plain HTTP probe: one GET per port, classified by status code, with the
 * server family taken from the Server header.
 */

import { errors, request, type Dispatcher } from 'undici';
import { isValidPort } from './config.js';
import {
  PortRangeError,
  classifyError,
  errorMessage,
  isSystemError,
  truncateErrorMessage,
} from './errors.js';
import { ResultCollector } from './results.js';
import { runBounded } from '../utils/concurrency.js';
import { createProbeAgent, headerValue, probeUrl } from '../utils/http.js';
import { logger } from '../utils/logger.js';
import type {
  BatchProberOptions,
  HttpPortResult,
  HttpScanResult,
  LogSink,
  Pacer,
} from './types.js';

export const DEFAULT_HTTP_TIMEOUT_MS = 3000;

const USER_AGENT = 'portprobe/1.0';

// Checked in order; first substring hit wins
const SERVER_FAMILIES: ReadonlyArray<[needles: string[], family: string]> = [
  [['apache'], 'Apache'],
  [['nginx'], 'Nginx'],
  [['iis', 'microsoft'], 'Microsoft IIS'],
  [['lighttpd'], 'Lighttpd'],
  [['gunicorn'], 'Gunicorn'],
  [['caddy'], 'Caddy'],
];

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

/**
 * Canonical server family from a Server header.
 * "nginx/1.18" → "Nginx", "CustomThing/2.0" → "Customthing", absent → "Unknown"
 */
export function identifyServer(header: string | undefined): string {
  if (!header || header.trim() === '') return 'Unknown';

  const lowered = header.toLowerCase();
  for (const [needles, family] of SERVER_FAMILIES) {
    if (needles.some((n) => lowered.includes(n))) return family;
  }
  return capitalize(header.split('/')[0]);
}

/**
 * Failures of the request itself, as opposed to bugs in the caller
 */
function isTransportError(err: unknown): err is Error {
  return (
    err instanceof errors.UndiciError ||
    isSystemError(err) ||
    (err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError'))
  );
}

export interface HttpProberOptions extends BatchProberOptions {
  /** Custom dispatcher (e.g. a MockAgent); the prober does not close it */
  dispatcher?: Dispatcher;
}

export class HttpProber {
  private timeoutMs: number;
  private pacer: Pacer | null;
  private sink: LogSink;
  private concurrency: number;
  private signal?: AbortSignal;
  private dispatcher?: Dispatcher;

  constructor(options: HttpProberOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.pacer = options.pacer ?? null;
    this.sink = options.sink ?? logger;
    this.concurrency = options.concurrency ?? 1;
    this.signal = options.signal;
    this.dispatcher = options.dispatcher;
  }

  /**
   * Probe an explicit list of ports (need not be contiguous)
   *
   * @throws PortRangeError if a port is outside 1-65535
   */
  async scan(host: string, ports: readonly number[]): Promise<HttpScanResult> {
    const invalid = ports.find((p) => !isValidPort(p));
    if (invalid !== undefined) {
      throw new PortRangeError(`Ports must be between 1 and 65535. Got: ${invalid}`);
    }

    this.sink.log('info', `HTTP probe of ${host}`, { ports: ports.length });

    const owned = this.dispatcher ? undefined : createProbeAgent(this.timeoutMs);
    const dispatcher = this.dispatcher ?? owned;
    const collector = new ResultCollector<HttpPortResult>({
      sortByPort: this.concurrency > 1,
    });

    try {
      await runBounded(
        ports,
        async (port) => collector.add(await this.probePort(host, port, dispatcher)),
        this.concurrency,
        this.signal
      );
    } finally {
      await owned?.close();
    }

    if (this.signal?.aborted) {
      this.sink.log('warn', 'HTTP probe interrupted, returning partial results', {
        completed: collector.size,
        total: ports.length,
      });
    }

    const result = collector.build();
    this.sink.log('info', 'HTTP probe finished', {
      scanned: collector.size,
      open: result.open_ports.length,
    });
    return result;
  }

  /**
   * GET http://host:port/ (pacing included)
   */
  async probePort(host: string, port: number, dispatcher?: Dispatcher): Promise<HttpPortResult> {
    await this.pacer?.wait();

    const url = probeUrl(host, port);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const resp = await request(url, {
        method: 'GET',
        dispatcher,
        headers: { 'user-agent': USER_AGENT, accept: '*/*' },
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
        signal: controller.signal,
        throwOnError: false,
      });
      await resp.body.dump();

      const status_code = resp.statusCode;
      return {
        port,
        status: status_code < 400 ? 'open' : 'closed',
        status_code,
        server: identifyServer(headerValue(resp.headers, 'server')),
        content_type: headerValue(resp.headers, 'content-type') ?? 'Unknown',
        url,
      };
    } catch (err) {
      if (!isTransportError(err)) throw err;

      this.sink.log('debug', `HTTP probe of port ${port} failed`, {
        category: classifyError(err),
      });
      return {
        port,
        status: 'closed',
        server: 'N/A',
        url,
        error: truncateErrorMessage(errorMessage(err)),
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
