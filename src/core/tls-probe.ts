/**
 * src/core/tls-probe.ts
 *
 * TLS certificate inspection for a single host:port.
 *
 * Failures never escape as exceptions; they come back as ok=false with one of
 * three error shapes: "No certificate presented", "SSL error: ..." (handshake
 * and verification) or "Socket error: ..." (everything below TLS).
 */

import { isIP } from 'node:net';
import { connect as tlsConnect } from 'node:tls';
import { isValidPort } from './config.js';
import {
  PortRangeError,
  classifyTlsFailure,
  errorMessage,
  isSystemError,
} from './errors.js';
import { certificateFailure, certificateSuccess } from './results.js';
import { logger } from '../utils/logger.js';
import type { CertificateProbeResult, LogSink, Pacer, ProberOptions } from './types.js';

export const DEFAULT_TLS_TIMEOUT_MS = 5000;
export const DEFAULT_TLS_PORT = 443;

const DAY_MS = 24 * 60 * 60 * 1000;

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

// "Jan  1 00:00:00 2024 GMT" or "Jan 1 00:00:00 2024 GMT"
const CERT_DATE = /^([A-Z][a-z]{2}) {1,2}(\d{1,2}) (\d{2}):(\d{2}):(\d{2}) (\d{4}) (?:GMT|UTC)$/;

/**
 * Peer certificate fields the prober reads
 */
export interface CertificateSnapshot {
  /** Distinguished-name attributes; repeated attributes arrive as arrays */
  subject?: object;
  issuer?: object;
  valid_from?: string;
  valid_to?: string;
}

export interface TlsConnectOptions {
  host: string;
  port: number;
  /** SNI and expected certificate name; omitted for IP literals */
  servername?: string;
  verify: boolean;
  timeoutMs: number;
}

/**
 * Completes a handshake and returns the peer certificate, or null when none was presented
 */
export type TlsConnector = (options: TlsConnectOptions) => Promise<CertificateSnapshot | null>;

export const tlsSocketConnector: TlsConnector = (options) =>
  new Promise<CertificateSnapshot | null>((resolve, reject) => {
    const socket = tlsConnect({
      host: options.host,
      port: options.port,
      servername: options.servername,
      rejectUnauthorized: options.verify,
      ...(options.verify ? {} : { checkServerIdentity: () => undefined }),
    });

    socket.setTimeout(options.timeoutMs, () => {
      socket.destroy();
      reject(
        Object.assign(new Error(`connect ETIMEDOUT ${options.host}:${options.port}`), {
          code: 'ETIMEDOUT',
        })
      );
    });

    socket.once('secureConnect', () => {
      const cert = socket.getPeerCertificate();
      socket.end();
      socket.destroy();

      if (!cert || Object.keys(cert).length === 0) {
        resolve(null);
        return;
      }
      resolve({
        subject: cert.subject,
        issuer: cert.issuer,
        valid_from: cert.valid_from,
        valid_to: cert.valid_to,
      });
    });

    socket.once('error', (err) => {
      socket.destroy();
      reject(err);
    });
  });

/**
 * Collapse a distinguished name into attribute → value. When an attribute
 * repeats, the last occurrence wins.
 */
export function flattenDistinguishedName(name: object | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  if (!name) return out;

  const entries: Array<[string, unknown]> = Object.entries(name);
  for (const [key, value] of entries) {
    if (typeof value === 'string') {
      out[key] = value;
    } else if (Array.isArray(value)) {
      const strings = value.filter((v): v is string => typeof v === 'string');
      if (strings.length > 0) out[key] = strings[strings.length - 1];
    }
  }
  return out;
}

/**
 * Parse an OpenSSL certificate timestamp; null when it matches neither padding
 */
export function parseCertificateDate(value: unknown): Date | null {
  if (typeof value !== 'string') return null;

  const match = CERT_DATE.exec(value);
  if (!match) return null;

  const month = MONTHS.indexOf(match[1]);
  const [day, hours, minutes, seconds, year] = match.slice(2, 7).map(Number);
  if (month === -1 || hours > 23 || minutes > 59 || seconds > 59) return null;

  const date = new Date(Date.UTC(year, month, day, hours, minutes, seconds));
  // "Feb 30" would silently roll into March
  if (date.getUTCDate() !== day || date.getUTCMonth() !== month) return null;
  return date;
}

/**
 * Whole days from now until `notAfter`, floored (negative once expired)
 */
export function daysUntil(notAfter: Date, now: Date): number {
  return Math.floor((notAfter.getTime() - now.getTime()) / DAY_MS);
}

export interface TlsProberOptions extends ProberOptions {
  /** Validate the chain and hostname (default true) */
  verify?: boolean;
  connector?: TlsConnector;
  now?: () => Date;
}

export class TlsProber {
  private timeoutMs: number;
  private pacer: Pacer | null;
  private sink: LogSink;
  private verify: boolean;
  private connect: TlsConnector;
  private now: () => Date;

  constructor(options: TlsProberOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TLS_TIMEOUT_MS;
    this.pacer = options.pacer ?? null;
    this.sink = options.sink ?? logger;
    this.verify = options.verify ?? true;
    this.connect = options.connector ?? tlsSocketConnector;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * @throws PortRangeError for an invalid port; network failures never throw
   */
  async scan(host: string, port = DEFAULT_TLS_PORT): Promise<CertificateProbeResult> {
    if (!isValidPort(port)) {
      throw new PortRangeError(`TLS port must be between 1 and 65535, got ${port}`);
    }

    await this.pacer?.wait();
    this.sink.log('info', `TLS certificate probe of ${host}:${port}`, { verify: this.verify });

    let cert: CertificateSnapshot | null;
    try {
      cert = await this.connect({
        host,
        port,
        servername: isIP(host) ? undefined : host,
        verify: this.verify,
        timeoutMs: this.timeoutMs,
      });
    } catch (err) {
      if (!isSystemError(err)) throw err;

      const layer = classifyTlsFailure(err);
      this.sink.log('warn', `TLS probe of ${host}:${port} failed`, { layer, code: err.code });
      return certificateFailure(
        layer === 'ssl' ? `SSL error: ${errorMessage(err)}` : `Socket error: ${errorMessage(err)}`
      );
    }

    if (!cert) {
      this.sink.log('warn', `No certificate presented by ${host}:${port}`);
      return certificateFailure('No certificate presented');
    }

    return this.describe(cert);
  }

  /**
   * Build the result record for a retrieved certificate
   */
  describe(cert: CertificateSnapshot): CertificateProbeResult {
    const subject = flattenDistinguishedName(cert.subject);
    const issuer = flattenDistinguishedName(cert.issuer);
    const notBefore = parseCertificateDate(cert.valid_from);
    const notAfter = parseCertificateDate(cert.valid_to);

    if (cert.valid_to !== undefined && !notAfter) {
      this.sink.log('debug', 'Unparseable certificate expiry', { value: cert.valid_to });
    }

    return certificateSuccess({
      issued_to: subject.CN ?? null,
      issued_by: issuer.CN ?? null,
      valid_from: notBefore ? notBefore.toISOString() : null,
      valid_until: notAfter ? notAfter.toISOString() : null,
      days_left: notAfter ? daysUntil(notAfter, this.now()) : null,
    });
  }
}
