// src/core/types.ts
/**
 * Type definitions for portprobe
 */

/**
 * Selectable probe modules, in invocation order
 */
export const MODULE_NAMES = ['tcp', 'http', 'ssl'] as const;

export type ModuleName = (typeof MODULE_NAMES)[number];

/**
 * Named pacing presets
 */
export type PacingPreset = 'stealth' | 'normal' | 'aggressive' | 'none';

/**
 * Inclusive port bounds
 */
export interface PortRange {
  start: number;
  end: number;
}

/**
 * Pacing parameters (delay in seconds)
 */
export interface PacingConfig {
  readonly delay: number;
  readonly jitter: boolean;
}

/**
 * Pacing request: a preset name, or an explicit delay which always wins
 */
export interface PacingOptions {
  preset?: string;
  delay?: number;
}

/**
 * Input accepted by the orchestrator
 */
export interface ScanRequest {
  host: string;
  portRange: PortRange;
  modules?: readonly string[];
  /** Per-request timeout in seconds */
  timeout?: number;
  tlsVerify?: boolean;
  tlsPort?: number;
  pacing?: PacingOptions;
  concurrency?: number;
  signal?: AbortSignal;
}

/**
 * ScanRequest with defaults filled in and every field validated
 */
export interface ResolvedScanConfig {
  host: string;
  portRange: PortRange;
  modules: ModuleName[];
  timeoutMs: number;
  tlsVerify: boolean;
  tlsPort: number;
  pacing: { preset: PacingPreset; delay?: number };
  concurrency: number;
  signal?: AbortSignal;
}

export type PortStatus = 'open' | 'closed' | 'error';

/**
 * One TCP port's outcome
 */
export interface PortResult {
  readonly port: number;
  readonly status: PortStatus;
  readonly service: string;
  readonly error: string;
}

/**
 * TCP module result set
 */
export interface TcpScanResult {
  open_ports: number[];
  scan_results: PortResult[];
}

/**
 * One HTTP port's outcome.
 *
 * status_code and content_type are absent when the request never got a response.
 */
export interface HttpPortResult {
  readonly port: number;
  readonly status: Exclude<PortStatus, 'error'>;
  readonly status_code?: number;
  readonly server: string;
  readonly content_type?: string;
  readonly url: string;
  readonly error?: string;
}

/**
 * HTTP module result set
 */
export interface HttpScanResult {
  open_ports: number[];
  scan_results: HttpPortResult[];
}

/**
 * TLS certificate probe outcome for one host:port
 */
export interface CertificateProbeResult {
  ok: boolean;
  issued_to: string | null;
  issued_by: string | null;
  valid_from: string | null;
  valid_until: string | null;
  days_left: number | null;
  expired: boolean;
  error: string | null;
}

/**
 * Complete scan report, keyed by module name in invocation order
 */
export interface ScanReport {
  tcp?: TcpScanResult;
  http?: HttpScanResult;
  ssl?: CertificateProbeResult;
}

/**
 * Cache entry
 */
export interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/**
 * Logger levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured fields attached to a log line
 */
export type LogContext = Record<string, string | number | boolean | undefined>;

/**
 * Logging sink handed to the orchestrator and every prober
 */
export interface LogSink {
  log(level: LogLevel, message: string, context?: LogContext): void;
}

/**
 * Anything that can hold a probe back before it touches the network
 */
export interface Pacer {
  wait(): Promise<void>;
}

/**
 * Options shared by every prober
 */
export interface ProberOptions {
  /** Per-attempt timeout in milliseconds */
  timeoutMs?: number;
  /** Shared pacing gate; null or absent means unrestricted */
  pacer?: Pacer | null;
  sink?: LogSink;
}

/**
 * Options of probers that sweep many ports
 */
export interface BatchProberOptions extends ProberOptions {
  /** Probes in flight at once (default 1: sequential) */
  concurrency?: number;
  /** Stops issuing new probes once aborted */
  signal?: AbortSignal;
}
