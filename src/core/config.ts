/**
 * Scan configuration: defaults and validation
 */

import { ConfigurationError, PortRangeError } from './errors.js';
import { isPacingPreset } from './pacing.js';
import { MODULE_NAMES } from './types.js';
import type { ModuleName, PortRange, ResolvedScanConfig, ScanRequest } from './types.js';

const DEFAULT_MODULES: readonly ModuleName[] = ['tcp'];

export const DEFAULTS = {
  TIMEOUT_SECONDS: 0.5,
  TLS_PORT: 443,
  TLS_VERIFY: true,
  PRESET: 'normal',
  CONCURRENCY: 1,
  MODULES: DEFAULT_MODULES,
};

export const MIN_PORT = 1;
export const MAX_PORT = 65535;

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= MIN_PORT && port <= MAX_PORT;
}

/**
 * @throws PortRangeError on out-of-bounds or inverted ranges
 */
export function validatePortRange(range: PortRange): PortRange {
  const { start, end } = range;
  if (!isValidPort(start) || !isValidPort(end)) {
    throw new PortRangeError(
      `Ports must be between ${MIN_PORT} and ${MAX_PORT}. Got range: ${start}-${end}`
    );
  }
  if (start > end) {
    throw new PortRangeError(`Start port (${start}) cannot be greater than end port (${end})`);
  }
  return { start, end };
}

/**
 * Parse "start-end" (a single port "N" is accepted as N-N)
 */
export function parsePortRange(spec: string): PortRange {
  const match = /^\s*(\d+)\s*(?:-\s*(\d+)\s*)?$/.exec(spec);
  if (!match) {
    throw new PortRangeError("Invalid port range format. Use the format '20-80'.");
  }
  const start = Number(match[1]);
  const end = match[2] === undefined ? start : Number(match[2]);
  return validatePortRange({ start, end });
}

export function portCount(range: PortRange): number {
  return range.end - range.start + 1;
}

export function expandPorts(range: PortRange): number[] {
  return Array.from({ length: portCount(range) }, (_, i) => range.start + i);
}

function isModuleName(name: string): name is ModuleName {
  const names: readonly string[] = MODULE_NAMES;
  return names.includes(name);
}

/**
 * Fill defaults and validate a request. Throws ConfigurationError before
 * anything touches the network.
 */
export function resolveScanConfig(request: ScanRequest): ResolvedScanConfig {
  if (!request.host || request.host.trim() === '') {
    throw new ConfigurationError('Host must not be empty');
  }

  const portRange = validatePortRange(request.portRange);

  const requested: readonly string[] =
    request.modules && request.modules.length > 0 ? request.modules : DEFAULTS.MODULES;
  for (const name of requested) {
    if (!isModuleName(name)) {
      throw new ConfigurationError(
        `Unknown module '${name}'. Valid options: ${MODULE_NAMES.join(', ')}`
      );
    }
  }
  const modules = MODULE_NAMES.filter((name) => requested.includes(name));

  const timeout = request.timeout ?? DEFAULTS.TIMEOUT_SECONDS;
  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new ConfigurationError(`Timeout must be a positive number of seconds, got ${timeout}`);
  }
  const timeoutMs = Math.round(timeout * 1000);
  if (timeoutMs < 1) {
    throw new ConfigurationError(`Timeout must be at least 1 millisecond, got ${timeout} seconds`);
  }

  const tlsPort = request.tlsPort ?? DEFAULTS.TLS_PORT;
  if (!isValidPort(tlsPort)) {
    throw new PortRangeError(
      `TLS port must be between ${MIN_PORT} and ${MAX_PORT}, got ${tlsPort}`
    );
  }

  const preset: string = request.pacing?.preset ?? DEFAULTS.PRESET;
  if (!isPacingPreset(preset)) {
    throw new ConfigurationError(
      `Unknown preset '${preset}'. Valid options: stealth, normal, aggressive, none`
    );
  }

  const delay = request.pacing?.delay;
  if (delay !== undefined && (!Number.isFinite(delay) || delay < 0)) {
    throw new ConfigurationError(`Delay must be a non-negative number of seconds, got ${delay}`);
  }

  const concurrency = request.concurrency ?? DEFAULTS.CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigurationError(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  return {
    host: request.host.trim(),
    portRange,
    modules,
    timeoutMs,
    tlsVerify: request.tlsVerify ?? DEFAULTS.TLS_VERIFY,
    tlsPort,
    pacing: delay === undefined ? { preset } : { preset, delay },
    concurrency,
    signal: request.signal,
  };
}
