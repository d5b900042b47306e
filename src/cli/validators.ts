/**
 * Command-line argument validation
 */

import { InvalidArgumentError } from 'commander';

export class CliValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliValidationError';
  }
}

export const MIN_TIMEOUT_SECONDS = 0.1;
export const MAX_TIMEOUT_SECONDS = 10.0;

const IPV4_PATTERN = /^(\d{1,3}\.){3}\d{1,3}$/;
const HOST_PATTERN = /^[a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(\.[a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*$/;

/**
 * Accept an IPv4 literal (octets 0-255) or a hostname
 */
export function validateHost(host: string): string {
  const trimmed = host.trim();

  if (IPV4_PATTERN.test(trimmed)) {
    if (!trimmed.split('.').every((octet) => Number(octet) <= 255)) {
      throw new CliValidationError('Invalid IP address: octets must be between 0 and 255');
    }
    return trimmed;
  }

  if (!HOST_PATTERN.test(trimmed)) {
    throw new CliValidationError('Invalid host: must be a valid IP address or domain name');
  }
  return trimmed;
}

export function validateTimeout(timeout: number): number {
  if (!Number.isFinite(timeout) || timeout < MIN_TIMEOUT_SECONDS || timeout > MAX_TIMEOUT_SECONDS) {
    throw new CliValidationError(
      `Timeout must be between ${MIN_TIMEOUT_SECONDS} and ${MAX_TIMEOUT_SECONDS} seconds`
    );
  }
  return timeout;
}

/**
 * Commander value parsers for numeric options
 */
export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidArgumentError(`Expected a number, got '${value}'.`);
  }
  return parsed;
}

export function parseInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got '${value}'.`);
  }
  return parsed;
}
