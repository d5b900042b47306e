/**
 * HTTP utilities for probing arbitrary ports
 */

import { Agent } from 'undici';

/**
 * Probe agent: certificate checks off, no keep-alive reuse between probes
 */
export function createProbeAgent(timeoutMs: number) {
  return new Agent({
    connect: {
      rejectUnauthorized: false,
      timeout: timeoutMs,
    },
    pipelining: 0,
    keepAliveTimeout: 1,
    keepAliveMaxTimeout: 1,
  });
}

/**
 * Case-insensitive header lookup; repeated headers are joined
 */
export function headerValue(
  headers: Record<string, string | string[] | undefined>,
  name: string
): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted || value === undefined) continue;
    return Array.isArray(value) ? value.join(', ') : value;
  }
  return undefined;
}

/**
 * Build the probe URL, bracketing IPv6 literals
 */
export function probeUrl(host: string, port: number): string {
  const hostPart = host.includes(':') && !host.startsWith('[') ? `[${host}]` : host;
  return `http://${hostPart}:${port}/`;
}
