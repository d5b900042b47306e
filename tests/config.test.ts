/**
 * Tests for scan configuration parsing and validation
 */

import { describe, it, expect } from 'vitest';
import {
  expandPorts,
  parsePortRange,
  portCount,
  resolveScanConfig,
  validatePortRange,
} from '../src/core/config.js';
import { ConfigurationError, PortRangeError } from '../src/core/errors.js';

describe('port ranges', () => {
  it('should parse start-end and single ports', () => {
    expect(parsePortRange('20-80')).toEqual({ start: 20, end: 80 });
    expect(parsePortRange(' 443 ')).toEqual({ start: 443, end: 443 });
    expect(parsePortRange('1 - 1024')).toEqual({ start: 1, end: 1024 });
  });

  it('should reject malformed input', () => {
    for (const bad of ['', 'abc', '20-', '-80', '20-80-90', '20:80']) {
      expect(() => parsePortRange(bad)).toThrow(
        "Invalid port range format. Use the format '20-80'."
      );
    }
  });

  it('should reject out-of-bounds ranges', () => {
    expect(() => validatePortRange({ start: 0, end: 80 })).toThrow(
      'Ports must be between 1 and 65535. Got range: 0-80'
    );
    expect(() => parsePortRange('1-65536')).toThrow(PortRangeError);
  });

  it('should reject inverted ranges', () => {
    expect(() => parsePortRange('80-20')).toThrow(
      'Start port (80) cannot be greater than end port (20)'
    );
  });

  it('should accept the full port space', () => {
    const range = parsePortRange('1-65535');
    expect(portCount(range)).toBe(65535);
  });

  it('should expand ranges inclusively', () => {
    expect(expandPorts({ start: 8080, end: 8083 })).toEqual([8080, 8081, 8082, 8083]);
    expect(expandPorts({ start: 22, end: 22 })).toEqual([22]);
  });

  it('should make PortRangeError a ConfigurationError', () => {
    expect(() => parsePortRange('0-0')).toThrow(ConfigurationError);
  });
});

describe('resolveScanConfig', () => {
  it('should fill defaults', () => {
    expect(resolveScanConfig({ host: 'example.test', portRange: { start: 1, end: 10 } })).toEqual({
      host: 'example.test',
      portRange: { start: 1, end: 10 },
      modules: ['tcp'],
      timeoutMs: 500,
      tlsVerify: true,
      tlsPort: 443,
      pacing: { preset: 'normal' },
      concurrency: 1,
      signal: undefined,
    });
  });

  it('should order and deduplicate modules', () => {
    const config = resolveScanConfig({
      host: 'example.test',
      portRange: { start: 1, end: 10 },
      modules: ['ssl', 'tcp', 'ssl'],
    });
    expect(config.modules).toEqual(['tcp', 'ssl']);
  });

  it('should keep an explicit delay alongside the preset', () => {
    const config = resolveScanConfig({
      host: 'example.test',
      portRange: { start: 1, end: 10 },
      pacing: { preset: 'stealth', delay: 0 },
      timeout: 2.25,
    });
    expect(config.pacing).toEqual({ preset: 'stealth', delay: 0 });
    expect(config.timeoutMs).toBe(2250);
  });

  it.each([
    [{ host: '  ' }, 'Host must not be empty'],
    [{ modules: ['tcp', 'ftp'] }, "Unknown module 'ftp'. Valid options: tcp, http, ssl"],
    [{ timeout: 0 }, 'Timeout must be a positive number of seconds, got 0'],
    [{ timeout: 0.0004 }, 'Timeout must be at least 1 millisecond, got 0.0004 seconds'],
    [{ tlsPort: 70000 }, 'TLS port must be between 1 and 65535, got 70000'],
    [{ pacing: { preset: 'fast' } }, "Unknown preset 'fast'"],
    [{ pacing: { delay: -0.5 } }, 'Delay must be a non-negative number of seconds, got -0.5'],
    [{ concurrency: 0 }, 'Concurrency must be a positive integer, got 0'],
    [{ concurrency: 2.5 }, 'Concurrency must be a positive integer, got 2.5'],
  ])('should reject %j', (overrides, message) => {
    expect(() =>
      resolveScanConfig({ host: 'example.test', portRange: { start: 1, end: 10 }, ...overrides })
    ).toThrow(message);
  });

  it('should accept a one millisecond timeout', () => {
    const config = resolveScanConfig({
      host: 'example.test',
      portRange: { start: 1, end: 10 },
      timeout: 0.001,
    });
    expect(config.timeoutMs).toBe(1);
  });

  it('should raise ConfigurationError for every rejection', () => {
    expect(() =>
      resolveScanConfig({ host: 'example.test', portRange: { start: 1, end: 10 }, timeout: -1 })
    ).toThrow(ConfigurationError);
  });
});
