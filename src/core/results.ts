/**
 * Result records and per-module collectors
 */

import type { CertificateProbeResult, PortResult, PortStatus } from './types.js';

interface PortRecord {
  readonly port: number;
  readonly status: string;
}

/**
 * Accumulates one module's per-port records. Owned by a single prober run.
 *
 * Records keep scan order unless `sortByPort` is set, which concurrent runs
 * need since their completion order is arbitrary.
 */
export class ResultCollector<R extends PortRecord> {
  private readonly records: R[] = [];
  private readonly sortByPort: boolean;

  constructor(options: { sortByPort?: boolean } = {}) {
    this.sortByPort = options.sortByPort ?? false;
  }

  add(record: R): void {
    Object.freeze(record);
    this.records.push(record);
  }

  get size(): number {
    return this.records.length;
  }

  /**
   * Records plus the open subset, in the same order
   */
  build(): { open_ports: number[]; scan_results: R[] } {
    const scan_results = [...this.records];
    if (this.sortByPort) scan_results.sort((a, b) => a.port - b.port);
    return {
      open_ports: scan_results.filter((r) => r.status === 'open').map((r) => r.port),
      scan_results,
    };
  }
}

export function portResult(
  port: number,
  status: PortStatus,
  fields: { service?: string; error?: string } = {}
): PortResult {
  return {
    port,
    status,
    service: status === 'open' ? (fields.service ?? '') : '',
    error: status === 'error' ? (fields.error ?? '') : '',
  };
}

export function certificateSuccess(
  fields: Omit<CertificateProbeResult, 'ok' | 'error' | 'expired'>
): CertificateProbeResult {
  return {
    ok: true,
    ...fields,
    expired: fields.days_left !== null && fields.days_left < 0,
    error: null,
  };
}

export function certificateFailure(error: string): CertificateProbeResult {
  return {
    ok: false,
    issued_to: null,
    issued_by: null,
    valid_from: null,
    valid_until: null,
    days_left: null,
    expired: false,
    error,
  };
}
