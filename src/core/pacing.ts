/**
 * Probe pacing: fixed or jittered delay applied before every network attempt
 */

import { sleep as defaultSleep } from '../utils/concurrency.js';
import { ConfigurationError } from './errors.js';
import type { LogSink, PacingConfig, PacingPreset } from './types.js';

const JITTER_MIN = 0.5;
const JITTER_MAX = 2.0;

/**
 * Scans spanning more ports than this never run unpaced
 */
export const LARGE_SCAN_THRESHOLD = 1000;

export const PACING_PRESETS: Readonly<Record<PacingPreset, PacingConfig | null>> = {
  stealth: { delay: 1.0, jitter: true }, // 0.5s-2s per attempt
  normal: { delay: 0.05, jitter: false },
  aggressive: { delay: 0.01, jitter: false },
  none: null,
};

export function isPacingPreset(name: string): name is PacingPreset {
  return Object.prototype.hasOwnProperty.call(PACING_PRESETS, name);
}

export interface PacingHooks {
  /** Millisecond sleep */
  sleep?: (ms: number) => Promise<void>;
  /** Uniform sample in [0, 1) */
  random?: () => number;
}

/**
 * Shared pacing gate.
 *
 * Calls to wait() are chained: under concurrent workers each attempt still
 * waits its own delay after the previous one, so the delay caps the attempt
 * rate rather than each worker's rate.
 */
export class PacingController {
  readonly config: PacingConfig;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private gate: Promise<void> = Promise.resolve();

  constructor(config: PacingConfig, hooks: PacingHooks = {}) {
    if (!Number.isFinite(config.delay) || config.delay < 0) {
      throw new ConfigurationError(
        `Pacing delay must be a non-negative number, got ${config.delay}`
      );
    }
    this.config = Object.freeze({ delay: config.delay, jitter: config.jitter });
    this.sleep = hooks.sleep ?? defaultSleep;
    this.random = hooks.random ?? Math.random;
  }

  /**
   * Preset by name; `none` yields null (unrestricted)
   */
  static fromPreset(name: string, hooks: PacingHooks = {}): PacingController | null {
    if (!isPacingPreset(name)) {
      throw new ConfigurationError(
        `Unknown preset '${name}'. Valid options: ${Object.keys(PACING_PRESETS).join(', ')}`
      );
    }
    const preset = PACING_PRESETS[name];
    return preset ? new PacingController(preset, hooks) : null;
  }

  /**
   * Delay in seconds for the next attempt
   */
  nextDelay(): number {
    const { delay, jitter } = this.config;
    if (delay <= 0) return 0;
    if (!jitter) return delay;
    return delay * (JITTER_MIN + this.random() * (JITTER_MAX - JITTER_MIN));
  }

  wait(): Promise<void> {
    const seconds = this.nextDelay();
    if (seconds <= 0) return Promise.resolve();

    // A failed sleep must not stall later waiters
    const next = this.gate.then(() => this.sleep(seconds * 1000)).catch(() => undefined);
    this.gate = next;
    return next;
  }

  describe(): string {
    const { delay, jitter } = this.config;
    const rate = delay > 0 ? `~${(1 / delay).toFixed(1)} req/s` : 'unlimited';
    const spread = jitter ? ` with jitter [${JITTER_MIN}x-${JITTER_MAX}x]` : '';
    return `delay=${delay}s, ${rate}${spread}`;
  }
}

export interface PacerRequest {
  preset?: string;
  /** Explicit delay in seconds, overrides any preset */
  delay?: number;
  portCount: number;
}

/**
 * Resolve the pacing controller for one orchestrator run, applying the
 * large-scan safety policy to the `none` preset.
 */
export function createPacer(
  request: PacerRequest,
  sink: LogSink,
  hooks: PacingHooks = {}
): PacingController | null {
  if (request.delay !== undefined) {
    const pacer = new PacingController({ delay: request.delay, jitter: false }, hooks);
    sink.log('info', `Custom pacing delay: ${pacer.describe()}`);
    return pacer;
  }

  const preset = request.preset ?? 'normal';

  if (preset === 'none' && request.portCount > LARGE_SCAN_THRESHOLD) {
    sink.log(
      'warn',
      `Large scan detected (${request.portCount} ports). ` +
        "Enforcing minimal rate limiting with the 'aggressive' preset.",
      { requested: 'none', applied: 'aggressive', ports: request.portCount }
    );
    return PacingController.fromPreset('aggressive', hooks);
  }

  const pacer = PacingController.fromPreset(preset, hooks);
  if (pacer) {
    sink.log('info', `Pacing preset '${preset}' activated: ${pacer.describe()}`);
  } else {
    sink.log(
      'warn',
      "Rate limiting DISABLED (preset='none'). This may overload targets and is detectable."
    );
  }
  return pacer;
}
