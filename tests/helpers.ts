/**
 * Shared test fixtures
 */

import { vi } from 'vitest';
import type { LogContext, LogLevel, LogSink, Pacer } from '../src/core/types.js';

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: LogContext;
}

export function createRecordingSink(): LogSink & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    log(level, message, context) {
      entries.push({ level, message, context });
    },
  };
}

export function createPacerSpy() {
  const wait = vi.fn(async (): Promise<void> => undefined);
  const pacer: Pacer = { wait };
  return { pacer, wait };
}

export function systemError(code: string, message: string): Error & { code: string } {
  return Object.assign(new Error(message), { code });
}
