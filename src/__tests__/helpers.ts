/**
 * Shared test helpers: a recording logger and a controllable clock.
 */

import { vi } from 'vitest';

import type { Logger } from '../logger.js';

export function createTestLogger() {
  const log = {
    debug: vi.fn<(...args: unknown[]) => void>(),
    info: vi.fn<(...args: unknown[]) => void>(),
    warn: vi.fn<(...args: unknown[]) => void>(),
    error: vi.fn<(...args: unknown[]) => void>(),
    child: (): Logger => log,
  };
  return log;
}

/** Millisecond clock that only moves when told to. */
export function createClock(start = 1_700_000_000_000) {
  let current = start;
  return {
    now: () => current,
    advance(ms: number) {
      current += ms;
    },
  };
}
