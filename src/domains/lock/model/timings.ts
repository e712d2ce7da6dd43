/**
 * Lock timing configuration
 * All values in milliseconds.
 */

import { ValidationError } from '../../../shared/errors/index.js';

export interface LockTimingOptions {
  /** Delay between contention re-checks. Default: 10 */
  pollIntervalMs?: number;

  /** Delay between heartbeat mtime refreshes. Default: min(poll × 3, stale / 6) */
  updateIntervalMs?: number;

  /** How long the mtime must stay unchanged before a lock counts as stale. Default: ≥ 1s */
  staleMs?: number;
}

export interface LockTimings {
  pollIntervalMs: number;
  updateIntervalMs: number;
  staleMs: number;
}

export const DEFAULT_POLL_INTERVAL_MS = 10;
export const MIN_DEFAULT_STALE_MS = 1000;

const TIMING_KEYS = ['pollIntervalMs', 'updateIntervalMs', 'staleMs'] as const;

/** Derive the missing timings and validate the result. */
export function resolveLockTimings(options: LockTimingOptions = {}): LockTimings {
  for (const key of TIMING_KEYS) {
    const value = options[key];
    if (value !== undefined && (!Number.isFinite(value) || value <= 0)) {
      throw new ValidationError(`${key} must be a positive number, got ${value}`);
    }
  }

  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const staleMs =
    options.staleMs ??
    Math.max((options.updateIntervalMs ?? pollIntervalMs * 3) * 10, MIN_DEFAULT_STALE_MS);
  const updateIntervalMs = options.updateIntervalMs ?? Math.min(pollIntervalMs * 3, staleMs / 6);

  if (updateIntervalMs >= staleMs) {
    throw new ValidationError(
      `updateIntervalMs (${updateIntervalMs}) must be smaller than staleMs (${staleMs})`
    );
  }

  return { pollIntervalMs, updateIntervalMs, staleMs };
}

/**
 * Consecutive unchanged-mtime observations required before elapsed time
 * is even considered. Guards against sleep/wake clock jumps.
 */
export function staleFactor(timings: LockTimings): number {
  return Math.max(timings.staleMs / timings.pollIntervalMs, 2);
}
