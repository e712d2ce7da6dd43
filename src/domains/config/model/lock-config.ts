/**
 * Lock configuration from environment variables.
 * Values are duration strings: "10ms", "2s", "1m". A bare number is milliseconds.
 */

import { ValidationError } from '../../../shared/errors/index.js';
import { parseDurationMs } from '../../../shared/utils/duration-parser.js';
import type { LockTimingOptions } from '../../lock/model/timings.js';

export const LOCK_ENV_KEYS = {
  pollIntervalMs: 'DIRLOCK_POLL_INTERVAL',
  updateIntervalMs: 'DIRLOCK_UPDATE_INTERVAL',
  staleMs: 'DIRLOCK_STALE',
} as const satisfies Record<keyof LockTimingOptions, string>;

export function loadLockConfig(source: NodeJS.ProcessEnv = process.env): LockTimingOptions {
  return {
    pollIntervalMs: readDuration(source, LOCK_ENV_KEYS.pollIntervalMs),
    updateIntervalMs: readDuration(source, LOCK_ENV_KEYS.updateIntervalMs),
    staleMs: readDuration(source, LOCK_ENV_KEYS.staleMs),
  };
}

function readDuration(source: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = source[key];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }

  try {
    return parseDurationMs(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`${key}: ${message}`);
  }
}
