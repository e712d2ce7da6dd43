import { setTimeout as delay } from 'node:timers/promises';

/** Time source and timer used by the lock; swapped out in tests. */
export interface Clock {
  now(): number;
  /** Rejects with an AbortError if `signal` aborts before `ms` elapses. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms, signal) => {
    await delay(ms, undefined, { signal });
  },
};
