import type { Clock } from '../../../shared/utils/clock.js';
import type { Latch } from '../../../shared/utils/latch.js';
import type { Logger } from '../../../shared/logging/logger.js';
import type { LockFileSystem } from '../ports/lock-filesystem.js';

export interface HeartbeatContext {
  path: string;
  intervalMs: number;
  fs: LockFileSystem;
  clock: Clock;
  log: Logger;
  /** Aborted by release. Observed at each sleep. */
  signal: AbortSignal;
  /** Signalled exactly once when the task exits, whatever the exit path. */
  done: Latch;
}

/**
 * Keep the lock directory's mtime fresh while it is held.
 * Never rejects: a failed touch is logged and ends the task, and the
 * protected block keeps running with a lock that may now look stale.
 */
export async function runHeartbeat(ctx: HeartbeatContext): Promise<void> {
  const { path, intervalMs, fs, clock, log, signal, done } = ctx;

  try {
    while (!signal.aborted) {
      try {
        await clock.sleep(intervalMs, signal);
      } catch (err) {
        if (signal.aborted) return;
        throw err;
      }

      await fs.touch(path, new Date(clock.now()));
      log.trace({ path }, 'lock heartbeat');
    }
  } catch (err) {
    log.error({ path, err }, 'lock heartbeat failed, lock may appear stale');
  } finally {
    done.signal();
  }
}
