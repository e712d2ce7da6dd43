import { isErrnoException } from '../../../shared/errors/index.js';
import { createLogger, type Logger } from '../../../shared/logging/logger.js';
import { systemClock, type Clock } from '../../../shared/utils/clock.js';
import { nodeLockFileSystem } from '../adapters/node-lock-filesystem.js';
import { resolveLockTimings, type LockTimings } from '../model/timings.js';
import type { LockEntryStat, LockFileSystem } from '../ports/lock-filesystem.js';
import { DirectoryLock, type DirectoryLockOptions, type RunOptions } from './directory-lock.js';
import type { LockService } from './lock-service.js';

/**
 * Path-keyed facade over DirectoryLock.
 * Every withLock() call gets its own DirectoryLock, so concurrent calls on the
 * same path contend through the filesystem like separate processes do.
 * The service and the locks it creates share one logger.
 */
export class DirectoryLockService implements LockService {
  readonly timings: LockTimings;
  private readonly log: Logger;
  private readonly fs: LockFileSystem;
  private readonly clock: Clock;

  constructor(private readonly options: DirectoryLockOptions = {}) {
    this.timings = resolveLockTimings(options);
    this.log = options.logger ?? createLogger('lock');
    this.fs = options.fs ?? nodeLockFileSystem;
    this.clock = options.clock ?? systemClock;
  }

  async withLock<T>(
    lockPath: string,
    block: () => T | Promise<T>,
    options?: RunOptions
  ): Promise<T> {
    const lock = new DirectoryLock(lockPath, {
      ...this.options,
      ...this.timings,
      logger: this.log,
    });
    return lock.run(block, options);
  }

  async isLocked(lockPath: string): Promise<boolean> {
    const entry = await this.statEntry(lockPath);
    return entry?.isDirectory ?? false;
  }

  async removeStale(lockPath: string, maxAgeMs = this.timings.staleMs): Promise<boolean> {
    const entry = await this.statEntry(lockPath);
    if (!entry?.isDirectory) {
      return false;
    }

    const ageMs = this.clock.now() - entry.mtimeMs;
    if (ageMs <= maxAgeMs) {
      return false;
    }

    try {
      await this.fs.rmdir(lockPath);
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return false;
      }
      throw err;
    }

    this.log.warn({ path: lockPath, ageMs }, 'removed stale lock');
    return true;
  }

  private async statEntry(lockPath: string): Promise<LockEntryStat | undefined> {
    try {
      return await this.fs.stat(lockPath);
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return undefined;
      }
      throw err;
    }
  }
}
