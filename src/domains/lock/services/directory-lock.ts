import { dirname } from 'node:path';
import {
  InvalidLockStateError,
  LockAbortedError,
  LockInternalError,
  LockSetupError,
  isErrnoException,
} from '../../../shared/errors/index.js';
import { createLogger, type Logger } from '../../../shared/logging/logger.js';
import { systemClock, type Clock } from '../../../shared/utils/clock.js';
import { Latch } from '../../../shared/utils/latch.js';
import { nodeLockFileSystem } from '../adapters/node-lock-filesystem.js';
import { LockState } from '../model/lock-state.js';
import {
  resolveLockTimings,
  staleFactor,
  type LockTimingOptions,
  type LockTimings,
} from '../model/timings.js';
import type { LockEntryStat, LockFileSystem } from '../ports/lock-filesystem.js';
import { runHeartbeat } from './heartbeat.js';
import { failOnStale } from './stale-handlers.js';

/** What the waiter saw when it judged the lock abandoned. */
export interface StaleLockInfo {
  /** mtime that stayed unchanged */
  mtimeMs: number;
  /** How long the waiter watched it stay unchanged */
  unchangedMs: number;
}

/**
 * Called when the lock looks abandoned.
 * Returning retries acquisition; throwing aborts it.
 */
export type StaleHandler = (path: string, info: StaleLockInfo) => void | Promise<void>;

export interface DirectoryLockOptions extends LockTimingOptions {
  logger?: Logger;
  fs?: LockFileSystem;
  clock?: Clock;
}

export interface RunOptions {
  /** Default: reject with StaleLockError */
  onStale?: StaleHandler;

  /** Aborts the wait for the lock. Has no effect once the lock is held. */
  signal?: AbortSignal;
}

/** Consecutive EEXIST failures tolerated while stat never sees the directory. */
export const MAX_CREATION_FAILURES = 50;

/**
 * Cross-process lock identified by a directory path.
 *
 * - Acquire: mkdir(path), which fails with EEXIST while another owner holds it
 * - Hold: a heartbeat refreshes the directory mtime every updateIntervalMs
 * - Stale: a waiter that sees the mtime frozen for longer than staleMs calls onStale
 * - Release: stop the heartbeat, wait for it to exit, rmdir(path)
 *
 * One instance runs one block at a time and can be reused afterwards.
 */
export class DirectoryLock {
  readonly path: string;
  readonly timings: LockTimings;
  private readonly log: Logger;
  private readonly fs: LockFileSystem;
  private readonly clock: Clock;
  private lockState = LockState.Created;
  private readonly done = new Latch();
  private heartbeat: AbortController | null = null;

  constructor(path: string, options: DirectoryLockOptions = {}) {
    this.path = path;
    this.timings = resolveLockTimings(options);
    this.log = options.logger ?? createLogger('lock');
    this.fs = options.fs ?? nodeLockFileSystem;
    this.clock = options.clock ?? systemClock;
  }

  get state(): LockState {
    return this.lockState;
  }

  /**
   * Run `block` while holding the lock.
   * The block's result or error is passed through once the lock is released.
   * @throws InvalidLockStateError if this instance is already running a block
   */
  async run<T>(block: () => T | Promise<T>, options: RunOptions = {}): Promise<T> {
    if (this.lockState !== LockState.Created) {
      throw new InvalidLockStateError(this.path, this.lockState);
    }

    this.lockState = LockState.Taking;
    try {
      await this.take(options.onStale ?? failOnStale, options.signal);
    } catch (err) {
      this.lockState = LockState.Created;
      throw err;
    }

    this.lockState = LockState.Owned;
    this.startHeartbeat();

    let result: T;
    try {
      result = await block();
    } catch (err) {
      try {
        await this.release();
      } catch (releaseErr) {
        // removeDirectory has logged it; the block's error is the one the caller sees
        this.log.debug({ path: this.path, err: releaseErr }, 'release failed after block error');
      }
      throw err;
    }

    await this.release();
    return result;
  }

  private async take(onStale: StaleHandler, signal: AbortSignal | undefined): Promise<void> {
    const factor = staleFactor(this.timings);
    let creationFailures = 0;
    let unchangedCount = 0;
    let lastMtimeMs: number | undefined;
    let lastChangeAt = this.clock.now();

    for (;;) {
      if (signal?.aborted) {
        throw new LockAbortedError(this.path);
      }

      const entry = await this.statEntry();

      if (entry) {
        if (!entry.isDirectory) {
          throw new LockSetupError(this.path);
        }

        creationFailures = 0;
        const now = this.clock.now();
        if (entry.mtimeMs === lastMtimeMs) {
          unchangedCount++;
        } else {
          unchangedCount = 0;
          lastMtimeMs = entry.mtimeMs;
          lastChangeAt = now;
        }

        if (unchangedCount >= factor && now - lastChangeAt > this.timings.staleMs) {
          const info: StaleLockInfo = { mtimeMs: entry.mtimeMs, unchangedMs: now - lastChangeAt };
          this.log.warn({ path: this.path, ...info }, 'stale lock detected');
          await onStale(this.path, info);
          // The handler may have removed the directory, or decided to keep
          // waiting. Either way start counting again.
          unchangedCount = 0;
          continue;
        }

        this.log.trace({ path: this.path }, 'lock busy, waiting');
        await this.pause(signal);
        continue;
      }

      await this.fs.mkdirp(dirname(this.path));
      try {
        await this.fs.mkdir(this.path);
      } catch (err) {
        if (isErrnoException(err) && err.code === 'EEXIST') {
          creationFailures++;
          if (creationFailures > MAX_CREATION_FAILURES) {
            const internal = new LockInternalError(this.path, creationFailures);
            this.log.error({ path: this.path, err: internal }, 'lock directory never became visible');
            throw internal;
          }
          this.log.debug({ path: this.path }, 'lost lock creation race');
          continue;
        }
        throw err;
      }

      this.log.info({ path: this.path }, 'lock acquired');
      return;
    }
  }

  /** Returns undefined if nothing exists at the lock path. */
  private async statEntry(): Promise<LockEntryStat | undefined> {
    try {
      return await this.fs.stat(this.path);
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return undefined;
      }
      throw err;
    }
  }

  private async pause(signal: AbortSignal | undefined): Promise<void> {
    try {
      await this.clock.sleep(this.timings.pollIntervalMs, signal);
    } catch (err) {
      if (signal?.aborted) {
        throw new LockAbortedError(this.path);
      }
      throw err;
    }
  }

  private startHeartbeat(): void {
    const controller = new AbortController();
    this.heartbeat = controller;
    void runHeartbeat({
      path: this.path,
      intervalMs: this.timings.updateIntervalMs,
      fs: this.fs,
      clock: this.clock,
      log: this.log,
      signal: controller.signal,
      done: this.done,
    });
  }

  /**
   * Takes no caller signal: once started, release always runs to the end.
   */
  private async release(): Promise<void> {
    this.lockState = LockState.Releasing;
    try {
      this.heartbeat?.abort();
      // Wait for the task to actually exit so an in-flight touch
      // cannot race the rmdir below.
      await this.done.wait();
      await this.removeDirectory();
    } finally {
      this.heartbeat = null;
      this.done.reset();
      this.lockState = LockState.Created;
    }
  }

  private async removeDirectory(): Promise<void> {
    try {
      await this.fs.rmdir(this.path);
      this.log.info({ path: this.path }, 'lock released');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        this.log.warn({ path: this.path }, 'lock directory already gone on release');
        return;
      }
      this.log.error({ path: this.path, err }, 'failed to remove lock directory');
      throw err;
    }
  }
}
