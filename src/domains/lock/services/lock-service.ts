// Lock service interface - abstraction for coordination

import type { RunOptions } from './directory-lock.js';

export interface LockService {
  /**
   * Run a block while holding the lock at `lockPath`
   * @param lockPath Path of the lock directory
   * @throws StaleLockError if the lock is abandoned and no onStale handler resolves it
   */
  withLock<T>(lockPath: string, block: () => T | Promise<T>, options?: RunOptions): Promise<T>;

  /**
   * Check if a lock directory currently exists
   * @param lockPath Path of the lock directory
   */
  isLocked(lockPath: string): Promise<boolean>;

  /**
   * Force remove a lock whose mtime is older than `maxAgeMs` (cleanup utility)
   * @param maxAgeMs Maximum age in milliseconds (default: the service's staleMs)
   * @returns true if the directory was removed
   */
  removeStale(lockPath: string, maxAgeMs?: number): Promise<boolean>;
}
