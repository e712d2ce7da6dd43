import { StaleLockError, isErrnoException } from '../../../shared/errors/index.js';
import { createLogger } from '../../../shared/logging/logger.js';
import { nodeLockFileSystem } from '../adapters/node-lock-filesystem.js';
import type { LockFileSystem } from '../ports/lock-filesystem.js';
import type { StaleHandler } from './directory-lock.js';

const log = createLogger('stale-handler');

/** Default handler: give up on an abandoned lock. */
export const failOnStale: StaleHandler = (path) => {
  throw new StaleLockError(path);
};

/**
 * Handler that breaks an abandoned lock by removing its directory, then lets
 * acquisition retry.
 *
 * The directory is removed only if its mtime still matches the one the stale
 * verdict was based on. Another waiter may already have broken the lock and
 * taken it; that directory carries a new mtime and is left alone.
 */
export function removeStaleLock(fs: LockFileSystem = nodeLockFileSystem): StaleHandler {
  return async (path, info) => {
    try {
      const current = await fs.stat(path);
      if (!current.isDirectory || current.mtimeMs !== info.mtimeMs) {
        log.info(
          { path, staleMtimeMs: info.mtimeMs, mtimeMs: current.mtimeMs },
          'lock changed since stale verdict, not removing'
        );
        return;
      }

      await fs.rmdir(path);
      log.warn({ path, unchangedMs: info.unchangedMs }, 'removed stale lock');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        log.debug({ path }, 'stale lock already removed');
        return;
      }
      throw err;
    }
  };
}
