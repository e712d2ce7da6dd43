import { mkdir, rmdir, stat, utimes } from 'node:fs/promises';
import type { LockEntryStat, LockFileSystem } from '../ports/lock-filesystem.js';

/**
 * LockFileSystem backed by node:fs/promises.
 * mkdir without `recursive` maps to mkdir(2), which is atomic on local filesystems.
 */
export const nodeLockFileSystem: LockFileSystem = {
  async stat(path: string): Promise<LockEntryStat> {
    const stats = await stat(path);
    return { isDirectory: stats.isDirectory(), mtimeMs: stats.mtimeMs };
  },

  async mkdir(path: string): Promise<void> {
    await mkdir(path);
  },

  async mkdirp(path: string): Promise<void> {
    await mkdir(path, { recursive: true });
  },

  async rmdir(path: string): Promise<void> {
    await rmdir(path);
  },

  async touch(path: string, time: Date): Promise<void> {
    await utimes(path, time, time);
  },
};
