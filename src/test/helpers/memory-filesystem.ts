import type { LockEntryStat, LockFileSystem } from '../../domains/lock/ports/lock-filesystem.js';

export function errnoError(code: string, path: string): NodeJS.ErrnoException {
  return Object.assign(new Error(`${code}: ${path}`), { code, path });
}

/**
 * In-memory LockFileSystem for unit tests.
 * Tracks only the entries the lock touches; parents always "exist".
 */
export class MemoryLockFileSystem implements LockFileSystem {
  readonly entries = new Map<string, LockEntryStat>();
  touches = 0;

  constructor(private readonly now: () => number = () => Date.now()) {}

  /** Put an entry in place as if another process created it. */
  plant(path: string, entry: Partial<LockEntryStat> = {}): void {
    this.entries.set(path, { isDirectory: true, mtimeMs: this.now(), ...entry });
  }

  async stat(path: string): Promise<LockEntryStat> {
    const entry = this.entries.get(path);
    if (!entry) {
      throw errnoError('ENOENT', path);
    }
    return { ...entry };
  }

  async mkdir(path: string): Promise<void> {
    if (this.entries.has(path)) {
      throw errnoError('EEXIST', path);
    }
    this.entries.set(path, { isDirectory: true, mtimeMs: this.now() });
  }

  async mkdirp(_path: string): Promise<void> {}

  async rmdir(path: string): Promise<void> {
    if (!this.entries.delete(path)) {
      throw errnoError('ENOENT', path);
    }
  }

  async touch(path: string, time: Date): Promise<void> {
    const entry = this.entries.get(path);
    if (!entry) {
      throw errnoError('ENOENT', path);
    }
    entry.mtimeMs = time.getTime();
    this.touches++;
  }
}
