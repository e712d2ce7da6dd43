// Filesystem primitives the lock protocol relies on

export interface LockEntryStat {
  isDirectory: boolean;
  mtimeMs: number;
}

export interface LockFileSystem {
  /** @throws ErrnoException with code ENOENT if the entry is missing */
  stat(path: string): Promise<LockEntryStat>;

  /**
   * Create a single directory. Must fail with EEXIST if anything exists at
   * `path`; this is the atomic acquire.
   */
  mkdir(path: string): Promise<void>;

  /** Create a directory and any missing parents. */
  mkdirp(path: string): Promise<void>;

  rmdir(path: string): Promise<void>;

  /** Set access and modification time. */
  touch(path: string, time: Date): Promise<void>;
}
