// Global error types

export class DirLockError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = 'DirLockError';
  }
}

export class ValidationError extends DirLockError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class InvalidLockStateError extends DirLockError {
  constructor(lockPath: string, public readonly state: string) {
    super(`Lock is already in use (${state}): ${lockPath}`, 'INVALID_LOCK_STATE');
    this.name = 'InvalidLockStateError';
  }
}

export class StaleLockError extends DirLockError {
  constructor(public readonly lockPath: string) {
    super(`Stale lock detected: ${lockPath}`, 'STALE_LOCK');
    this.name = 'StaleLockError';
  }
}

export class LockSetupError extends DirLockError {
  constructor(public readonly lockPath: string) {
    super(`Lock path exists and is not a directory: ${lockPath}`, 'LOCK_PATH_NOT_DIRECTORY');
    this.name = 'LockSetupError';
  }
}

/** mkdir keeps failing with EEXIST while stat never sees the directory. */
export class LockInternalError extends DirLockError {
  constructor(lockPath: string, attempts: number) {
    super(
      `Lock directory creation failed ${attempts} times without the directory becoming visible: ${lockPath}`,
      'LOCK_INTERNAL'
    );
    this.name = 'LockInternalError';
  }
}

export class LockAbortedError extends DirLockError {
  constructor(lockPath: string) {
    super(`Lock acquisition aborted: ${lockPath}`, 'LOCK_ABORTED');
    this.name = 'LockAbortedError';
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
