// Public API

export {
  DirectoryLock,
  MAX_CREATION_FAILURES,
  type DirectoryLockOptions,
  type RunOptions,
  type StaleHandler,
  type StaleLockInfo,
} from './domains/lock/services/directory-lock.js';
export { DirectoryLockService } from './domains/lock/services/directory-lock-service.js';
export type { LockService } from './domains/lock/services/lock-service.js';
export { failOnStale, removeStaleLock } from './domains/lock/services/stale-handlers.js';
export { LockState } from './domains/lock/model/lock-state.js';
export {
  resolveLockTimings,
  staleFactor,
  type LockTimingOptions,
  type LockTimings,
} from './domains/lock/model/timings.js';
export type { LockEntryStat, LockFileSystem } from './domains/lock/ports/lock-filesystem.js';
export { nodeLockFileSystem } from './domains/lock/adapters/node-lock-filesystem.js';
export { loadLockConfig, LOCK_ENV_KEYS } from './domains/config/index.js';
export { systemClock, type Clock } from './shared/utils/clock.js';
export { createLogger, type Logger } from './shared/logging/logger.js';
export {
  DirLockError,
  InvalidLockStateError,
  LockAbortedError,
  LockInternalError,
  LockSetupError,
  StaleLockError,
  ValidationError,
} from './shared/errors/index.js';
