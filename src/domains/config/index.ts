export { loadLockConfig, LOCK_ENV_KEYS } from './model/lock-config.js';
