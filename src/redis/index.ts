/**
 * Redis Module
 *
 * Redis is OPTIONAL: it mirrors background run state for polling clients.
 * Reconciliation works the same without it.
 */

export {
  getRedisClient,
  getRedisConfig,
  isRedisAvailable,
  disconnectRedis,
  safeRedisOperation,
  safeRedisWrite,
} from './client';

export {
  getCachedRunState,
  setCachedRunState,
  parseRunState,
  buildRunState,
  getRunStateKey,
  markRunQueued,
  markRunProcessing,
  markRunFinished,
  markRunFailed,
  type CachedRunState,
  type RunLifecycle,
} from './runState';
