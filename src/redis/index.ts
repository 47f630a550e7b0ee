/**
 * Redis Module
 *
 * Exports the Redis client used by the Redis-backed mapping store.
 * Redis is OPTIONAL: with the default file store it is never contacted.
 */

export {
  getRedisClient,
  isRedisAvailable,
  disconnectRedis,
  safeRedisOperation,
  safeRedisWrite,
} from './client';
