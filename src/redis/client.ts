/**
 * Redis Client Module
 *
 * Singleton Redis client with GRACEFUL DEGRADATION.
 *
 * - Redis only mirrors run state for polling clients; reconciliation itself
 *   never depends on it
 * - Redis failures are logged, never thrown
 * - REDIS_ENABLED=false turns every operation into its fallback
 */

import Redis, { type RedisOptions } from 'ioredis';
import { env } from '../config';
import { logger } from '../utils';

// ============================================
// Configuration
// ============================================

export function getRedisConfig(): RedisOptions {
  return {
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
    // Limit retries to avoid blocking
    maxRetriesPerRequest: 1,
    // Exponential backoff: 100ms, 200ms, 300ms, then give up
    retryStrategy: (times: number) => (times > 3 ? null : Math.min(times * 100, 400)),
    lazyConnect: true,
  };
}

// ============================================
// Client State
// ============================================

let redisClient: Redis | null = null;
let isConnected = false;
let connectionAttempted = false;

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : 'Unknown error');

function createRedisClient(): Redis | null {
  try {
    const client = new Redis(getRedisConfig());

    client.on('connect', () => {
      isConnected = true;
      logger.info('📦 Redis connected');
    });

    client.on('ready', () => {
      isConnected = true;
      logger.debug('Redis client ready');
    });

    client.on('error', (error: Error) => {
      logger.warn(`Redis error (non-fatal): ${error.message}`);
      isConnected = false;
    });

    client.on('close', () => {
      isConnected = false;
      logger.debug('Redis connection closed');
    });

    client.on('end', () => {
      isConnected = false;
      logger.debug('Redis connection ended');
    });

    return client;
  } catch (error) {
    logger.warn(`Failed to create Redis client (non-fatal): ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Gets the Redis client, creating and connecting it on first use.
 *
 * @returns Redis client, or null when Redis is disabled or unavailable
 */
export function getRedisClient(): Redis | null {
  if (!env.REDIS_ENABLED) {
    return null;
  }

  if (!connectionAttempted) {
    connectionAttempted = true;
    redisClient = createRedisClient();

    if (redisClient) {
      redisClient.connect().catch((error: unknown) => {
        logger.warn(`Redis initial connection failed (non-fatal): ${errorMessage(error)}`);
        isConnected = false;
      });
    }
  }

  return redisClient;
}

export function isRedisAvailable(): boolean {
  return isConnected && redisClient !== null;
}

/**
 * Call during application shutdown
 */
export async function disconnectRedis(): Promise<void> {
  if (!redisClient) return;

  try {
    await redisClient.quit();
    logger.info('Redis disconnected');
  } catch (error) {
    logger.warn(`Redis disconnect error (non-fatal): ${errorMessage(error)}`);
  } finally {
    redisClient = null;
    isConnected = false;
    connectionAttempted = false;
  }
}

// ============================================
// Safe Redis Operations
// ============================================

/**
 * Runs a Redis read, returning `fallback` when Redis is unavailable or the
 * operation fails.
 */
export async function safeRedisOperation<T>(
  operation: (client: Redis) => Promise<T>,
  fallback: T,
  operationName = 'Redis operation'
): Promise<T> {
  const client = getRedisClient();

  if (!client || !isConnected) {
    logger.debug(`${operationName}: Redis unavailable, using fallback`);
    return fallback;
  }

  try {
    return await operation(client);
  } catch (error) {
    logger.warn(`${operationName} failed (non-fatal): ${errorMessage(error)}`);
    return fallback;
  }
}

/**
 * Runs a Redis write whose failure only costs a stale cache.
 */
export async function safeRedisWrite(
  operation: (client: Redis) => Promise<unknown>,
  operationName = 'Redis write'
): Promise<void> {
  const client = getRedisClient();

  if (!client || !isConnected) {
    logger.debug(`${operationName}: Redis unavailable, skipping`);
    return;
  }

  try {
    await operation(client);
  } catch (error) {
    logger.warn(`${operationName} failed (non-fatal): ${errorMessage(error)}`);
  }
}
