/**
 * Redis Client
 * Used for: API key lookup cache, webhook delivery log, rate limiting
 */

import { Redis, type RedisOptions } from 'ioredis';
import type { Config } from '../../config/index.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('redis-client');

let redisClient: Redis | null = null;

export function createRedisClient(config: Config): Redis {
  if (redisClient) {
    return redisClient;
  }

  const options: RedisOptions = {
    host: config.redis.host,
    port: config.redis.port,
    maxRetriesPerRequest: 3,
    retryStrategy(times: number) {
      if (times > 10) {
        logger.error({ attempts: times }, 'Redis connection failed');
        return null;
      }
      const delay = Math.min(times * 200, 5000);
      logger.warn({ attempt: times, delay }, 'Redis connection retry');
      return delay;
    },
    connectTimeout: 10000,
    commandTimeout: 5000,
    lazyConnect: true,
    enableReadyCheck: true,
  };

  if (config.redis.password) {
    options.password = config.redis.password;
  }

  redisClient = config.redis.url ? new Redis(config.redis.url, options) : new Redis(options);

  redisClient.on('ready', () => {
    logger.info('Redis ready');
  });

  redisClient.on('error', (error: Error) => {
    logger.error({ error: error.message }, 'Redis error');
  });

  redisClient.on('close', () => {
    logger.warn('Redis connection closed');
  });

  redisClient.on('reconnecting', (delay: number) => {
    logger.warn({ delay }, 'Redis reconnecting');
  });

  return redisClient;
}

export async function closeRedisClient(): Promise<void> {
  if (redisClient) {
    await redisClient.quit();
    redisClient = null;
    logger.info('Redis closed');
  }
}

export const RedisKeys = {
  apiKeyCache: (keyHash: string) => `auth:apikey:${keyHash}`,
  apiKeyRevoked: (keyHash: string) => `auth:apikey-revoked:${keyHash}`,
  webhookDelivery: (digest: string) => `webhook:delivery:${digest}`,
  rateLimitPrefix: 'ratelimit:',
} as const;

/** The subset of the ioredis API the caches use; lets tests pass an in-memory stand-in */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
}
