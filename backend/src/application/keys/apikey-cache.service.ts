/**
 * API Key Cache Service
 * Caches key-by-hash lookups in Redis so authorization stays off PostgreSQL.
 * The cached value is the row itself: activity, expiry and permissions are
 * still evaluated on every use.
 *
 * Revocation writes a marker under the hash before evicting. A fill that read
 * the row before the revoke committed checks the marker after writing and
 * drops its own entry, so a stale active row cannot outlive a revocation.
 */

import { z } from 'zod';
import { API_KEY_PERMISSIONS } from '@walletgate/shared';
import { RedisKeys, type RedisCommands } from '../../infrastructure/database/redis.client.js';
import type { ApiKeyWithOwner } from '../../infrastructure/database/credential.store.js';
import { createLogger } from '../../infrastructure/logging/logger.js';

const logger = createLogger('apikey-cache');

const CACHE_TTL = 300; // 5 minutes

const cachedEntrySchema = z.object({
  key: z.object({
    id: z.string(),
    userId: z.string(),
    name: z.string(),
    keyHash: z.string(),
    permissions: z.array(z.enum(API_KEY_PERMISSIONS)),
    expiresAt: z.coerce.date(),
    isActive: z.boolean(),
    createdAt: z.coerce.date(),
    revokedAt: z.coerce.date().nullable(),
    lastUsedAt: z.coerce.date().nullable(),
  }),
  owner: z.object({
    id: z.string(),
    email: z.string(),
  }),
});

export interface ApiKeyLookupCache {
  get(keyHash: string): Promise<ApiKeyWithOwner | null>;
  set(keyHash: string, entry: ApiKeyWithOwner): Promise<void>;
  evict(keyHash: string): Promise<void>;
}

export class RedisApiKeyCache implements ApiKeyLookupCache {
  constructor(private readonly redis: RedisCommands) {}

  async get(keyHash: string): Promise<ApiKeyWithOwner | null> {
    try {
      const cached = await this.redis.get(RedisKeys.apiKeyCache(keyHash));
      if (!cached) {
        return null;
      }
      const parsed = cachedEntrySchema.safeParse(JSON.parse(cached));
      if (!parsed.success) {
        logger.warn({ keyHash: keyHash.substring(0, 8) }, 'Discarding malformed cached API key');
        await this.redis.del(RedisKeys.apiKeyCache(keyHash));
        return null;
      }
      return parsed.data;
    } catch (error) {
      logger.warn({
        error: error instanceof Error ? error.message : String(error),
        keyHash: keyHash.substring(0, 8),
      }, 'Failed to read cached API key');
      return null;
    }
  }

  async set(keyHash: string, entry: ApiKeyWithOwner): Promise<void> {
    try {
      await this.redis.set(RedisKeys.apiKeyCache(keyHash), JSON.stringify(entry), 'EX', CACHE_TTL);
      if (await this.redis.get(RedisKeys.apiKeyRevoked(keyHash))) {
        logger.debug({ keyHash: keyHash.substring(0, 8) }, 'Dropping cache fill for a revoked API key');
        await this.redis.del(RedisKeys.apiKeyCache(keyHash));
      }
    } catch (error) {
      logger.warn({
        error: error instanceof Error ? error.message : String(error),
        keyHash: keyHash.substring(0, 8),
      }, 'Failed to cache API key');
    }
  }

  /** Failures propagate: a revoked key must not keep authorizing from cache */
  async evict(keyHash: string): Promise<void> {
    // The marker outlives any entry a concurrent fill could still write
    await this.redis.set(RedisKeys.apiKeyRevoked(keyHash), '1', 'EX', CACHE_TTL);
    await this.redis.del(RedisKeys.apiKeyCache(keyHash));
  }
}
