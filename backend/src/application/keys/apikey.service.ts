/**
 * API Key Service
 * Issues, lists, revokes and rolls over API keys, and authorizes requests
 * that present one. Only the sha256 of a key is stored; the plaintext is
 * returned once, at creation.
 *
 * "Active" is never stored truth: it is `isActive && now < expiresAt`,
 * evaluated wherever a key is used or counted.
 */

import crypto from 'crypto';
import {
  API_KEY_EXPIRY_OPTIONS,
  API_KEY_PERMISSIONS,
  type ApiKey,
  type ApiKeyExpiry,
  type ApiKeyPermission,
  type ApiKeySummary,
} from '@walletgate/shared';
import type { CredentialStore } from '../../infrastructure/database/credential.store.js';
import { createLogger } from '../../infrastructure/logging/logger.js';
import { systemClock, type Clock } from '../common/clock.js';
import {
  AuthError,
  NotExpiredError,
  NotFoundError,
  QuotaExceededError,
  ValidationError,
} from '../common/errors.js';
import { retryRead } from '../common/retry.utils.js';
import type { Principal } from '../auth/principal.js';
import type { ApiKeyLookupCache } from './apikey-cache.service.js';

const logger = createLogger('apikey-service');

const API_KEY_RANDOM_BYTES = 32;
const MAX_KEY_NAME_LENGTH = 100;

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export const EXPIRY_DURATIONS_MS: Record<ApiKeyExpiry, number> = {
  '1H': HOUR_MS,
  '1D': DAY_MS,
  '1M': 30 * DAY_MS,
  '1Y': 365 * DAY_MS,
};

export interface ApiKeyServiceOptions {
  store: CredentialStore;
  prefix: string;
  maxActiveKeys: number;
  cache?: ApiKeyLookupCache;
  clock?: Clock;
}

export interface IssuedApiKey {
  apiKey: string;
  keyId: string;
  expiresAt: Date;
}

/**
 * Hashes an API key for storage and lookup
 */
export function hashApiKey(apiKey: string): string {
  return crypto.createHash('sha256').update(apiKey).digest('hex');
}

export function isApiKeyPermission(value: string): value is ApiKeyPermission {
  return API_KEY_PERMISSIONS.some((permission) => permission === value);
}

export function isApiKeyExpiry(value: string): value is ApiKeyExpiry {
  return API_KEY_EXPIRY_OPTIONS.some((option) => option === value);
}

export function isKeyActive(key: ApiKey, now: Date): boolean {
  return key.isActive && now.getTime() < key.expiresAt.getTime();
}

export function toApiKeySummary(key: ApiKey, now: Date): ApiKeySummary {
  return {
    id: key.id,
    name: key.name,
    permissions: key.permissions,
    expiresAt: key.expiresAt.toISOString(),
    active: isKeyActive(key, now),
    createdAt: key.createdAt.toISOString(),
    revokedAt: key.revokedAt?.toISOString() ?? null,
    lastUsedAt: key.lastUsedAt?.toISOString() ?? null,
  };
}

export class ApiKeyService {
  private readonly store: CredentialStore;
  private readonly cache: ApiKeyLookupCache | undefined;
  private readonly prefix: string;
  private readonly maxActiveKeys: number;
  private readonly clock: Clock;

  constructor(options: ApiKeyServiceOptions) {
    this.store = options.store;
    this.cache = options.cache;
    this.prefix = options.prefix;
    this.maxActiveKeys = options.maxActiveKeys;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Creates a key for the user. Fails with QuotaExceeded when the user already
   * holds the maximum number of active keys.
   */
  async create(
    userId: string,
    name: string,
    permissions: readonly string[],
    expiry: string
  ): Promise<IssuedApiKey> {
    const keyName = name.trim();
    if (keyName.length === 0 || keyName.length > MAX_KEY_NAME_LENGTH) {
      throw new ValidationError(`Key name must be between 1 and ${MAX_KEY_NAME_LENGTH} characters`);
    }

    return this.issue(userId, keyName, this.normalizePermissions(permissions), this.parseExpiry(expiry));
  }

  /**
   * Replaces an expired key with a new one carrying the same name and permissions.
   * The expired row is left untouched.
   */
  async rollover(userId: string, expiredKeyId: string, expiry: string): Promise<IssuedApiKey> {
    const duration = this.parseExpiry(expiry);
    const expiredKey = await retryRead(
      () => this.store.findApiKeyForUser(expiredKeyId, userId),
      'findApiKeyForUser'
    );

    if (!expiredKey) {
      throw new NotFoundError('API key', { keyId: expiredKeyId });
    }

    if (expiredKey.expiresAt.getTime() > this.clock().getTime()) {
      throw new NotExpiredError(expiredKey.id, expiredKey.expiresAt);
    }

    const issued = await this.issue(userId, expiredKey.name, expiredKey.permissions, duration);
    logger.info({ userId, previousKeyId: expiredKey.id, keyId: issued.keyId }, 'API key rolled over');
    return issued;
  }

  /**
   * Resolves a presented key to its owner, requiring `permission` when given.
   * Unknown or revoked keys are API_KEY_INVALID; expired keys API_KEY_EXPIRED;
   * a missing permission is FORBIDDEN.
   */
  async authorize(presentedKey: string, permission?: ApiKeyPermission): Promise<Principal> {
    if (!presentedKey.startsWith(this.prefix)) {
      throw new AuthError('invalid_key', 'Invalid API key format', 'api_key');
    }

    const keyHash = hashApiKey(presentedKey);
    let entry = this.cache ? await this.cache.get(keyHash) : null;

    if (!entry) {
      logger.debug({ keyHash: keyHash.substring(0, 8) }, 'API key cache miss, querying database');
      entry = await retryRead(() => this.store.findApiKeyByHash(keyHash), 'findApiKeyByHash');
      if (entry && this.cache) {
        await this.cache.set(keyHash, entry);
      }
    }

    if (!entry) {
      logger.warn({ keyHash: keyHash.substring(0, 8) }, 'Unknown API key');
      throw new AuthError('invalid_key', 'Invalid API key', 'api_key');
    }

    const { key, owner } = entry;
    const now = this.clock();

    if (!key.isActive) {
      logger.warn({ keyId: key.id }, 'Revoked API key used');
      throw new AuthError('invalid_key', 'API key has been revoked', 'api_key', { keyId: key.id });
    }

    if (now.getTime() >= key.expiresAt.getTime()) {
      logger.warn({ keyId: key.id }, 'Expired API key used');
      throw new AuthError('expired', 'API key has expired', 'api_key', { keyId: key.id });
    }

    if (permission && !key.permissions.includes(permission)) {
      logger.warn({ keyId: key.id, permission }, 'API key lacks permission');
      throw new AuthError('forbidden', `API key does not have '${permission}' permission`, 'api_key', {
        keyId: key.id,
        permission,
      });
    }

    // Update last used (fire and forget - don't block request)
    this.store.touchApiKey(key.id, now).catch((error: unknown) => {
      logger.error({
        error: error instanceof Error ? error.message : String(error),
        keyId: key.id,
      }, 'Failed to update lastUsedAt');
    });

    return {
      userId: owner.id,
      email: owner.email,
      credential: 'api_key',
      keyId: key.id,
      permissions: key.permissions,
    };
  }

  async list(userId: string): Promise<ApiKeySummary[]> {
    const keys = await retryRead(() => this.store.listApiKeys(userId), 'listApiKeys');
    const now = this.clock();
    return keys.map((key) => toApiKeySummary(key, now));
  }

  /**
   * Deactivates a key. Revoking an already revoked key is a no-op.
   */
  async revoke(userId: string, keyId: string): Promise<ApiKeySummary> {
    const now = this.clock();
    const revoked = await this.store.revokeApiKey(keyId, userId, now);
    if (!revoked) {
      throw new NotFoundError('API key', { keyId });
    }

    if (this.cache) {
      await this.cache.evict(revoked.keyHash);
    }

    logger.info({ userId, keyId }, 'API key revoked');
    return toApiKeySummary(revoked, now);
  }

  private async issue(
    userId: string,
    name: string,
    permissions: readonly ApiKeyPermission[],
    durationMs: number
  ): Promise<IssuedApiKey> {
    const now = this.clock();
    const apiKey = this.prefix + crypto.randomBytes(API_KEY_RANDOM_BYTES).toString('base64url');
    const expiresAt = new Date(now.getTime() + durationMs);

    const result = await this.store.insertApiKeyWithinQuota(
      { userId, name, keyHash: hashApiKey(apiKey), permissions, expiresAt },
      this.maxActiveKeys,
      now
    );

    if (!result.ok) {
      if (result.reason === 'unknown_user') {
        throw new NotFoundError('User', { userId });
      }
      logger.warn({ userId, active: result.active, limit: this.maxActiveKeys }, 'API key quota exceeded');
      throw new QuotaExceededError(this.maxActiveKeys);
    }

    logger.info({
      userId,
      keyId: result.key.id,
      keyName: result.key.name,
      permissions: result.key.permissions,
    }, 'API key generated');

    return { apiKey, keyId: result.key.id, expiresAt: result.key.expiresAt };
  }

  private normalizePermissions(permissions: readonly string[]): ApiKeyPermission[] {
    if (permissions.length === 0) {
      throw new ValidationError('At least one permission is required');
    }
    const normalized = new Set<ApiKeyPermission>();
    for (const permission of permissions) {
      if (!isApiKeyPermission(permission)) {
        throw new ValidationError(`Unknown permission: ${permission}`, 'VALIDATION_ERROR', {
          allowed: API_KEY_PERMISSIONS,
        });
      }
      normalized.add(permission);
    }
    return [...normalized];
  }

  private parseExpiry(expiry: string): number {
    if (!isApiKeyExpiry(expiry)) {
      throw new ValidationError(`Invalid expiry format: ${expiry}`, 'VALIDATION_ERROR', {
        allowed: API_KEY_EXPIRY_OPTIONS,
      });
    }
    return EXPIRY_DURATIONS_MS[expiry];
  }
}
