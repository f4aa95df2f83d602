/**
 * User and API key types for master data (stored in PostgreSQL).
 * Key lookups are cached in Redis to keep authorization off the primary.
 */

export type UserId = string;

/** Permissions an API key may carry. Session tokens carry all of them. */
export const API_KEY_PERMISSIONS = ['deposit', 'transfer', 'read'] as const;

export type ApiKeyPermission = (typeof API_KEY_PERMISSIONS)[number];

/** Lifetime presets accepted when creating or rolling over a key */
export const API_KEY_EXPIRY_OPTIONS = ['1H', '1D', '1M', '1Y'] as const;

export type ApiKeyExpiry = (typeof API_KEY_EXPIRY_OPTIONS)[number];

/** Core user entity (PostgreSQL) */
export interface User {
  readonly id: UserId;
  readonly externalId: string | null;
  readonly email: string;
  readonly name: string | null;
  readonly avatarUrl: string | null;
  /** Minor units (kobo). Never negative. */
  readonly walletBalance: number;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/** Identity as reported by the OAuth provider */
export interface ExternalIdentity {
  readonly externalId: string;
  readonly email: string;
  readonly name: string | null;
  readonly avatarUrl: string | null;
}

/** Stored API key row. The plaintext secret never reaches this shape. */
export interface ApiKey {
  readonly id: string;
  readonly userId: UserId;
  readonly name: string;
  readonly keyHash: string;
  readonly permissions: readonly ApiKeyPermission[];
  readonly expiresAt: Date;
  readonly isActive: boolean;
  readonly createdAt: Date;
  readonly revokedAt: Date | null;
  readonly lastUsedAt: Date | null;
}

/** Public view of a key, as listed to its owner */
export interface ApiKeySummary {
  readonly id: string;
  readonly name: string;
  readonly permissions: readonly ApiKeyPermission[];
  readonly expiresAt: string;
  readonly active: boolean;
  readonly createdAt: string;
  readonly revokedAt: string | null;
  readonly lastUsedAt: string | null;
}
