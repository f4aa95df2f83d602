/**
 * PostgreSQL implementation of the Credential Store.
 *
 * Invariant-guarding mutations run in one transaction with SELECT ... FOR UPDATE
 * on the row that serializes them: the owning user row for key quota and
 * transfers, the transaction row for terminal transitions. Nothing here holds
 * a lock across a call to an external provider.
 */

import crypto from 'crypto';
import type { Pool, PoolClient } from 'pg';
import { z } from 'zod';
import {
  API_KEY_PERMISSIONS,
  TRANSACTION_KINDS,
  TRANSACTION_STATUSES,
  type ApiKey,
  type ApiKeyPermission,
  type ExternalIdentity,
  type TerminalStatus,
  type Transaction,
  type TransactionKind,
  type TransactionStatus,
  type User,
} from '@walletgate/shared';
import { StorageError } from '../../application/common/errors.js';
import { createLogger } from '../logging/logger.js';
import type {
  ApiKeyWithOwner,
  CredentialStore,
  InsertApiKeyResult,
  InsertTransactionResult,
  NewApiKey,
  NewTransaction,
  NewTransfer,
  TerminalTransitionResult,
  TransferResult,
} from './credential.store.js';

const logger = createLogger('postgres-store');

const keyIdSchema = z.string().uuid();

/** Ids that cannot match a UUID column name no row; Postgres would reject them with 22P02 */
function isRowId(value: string): boolean {
  return keyIdSchema.safeParse(value).success;
}

interface UserRow {
  id: string;
  external_id: string | null;
  email: string;
  name: string | null;
  avatar_url: string | null;
  wallet_balance: string;
  created_at: Date;
  updated_at: Date;
}

interface ApiKeyRow {
  id: string;
  user_id: string;
  name: string;
  key_hash: string;
  permissions: string[];
  expires_at: Date;
  is_active: boolean;
  created_at: Date;
  revoked_at: Date | null;
  last_used_at: Date | null;
}

interface ApiKeyOwnerRow extends ApiKeyRow {
  owner_email: string;
}

interface TransactionRow {
  id: string;
  reference: string;
  user_id: string | null;
  kind: string;
  amount: string;
  status: string;
  authorization_url: string | null;
  counterparty_user_id: string | null;
  completed_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

const USER_COLUMNS = 'id, external_id, email, name, avatar_url, wallet_balance, created_at, updated_at';
const API_KEY_COLUMNS = 'id, user_id, name, key_hash, permissions, expires_at, is_active, created_at, revoked_at, last_used_at';
const TRANSACTION_COLUMNS =
  'id, reference, user_id, kind, amount, status, authorization_url, counterparty_user_id, completed_at, created_at, updated_at';

function isPermission(value: string): value is ApiKeyPermission {
  return API_KEY_PERMISSIONS.some((permission) => permission === value);
}

function parseKind(value: string): TransactionKind {
  const kind = TRANSACTION_KINDS.find((candidate) => candidate === value);
  if (!kind) {
    throw new Error(`Unknown transaction kind in storage: ${value}`);
  }
  return kind;
}

function parseStatus(value: string): TransactionStatus {
  const status = TRANSACTION_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new Error(`Unknown transaction status in storage: ${value}`);
  }
  return status;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    externalId: row.external_id,
    email: row.email,
    name: row.name,
    avatarUrl: row.avatar_url,
    walletBalance: Number(row.wallet_balance),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toApiKey(row: ApiKeyRow): ApiKey {
  return {
    id: row.id,
    userId: row.user_id,
    name: row.name,
    keyHash: row.key_hash,
    permissions: row.permissions.filter(isPermission),
    expiresAt: row.expires_at,
    isActive: row.is_active,
    createdAt: row.created_at,
    revokedAt: row.revoked_at,
    lastUsedAt: row.last_used_at,
  };
}

function toTransaction(row: TransactionRow): Transaction {
  return {
    id: row.id,
    reference: row.reference,
    userId: row.user_id,
    kind: parseKind(row.kind),
    amount: Number(row.amount),
    status: parseStatus(row.status),
    authorizationUrl: row.authorization_url,
    counterpartyUserId: row.counterparty_user_id,
    completedAt: row.completed_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class PostgresCredentialStore implements CredentialStore {
  constructor(private readonly pool: Pool) {}

  async upsertUserByExternalId(identity: ExternalIdentity, now: Date): Promise<User> {
    return this.run('upsertUserByExternalId', async () => {
      const result = await this.pool.query<UserRow>(
        `INSERT INTO users (id, external_id, email, name, avatar_url, wallet_balance, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, 0, $6, $6)
         ON CONFLICT (external_id) DO UPDATE
           SET email = EXCLUDED.email, name = EXCLUDED.name, avatar_url = EXCLUDED.avatar_url, updated_at = EXCLUDED.updated_at
         RETURNING ${USER_COLUMNS}`,
        [crypto.randomUUID(), identity.externalId, identity.email, identity.name, identity.avatarUrl, now]
      );
      return toUser(this.single(result.rows, 'upsertUserByExternalId'));
    });
  }

  async findUserById(userId: string): Promise<User | null> {
    return this.run('findUserById', async () => {
      const result = await this.pool.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [userId]);
      const row = result.rows[0];
      return row ? toUser(row) : null;
    });
  }

  async findUserByEmail(email: string): Promise<User | null> {
    return this.run('findUserByEmail', async () => {
      const result = await this.pool.query<UserRow>(
        `SELECT ${USER_COLUMNS} FROM users WHERE lower(email) = lower($1)`,
        [email]
      );
      const row = result.rows[0];
      return row ? toUser(row) : null;
    });
  }

  async insertApiKeyWithinQuota(key: NewApiKey, limit: number, now: Date): Promise<InsertApiKeyResult> {
    return this.transaction('insertApiKeyWithinQuota', async (client): Promise<InsertApiKeyResult> => {
      // The owner row is the quota lock: concurrent creations for one user queue here
      const owner = await client.query<{ id: string }>('SELECT id FROM users WHERE id = $1 FOR UPDATE', [key.userId]);
      if (owner.rows.length === 0) {
        return { ok: false, reason: 'unknown_user' };
      }

      const count = await client.query<{ active: string }>(
        `SELECT count(*) AS active FROM api_keys
         WHERE user_id = $1 AND is_active = TRUE AND expires_at > $2`,
        [key.userId, now]
      );
      const active = Number(count.rows[0]?.active ?? 0);
      if (active >= limit) {
        return { ok: false, reason: 'quota_exceeded', active };
      }

      const inserted = await client.query<ApiKeyRow>(
        `INSERT INTO api_keys (id, user_id, name, key_hash, permissions, expires_at, is_active, created_at)
         VALUES ($1, $2, $3, $4, $5, $6, TRUE, $7)
         RETURNING ${API_KEY_COLUMNS}`,
        [crypto.randomUUID(), key.userId, key.name, key.keyHash, [...key.permissions], key.expiresAt, now]
      );
      return { ok: true, key: toApiKey(this.single(inserted.rows, 'insertApiKeyWithinQuota')) };
    });
  }

  async findApiKeyByHash(keyHash: string): Promise<ApiKeyWithOwner | null> {
    return this.run('findApiKeyByHash', async () => {
      const result = await this.pool.query<ApiKeyOwnerRow>(
        `SELECT k.id, k.user_id, k.name, k.key_hash, k.permissions, k.expires_at, k.is_active,
                k.created_at, k.revoked_at, k.last_used_at, u.email AS owner_email
         FROM api_keys k JOIN users u ON u.id = k.user_id
         WHERE k.key_hash = $1`,
        [keyHash]
      );
      const row = result.rows[0];
      return row ? { key: toApiKey(row), owner: { id: row.user_id, email: row.owner_email } } : null;
    });
  }

  async findApiKeyForUser(keyId: string, userId: string): Promise<ApiKey | null> {
    if (!isRowId(keyId)) {
      return null;
    }
    return this.run('findApiKeyForUser', async () => {
      const result = await this.pool.query<ApiKeyRow>(
        `SELECT ${API_KEY_COLUMNS} FROM api_keys WHERE id = $1 AND user_id = $2`,
        [keyId, userId]
      );
      const row = result.rows[0];
      return row ? toApiKey(row) : null;
    });
  }

  async listApiKeys(userId: string): Promise<ApiKey[]> {
    return this.run('listApiKeys', async () => {
      const result = await this.pool.query<ApiKeyRow>(
        `SELECT ${API_KEY_COLUMNS} FROM api_keys WHERE user_id = $1 ORDER BY created_at DESC`,
        [userId]
      );
      return result.rows.map(toApiKey);
    });
  }

  async revokeApiKey(keyId: string, userId: string, now: Date): Promise<ApiKey | null> {
    if (!isRowId(keyId)) {
      return null;
    }
    return this.run('revokeApiKey', async () => {
      const result = await this.pool.query<ApiKeyRow>(
        `UPDATE api_keys
         SET is_active = FALSE, revoked_at = COALESCE(revoked_at, $3)
         WHERE id = $1 AND user_id = $2
         RETURNING ${API_KEY_COLUMNS}`,
        [keyId, userId, now]
      );
      const row = result.rows[0];
      return row ? toApiKey(row) : null;
    });
  }

  async touchApiKey(keyId: string, now: Date): Promise<void> {
    await this.run('touchApiKey', async () => {
      await this.pool.query('UPDATE api_keys SET last_used_at = $2 WHERE id = $1', [keyId, now]);
    });
  }

  async insertTransaction(transaction: NewTransaction, now: Date): Promise<InsertTransactionResult> {
    return this.run('insertTransaction', async () => {
      const inserted = await this.pool.query<TransactionRow>(
        `INSERT INTO transactions (id, reference, user_id, kind, amount, status, authorization_url, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, 'pending', $6, $7, $7)
         ON CONFLICT (reference) DO NOTHING
         RETURNING ${TRANSACTION_COLUMNS}`,
        [
          crypto.randomUUID(),
          transaction.reference,
          transaction.userId,
          transaction.kind,
          transaction.amount,
          transaction.authorizationUrl,
          now,
        ]
      );
      const row = inserted.rows[0];
      if (row) {
        return { inserted: true, transaction: toTransaction(row) };
      }

      const existing = await this.pool.query<TransactionRow>(
        `SELECT ${TRANSACTION_COLUMNS} FROM transactions WHERE reference = $1`,
        [transaction.reference]
      );
      return { inserted: false, transaction: toTransaction(this.single(existing.rows, 'insertTransaction')) };
    });
  }

  async findTransactionByReference(reference: string): Promise<Transaction | null> {
    return this.run('findTransactionByReference', async () => {
      const result = await this.pool.query<TransactionRow>(
        `SELECT ${TRANSACTION_COLUMNS} FROM transactions WHERE reference = $1`,
        [reference]
      );
      const row = result.rows[0];
      return row ? toTransaction(row) : null;
    });
  }

  async applyTerminalStatus(
    reference: string,
    status: TerminalStatus,
    now: Date
  ): Promise<TerminalTransitionResult | null> {
    return this.transaction('applyTerminalStatus', async (client) => {
      const locked = await client.query<TransactionRow>(
        `SELECT ${TRANSACTION_COLUMNS} FROM transactions WHERE reference = $1 FOR UPDATE`,
        [reference]
      );
      const current = locked.rows[0];
      if (!current) {
        return null;
      }
      if (current.status !== 'pending') {
        return { applied: false, transaction: toTransaction(current), credited: 0 };
      }

      const updated = await client.query<TransactionRow>(
        `UPDATE transactions
         SET status = $2, completed_at = $3, updated_at = $4
         WHERE id = $1
         RETURNING ${TRANSACTION_COLUMNS}`,
        [current.id, status, status === 'success' ? now : null, now]
      );
      const transaction = toTransaction(this.single(updated.rows, 'applyTerminalStatus'));

      let credited = 0;
      if (status === 'success' && transaction.kind === 'deposit' && transaction.userId) {
        await client.query(
          'UPDATE users SET wallet_balance = wallet_balance + $2, updated_at = $3 WHERE id = $1',
          [transaction.userId, transaction.amount, now]
        );
        credited = transaction.amount;
      }

      return { applied: true, transaction, credited };
    });
  }

  async transfer(transfer: NewTransfer, now: Date): Promise<TransferResult> {
    return this.transaction('transfer', async (client): Promise<TransferResult> => {
      // Lock both wallets in id order so opposing transfers cannot deadlock
      const ids = [transfer.fromUserId, transfer.toUserId].sort();
      const locked = await client.query<{ id: string; wallet_balance: string }>(
        'SELECT id, wallet_balance FROM users WHERE id = ANY($1::uuid[]) ORDER BY id FOR UPDATE',
        [ids]
      );

      const balances = new Map(locked.rows.map((row) => [row.id, Number(row.wallet_balance)]));
      const sourceBalance = balances.get(transfer.fromUserId);
      if (sourceBalance === undefined) {
        return { ok: false, reason: 'unknown_user', userId: transfer.fromUserId };
      }
      if (!balances.has(transfer.toUserId)) {
        return { ok: false, reason: 'unknown_user', userId: transfer.toUserId };
      }
      if (sourceBalance < transfer.amount) {
        return { ok: false, reason: 'insufficient_funds', balance: sourceBalance };
      }

      await client.query('UPDATE users SET wallet_balance = wallet_balance - $2, updated_at = $3 WHERE id = $1', [
        transfer.fromUserId,
        transfer.amount,
        now,
      ]);
      await client.query('UPDATE users SET wallet_balance = wallet_balance + $2, updated_at = $3 WHERE id = $1', [
        transfer.toUserId,
        transfer.amount,
        now,
      ]);

      const inserted = await client.query<TransactionRow>(
        `INSERT INTO transactions
           (id, reference, user_id, kind, amount, status, counterparty_user_id, completed_at, created_at, updated_at)
         VALUES ($1, $2, $3, 'transfer', $4, 'success', $5, $6, $6, $6)
         RETURNING ${TRANSACTION_COLUMNS}`,
        [crypto.randomUUID(), transfer.reference, transfer.fromUserId, transfer.amount, transfer.toUserId, now]
      );

      return {
        ok: true,
        transaction: toTransaction(this.single(inserted.rows, 'transfer')),
        balance: sourceBalance - transfer.amount,
      };
    });
  }

  async listTransactionsForUser(userId: string, limit: number): Promise<Transaction[]> {
    return this.run('listTransactionsForUser', async () => {
      const result = await this.pool.query<TransactionRow>(
        `SELECT ${TRANSACTION_COLUMNS} FROM transactions
         WHERE user_id = $1 OR counterparty_user_id = $1
         ORDER BY created_at DESC
         LIMIT $2`,
        [userId, limit]
      );
      return result.rows.map(toTransaction);
    });
  }

  async ping(): Promise<void> {
    await this.run('ping', async () => {
      await this.pool.query('SELECT 1');
    });
  }

  /**
   * Run `work` inside BEGIN/COMMIT on a dedicated client, rolling back on any failure
   */
  private async transaction<T>(operation: string, work: (client: PoolClient) => Promise<T>): Promise<T> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw this.storageError(operation, error);
    }

    try {
      await client.query('BEGIN');
      const result = await work(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        logger.error({ operation, error: String(rollbackError) }, 'Rollback failed');
      }
      throw this.storageError(operation, error);
    } finally {
      client.release();
    }
  }

  private async run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      throw this.storageError(operation, error);
    }
  }

  private single<T>(rows: T[], operation: string): T {
    const row = rows[0];
    if (!row) {
      throw new Error(`${operation} returned no row`);
    }
    return row;
  }

  private storageError(operation: string, error: unknown): StorageError {
    if (error instanceof StorageError) {
      return error;
    }
    logger.error({ operation, error: error instanceof Error ? error.message : String(error) }, 'Storage operation failed');
    return new StorageError(operation, error);
  }
}
