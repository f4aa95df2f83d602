/**
 * Unit Tests: PostgreSQL Credential Store
 * Runs the store against a scripted pool to check locking and rollback.
 */

import { describe, it, expect } from 'vitest';
import type { Pool } from 'pg';
import { PostgresCredentialStore } from '../../infrastructure/database/postgres.store.js';
import { StorageError } from '../../application/common/errors.js';
import { ScriptedPool, type Responder } from '../mocks/pg.mock.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');
const USER_ID = '00000000-0000-4000-8000-000000000001';
const OTHER_ID = '00000000-0000-4000-8000-000000000002';

function keyRow(overrides: Record<string, unknown> = {}) {
  return {
    id: 'key-1',
    user_id: USER_ID,
    name: 'reporting',
    key_hash: 'abc123',
    permissions: ['read', 'admin'],
    expires_at: new Date('2026-03-02T12:00:00.000Z'),
    is_active: true,
    created_at: NOW,
    revoked_at: null,
    last_used_at: null,
    ...overrides,
  };
}

function transactionRow(overrides: Record<string, unknown> = {}) {
  return {
    id: 'tx-1',
    reference: 'txn_1',
    user_id: USER_ID,
    kind: 'deposit',
    amount: '5000',
    status: 'pending',
    authorization_url: 'https://checkout.test/txn_1',
    counterparty_user_id: null,
    completed_at: null,
    created_at: NOW,
    updated_at: NOW,
    ...overrides,
  };
}

function storeOver(respond: Responder): { pool: ScriptedPool; store: PostgresCredentialStore } {
  const pool = new ScriptedPool(respond);
  return { pool, store: new PostgresCredentialStore(pool as unknown as Pool) };
}

describe('PostgresCredentialStore', () => {
  describe('insertApiKeyWithinQuota', () => {
    const newKey = {
      userId: USER_ID,
      name: 'reporting',
      keyHash: 'abc123',
      permissions: ['read'] as const,
      expiresAt: new Date('2026-03-02T12:00:00.000Z'),
    };

    it('should lock the owner, count, insert and commit', async () => {
      const { pool, store } = storeOver((text) => {
        if (text.startsWith('SELECT id FROM users')) return [{ id: USER_ID }];
        if (text.startsWith('SELECT count(*)')) return [{ active: '2' }];
        if (text.startsWith('INSERT INTO api_keys')) return [keyRow()];
        return [];
      });

      const result = await store.insertApiKeyWithinQuota(newKey, 5, NOW);

      expect(pool.verbs()).toEqual(['BEGIN', 'SELECT', 'SELECT', 'INSERT', 'COMMIT']);
      expect(pool.statements[1]).toBe('SELECT id FROM users WHERE id = $1 FOR UPDATE');
      expect(pool.values[2]).toEqual([USER_ID, NOW]);
      expect(pool.released).toBe(1);
      expect(result).toEqual({
        ok: true,
        key: {
          id: 'key-1',
          userId: USER_ID,
          name: 'reporting',
          keyHash: 'abc123',
          permissions: ['read'],
          expiresAt: new Date('2026-03-02T12:00:00.000Z'),
          isActive: true,
          createdAt: NOW,
          revokedAt: null,
          lastUsedAt: null,
        },
      });
    });

    it('should refuse at the limit without inserting', async () => {
      const { pool, store } = storeOver((text) => {
        if (text.startsWith('SELECT id FROM users')) return [{ id: USER_ID }];
        if (text.startsWith('SELECT count(*)')) return [{ active: '5' }];
        return [];
      });

      await expect(store.insertApiKeyWithinQuota(newKey, 5, NOW)).resolves.toEqual({
        ok: false,
        reason: 'quota_exceeded',
        active: 5,
      });
      expect(pool.verbs()).toEqual(['BEGIN', 'SELECT', 'SELECT', 'COMMIT']);
    });

    it('should report an unknown owner', async () => {
      const { store } = storeOver(() => []);

      await expect(store.insertApiKeyWithinQuota(newKey, 5, NOW)).resolves.toEqual({
        ok: false,
        reason: 'unknown_user',
      });
    });

    it('should roll back and wrap a failing statement', async () => {
      const { pool, store } = storeOver((text) => {
        if (text.startsWith('SELECT id FROM users')) return [{ id: USER_ID }];
        if (text.startsWith('SELECT count(*)')) return [{ active: '0' }];
        if (text.startsWith('INSERT')) return new Error('duplicate key value violates unique constraint');
        return [];
      });

      const attempt = store.insertApiKeyWithinQuota(newKey, 5, NOW);

      await expect(attempt).rejects.toBeInstanceOf(StorageError);
      await expect(attempt).rejects.toMatchObject({
        message: 'Storage operation failed: insertApiKeyWithinQuota',
        details: {
          operation: 'insertApiKeyWithinQuota',
          cause: 'duplicate key value violates unique constraint',
        },
      });
      expect(pool.verbs().at(-1)).toBe('ROLLBACK');
      expect(pool.released).toBe(1);
    });

    it('should wrap a failure to check out a client', async () => {
      const { pool, store } = storeOver(() => []);
      pool.connectError = new Error('too many clients already');

      await expect(store.insertApiKeyWithinQuota(newKey, 5, NOW)).rejects.toThrow(
        'Storage operation failed: insertApiKeyWithinQuota'
      );
      expect(pool.statements).toEqual([]);
    });
  });

  describe('applyTerminalStatus', () => {
    it('should settle a pending deposit and credit the owner', async () => {
      const { pool, store } = storeOver((text) => {
        if (text.includes('FOR UPDATE')) return [transactionRow()];
        if (text.startsWith('UPDATE transactions')) {
          return [transactionRow({ status: 'success', completed_at: NOW })];
        }
        return [];
      });

      const result = await store.applyTerminalStatus('txn_1', 'success', NOW);

      expect(result).toMatchObject({ applied: true, credited: 5000 });
      expect(result?.transaction.amount).toBe(5000);
      expect(pool.verbs()).toEqual(['BEGIN', 'SELECT', 'UPDATE', 'UPDATE', 'COMMIT']);
      expect(pool.statements[3]).toBe(
        'UPDATE users SET wallet_balance = wallet_balance + $2, updated_at = $3 WHERE id = $1'
      );
      expect(pool.values[3]).toEqual([USER_ID, 5000, NOW]);
    });

    it('should leave a terminal row alone', async () => {
      const { pool, store } = storeOver((text) =>
        text.includes('FOR UPDATE') ? [transactionRow({ status: 'failed' })] : []
      );

      const result = await store.applyTerminalStatus('txn_1', 'success', NOW);

      expect(result).toMatchObject({ applied: false, credited: 0 });
      expect(result?.transaction.status).toBe('failed');
      expect(pool.verbs()).toEqual(['BEGIN', 'SELECT', 'COMMIT']);
    });

    it('should not credit a failed deposit', async () => {
      const { pool, store } = storeOver((text) => {
        if (text.includes('FOR UPDATE')) return [transactionRow()];
        if (text.startsWith('UPDATE transactions')) return [transactionRow({ status: 'failed' })];
        return [];
      });

      await expect(store.applyTerminalStatus('txn_1', 'failed', NOW)).resolves.toMatchObject({
        applied: true,
        credited: 0,
      });
      expect(pool.values[2]).toEqual(['tx-1', 'failed', null, NOW]);
      expect(pool.verbs()).toEqual(['BEGIN', 'SELECT', 'UPDATE', 'COMMIT']);
    });

    it('should return null for an unknown reference', async () => {
      const { store } = storeOver(() => []);

      await expect(store.applyTerminalStatus('txn_missing', 'success', NOW)).resolves.toBeNull();
    });
  });

  describe('transfer', () => {
    const transfer = { reference: 'trf_1', fromUserId: OTHER_ID, toUserId: USER_ID, amount: 1500 };

    it('should lock both wallets in id order and move the funds', async () => {
      const { pool, store } = storeOver((text) => {
        if (text.includes('FOR UPDATE')) {
          return [
            { id: USER_ID, wallet_balance: '100' },
            { id: OTHER_ID, wallet_balance: '2000' },
          ];
        }
        if (text.startsWith('INSERT INTO transactions')) {
          return [
            transactionRow({
              reference: 'trf_1',
              user_id: OTHER_ID,
              kind: 'transfer',
              amount: '1500',
              status: 'success',
              counterparty_user_id: USER_ID,
              completed_at: NOW,
            }),
          ];
        }
        return [];
      });

      const result = await store.transfer(transfer, NOW);

      expect(result).toMatchObject({ ok: true, balance: 500 });
      expect(pool.values[1]).toEqual([[USER_ID, OTHER_ID]]);
      expect(pool.verbs()).toEqual(['BEGIN', 'SELECT', 'UPDATE', 'UPDATE', 'INSERT', 'COMMIT']);
      expect(pool.values[2]).toEqual([OTHER_ID, 1500, NOW]);
      expect(pool.values[3]).toEqual([USER_ID, 1500, NOW]);
    });

    it('should refuse an overdraft without writing', async () => {
      const { pool, store } = storeOver((text) =>
        text.includes('FOR UPDATE')
          ? [
              { id: USER_ID, wallet_balance: '0' },
              { id: OTHER_ID, wallet_balance: '1000' },
            ]
          : []
      );

      await expect(store.transfer(transfer, NOW)).resolves.toEqual({
        ok: false,
        reason: 'insufficient_funds',
        balance: 1000,
      });
      expect(pool.verbs()).toEqual(['BEGIN', 'SELECT', 'COMMIT']);
    });

    it('should report a missing recipient', async () => {
      const { store } = storeOver((text) =>
        text.includes('FOR UPDATE') ? [{ id: OTHER_ID, wallet_balance: '1000' }] : []
      );

      await expect(store.transfer(transfer, NOW)).resolves.toEqual({
        ok: false,
        reason: 'unknown_user',
        userId: USER_ID,
      });
    });
  });

  describe('single-statement operations', () => {
    it('should return the existing row when an insert loses the reference race', async () => {
      const { pool, store } = storeOver((text) =>
        text.startsWith('SELECT') ? [transactionRow({ reference: 'order-1' })] : []
      );

      const result = await store.insertTransaction(
        { reference: 'order-1', userId: USER_ID, kind: 'payment', amount: 5000, authorizationUrl: null },
        NOW
      );

      expect(result.inserted).toBe(false);
      expect(result.transaction.reference).toBe('order-1');
      expect(pool.verbs()).toEqual(['INSERT', 'SELECT']);
    });

    it('should convert numeric columns', async () => {
      const { store } = storeOver(() => [
        {
          id: USER_ID,
          external_id: 'g-1',
          email: 'ada@example.com',
          name: 'Ada',
          avatar_url: null,
          wallet_balance: '2500',
          created_at: NOW,
          updated_at: NOW,
        },
      ]);

      await expect(store.findUserById(USER_ID)).resolves.toMatchObject({ id: USER_ID, walletBalance: 2500 });
    });

    it('should reject rows with an unknown status', async () => {
      const { store } = storeOver(() => [transactionRow({ status: 'refunded' })]);

      await expect(store.findTransactionByReference('txn_1')).rejects.toBeInstanceOf(StorageError);
    });

    it('should treat a key id that is not a UUID as unknown without querying', async () => {
      const { pool, store } = storeOver(() => new Error('invalid input syntax for type uuid: "abc"'));

      await expect(store.findApiKeyForUser('abc', USER_ID)).resolves.toBeNull();
      await expect(store.revokeApiKey('abc', USER_ID, NOW)).resolves.toBeNull();
      expect(pool.statements).toEqual([]);
    });

    it('should wrap driver errors', async () => {
      const { store } = storeOver(() => new Error('connection terminated unexpectedly'));

      await expect(store.ping()).rejects.toThrow('Storage operation failed: ping');
    });
  });
});
