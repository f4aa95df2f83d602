/**
 * Credential Store contract
 * Single owner of persisted users, API keys and transactions.
 *
 * Every mutation that guards an invariant (key quota, terminal transition,
 * wallet balance) is one store call so that the implementation can run it
 * inside a single database transaction under row locks.
 */

import type {
  ApiKey,
  ApiKeyPermission,
  ExternalIdentity,
  TerminalStatus,
  Transaction,
  TransactionKind,
  User,
} from '@walletgate/shared';

export interface NewApiKey {
  readonly userId: string;
  readonly name: string;
  readonly keyHash: string;
  readonly permissions: readonly ApiKeyPermission[];
  readonly expiresAt: Date;
}

export type InsertApiKeyResult =
  | { readonly ok: true; readonly key: ApiKey }
  | { readonly ok: false; readonly reason: 'quota_exceeded'; readonly active: number }
  | { readonly ok: false; readonly reason: 'unknown_user' };

export interface ApiKeyWithOwner {
  readonly key: ApiKey;
  readonly owner: Pick<User, 'id' | 'email'>;
}

export interface NewTransaction {
  readonly reference: string;
  readonly userId: string | null;
  readonly kind: TransactionKind;
  readonly amount: number;
  readonly authorizationUrl: string | null;
}

export interface InsertTransactionResult {
  /** False when a row with the same reference already existed */
  readonly inserted: boolean;
  readonly transaction: Transaction;
}

export interface TerminalTransitionResult {
  /** False when the row was already terminal; nothing was written */
  readonly applied: boolean;
  readonly transaction: Transaction;
  /** Amount credited to the owner's wallet by this call */
  readonly credited: number;
}

export interface NewTransfer {
  readonly reference: string;
  readonly fromUserId: string;
  readonly toUserId: string;
  readonly amount: number;
}

export type TransferResult =
  | { readonly ok: true; readonly transaction: Transaction; readonly balance: number }
  | { readonly ok: false; readonly reason: 'insufficient_funds'; readonly balance: number }
  | { readonly ok: false; readonly reason: 'unknown_user'; readonly userId: string };

export interface CredentialStore {
  upsertUserByExternalId(identity: ExternalIdentity, now: Date): Promise<User>;
  findUserById(userId: string): Promise<User | null>;
  findUserByEmail(email: string): Promise<User | null>;

  /**
   * Insert a key unless the owner already holds `limit` keys that are active
   * at `now`. The count and the insert are atomic per user.
   */
  insertApiKeyWithinQuota(key: NewApiKey, limit: number, now: Date): Promise<InsertApiKeyResult>;
  findApiKeyByHash(keyHash: string): Promise<ApiKeyWithOwner | null>;
  findApiKeyForUser(keyId: string, userId: string): Promise<ApiKey | null>;
  listApiKeys(userId: string): Promise<ApiKey[]>;
  /** Returns null when no such key belongs to the user */
  revokeApiKey(keyId: string, userId: string, now: Date): Promise<ApiKey | null>;
  touchApiKey(keyId: string, now: Date): Promise<void>;

  insertTransaction(transaction: NewTransaction, now: Date): Promise<InsertTransactionResult>;
  findTransactionByReference(reference: string): Promise<Transaction | null>;
  /**
   * Move a pending transaction to a terminal status, crediting the owner's
   * wallet for successful deposits. Returns null for unknown references.
   */
  applyTerminalStatus(reference: string, status: TerminalStatus, now: Date): Promise<TerminalTransitionResult | null>;
  transfer(transfer: NewTransfer, now: Date): Promise<TransferResult>;
  listTransactionsForUser(userId: string, limit: number): Promise<Transaction[]>;

  ping(): Promise<void>;
}
