/**
 * Payment and wallet transaction types.
 * Amounts are integers in minor units; floating point never reaches storage.
 */

import type { UserId } from './user.types.js';

export type { UserId };

export const TRANSACTION_STATUSES = ['pending', 'success', 'failed'] as const;

export type TransactionStatus = (typeof TRANSACTION_STATUSES)[number];

/** Statuses with no outgoing transition */
export type TerminalStatus = Exclude<TransactionStatus, 'pending'>;

export const TRANSACTION_KINDS = ['payment', 'deposit', 'transfer'] as const;

export type TransactionKind = (typeof TRANSACTION_KINDS)[number];

export interface Transaction {
  readonly id: string;
  readonly reference: string;
  readonly userId: UserId | null;
  readonly kind: TransactionKind;
  readonly amount: number;
  readonly status: TransactionStatus;
  readonly authorizationUrl: string | null;
  /** Recipient of a transfer */
  readonly counterpartyUserId: UserId | null;
  readonly completedAt: Date | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/** Transaction as returned over the API */
export interface TransactionView {
  readonly reference: string;
  readonly kind: TransactionKind;
  readonly status: TransactionStatus;
  readonly amount: number;
  readonly paidAt: string | null;
  readonly createdAt: string;
}

export function isTerminalStatus(status: TransactionStatus): status is TerminalStatus {
  return status !== 'pending';
}
