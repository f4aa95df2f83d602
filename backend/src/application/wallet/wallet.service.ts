/**
 * Wallet Service
 * Balances live on the user row, in minor units. Deposits are credited by the
 * payment state machine; this service reads balances and moves funds between users.
 */

import type { Transaction } from '@walletgate/shared';
import type { CredentialStore } from '../../infrastructure/database/credential.store.js';
import { createLogger } from '../../infrastructure/logging/logger.js';
import { systemClock, type Clock } from '../common/clock.js';
import { InsufficientFundsError, NotFoundError, ValidationError } from '../common/errors.js';
import { retryRead } from '../common/retry.utils.js';
import { generateReference, isValidAmount } from '../payments/payment.service.js';

const logger = createLogger('wallet-service');

const DEFAULT_HISTORY_LIMIT = 50;
const MAX_HISTORY_LIMIT = 200;

export interface TransferOutcome {
  readonly transaction: Transaction;
  /** Sender's balance after the transfer */
  readonly balance: number;
}

export class WalletService {
  constructor(
    private readonly store: CredentialStore,
    private readonly clock: Clock = systemClock
  ) {}

  async getBalance(userId: string): Promise<number> {
    const user = await retryRead(() => this.store.findUserById(userId), 'findUserById');
    if (!user) {
      throw new NotFoundError('Wallet', { userId });
    }
    return user.walletBalance;
  }

  /**
   * Moves `amount` from the user's wallet to the recipient's, atomically
   */
  async transfer(userId: string, recipientEmail: string, amount: unknown): Promise<TransferOutcome> {
    if (!isValidAmount(amount)) {
      throw new ValidationError('Amount must be a positive integer in minor units', 'INVALID_AMOUNT', { amount });
    }

    const recipient = await retryRead(
      () => this.store.findUserByEmail(recipientEmail.trim()),
      'findUserByEmail'
    );
    if (!recipient) {
      throw new NotFoundError('Recipient', { recipientEmail });
    }
    if (recipient.id === userId) {
      throw new ValidationError('Cannot transfer to your own wallet');
    }

    const result = await this.store.transfer(
      { reference: generateReference('trf'), fromUserId: userId, toUserId: recipient.id, amount },
      this.clock()
    );

    if (!result.ok) {
      if (result.reason === 'insufficient_funds') {
        throw new InsufficientFundsError(result.balance, amount);
      }
      throw new NotFoundError('Wallet', { userId: result.userId });
    }

    logger.info({
      reference: result.transaction.reference,
      fromUserId: userId,
      toUserId: recipient.id,
      amount,
    }, 'Transfer completed');

    return { transaction: result.transaction, balance: result.balance };
  }

  async listTransactions(userId: string, limit: number = DEFAULT_HISTORY_LIMIT): Promise<Transaction[]> {
    const bounded = Math.min(Math.max(Math.trunc(limit), 1), MAX_HISTORY_LIMIT);
    return retryRead(() => this.store.listTransactionsForUser(userId, bounded), 'listTransactionsForUser');
  }
}
