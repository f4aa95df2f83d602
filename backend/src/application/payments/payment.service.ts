/**
 * Payment Service
 * Drives the transaction state machine:
 *
 *   pending --(webhook | poll: success)--> success
 *   pending --(webhook | poll: failed)---> failed
 *
 * Terminal states have no outgoing edge. Both webhook and poll go through
 * `store.applyTerminalStatus`, which locks the row, so whichever lands first
 * wins and the other observes "already terminal". A deposit credits the
 * owner's wallet inside that same store transaction.
 */

import crypto from 'crypto';
import { z } from 'zod';
import type {
  TerminalStatus,
  Transaction,
  TransactionKind,
  TransactionView,
  WebhookAck,
  WebhookOutcome,
} from '@walletgate/shared';
import { isTerminalStatus } from '@walletgate/shared';
import type { CredentialStore } from '../../infrastructure/database/credential.store.js';
import { createLogger } from '../../infrastructure/logging/logger.js';
import { systemClock, type Clock } from '../common/clock.js';
import { ConflictError, NotFoundError, ValidationError } from '../common/errors.js';
import { retryRead } from '../common/retry.utils.js';
import {
  mapProviderStatus,
  type InitializedCharge,
  type PaymentProvider,
  type ProviderChargeStatus,
} from './payment-provider.js';
import { verifyWebhookSignature } from './webhook.signature.js';
import { deliveryDigest, type WebhookDeliveryLog } from './webhook-delivery.service.js';

const logger = createLogger('payment-service');

const REFERENCE_PATTERN = /^[A-Za-z0-9_.=-]{6,100}$/;

const webhookEventSchema = z.object({
  event: z.string().min(1),
  data: z
    .object({
      reference: z.string().min(1),
      status: z.string().optional(),
      amount: z.number().int().optional(),
    })
    .passthrough(),
});

export type PaymentKind = 'payment' | 'deposit';

export interface Requester {
  readonly userId: string;
  readonly email: string;
}

export interface InitiateOptions {
  readonly kind: PaymentKind;
  /** Caller-chosen reference; resubmitting it returns the original transaction */
  readonly reference?: string;
}

export interface InitiateResult {
  readonly transaction: Transaction;
  /** False when an existing transaction was returned for a resubmitted reference */
  readonly created: boolean;
}

export interface StatusOptions {
  readonly refresh?: boolean;
  /** When set, only transactions this user takes part in are visible */
  readonly requesterId?: string;
  /** When set, transactions of any other kind are reported as not found */
  readonly kind?: TransactionKind;
}

export interface PaymentServiceOptions {
  store: CredentialStore;
  provider: PaymentProvider;
  webhookSecret: string;
  deliveryLog?: WebhookDeliveryLog;
  clock?: Clock;
}

interface ReconcileResult {
  outcome: WebhookOutcome;
  transaction: Transaction | null;
}

/**
 * Generate a unique transaction reference
 */
export function generateReference(prefix = 'txn'): string {
  return `${prefix}_${crypto.randomBytes(16).toString('hex')}`;
}

export function isValidAmount(amount: unknown): amount is number {
  return typeof amount === 'number' && Number.isSafeInteger(amount) && amount > 0;
}

export function toTransactionView(transaction: Transaction): TransactionView {
  return {
    reference: transaction.reference,
    kind: transaction.kind,
    status: transaction.status,
    amount: transaction.amount,
    paidAt: transaction.completedAt?.toISOString() ?? null,
    createdAt: transaction.createdAt.toISOString(),
  };
}

export class PaymentService {
  private readonly store: CredentialStore;
  private readonly provider: PaymentProvider;
  private readonly webhookSecret: string;
  private readonly deliveryLog: WebhookDeliveryLog | undefined;
  private readonly clock: Clock;

  constructor(options: PaymentServiceOptions) {
    this.store = options.store;
    this.provider = options.provider;
    this.webhookSecret = options.webhookSecret;
    this.deliveryLog = options.deliveryLog;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Starts a charge with the provider and records it as pending.
   * Nothing is persisted unless the provider accepted the charge.
   */
  async initiate(requester: Requester, amount: unknown, options: InitiateOptions): Promise<InitiateResult> {
    if (!isValidAmount(amount)) {
      throw new ValidationError('Amount must be a positive integer in minor units', 'INVALID_AMOUNT', { amount });
    }

    let reference: string;
    if (options.reference !== undefined) {
      if (!REFERENCE_PATTERN.test(options.reference)) {
        throw new ValidationError('Reference must be 6-100 characters of letters, digits, or _ . = -');
      }
      reference = options.reference;

      const existing = await retryRead(
        () => this.store.findTransactionByReference(reference),
        'findTransactionByReference'
      );
      if (existing) {
        this.assertSameRequest(existing, requester, amount, options.kind);
        logger.info({ reference, userId: requester.userId }, 'Returning existing transaction for resubmitted reference');
        return { transaction: existing, created: false };
      }
    } else {
      reference = generateReference();
    }

    // No lock or row exists while the provider call is in flight
    let charge: InitializedCharge;
    try {
      charge = await this.provider.initialize({ reference, amount, email: requester.email });
    } catch (error) {
      if (options.reference === undefined) {
        throw error;
      }
      // The provider refuses a reference it has already seen; a concurrent
      // resubmission may have won the race and recorded its row by now
      const winner = await this.store.findTransactionByReference(reference);
      if (!winner) {
        throw error;
      }
      this.assertSameRequest(winner, requester, amount, options.kind);
      logger.info({ reference, userId: requester.userId }, 'Provider refused a concurrent resubmission; returning its row');
      return { transaction: winner, created: false };
    }

    const result = await this.store.insertTransaction(
      {
        reference,
        userId: requester.userId,
        kind: options.kind,
        amount,
        authorizationUrl: charge.authorizationUrl,
      },
      this.clock()
    );

    if (!result.inserted) {
      // A concurrent resubmission of the same reference got there first
      this.assertSameRequest(result.transaction, requester, amount, options.kind);
      return { transaction: result.transaction, created: false };
    }

    logger.info({
      reference,
      userId: requester.userId,
      amount,
      kind: options.kind,
    }, 'Transaction initiated');

    return { transaction: result.transaction, created: true };
  }

  /**
   * Applies a signed provider event. Always acknowledges a verified delivery,
   * reporting through `outcome` whether it changed anything.
   */
  async handleWebhook(rawBody: Buffer, signature: string | undefined): Promise<WebhookAck> {
    verifyWebhookSignature(rawBody, signature, this.webhookSecret);

    const digest = deliveryDigest(rawBody);
    if (this.deliveryLog && (await this.deliveryLog.seen(digest))) {
      logger.debug({ digest: digest.substring(0, 8) }, 'Duplicate webhook delivery');
      return { received: true, outcome: 'already_applied' };
    }

    let payload: unknown;
    try {
      payload = JSON.parse(rawBody.toString('utf8'));
    } catch {
      throw new ValidationError('Webhook body is not valid JSON');
    }

    const parsed = webhookEventSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ValidationError('Webhook payload is missing event or data.reference', 'VALIDATION_ERROR', {
        issues: parsed.error.issues.map((issue) => issue.path.join('.')),
      });
    }

    const { event, data } = parsed.data;
    const status = this.statusFromEvent(event, data.status);
    if (status === null) {
      logger.info({ event, reference: data.reference }, 'Ignoring non-terminal webhook event');
      return { received: true, outcome: 'ignored' };
    }

    const { outcome } = await this.reconcile(data.reference, status, data.amount, 'webhook');

    if (this.deliveryLog && (outcome === 'applied' || outcome === 'already_applied')) {
      await this.deliveryLog.record(digest);
    }

    return { received: true, outcome };
  }

  /**
   * Current state of a transaction, optionally refreshed from the provider first
   */
  async getStatus(reference: string, options: StatusOptions = {}): Promise<Transaction> {
    const transaction = await retryRead(
      () => this.store.findTransactionByReference(reference),
      'findTransactionByReference'
    );

    const wrongKind = options.kind !== undefined && transaction?.kind !== options.kind;
    if (!transaction || wrongKind || !this.isVisibleTo(transaction, options.requesterId)) {
      throw new NotFoundError('Transaction', { reference });
    }

    // Terminal rows cannot change, and transfers never involve the provider
    if (!options.refresh || isTerminalStatus(transaction.status) || transaction.kind === 'transfer') {
      return transaction;
    }

    const report = await this.provider.query(reference);
    if (report.status === 'pending') {
      return transaction;
    }

    const { transaction: reconciled } = await this.reconcile(reference, report.status, report.amount, 'poll');
    return reconciled ?? transaction;
  }

  private async reconcile(
    reference: string,
    status: TerminalStatus,
    reportedAmount: number | undefined,
    source: 'webhook' | 'poll'
  ): Promise<ReconcileResult> {
    const current = await retryRead(
      () => this.store.findTransactionByReference(reference),
      'findTransactionByReference'
    );

    if (!current) {
      logger.warn({ reference, source }, 'Status report for unknown reference');
      return { outcome: 'unknown_reference', transaction: null };
    }

    if (isTerminalStatus(current.status)) {
      logger.debug({ reference, source, status: current.status }, 'Transaction already terminal');
      return { outcome: 'already_applied', transaction: current };
    }

    if (reportedAmount !== undefined && reportedAmount !== current.amount) {
      logger.warn({
        reference,
        source,
        expected: current.amount,
        reported: reportedAmount,
      }, 'Reported amount does not match transaction, not applying');
      return { outcome: 'ignored', transaction: current };
    }

    const result = await this.store.applyTerminalStatus(reference, status, this.clock());
    if (!result) {
      return { outcome: 'unknown_reference', transaction: null };
    }

    if (result.applied) {
      logger.info({
        reference,
        source,
        status,
        credited: result.credited,
      }, 'Transaction settled');
    }

    return {
      outcome: result.applied ? 'applied' : 'already_applied',
      transaction: result.transaction,
    };
  }

  private statusFromEvent(event: string, rawStatus: string | undefined): TerminalStatus | null {
    if (!event.startsWith('charge.')) {
      return null;
    }

    let status: ProviderChargeStatus;
    if (rawStatus !== undefined) {
      status = mapProviderStatus(rawStatus);
    } else if (event === 'charge.success') {
      status = 'success';
    } else if (event === 'charge.failed') {
      status = 'failed';
    } else {
      status = 'pending';
    }

    return status === 'pending' ? null : status;
  }

  private isVisibleTo(transaction: Transaction, requesterId: string | undefined): boolean {
    return (
      requesterId === undefined ||
      transaction.userId === requesterId ||
      transaction.counterpartyUserId === requesterId
    );
  }

  private assertSameRequest(existing: Transaction, requester: Requester, amount: number, kind: PaymentKind): void {
    if (existing.userId !== requester.userId) {
      throw new ConflictError('Reference is already in use', { reference: existing.reference });
    }
    if (existing.amount !== amount || existing.kind !== kind) {
      throw new ConflictError('Reference was already used with a different amount or kind', {
        reference: existing.reference,
      });
    }
  }
}
