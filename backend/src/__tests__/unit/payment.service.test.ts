/**
 * Unit Tests: Payment Service
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { User } from '@walletgate/shared';
import { PaymentService, toTransactionView } from '../../application/payments/payment.service.js';
import { computeWebhookSignature } from '../../application/payments/webhook.signature.js';
import {
  ConflictError,
  NotFoundError,
  ProviderError,
  SignatureInvalidError,
  ValidationError,
} from '../../application/common/errors.js';
import { createTestContext, TEST_WEBHOOK_SECRET, type TestContext } from '../mocks/services.mock.js';

function signed(payload: unknown, secret = TEST_WEBHOOK_SECRET): { body: Buffer; signature: string } {
  const body = Buffer.from(JSON.stringify(payload));
  return { body, signature: computeWebhookSignature(body, secret) };
}

function chargeEvent(reference: string, status: string, amount: number, event = `charge.${status}`) {
  return { event, data: { reference, status, amount } };
}

describe('PaymentService', () => {
  let ctx: TestContext;
  let payments: PaymentService;
  let user: User;

  beforeEach(() => {
    ctx = createTestContext();
    payments = ctx.services.paymentService;
    user = ctx.store.seedUser({ email: 'ada@example.com' });
  });

  const requester = () => ({ userId: user.id, email: user.email });

  describe('initiate', () => {
    it('should create a pending transaction with a generated reference', async () => {
      const { transaction, created } = await payments.initiate(requester(), 5000, { kind: 'deposit' });

      expect(created).toBe(true);
      expect(transaction.reference).toMatch(/^txn_[0-9a-f]{32}$/);
      expect(transaction.status).toBe('pending');
      expect(transaction.amount).toBe(5000);
      expect(transaction.authorizationUrl).toBe(`https://checkout.test/${transaction.reference}`);
      expect(ctx.provider.initialized).toEqual([
        { reference: transaction.reference, amount: 5000, email: 'ada@example.com' },
      ]);
    });

    it.each([0, -5, 1.5, '5000', Number.NaN, undefined])(
      'should reject amount %s without persisting or calling the provider',
      async (amount) => {
        const attempt = payments.initiate(requester(), amount, { kind: 'payment' });

        await expect(attempt).rejects.toBeInstanceOf(ValidationError);
        await expect(attempt).rejects.toMatchObject({ code: 'INVALID_AMOUNT', statusCode: 400 });
        expect(ctx.store.allTransactions()).toHaveLength(0);
        expect(ctx.provider.initialized).toHaveLength(0);
      }
    );

    it('should persist nothing when the provider refuses the charge', async () => {
      ctx.provider.failInitialize('Invalid email address');

      const attempt = payments.initiate(requester(), 5000, { kind: 'payment' });

      await expect(attempt).rejects.toBeInstanceOf(ProviderError);
      await expect(attempt).rejects.toMatchObject({ statusCode: 402, message: 'Invalid email address' });
      expect(ctx.store.allTransactions()).toHaveLength(0);
    });

    it('should return the original transaction for a resubmitted reference', async () => {
      const first = await payments.initiate(requester(), 5000, { kind: 'payment', reference: 'order-1001' });
      const second = await payments.initiate(requester(), 5000, { kind: 'payment', reference: 'order-1001' });

      expect(first.created).toBe(true);
      expect(second.created).toBe(false);
      expect(second.transaction.id).toBe(first.transaction.id);
      expect(ctx.provider.initialized).toHaveLength(1);
    });

    it('should refuse a reference reused with another amount or by another user', async () => {
      await payments.initiate(requester(), 5000, { kind: 'payment', reference: 'order-1001' });
      const other = ctx.store.seedUser({ email: 'eve@example.com' });

      await expect(
        payments.initiate(requester(), 7000, { kind: 'payment', reference: 'order-1001' })
      ).rejects.toBeInstanceOf(ConflictError);
      await expect(
        payments.initiate({ userId: other.id, email: other.email }, 5000, { kind: 'payment', reference: 'order-1001' })
      ).rejects.toThrow('Reference is already in use');
    });

    it('should reject a malformed reference', async () => {
      await expect(
        payments.initiate(requester(), 5000, { kind: 'payment', reference: 'bad ref' })
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('should keep a single row when the same reference races', async () => {
      const results = await Promise.all([
        payments.initiate(requester(), 5000, { kind: 'deposit', reference: 'order-2002' }),
        payments.initiate(requester(), 5000, { kind: 'deposit', reference: 'order-2002' }),
      ]);

      expect(results.map((result) => result.created).sort()).toEqual([false, true]);
      expect(ctx.store.allTransactions()).toHaveLength(1);
    });

    it('should return the winning row when the provider refuses a raced reference', async () => {
      const [first, second] = await Promise.all([
        payments.initiate(requester(), 5000, { kind: 'deposit', reference: 'order-2003' }),
        payments.initiate(requester(), 5000, { kind: 'deposit', reference: 'order-2003' }),
      ]);

      expect(ctx.provider.initialized).toHaveLength(1);
      expect(first.created).toBe(true);
      expect(second).toEqual({ transaction: first.transaction, created: false });
    });

    it('should surface a provider refusal when no row was recorded', async () => {
      ctx.provider.failInitialize('Invalid email');

      await expect(
        payments.initiate(requester(), 5000, { kind: 'deposit', reference: 'order-2004' })
      ).rejects.toBeInstanceOf(ProviderError);
      expect(ctx.store.callCount('findTransactionByReference')).toBe(2);
      expect(ctx.store.allTransactions()).toEqual([]);
    });
  });

  describe('handleWebhook', () => {
    it('should reject a missing signature before reading the body', async () => {
      const { body } = signed(chargeEvent('order-1', 'success', 5000));

      await expect(payments.handleWebhook(body, undefined)).rejects.toThrow('Missing webhook signature');
    });

    it('should reject a signature that does not match the body', async () => {
      const { transaction } = await payments.initiate(requester(), 5000, { kind: 'deposit' });
      const { signature } = signed(chargeEvent(transaction.reference, 'success', 5000));
      const tampered = Buffer.from(JSON.stringify(chargeEvent(transaction.reference, 'success', 9000)));

      await expect(payments.handleWebhook(tampered, signature)).rejects.toBeInstanceOf(SignatureInvalidError);
      await expect(payments.handleWebhook(tampered, signature)).rejects.toMatchObject({
        code: 'SIGNATURE_INVALID',
        statusCode: 401,
      });
      expect(ctx.store.allTransactions()[0]?.status).toBe('pending');
    });

    it('should reject a body signed with another secret', async () => {
      const { body, signature } = signed(chargeEvent('order-1', 'success', 5000), 'other-secret');

      await expect(payments.handleWebhook(body, signature)).rejects.toBeInstanceOf(SignatureInvalidError);
    });

    it('should settle a deposit and credit the wallet', async () => {
      const { transaction } = await payments.initiate(requester(), 5000, { kind: 'deposit' });
      const { body, signature } = signed(chargeEvent(transaction.reference, 'success', 5000));

      const ack = await payments.handleWebhook(body, signature);

      expect(ack).toEqual({ received: true, outcome: 'applied' });
      const settled = await payments.getStatus(transaction.reference);
      expect(settled.status).toBe('success');
      expect(settled.completedAt?.toISOString()).toBe('2026-03-01T12:00:00.000Z');
      expect(ctx.store.balanceOf(user.id)).toBe(5000);
    });

    it('should not credit the wallet for a plain payment', async () => {
      const { transaction } = await payments.initiate(requester(), 5000, { kind: 'payment' });
      const { body, signature } = signed(chargeEvent(transaction.reference, 'success', 5000));

      await expect(payments.handleWebhook(body, signature)).resolves.toEqual({ received: true, outcome: 'applied' });
      expect(ctx.store.balanceOf(user.id)).toBe(0);
    });

    it('should acknowledge a redelivery without crediting again', async () => {
      const { transaction } = await payments.initiate(requester(), 5000, { kind: 'deposit' });
      const { body, signature } = signed(chargeEvent(transaction.reference, 'success', 5000));

      await payments.handleWebhook(body, signature);
      const lookupsAfterFirst = ctx.store.callCount('findTransactionByReference');
      const ack = await payments.handleWebhook(body, signature);

      expect(ack.outcome).toBe('already_applied');
      expect(ctx.store.callCount('findTransactionByReference')).toBe(lookupsAfterFirst);
      expect(ctx.store.balanceOf(user.id)).toBe(5000);
    });

    it('should fall back to the store when the delivery log is unavailable', async () => {
      const { transaction } = await payments.initiate(requester(), 5000, { kind: 'deposit' });
      const { body, signature } = signed(chargeEvent(transaction.reference, 'success', 5000));

      await payments.handleWebhook(body, signature);
      ctx.redis.setUnavailable(true);

      await expect(payments.handleWebhook(body, signature)).resolves.toEqual({
        received: true,
        outcome: 'already_applied',
      });
      expect(ctx.store.balanceOf(user.id)).toBe(5000);
    });

    it('should credit exactly once for concurrent deliveries', async () => {
      const { transaction } = await payments.initiate(requester(), 5000, { kind: 'deposit' });
      const { body, signature } = signed(chargeEvent(transaction.reference, 'success', 5000));

      const acks = await Promise.all([
        payments.handleWebhook(body, signature),
        payments.handleWebhook(body, signature),
      ]);

      expect(acks.map((ack) => ack.outcome).sort()).toEqual(['already_applied', 'applied']);
      expect(ctx.store.balanceOf(user.id)).toBe(5000);
    });

    it('should never move a terminal transaction', async () => {
      const { transaction } = await payments.initiate(requester(), 5000, { kind: 'deposit' });
      const failed = signed(chargeEvent(transaction.reference, 'failed', 5000));
      const success = signed(chargeEvent(transaction.reference, 'success', 5000));

      await expect(payments.handleWebhook(failed.body, failed.signature)).resolves.toMatchObject({ outcome: 'applied' });
      await expect(payments.handleWebhook(success.body, success.signature)).resolves.toMatchObject({
        outcome: 'already_applied',
      });

      const current = await payments.getStatus(transaction.reference);
      expect(current.status).toBe('failed');
      expect(current.completedAt).toBeNull();
      expect(ctx.store.balanceOf(user.id)).toBe(0);
    });

    it('should ignore a report whose amount does not match', async () => {
      const { transaction } = await payments.initiate(requester(), 5000, { kind: 'deposit' });
      const { body, signature } = signed(chargeEvent(transaction.reference, 'success', 500));

      await expect(payments.handleWebhook(body, signature)).resolves.toEqual({ received: true, outcome: 'ignored' });
      expect((await payments.getStatus(transaction.reference)).status).toBe('pending');
    });

    it('should acknowledge unknown references', async () => {
      const { body, signature } = signed(chargeEvent('txn_unknown', 'success', 5000));

      await expect(payments.handleWebhook(body, signature)).resolves.toEqual({
        received: true,
        outcome: 'unknown_reference',
      });
    });

    it('should ignore non-charge and non-terminal events', async () => {
      const { transaction } = await payments.initiate(requester(), 5000, { kind: 'deposit' });
      const transfer = signed({ event: 'transfer.success', data: { reference: transaction.reference } });
      const abandoned = signed(chargeEvent(transaction.reference, 'abandoned', 5000, 'charge.success'));

      await expect(payments.handleWebhook(transfer.body, transfer.signature)).resolves.toMatchObject({
        outcome: 'ignored',
      });
      await expect(payments.handleWebhook(abandoned.body, abandoned.signature)).resolves.toMatchObject({
        outcome: 'ignored',
      });
      expect((await payments.getStatus(transaction.reference)).status).toBe('pending');
    });

    it('should take the status from the event name when data.status is absent', async () => {
      const { transaction } = await payments.initiate(requester(), 5000, { kind: 'deposit' });
      const { body, signature } = signed({ event: 'charge.success', data: { reference: transaction.reference } });

      await expect(payments.handleWebhook(body, signature)).resolves.toMatchObject({ outcome: 'applied' });
      expect(ctx.store.balanceOf(user.id)).toBe(5000);
    });

    it('should reject signed bodies that are not valid events', async () => {
      const notJson = Buffer.from('not json');
      const missingReference = signed({ event: 'charge.success', data: {} });

      await expect(
        payments.handleWebhook(notJson, computeWebhookSignature(notJson, TEST_WEBHOOK_SECRET))
      ).rejects.toThrow('Webhook body is not valid JSON');
      await expect(
        payments.handleWebhook(missingReference.body, missingReference.signature)
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('getStatus', () => {
    it('should hide unknown and foreign transactions', async () => {
      const { transaction } = await payments.initiate(requester(), 5000, { kind: 'payment' });
      const other = ctx.store.seedUser({ email: 'eve@example.com' });

      await expect(payments.getStatus('txn_missing')).rejects.toBeInstanceOf(NotFoundError);
      await expect(
        payments.getStatus(transaction.reference, { requesterId: other.id })
      ).rejects.toBeInstanceOf(NotFoundError);
      await expect(
        payments.getStatus(transaction.reference, { requesterId: user.id })
      ).resolves.toMatchObject({ reference: transaction.reference });
    });

    it('should report another kind as not found without asking the provider', async () => {
      const { transaction } = await payments.initiate(requester(), 5000, { kind: 'payment' });

      await expect(
        payments.getStatus(transaction.reference, { kind: 'deposit', refresh: true, requesterId: user.id })
      ).rejects.toBeInstanceOf(NotFoundError);
      expect(ctx.provider.queried).toEqual([]);
      await expect(
        payments.getStatus(transaction.reference, { kind: 'payment', requesterId: user.id })
      ).resolves.toMatchObject({ reference: transaction.reference, kind: 'payment' });
    });

    it('should reconcile a pending transaction from the provider on refresh', async () => {
      const { transaction } = await payments.initiate(requester(), 5000, { kind: 'deposit' });
      ctx.provider.report({ reference: transaction.reference, status: 'success', amount: 5000, paidAt: null });

      const refreshed = await payments.getStatus(transaction.reference, { refresh: true });

      expect(refreshed.status).toBe('success');
      expect(ctx.provider.queried).toEqual([transaction.reference]);
      expect(ctx.store.balanceOf(user.id)).toBe(5000);

      // The webhook arriving afterwards changes nothing
      const { body, signature } = signed(chargeEvent(transaction.reference, 'success', 5000));
      await expect(payments.handleWebhook(body, signature)).resolves.toMatchObject({ outcome: 'already_applied' });
      expect(ctx.store.balanceOf(user.id)).toBe(5000);
    });

    it('should not ask the provider about terminal transactions', async () => {
      const { transaction } = await payments.initiate(requester(), 5000, { kind: 'deposit' });
      const { body, signature } = signed(chargeEvent(transaction.reference, 'failed', 5000));
      await payments.handleWebhook(body, signature);

      const current = await payments.getStatus(transaction.reference, { refresh: true });

      expect(current.status).toBe('failed');
      expect(ctx.provider.queried).toEqual([]);
    });

    it('should leave the row pending while the provider reports pending', async () => {
      const { transaction } = await payments.initiate(requester(), 5000, { kind: 'deposit' });

      const current = await payments.getStatus(transaction.reference, { refresh: true });

      expect(current.status).toBe('pending');
      expect(ctx.provider.queried).toEqual([transaction.reference]);
    });

    it('should leave the row pending when the polled amount does not match', async () => {
      const { transaction } = await payments.initiate(requester(), 5000, { kind: 'deposit' });
      ctx.provider.report({ reference: transaction.reference, status: 'success', amount: 50, paidAt: null });

      const current = await payments.getStatus(transaction.reference, { refresh: true });

      expect(current.status).toBe('pending');
      expect(ctx.store.balanceOf(user.id)).toBe(0);
    });

    it('should surface provider failures during refresh', async () => {
      const { transaction } = await payments.initiate(requester(), 5000, { kind: 'deposit' });
      ctx.provider.failQuery('Service unavailable');

      await expect(payments.getStatus(transaction.reference, { refresh: true })).rejects.toBeInstanceOf(ProviderError);
    });
  });

  describe('toTransactionView', () => {
    it('should expose the completion time as paidAt', async () => {
      const { transaction } = await payments.initiate(requester(), 5000, { kind: 'deposit' });
      const { body, signature } = signed(chargeEvent(transaction.reference, 'success', 5000));
      await payments.handleWebhook(body, signature);

      const view = toTransactionView(await payments.getStatus(transaction.reference));

      expect(view).toMatchObject({
        reference: transaction.reference,
        kind: 'deposit',
        status: 'success',
        amount: 5000,
        paidAt: '2026-03-01T12:00:00.000Z',
      });
    });
  });
});
