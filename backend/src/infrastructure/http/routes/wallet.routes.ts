/**
 * Wallet Routes
 * Deposits, balance, transfers and history. Every route accepts a session
 * token or an API key carrying the matching permission.
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { BalanceResponse, TransactionListResponse, TransferResponse } from '@walletgate/shared';
import { toTransactionView, type PaymentService } from '../../../application/payments/payment.service.js';
import type { WalletService } from '../../../application/wallet/wallet.service.js';
import { requirePrincipal, type Authenticate } from '../middleware/auth.middleware.js';
import {
  InitiateBodySchema,
  ReferenceParamsSchema,
  StatusQuerySchema,
  statusQueryJsonSchema,
  toInitiateResponse,
} from './payments.routes.js';
import {
  bearerOrKeySecurity,
  envelope,
  errorResponseSchema,
  initiateBodySchema,
  initiateResponseSchema,
  transactionViewSchema,
} from './schemas.js';

export interface WalletRoutesOptions {
  paymentService: PaymentService;
  walletService: WalletService;
  authenticate: Authenticate;
}

const TransferBodySchema = z.object({
  recipientEmail: z.string().email('Invalid email format'),
  amount: z.unknown(),
});

const HistoryQuerySchema = z.object({
  limit: z.number().int().min(1).max(200).optional(),
});

export const walletRoutes: FastifyPluginAsync<WalletRoutesOptions> = async (
  fastify: FastifyInstance,
  options: WalletRoutesOptions
): Promise<void> => {
  const { paymentService, walletService, authenticate } = options;

  // POST /wallet/deposit
  fastify.post('/deposit', {
    schema: {
      tags: ['Wallet'],
      summary: 'Fund the wallet',
      description: 'Starts a deposit checkout. The wallet is credited once the provider confirms the charge.',
      security: bearerOrKeySecurity,
      body: initiateBodySchema,
      response: {
        201: envelope(initiateResponseSchema),
        200: envelope(initiateResponseSchema),
        400: errorResponseSchema,
        401: errorResponseSchema,
        402: errorResponseSchema,
        403: errorResponseSchema,
        409: errorResponseSchema,
      },
    },
    preHandler: authenticate({ permission: 'deposit' }),
  }, async (request, reply) => {
    const principal = requirePrincipal(request);
    const body = InitiateBodySchema.parse(request.body);

    const { transaction, created } = await paymentService.initiate(
      { userId: principal.userId, email: principal.email },
      body.amount,
      { kind: 'deposit', reference: body.reference }
    );

    return reply.status(created ? 201 : 200).send({ success: true, data: toInitiateResponse(transaction) });
  });

  // GET /wallet/deposit/:reference/status
  fastify.get('/deposit/:reference/status', {
    schema: {
      tags: ['Wallet'],
      summary: 'Get deposit status',
      security: bearerOrKeySecurity,
      params: {
        type: 'object',
        properties: { reference: { type: 'string' } },
      },
      querystring: statusQueryJsonSchema,
      response: {
        200: envelope(transactionViewSchema),
        401: errorResponseSchema,
        402: errorResponseSchema,
        403: errorResponseSchema,
        404: errorResponseSchema,
      },
    },
    preHandler: authenticate({ permission: 'read' }),
  }, async (request, reply) => {
    const principal = requirePrincipal(request);
    const { reference } = ReferenceParamsSchema.parse(request.params);
    const query = StatusQuerySchema.parse(request.query);

    const transaction = await paymentService.getStatus(reference, {
      refresh: query.refresh ?? false,
      requesterId: principal.userId,
      kind: 'deposit',
    });

    return reply.send({ success: true, data: toTransactionView(transaction) });
  });

  // GET /wallet/balance
  fastify.get('/balance', {
    schema: {
      tags: ['Wallet'],
      summary: 'Get wallet balance',
      security: bearerOrKeySecurity,
      response: {
        200: envelope({
          type: 'object',
          properties: {
            balance: { type: 'integer', description: 'Balance in minor units' },
          },
        }),
        401: errorResponseSchema,
        403: errorResponseSchema,
      },
    },
    preHandler: authenticate({ permission: 'read' }),
  }, async (request, reply) => {
    const principal = requirePrincipal(request);
    const data: BalanceResponse = { balance: await walletService.getBalance(principal.userId) };
    return reply.send({ success: true, data });
  });

  // POST /wallet/transfer
  fastify.post('/transfer', {
    schema: {
      tags: ['Wallet'],
      summary: 'Transfer to another wallet',
      security: bearerOrKeySecurity,
      body: {
        type: 'object',
        required: ['recipientEmail', 'amount'],
        properties: {
          recipientEmail: { type: 'string', format: 'email' },
          amount: { description: 'Positive integer amount in minor units (kobo)' },
        },
      },
      response: {
        200: envelope({
          type: 'object',
          properties: {
            reference: { type: 'string' },
            amount: { type: 'integer' },
            balance: { type: 'integer', description: 'Sender balance after the transfer' },
          },
        }),
        400: errorResponseSchema,
        401: errorResponseSchema,
        403: errorResponseSchema,
        404: errorResponseSchema,
      },
    },
    preHandler: authenticate({ permission: 'transfer' }),
  }, async (request, reply) => {
    const principal = requirePrincipal(request);
    const body = TransferBodySchema.parse(request.body);

    const outcome = await walletService.transfer(principal.userId, body.recipientEmail, body.amount);
    const data: TransferResponse = {
      reference: outcome.transaction.reference,
      amount: outcome.transaction.amount,
      balance: outcome.balance,
    };

    return reply.send({ success: true, data });
  });

  // GET /wallet/transactions
  fastify.get('/transactions', {
    schema: {
      tags: ['Wallet'],
      summary: 'List wallet transactions',
      description: 'Newest first. Includes transfers received from other users.',
      security: bearerOrKeySecurity,
      querystring: {
        type: 'object',
        properties: {
          limit: { type: 'integer', minimum: 1, maximum: 200, default: 50 },
        },
      },
      response: {
        200: envelope({
          type: 'object',
          properties: {
            transactions: { type: 'array', items: transactionViewSchema },
          },
        }),
        401: errorResponseSchema,
        403: errorResponseSchema,
      },
    },
    preHandler: authenticate({ permission: 'read' }),
  }, async (request, reply) => {
    const principal = requirePrincipal(request);
    const query = HistoryQuerySchema.parse(request.query);

    const transactions = await walletService.listTransactions(principal.userId, query.limit);
    const data: TransactionListResponse = { transactions: transactions.map(toTransactionView) };
    return reply.send({ success: true, data });
  });
};
