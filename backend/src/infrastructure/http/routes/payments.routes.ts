/**
 * Payment Routes
 * POST /api/payments/initiate - Start a checkout
 * GET  /api/payments/:reference/status - Read (and optionally refresh) a transaction
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { InitiatePaymentResponse, Transaction } from '@walletgate/shared';
import { toTransactionView, type PaymentService } from '../../../application/payments/payment.service.js';
import { requirePrincipal, type Authenticate } from '../middleware/auth.middleware.js';
import {
  bearerOrKeySecurity,
  bearerSecurity,
  envelope,
  errorResponseSchema,
  initiateBodySchema,
  initiateResponseSchema,
  transactionViewSchema,
} from './schemas.js';

export interface PaymentRoutesOptions {
  paymentService: PaymentService;
  authenticate: Authenticate;
}

export const InitiateBodySchema = z.object({
  amount: z.unknown(),
  reference: z.string().optional(),
});

export const ReferenceParamsSchema = z.object({
  reference: z.string().min(1),
});

export const StatusQuerySchema = z.object({
  refresh: z.boolean().optional(),
});

export const statusQueryJsonSchema = {
  type: 'object',
  properties: {
    refresh: { type: 'boolean', description: 'Ask the payment provider for the latest status first' },
  },
} as const;

export function toInitiateResponse(transaction: Transaction): InitiatePaymentResponse {
  return {
    reference: transaction.reference,
    authorizationUrl: transaction.authorizationUrl,
    amount: transaction.amount,
    status: transaction.status,
  };
}

export const paymentRoutes: FastifyPluginAsync<PaymentRoutesOptions> = async (
  fastify: FastifyInstance,
  options: PaymentRoutesOptions
): Promise<void> => {
  const { paymentService, authenticate } = options;

  // POST /payments/initiate
  fastify.post('/initiate', {
    schema: {
      tags: ['Payments'],
      summary: 'Initiate a payment',
      description: 'Creates a pending transaction and returns the provider checkout URL. Returns 201 for a new transaction, 200 when a known reference is resubmitted.',
      security: bearerSecurity,
      body: initiateBodySchema,
      response: {
        201: envelope(initiateResponseSchema),
        200: envelope(initiateResponseSchema),
        400: errorResponseSchema,
        401: errorResponseSchema,
        402: errorResponseSchema,
        409: errorResponseSchema,
      },
    },
    preHandler: authenticate({ allowApiKey: false }),
  }, async (request, reply) => {
    const principal = requirePrincipal(request);
    const body = InitiateBodySchema.parse(request.body);

    const { transaction, created } = await paymentService.initiate(
      { userId: principal.userId, email: principal.email },
      body.amount,
      { kind: 'payment', reference: body.reference }
    );

    return reply.status(created ? 201 : 200).send({ success: true, data: toInitiateResponse(transaction) });
  });

  // GET /payments/:reference/status
  fastify.get('/:reference/status', {
    schema: {
      tags: ['Payments'],
      summary: 'Get transaction status',
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
    });

    return reply.send({ success: true, data: toTransactionView(transaction) });
  });
};
