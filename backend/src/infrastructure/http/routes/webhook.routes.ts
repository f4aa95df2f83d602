/**
 * Payment Provider Webhook
 * Registered in its own plugin so the JSON parser can be swapped for a raw
 * Buffer parser: the HMAC covers the exact bytes Paystack sent.
 */

import type { FastifyInstance, FastifyPluginAsync, FastifyRequest } from 'fastify';
import type { PaymentService } from '../../../application/payments/payment.service.js';
import { ValidationError } from '../../../application/common/errors.js';
import { errorResponseSchema } from './schemas.js';

export const WEBHOOK_SIGNATURE_HEADER = 'x-paystack-signature';

export interface WebhookRoutesOptions {
  paymentService: PaymentService;
}

export const webhookRoutes: FastifyPluginAsync<WebhookRoutesOptions> = async (
  fastify: FastifyInstance,
  options: WebhookRoutesOptions
): Promise<void> => {
  const { paymentService } = options;

  fastify.removeContentTypeParser('application/json');
  fastify.addContentTypeParser(
    'application/json',
    { parseAs: 'buffer' },
    async (_request: FastifyRequest, body: Buffer) => body
  );

  // POST /payments/webhook
  fastify.post('/webhook', {
    schema: {
      tags: ['Payments'],
      summary: 'Paystack webhook',
      description: `Signed with HMAC-SHA512 over the raw body in the ${WEBHOOK_SIGNATURE_HEADER} header. Redeliveries are acknowledged without effect.`,
      response: {
        200: {
          type: 'object',
          properties: {
            received: { type: 'boolean' },
            outcome: { type: 'string', enum: ['applied', 'already_applied', 'ignored', 'unknown_reference'] },
          },
        },
        400: errorResponseSchema,
        401: errorResponseSchema,
      },
    },
  }, async (request, reply) => {
    if (!Buffer.isBuffer(request.body)) {
      throw new ValidationError('Webhook body must be JSON');
    }

    const signature = request.headers[WEBHOOK_SIGNATURE_HEADER];
    const ack = await paymentService.handleWebhook(
      request.body,
      Array.isArray(signature) ? signature[0] : signature
    );

    return reply.send(ack);
  });
};
