/**
 * API Key Routes
 * Key management requires a session token; keys cannot mint keys.
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { API_KEY_EXPIRY_OPTIONS, API_KEY_PERMISSIONS, type IssuedApiKeyResponse } from '@walletgate/shared';
import type { ApiKeyService, IssuedApiKey } from '../../../application/keys/apikey.service.js';
import { requirePrincipal, type Authenticate } from '../middleware/auth.middleware.js';
import {
  apiKeySummarySchema,
  bearerSecurity,
  envelope,
  errorResponseSchema,
  issuedKeySchema,
} from './schemas.js';

export interface KeyRoutesOptions {
  apiKeyService: ApiKeyService;
  authenticate: Authenticate;
}

const CreateKeySchema = z.object({
  name: z.string().min(1, 'Name is required').max(100),
  permissions: z.array(z.string()).min(1, 'At least one permission is required'),
  expiry: z.string(),
});

const RolloverKeySchema = z.object({
  expiredKeyId: z.string().min(1, 'expiredKeyId is required'),
  expiry: z.string(),
});

const KeyParamsSchema = z.object({
  keyId: z.string().min(1),
});

function toIssuedResponse(issued: IssuedApiKey): IssuedApiKeyResponse {
  return {
    apiKey: issued.apiKey,
    keyId: issued.keyId,
    expiresAt: issued.expiresAt.toISOString(),
  };
}

export const keyRoutes: FastifyPluginAsync<KeyRoutesOptions> = async (
  fastify: FastifyInstance,
  options: KeyRoutesOptions
): Promise<void> => {
  const { apiKeyService } = options;

  fastify.addHook('preHandler', options.authenticate({ allowApiKey: false }));

  // POST /keys/create
  fastify.post('/create', {
    schema: {
      tags: ['Keys'],
      summary: 'Create API key',
      description: 'Creates a scoped API key. At most five keys may be active per user at once.',
      security: bearerSecurity,
      body: {
        type: 'object',
        required: ['name', 'permissions', 'expiry'],
        properties: {
          name: { type: 'string', maxLength: 100 },
          permissions: { type: 'array', items: { type: 'string', enum: API_KEY_PERMISSIONS } },
          expiry: { type: 'string', enum: API_KEY_EXPIRY_OPTIONS, description: '1H, 1D, 1M (30 days) or 1Y (365 days)' },
        },
      },
      response: {
        201: envelope(issuedKeySchema),
        400: errorResponseSchema,
        401: errorResponseSchema,
        429: errorResponseSchema,
      },
    },
  }, async (request, reply) => {
    const principal = requirePrincipal(request);
    const body = CreateKeySchema.parse(request.body);

    const issued = await apiKeyService.create(principal.userId, body.name, body.permissions, body.expiry);

    return reply.status(201).send({ success: true, data: toIssuedResponse(issued) });
  });

  // POST /keys/rollover
  fastify.post('/rollover', {
    schema: {
      tags: ['Keys'],
      summary: 'Roll over an expired API key',
      description: 'Issues a new key with the name and permissions of an expired one.',
      security: bearerSecurity,
      body: {
        type: 'object',
        required: ['expiredKeyId', 'expiry'],
        properties: {
          expiredKeyId: { type: 'string' },
          expiry: { type: 'string', enum: API_KEY_EXPIRY_OPTIONS },
        },
      },
      response: {
        201: envelope(issuedKeySchema),
        400: errorResponseSchema,
        401: errorResponseSchema,
        404: errorResponseSchema,
        409: errorResponseSchema,
        429: errorResponseSchema,
      },
    },
  }, async (request, reply) => {
    const principal = requirePrincipal(request);
    const body = RolloverKeySchema.parse(request.body);

    const issued = await apiKeyService.rollover(principal.userId, body.expiredKeyId, body.expiry);

    return reply.status(201).send({ success: true, data: toIssuedResponse(issued) });
  });

  // GET /keys
  fastify.get('/', {
    schema: {
      tags: ['Keys'],
      summary: 'List API keys',
      security: bearerSecurity,
      response: {
        200: envelope({
          type: 'object',
          properties: {
            keys: { type: 'array', items: apiKeySummarySchema },
          },
        }),
        401: errorResponseSchema,
      },
    },
  }, async (request, reply) => {
    const principal = requirePrincipal(request);
    const keys = await apiKeyService.list(principal.userId);
    return reply.send({ success: true, data: { keys } });
  });

  // POST /keys/:keyId/revoke
  fastify.post('/:keyId/revoke', {
    schema: {
      tags: ['Keys'],
      summary: 'Revoke API key',
      security: bearerSecurity,
      params: {
        type: 'object',
        properties: { keyId: { type: 'string' } },
      },
      response: {
        200: envelope(apiKeySummarySchema),
        401: errorResponseSchema,
        404: errorResponseSchema,
      },
    },
  }, async (request, reply) => {
    const principal = requirePrincipal(request);
    const { keyId } = KeyParamsSchema.parse(request.params);

    const revoked = await apiKeyService.revoke(principal.userId, keyId);
    return reply.send({ success: true, data: revoked });
  });
};
