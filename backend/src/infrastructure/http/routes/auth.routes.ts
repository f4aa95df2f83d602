/**
 * Authentication Routes
 * Google sign-in and the current-user endpoint
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { SignInResponse } from '@walletgate/shared';
import type { AuthService } from '../../../application/auth/auth.service.js';
import { ValidationError } from '../../../application/common/errors.js';
import { requirePrincipal, type Authenticate } from '../middleware/auth.middleware.js';
import { bearerOrKeySecurity, envelope, errorResponseSchema } from './schemas.js';
import { createLogger } from '../../logging/logger.js';

const logger = createLogger('auth-routes');

export interface AuthRoutesOptions {
  authService: AuthService;
  authenticate: Authenticate;
}

// Zod schemas for validation
const StartSignInSchema = z.object({
  state: z.string().max(200).optional(),
});

const CallbackSchema = z.object({
  code: z.string().optional(),
  state: z.string().optional(),
  error: z.string().optional(),
});

export const authRoutes: FastifyPluginAsync<AuthRoutesOptions> = async (
  fastify: FastifyInstance,
  options: AuthRoutesOptions
): Promise<void> => {
  const { authService, authenticate } = options;

  // GET /auth/google
  fastify.get('/google', {
    schema: {
      tags: ['Auth'],
      summary: 'Start Google sign-in',
      description: 'Returns the Google consent page URL. Send the user there; Google redirects back to the callback with a code.',
      querystring: {
        type: 'object',
        properties: {
          state: { type: 'string', maxLength: 200, description: 'Opaque value echoed back to the callback' },
        },
      },
      response: {
        200: envelope({
          type: 'object',
          properties: {
            authorizationUrl: { type: 'string' },
          },
        }),
      },
    },
  }, async (request, reply) => {
    const query = StartSignInSchema.parse(request.query);
    return reply.send({
      success: true,
      data: { authorizationUrl: authService.authorizationUrl(query.state) },
    });
  });

  // GET /auth/google/callback
  fastify.get('/google/callback', {
    schema: {
      tags: ['Auth'],
      summary: 'Complete Google sign-in',
      description: 'Exchanges the authorization code, creates the user on first sign-in and returns a session token.',
      querystring: {
        type: 'object',
        properties: {
          code: { type: 'string' },
          state: { type: 'string' },
          error: { type: 'string' },
        },
      },
      response: {
        200: envelope({
          type: 'object',
          properties: {
            userId: { type: 'string' },
            email: { type: 'string' },
            name: { type: ['string', 'null'] },
            accessToken: { type: 'string', description: 'Bearer token for authenticated endpoints' },
            tokenType: { type: 'string' },
            expiresIn: { type: 'integer', description: 'Token lifetime in seconds' },
          },
        }),
        400: errorResponseSchema,
        401: errorResponseSchema,
        402: errorResponseSchema,
      },
    },
  }, async (request, reply) => {
    const query = CallbackSchema.parse(request.query);

    if (query.error) {
      logger.info({ error: query.error }, 'Google sign-in was not completed');
      throw new ValidationError(`Google sign-in failed: ${query.error}`);
    }
    if (!query.code) {
      throw new ValidationError('Missing authorization code');
    }

    const result = await authService.signIn(query.code);
    const data: SignInResponse = {
      userId: result.user.id,
      email: result.user.email,
      name: result.user.name,
      accessToken: result.accessToken,
      tokenType: result.tokenType,
      expiresIn: result.expiresIn,
    };

    return reply.send({ success: true, data });
  });

  // GET /auth/me
  fastify.get('/me', {
    schema: {
      tags: ['Auth'],
      summary: 'Get current user',
      description: 'Returns the authenticated user. Accepts a session token or an API key.',
      security: bearerOrKeySecurity,
      response: {
        200: envelope({
          type: 'object',
          properties: {
            userId: { type: 'string' },
            email: { type: 'string' },
            name: { type: ['string', 'null'] },
            avatarUrl: { type: ['string', 'null'] },
            credential: { type: 'string', enum: ['token', 'api_key'] },
            keyId: { type: ['string', 'null'] },
            permissions: { type: 'array', items: { type: 'string' } },
          },
        }),
        401: errorResponseSchema,
      },
    },
    preHandler: authenticate(),
  }, async (request, reply) => {
    const principal = requirePrincipal(request);
    const user = await authService.getUser(principal.userId);

    return reply.send({
      success: true,
      data: {
        userId: user.id,
        email: user.email,
        name: user.name,
        avatarUrl: user.avatarUrl,
        credential: principal.credential,
        keyId: principal.keyId,
        permissions: principal.permissions,
      },
    });
  });
};
