/**
 * Authentication Middleware
 * Supports both session tokens (JWT) and API keys
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ApiKeyPermission } from '@walletgate/shared';
import { extractBearerToken, type TokenService } from '../../../application/auth/jwt.service.js';
import { tokenPrincipal, type Principal } from '../../../application/auth/principal.js';
import type { ApiKeyService } from '../../../application/keys/apikey.service.js';
import { AuthError } from '../../../application/common/errors.js';
import { createLogger } from '../../logging/logger.js';

const logger = createLogger('auth-middleware');

// Extend FastifyRequest to include the authenticated caller
declare module 'fastify' {
  interface FastifyRequest {
    principal?: Principal;
  }
}

export interface AuthenticateOptions {
  /** Required when the caller authenticates with an API key; tokens carry every permission */
  permission?: ApiKeyPermission;
  /** Session-token-only routes (key management) set this to false */
  allowApiKey?: boolean;
}

export type AuthPreHandler = (request: FastifyRequest, reply: FastifyReply) => Promise<void>;

export type Authenticate = (options?: AuthenticateOptions) => AuthPreHandler;

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Builds the preHandler factory. The bearer token is tried first; the
 * x-api-key header is the fallback.
 */
export function createAuthenticate(tokens: TokenService, apiKeys: ApiKeyService): Authenticate {
  return (options = {}) => {
    const allowApiKey = options.allowApiKey ?? true;

    return async function authenticateRequest(request: FastifyRequest, _reply: FastifyReply): Promise<void> {
      const token = extractBearerToken(headerValue(request.headers.authorization));
      const apiKey = allowApiKey ? headerValue(request.headers['x-api-key']) : undefined;

      let tokenError: AuthError | null = null;

      if (token) {
        try {
          const payload = tokens.verify(token);
          request.principal = tokenPrincipal(payload.userId, payload.email);
          return;
        } catch (error) {
          if (!(error instanceof AuthError) || !apiKey) {
            throw error;
          }
          tokenError = error;
        }
      }

      if (apiKey) {
        request.principal = await apiKeys.authorize(apiKey, options.permission);
        if (tokenError) {
          logger.debug({ reason: tokenError.reason }, 'Bearer token rejected, authenticated with API key');
        }
        return;
      }

      logger.debug({
        hasAuthHeader: !!request.headers.authorization,
        hasApiKey: !!request.headers['x-api-key'],
      }, 'Authentication failed');

      throw new AuthError(
        'missing',
        allowApiKey ? 'Invalid or missing authentication credentials' : 'A session token is required'
      );
    };
  };
}

/**
 * Authenticated caller of a route guarded by `authenticate`
 */
export function requirePrincipal(request: FastifyRequest): Principal {
  if (!request.principal) {
    throw new AuthError('missing', 'Authentication required');
  }
  return request.principal;
}
