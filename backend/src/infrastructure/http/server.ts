/**
 * Fastify Server Configuration
 * `buildApp` assembles the HTTP surface from ready services (tests use it with
 * in-process stand-ins); `createServer` wires the production dependencies.
 */

import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { Redis } from 'ioredis';
import { ZodError } from 'zod';
import type { ApiError } from '@walletgate/shared';
import type { Config } from '../../config/index.js';
import { AuthService } from '../../application/auth/auth.service.js';
import { TokenService } from '../../application/auth/jwt.service.js';
import { RedisApiKeyCache } from '../../application/keys/apikey-cache.service.js';
import { ApiKeyService } from '../../application/keys/apikey.service.js';
import { PaymentService } from '../../application/payments/payment.service.js';
import { RedisWebhookDeliveryLog } from '../../application/payments/webhook-delivery.service.js';
import { WalletService } from '../../application/wallet/wallet.service.js';
import { RateLimitedError, isAppError } from '../../application/common/errors.js';
import { sleep } from '../../application/common/retry.utils.js';
import { createLogger } from '../logging/logger.js';
import { createRedisClient, RedisKeys } from '../database/redis.client.js';
import { createPostgresPool, ensureSchema } from '../database/postgres.client.js';
import { PostgresCredentialStore } from '../database/postgres.store.js';
import { GoogleIdentityBridge } from '../providers/google.client.js';
import { PaystackClient } from '../providers/paystack.client.js';
import { createAuthenticate } from './middleware/auth.middleware.js';
import { healthRoutes, type HealthRoutesOptions } from './routes/health.routes.js';
import { authRoutes } from './routes/auth.routes.js';
import { keyRoutes } from './routes/keys.routes.js';
import { paymentRoutes } from './routes/payments.routes.js';
import { webhookRoutes } from './routes/webhook.routes.js';
import { walletRoutes } from './routes/wallet.routes.js';

const logger = createLogger('http-server');

const API_VERSION = '1.0.0';

export interface AppServices {
  readonly tokenService: TokenService;
  readonly authService: AuthService;
  readonly apiKeyService: ApiKeyService;
  readonly paymentService: PaymentService;
  readonly walletService: WalletService;
  readonly healthProbes: HealthRoutesOptions['probes'];
}

export interface AppOptions {
  readonly env: string;
  readonly corsOrigins?: readonly string[];
  /** Serve the OpenAPI document and Swagger UI under /docs */
  readonly docs?: boolean;
  readonly rateLimit?: {
    readonly max: number;
    readonly timeWindow: string;
    /** Shares counters across instances; in-memory when absent */
    readonly redis?: Redis;
  };
}

interface ErrorReply {
  statusCode: number;
  body: { success: false; error: ApiError };
}

/**
 * Maps any error reaching Fastify onto the response envelope
 */
export function toErrorReply(error: FastifyError | Error, env: string): ErrorReply {
  const isProduction = env === 'production';

  if (isAppError(error)) {
    const hide = error.statusCode >= 500 && isProduction;
    const hasDetails = Object.keys(error.details).length > 0;
    return {
      statusCode: error.statusCode,
      body: {
        success: false,
        error: {
          code: error.code,
          message: hide ? 'An internal error occurred' : error.message,
          ...(hasDetails && !hide ? { details: error.details } : {}),
        },
      },
    };
  }

  if (error instanceof ZodError) {
    const issue = error.issues[0];
    const path = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return {
      statusCode: 400,
      body: {
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: issue ? `${path}${issue.message}` : 'Invalid request data',
        },
      },
    };
  }

  if ('validation' in error && error.validation) {
    return {
      statusCode: 400,
      body: { success: false, error: { code: 'VALIDATION_ERROR', message: error.message } },
    };
  }

  // Fastify's own client errors (bad JSON, unsupported media type, body too large)
  if ('statusCode' in error && error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
    return {
      statusCode: error.statusCode,
      body: {
        success: false,
        error: { code: 'code' in error && error.code ? error.code : 'BAD_REQUEST', message: error.message },
      },
    };
  }

  return {
    statusCode: 500,
    body: {
      success: false,
      error: {
        code: 'INTERNAL_ERROR',
        message: isProduction ? 'An internal error occurred' : error.message,
      },
    },
  };
}

export async function buildApp(services: AppServices, options: AppOptions): Promise<FastifyInstance> {
  const server = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    connectionTimeout: 30000,
    keepAliveTimeout: 10000,
    maxParamLength: 200,
    bodyLimit: 1024 * 1024, // 1MB
  });

  if (options.docs) {
    // Swagger/OpenAPI documentation
    await server.register(swagger, {
      openapi: {
        info: {
          title: 'WalletGate API',
          description: 'Wallet and payment gateway: Google sign-in, scoped API keys, Paystack checkouts and wallet transfers',
          version: API_VERSION,
        },
        components: {
          securitySchemes: {
            bearerAuth: {
              type: 'http',
              scheme: 'bearer',
              bearerFormat: 'JWT',
              description: 'Session token from the Google sign-in callback',
            },
            apiKey: {
              type: 'apiKey',
              name: 'x-api-key',
              in: 'header',
              description: 'Scoped API key',
            },
          },
        },
        tags: [
          { name: 'Auth', description: 'Sign-in endpoints' },
          { name: 'Keys', description: 'API key management' },
          { name: 'Payments', description: 'Checkout and provider callbacks' },
          { name: 'Wallet', description: 'Balance, deposits and transfers' },
          { name: 'Health', description: 'Health check endpoints' },
        ],
      },
    });

    await server.register(swaggerUi, {
      routePrefix: '/docs',
      uiConfig: {
        docExpansion: 'list',
        deepLinking: true,
      },
    });
  }

  // Security middleware
  await server.register(helmet, {
    contentSecurityPolicy: false, // Disable for API-only server
  });

  const corsOrigins = options.corsOrigins ?? [];
  await server.register(cors, {
    origin: options.env === 'production' ? [...corsOrigins] : true,
    credentials: true,
  });

  if (options.rateLimit) {
    await server.register(rateLimit, {
      global: true,
      max: options.rateLimit.max,
      timeWindow: options.rateLimit.timeWindow,
      nameSpace: RedisKeys.rateLimitPrefix,
      ...(options.rateLimit.redis ? { redis: options.rateLimit.redis } : {}),
      errorResponseBuilder: (_request, context) => new RateLimitedError(context.after),
    });
  }

  server.addHook('onRequest', async (request) => {
    logger.debug({
      method: request.method,
      url: request.url,
      requestId: request.id,
    }, 'Incoming request');
  });

  server.addHook('onResponse', async (request, reply) => {
    logger.info({
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      responseTime: reply.elapsedTime,
      requestId: request.id,
    }, 'Request completed');
  });

  // Error handler
  server.setErrorHandler((error, request, reply) => {
    const { statusCode, body } = toErrorReply(error, options.env);

    if (statusCode >= 500) {
      logger.error({
        error: error.message,
        stack: error.stack,
        requestId: request.id,
      }, 'Request error');
    } else {
      logger.debug({
        code: body.error.code,
        statusCode,
        requestId: request.id,
      }, 'Request rejected');
    }

    void reply.status(statusCode).send(body);
  });

  const authenticate = createAuthenticate(services.tokenService, services.apiKeyService);

  // Register routes
  await server.register(healthRoutes, { prefix: '/api', probes: services.healthProbes, version: API_VERSION });
  await server.register(authRoutes, { prefix: '/api/auth', authService: services.authService, authenticate });
  await server.register(keyRoutes, { prefix: '/api/keys', apiKeyService: services.apiKeyService, authenticate });
  await server.register(paymentRoutes, {
    prefix: '/api/payments',
    paymentService: services.paymentService,
    authenticate,
  });
  await server.register(webhookRoutes, { prefix: '/api/payments', paymentService: services.paymentService });
  await server.register(walletRoutes, {
    prefix: '/api/wallet',
    paymentService: services.paymentService,
    walletService: services.walletService,
    authenticate,
  });

  logger.info('Routes registered');
  return server;
}

/**
 * Retry a startup connection a fixed number of times
 */
async function connectWithRetry(name: string, connect: () => Promise<void>, maxRetries = 10): Promise<void> {
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      await connect();
      logger.info(`${name} connected`);
      return;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      logger.warn({ attempt, maxRetries, error: errorMessage }, `${name} connection attempt failed`);

      if (attempt === maxRetries) {
        throw new Error(`${name} connection failed after ${maxRetries} attempts: ${errorMessage}`);
      }

      await sleep(2000);
    }
  }
}

export async function createServer(config: Config): Promise<FastifyInstance> {
  const redis = createRedisClient(config);
  const pool = createPostgresPool(config);

  // Initialize connections with retry logic
  await connectWithRetry('Redis', async () => {
    if (redis.status === 'wait' || redis.status === 'end') {
      await redis.connect();
    }
    const pingResult = await redis.ping();
    if (pingResult !== 'PONG') {
      throw new Error(`Redis ping failed: expected PONG, got ${pingResult}`);
    }
  });
  await connectWithRetry('PostgreSQL', async () => {
    await pool.query('SELECT 1');
  });
  await ensureSchema(pool);

  const store = new PostgresCredentialStore(pool);
  const tokenService = new TokenService({
    secret: config.auth.jwtSecret,
    ttlSeconds: config.auth.tokenTtlSeconds,
  });

  const services: AppServices = {
    tokenService,
    authService: new AuthService(new GoogleIdentityBridge(config.google), store, tokenService),
    apiKeyService: new ApiKeyService({
      store,
      prefix: config.auth.apiKeyPrefix,
      maxActiveKeys: config.auth.maxActiveKeys,
      cache: new RedisApiKeyCache(redis),
    }),
    paymentService: new PaymentService({
      store,
      provider: new PaystackClient(config.paystack),
      webhookSecret: config.paystack.webhookSecret,
      deliveryLog: new RedisWebhookDeliveryLog(redis),
    }),
    walletService: new WalletService(store),
    healthProbes: {
      postgres: () => store.ping(),
      redis: () => redis.ping(),
    },
  };

  return buildApp(services, {
    env: config.env,
    corsOrigins: config.server.corsOrigins,
    docs: true,
    rateLimit: { max: 300, timeWindow: '1 minute', redis },
  });
}
