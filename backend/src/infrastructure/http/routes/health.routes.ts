/**
 * Health Check Routes
 * Provides system status for monitoring and load balancers
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { HealthCheckResponse, ServiceHealth, ServiceHealthMap } from '@walletgate/shared';
import { createLogger } from '../../logging/logger.js';

const logger = createLogger('health-routes');

/** Resolves when the dependency answers, rejects otherwise */
export type HealthProbe = () => Promise<unknown>;

export interface HealthRoutesOptions {
  probes: Record<keyof ServiceHealthMap, HealthProbe>;
  version: string;
}

const serviceSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['up', 'down'] },
    latencyMs: { type: 'number' },
  },
} as const;

const healthResponseSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['healthy', 'degraded', 'unhealthy'] },
    version: { type: 'string' },
    uptime: { type: 'number', description: 'Server uptime in seconds' },
    timestamp: { type: 'string', format: 'date-time' },
    services: {
      type: 'object',
      properties: {
        postgres: serviceSchema,
        redis: serviceSchema,
      },
    },
  },
} as const;

async function probe(name: string, check: HealthProbe): Promise<ServiceHealth> {
  const startedAt = Date.now();
  try {
    await check();
    return { status: 'up', latencyMs: Date.now() - startedAt };
  } catch (error) {
    logger.warn({ service: name, error: error instanceof Error ? error.message : String(error) }, 'Health probe failed');
    return { status: 'down' };
  }
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (
  fastify: FastifyInstance,
  options: HealthRoutesOptions
): Promise<void> => {
  // GET /health - Full health check
  fastify.get('/health', {
    schema: {
      tags: ['Health'],
      summary: 'System health check',
      description: 'Returns the health status of PostgreSQL and Redis. Redis is optional, so its loss only degrades the service.',
      response: {
        200: healthResponseSchema,
        503: healthResponseSchema,
      },
    },
  }, async (_request, reply) => {
    const [postgres, redis] = await Promise.all([
      probe('postgres', options.probes.postgres),
      probe('redis', options.probes.redis),
    ]);

    let status: HealthCheckResponse['status'] = 'healthy';
    if (postgres.status === 'down') {
      status = 'unhealthy';
    } else if (redis.status === 'down') {
      status = 'degraded';
    }

    const response: HealthCheckResponse = {
      status,
      version: options.version,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      services: { postgres, redis },
    };

    return reply.status(status === 'unhealthy' ? 503 : 200).send(response);
  });

  // GET /ready - Kubernetes readiness probe
  fastify.get('/ready', {
    schema: {
      tags: ['Health'],
      summary: 'Readiness probe',
      description: 'Indicates if the server can reach its database.',
      response: {
        200: { type: 'object', properties: { ready: { type: 'boolean' } } },
        503: { type: 'object', properties: { ready: { type: 'boolean' } } },
      },
    },
  }, async (_request, reply) => {
    const postgres = await probe('postgres', options.probes.postgres);
    const ready = postgres.status === 'up';
    return reply.status(ready ? 200 : 503).send({ ready });
  });

  // GET /live - Kubernetes liveness probe
  fastify.get('/live', {
    schema: {
      tags: ['Health'],
      summary: 'Liveness probe',
      description: 'Indicates if the server process is alive.',
      response: {
        200: {
          type: 'object',
          properties: {
            live: { type: 'boolean' },
          },
        },
      },
    },
  }, async (_request, reply) => {
    return reply.send({ live: true });
  });
};
