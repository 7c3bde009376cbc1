/**
 * Health check routes
 *
 * - GET /health/live:  the process is up; nothing else is checked
 * - GET /health/ready: every checker runs; 503 when a critical one fails
 */

import {
  LivenessResponseSchema,
  ReadinessResponseSchema,
  type LivenessResponse,
  type ReadinessResponse,
} from '../../core/types.js';
import { getReadiness } from '../../core/usecases/get-readiness.js';

import type { HealthChecker } from '../../core/ports.js';
import type { FastifyPluginAsync } from 'fastify';

export interface MakeHealthRoutesDeps {
  version?: string | undefined;
  checkers?: HealthChecker[];
  /** Epoch ms the uptime is counted from; defaults to route registration */
  startedAt?: number;
}

const NO_STORE = 'no-store';

export const makeHealthRoutes = (deps: MakeHealthRoutesDeps = {}): FastifyPluginAsync => {
  const { version, checkers = [] } = deps;
  const startedAt = deps.startedAt ?? Date.now();

  return async (fastify) => {
    fastify.get<{ Reply: LivenessResponse }>(
      '/health/live',
      { schema: { response: { 200: LivenessResponseSchema } } },
      async (_request, reply) => reply.header('cache-control', NO_STORE).status(200).send({ status: 'ok' })
    );

    fastify.get<{ Reply: ReadinessResponse }>(
      '/health/ready',
      {
        schema: {
          response: {
            200: ReadinessResponseSchema,
            503: ReadinessResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const readiness = await getReadiness(
          { version, checkers },
          {
            uptime: Math.floor((Date.now() - startedAt) / 1000),
            timestamp: new Date().toISOString(),
          }
        );

        const failing = readiness.checks.filter((check) => check.status === 'unhealthy');
        if (failing.length > 0) {
          request.log.warn(
            { status: readiness.status, failing: failing.map((check) => check.name) },
            'Readiness check failed'
          );
        }

        return reply
          .header('cache-control', NO_STORE)
          .status(readiness.status === 'unhealthy' ? 503 : 200)
          .send(readiness);
      }
    );
  };
};
