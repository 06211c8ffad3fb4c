import { FastifyInstance } from 'fastify';
import Redis from 'ioredis';
import { LLMProvider } from '../llm/types';
import { env } from '../config/env';
import { getMetrics, getContentType } from '../observability/metrics';

type CheckStatus = 'ok' | 'error' | 'skipped';

export function registerHealthRoutes(app: FastifyInstance, redis?: Redis, llm?: LLMProvider): void {
  /** Liveness probe */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /** Readiness probe: Redis and the classifier LLM, when configured */
  app.get('/ready', async (_req, reply) => {
    const checks: Record<string, { status: CheckStatus; latencyMs?: number }> = {};

    if (redis) {
      const start = Date.now();
      try {
        await redis.ping();
        checks.redis = { status: 'ok', latencyMs: Date.now() - start };
      } catch {
        checks.redis = { status: 'error', latencyMs: Date.now() - start };
      }
    } else {
      checks.redis = { status: 'skipped' };
    }

    if (llm) {
      const start = Date.now();
      const healthy = await llm.healthCheck();
      checks[`llm_${llm.name}`] = { status: healthy ? 'ok' : 'error', latencyMs: Date.now() - start };
    } else {
      checks.llm = { status: 'skipped' };
    }

    const allOk = Object.values(checks).every((c) => c.status !== 'error');
    return reply.status(allOk ? 200 : 503).send({
      status: allOk ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  if (env.observability.enableMetrics) {
    app.get('/metrics', async (_req, reply) => {
      const metrics = await getMetrics();
      reply.header('Content-Type', getContentType());
      return reply.send(metrics);
    });
  }
}
