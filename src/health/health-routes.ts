import { FastifyInstance } from 'fastify';
import Redis from 'ioredis';
import { AgentCore } from '../agent/agent-core';
import { TurnQueue } from '../channels/turn-queue';
import { env } from '../config/env';
import { logger } from '../observability/logger';
import { getContentType, getMetrics } from '../observability/metrics';
import { RestaurantRepository } from '../restaurant/types';

export interface HealthDeps {
  repo: RestaurantRepository;
  agent: AgentCore;
  queue: TurnQueue;
  /** Absent when every store runs in memory */
  redis?: Redis;
}

export interface ReadinessCheck {
  status: 'ok' | 'error' | 'skipped';
  latencyMs?: number;
  detail?: string;
}

const log = logger.child({ component: 'health' });

/** Runs one dependency check; a throw marks it failed. */
async function runCheck(name: string, check: () => Promise<string>): Promise<ReadinessCheck> {
  const start = Date.now();
  try {
    const detail = await check();
    return { status: 'ok', latencyMs: Date.now() - start, detail };
  } catch (err) {
    log.warn({ err, check: name }, 'Readiness check failed');
    return {
      status: 'error',
      latencyMs: Date.now() - start,
      detail: err instanceof Error ? err.message : String(err),
    };
  }
}

export function registerHealthRoutes(app: FastifyInstance, deps: HealthDeps): void {
  app.get('/health', async (_req, reply) => {
    return reply.send({
      status: 'ok',
      uptimeSeconds: Math.round(process.uptime()),
      timestamp: new Date().toISOString(),
    });
  });

  /**
   * Ready when a turn could run end to end: the catalog is readable and
   * non-empty, Redis answers (when configured) and every provider is healthy.
   */
  app.get('/ready', async (_req, reply) => {
    const { repo, agent, queue, redis } = deps;

    const checks: Record<string, ReadinessCheck> = {
      catalog: await runCheck('catalog', async () => {
        const items = await repo.listMenuItems();
        if (items.length === 0) throw new Error('menu is empty');
        return `${items.length} menu items`;
      }),
      redis: redis
        ? await runCheck('redis', () => redis.ping())
        : { status: 'skipped', detail: 'in-memory stores' },
    };

    for (const [provider, health] of Object.entries(await agent.healthCheck())) {
      checks[`llm_${provider}`] = health;
    }

    const ready = Object.values(checks).every((check) => check.status !== 'error');
    return reply.status(ready ? 200 : 503).send({
      status: ready ? 'ready' : 'not_ready',
      checks,
      pendingTurns: queue.activeKeys,
      timestamp: new Date().toISOString(),
    });
  });

  if (env.observability.enableMetrics) {
    app.get('/metrics', async (_req, reply) => {
      reply.header('Content-Type', getContentType());
      return reply.send(await getMetrics());
    });
  }
}
