import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import Redis from 'ioredis';
import { env } from './config/env';
import { logger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { AgentCore } from './agent/agent-core';
import { PromptManager } from './agent/prompt-manager';
import { buildProviders } from './llm/provider-factory';
import { ModelRouter } from './llm/model-router';
import { LLMProvider, LLMProviderName, ModelRouterConfig, isProviderName } from './llm/types';
import { ChannelOutbound } from './channels/types';
import { WhatsAppOutboundAdapter } from './channels/whatsapp-adapter';
import { registerWhatsAppWebhook } from './channels/whatsapp-webhook';
import { TurnQueue } from './channels/turn-queue';
import { ActionDispatcher } from './orchestrator/action-dispatcher';
import { Orchestrator } from './orchestrator/orchestrator';
import { registerAdminRoutes } from './admin/admin-routes';
import { registerHealthRoutes } from './health/health-routes';
import { createRestaurantRepository } from './restaurant/restaurant-store';
import { OrderService } from './restaurant/order-service';
import { RestaurantRepository } from './restaurant/types';
import { createSessionStore, DEFAULT_SESSION_OPTIONS } from './session/session-store';
import { SessionStore } from './session/types';
import { createUsageTracker, DEFAULT_PRICING } from './usage/usage-tracker';
import { UsageTracker } from './usage/types';

/**
 * Everything buildApp would otherwise construct from the environment.
 * Tests pass in-memory stores, fake providers and a recording outbound.
 */
export interface AppOverrides {
  /** `null` runs without Redis; omitted connects to REDIS_URL */
  redis?: Redis | null;
  providers?: Map<LLMProviderName, LLMProvider>;
  outbound?: ChannelOutbound;
  prompts?: PromptManager;
  repo?: RestaurantRepository;
  sessions?: SessionStore;
  usage?: UsageTracker;
  queue?: TurnQueue;
  verifyToken?: string;
  now?: () => number;
}

export interface AppContext {
  app: FastifyInstance;
  redis?: Redis;
  orchestrator: Orchestrator;
  queue: TurnQueue;
}

async function connectRedis(): Promise<Redis | undefined> {
  try {
    const redisInstance = new Redis(env.redis.url, {
      maxRetriesPerRequest: 3,
      commandTimeout: env.store.timeoutMs,
      retryStrategy(times) {
        if (times > 5) return null; // stop retrying
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach error handler BEFORE connect to prevent unhandled error events
    redisInstance.on('error', (err) => {
      logger.debug({ err: err.message }, 'Redis connection error (handled)');
    });
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    return undefined;
  }
}

function routerConfigFromEnv(): ModelRouterConfig {
  const primary = env.llm.primaryProvider;
  const secondary = env.llm.secondaryProvider;
  if (!isProviderName(primary)) {
    throw new Error(`LLM_PRIMARY_PROVIDER must be one of gemini, openai, anthropic (got "${primary}")`);
  }
  if (secondary && !isProviderName(secondary)) {
    throw new Error(`LLM_SECONDARY_PROVIDER must be one of gemini, openai, anthropic (got "${secondary}")`);
  }
  return { primaryProvider: primary, secondaryProvider: secondary && isProviderName(secondary) ? secondary : undefined };
}

export async function buildApp(overrides: AppOverrides = {}): Promise<AppContext> {
  const now = overrides.now ?? Date.now;

  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST', 'PATCH'],
  });

  // Request timing
  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });

  // Internal errors never reach the caller verbatim
  app.setErrorHandler((err, req, reply) => {
    const statusCode = err.statusCode ?? 500;
    if (statusCode >= 500) {
      logger.error({ err, url: req.url }, 'Request failed');
      return reply.status(statusCode).send({ error: 'Internal server error' });
    }
    return reply.status(statusCode).send({ error: err.message });
  });

  // ───── Stores ─────
  const redis = overrides.redis === undefined ? await connectRedis() : overrides.redis ?? undefined;

  const sessions = overrides.sessions ?? createSessionStore(redis, DEFAULT_SESSION_OPTIONS);
  const usage = overrides.usage ?? createUsageTracker(redis, DEFAULT_PRICING);
  const repo = overrides.repo ?? await createRestaurantRepository(redis);
  const prompts = overrides.prompts ?? new PromptManager();

  // ───── Multi-LLM Provider Stack ─────
  const providers = overrides.providers ?? buildProviders(env);
  const routerConfig = routerConfigFromEnv();
  const modelRouter = new ModelRouter(routerConfig, providers);
  const agent = new AgentCore(modelRouter, env[routerConfig.primaryProvider].timeoutMs + 5_000);

  logger.info({
    primary: modelRouter.primaryProviderName,
    model: modelRouter.primaryModel,
    secondary: routerConfig.secondaryProvider,
    providerCount: providers.size,
  }, 'Multi-LLM stack initialized');

  // ───── Engine ─────
  const orders = new OrderService(repo, now);
  const dispatcher = new ActionDispatcher(repo, orders);
  const orchestrator = new Orchestrator({
    sessions,
    usage,
    repo,
    agent,
    dispatcher,
    prompts,
    pricing: DEFAULT_PRICING,
    historyTurns: env.session.historyTurns,
    feedbackDelayMinutes: env.session.feedbackDelayMinutes,
    now,
  });

  // ───── Routes ─────
  const queue = registerWhatsAppWebhook(app, {
    orchestrator,
    outbound: overrides.outbound ?? new WhatsAppOutboundAdapter(),
    verifyToken: overrides.verifyToken ?? env.whatsapp.verifyToken,
    queue: overrides.queue,
  });
  registerAdminRoutes(app, {
    usage,
    repo,
    orders,
    prompts,
    displayCurrency: DEFAULT_PRICING.displayCurrency,
    now,
  });
  registerHealthRoutes(app, { repo, agent, queue, redis });

  app.get('/', async (_req, reply) => reply.send({ message: `${env.appName} API`, status: 'running' }));

  return { app, redis, orchestrator, queue };
}
