import Fastify, { FastifyInstance } from 'fastify';
import Redis from 'ioredis';
import { env } from './config/env';
import { ConfigService } from './config/config-service';
import { logger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { createKeyValueStore } from './store/kv-store';
import { KeyValueStore } from './store/types';
import { ConversationStateStore, createConversationStateStore } from './memory/state-store';
import { Classifier } from './classification/types';
import { HeuristicClassifier } from './classification/heuristic-classifier';
import { LlmClassifier } from './classification/llm-classifier';
import { FallbackClassifier } from './classification/fallback-classifier';
import { OpenAIProvider } from './llm/providers/openai-provider';
import { LLMCostLimiter } from './llm/cost-limiter';
import { LLMProvider } from './llm/types';
import { GovernanceEngine } from './governance/governance-engine';
import { ConversationRateLimiter } from './governance/rate-limiter';
import { EscalationDetector } from './routing/escalation-detector';
import { IntentRouter } from './routing/intent-router';
import { InMemoryHandoffService } from './handoff/in-memory-handoff';
import { HandoffService } from './handoff/types';
import { CatalogSearch, InMemoryCatalogSearch } from './catalog/catalog-search';
import { createJourneyExecutors } from './journeys';
import { JourneyOrchestrator } from './orchestrator/journey-orchestrator';
import { CustomerResolver, JourneyExecutors } from './orchestrator/types';
import { MessageDeduplicationLock } from './dedup/message-lock';
import { BurstOptions } from './dedup/burst-coalescer';
import { MessageIntake, ReplySender } from './intake/message-intake';
import { registerMessageWebhook } from './channels/webhook';
import { registerHealthRoutes } from './health/health-routes';

/** Collaborators that callers (tests, embedding services) may replace */
export interface AppOverrides {
  classifier: Classifier;
  kvStore: KeyValueStore;
  stateStore: ConversationStateStore;
  handoff: HandoffService;
  catalogSearch: CatalogSearch;
  customers: CustomerResolver;
  journeys: Partial<JourneyExecutors>;
  replySender: ReplySender;
  burst: Partial<BurstOptions>;
}

export interface AppContext {
  app: FastifyInstance;
  redis?: Redis;
  intake: MessageIntake;
  orchestrator: JourneyOrchestrator;
  handoff: HandoffService;
  stateStore: ConversationStateStore;
}

export async function buildApp(overrides: Partial<AppOverrides> = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
  });

  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });

  const redis = await connectRedis();

  // ───── Stores ─────
  const kvStore = overrides.kvStore ?? createKeyValueStore(redis);
  const stateStore = overrides.stateStore ?? createConversationStateStore(redis);
  const handoff = overrides.handoff ?? new InMemoryHandoffService();

  // ───── Classification ─────
  let llm: LLMProvider | undefined;
  let classifier = overrides.classifier;
  if (!classifier) {
    if (env.openai.apiKey) {
      llm = new OpenAIProvider({
        apiKey: env.openai.apiKey,
        model: env.openai.model,
        maxTokens: env.openai.maxTokens,
        temperature: env.openai.temperature,
        timeoutMs: env.openai.timeoutMs,
      });
      const costLimiter = new LLMCostLimiter(env.llmBudget);
      const primary = new LlmClassifier(llm, costLimiter, {
        maxTokens: env.openai.maxTokens,
        temperature: env.openai.temperature,
      });
      classifier = new FallbackClassifier(primary);
      logger.info({ model: env.openai.model }, 'LLM classifier enabled with heuristic fallback');
    } else {
      classifier = new HeuristicClassifier();
      logger.warn('OPENAI_API_KEY not set; using heuristic classifier only');
    }
  }

  // ───── Orchestration ─────
  const orchestrator = new JourneyOrchestrator({
    classifier,
    tenants: new ConfigService(),
    customers: overrides.customers,
    governance: new GovernanceEngine(new ConversationRateLimiter(kvStore)),
    escalation: new EscalationDetector(),
    router: new IntentRouter(),
    journeys: createJourneyExecutors({
      handoff,
      catalogSearch: overrides.catalogSearch ?? new InMemoryCatalogSearch(),
      overrides: overrides.journeys,
    }),
    handoff,
    stateStore,
  });

  const intake = new MessageIntake(
    orchestrator,
    new MessageDeduplicationLock(kvStore),
    overrides.replySender,
    overrides.burst,
  );

  // ───── Routes ─────
  registerHealthRoutes(app, redis, llm);
  registerMessageWebhook(app, intake);

  return { app, redis, intake, orchestrator, handoff, stateStore };
}

/** Connect when REDIS_URL is set; otherwise every store runs in memory */
async function connectRedis(): Promise<Redis | undefined> {
  if (!env.redis.url) return undefined;
  try {
    const redis = new Redis(env.redis.url, {
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 5) return null; // stop retrying
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach error handler BEFORE connect to prevent unhandled error events
    redis.on('error', (err) => {
      logger.debug({ err: err.message }, 'Redis connection error (handled)');
    });
    await redis.connect();
    logger.info('Redis connected');
    return redis;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    return undefined;
  }
}
