import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

function optionalFloat(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseFloat(val) : fallback;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

const nodeEnv = optional('NODE_ENV', 'development');

export const env = {
  nodeEnv,
  port: optionalInt('PORT', 3000),
  // Tests stay quiet unless LOG_LEVEL asks otherwise
  logLevel: optional('LOG_LEVEL', nodeEnv === 'test' ? 'silent' : 'info'),

  // ───── Classifier LLM ─────
  openai: {
    apiKey: optional('OPENAI_API_KEY', ''),
    model: optional('OPENAI_MODEL', 'gpt-4o-mini'),
    maxTokens: optionalInt('OPENAI_MAX_TOKENS', 256),
    temperature: optionalFloat('OPENAI_TEMPERATURE', 0),
    timeoutMs: optionalInt('OPENAI_TIMEOUT_MS', 10000),
  },

  llmBudget: {
    maxTokensPerConversation: optionalInt('LLM_MAX_TOKENS_PER_CONVERSATION', 50_000),
    dailyBudgetPerTenant: optionalFloat('LLM_DAILY_BUDGET_PER_TENANT', 20),
  },

  // Empty URL → in-memory stores
  redis: {
    url: optional('REDIS_URL', ''),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'orchestrator:'),
  },

  // ───── Deduplication / burst coalescing ─────
  dedup: {
    lockTtlSeconds: optionalInt('DEDUP_LOCK_TTL_SECONDS', 300),
    stateTtlSeconds: optionalInt('DEDUP_STATE_TTL_SECONDS', 600),
  },

  burst: {
    windowMs: optionalInt('BURST_WINDOW_MS', 5000),
    maxBufferSize: optionalInt('BURST_MAX_BUFFER_SIZE', 10),
  },

  // ───── Governance rate limits ─────
  rateLimit: {
    messagesPerHour: optionalInt('RATE_LIMIT_MESSAGES_PER_HOUR', 60),
    messagesPerMinute: optionalInt('RATE_LIMIT_MESSAGES_PER_MINUTE', 10),
    spamCooldownMinutes: optionalInt('RATE_LIMIT_SPAM_COOLDOWN_MINUTES', 30),
    abuseCooldownHours: optionalInt('RATE_LIMIT_ABUSE_COOLDOWN_HOURS', 24),
  },

  state: {
    ttlSeconds: optionalInt('STATE_TTL_SECONDS', 7 * 24 * 60 * 60),
  },

  observability: {
    enableMetrics: optionalBool('ENABLE_METRICS', true),
  },

  defaultTenantId: optional('DEFAULT_TENANT_ID', 'default'),
} as const;
