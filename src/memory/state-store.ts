import Redis from 'ioredis';
import { ConversationState } from '../state/conversation-state';
import { env } from '../config/env';
import { logger } from '../observability/logger';
import { InvalidStateError } from '../errors/app-errors';

export interface ConversationStateStore {
  /** Null when nothing is stored; rejects with `InvalidStateError` on a corrupt record */
  get(tenantId: string, conversationId: string): Promise<ConversationState | null>;
  /** Validates, then writes the persisted JSON (no transient keys) */
  save(state: ConversationState): Promise<void>;
  delete(tenantId: string, conversationId: string): Promise<void>;
}

/**
 * Parse a stored payload. A record that is not JSON or breaks a state
 * invariant throws `InvalidStateError`; it is never replaced by a new state.
 */
function decode(raw: string): ConversationState {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (err) {
    throw new InvalidStateError('payload', `not valid JSON (${err instanceof Error ? err.message : String(err)})`);
  }
  return ConversationState.fromJSON(payload);
}

/**
 * Redis-backed state store.
 */
export class RedisConversationStateStore implements ConversationStateStore {
  private readonly prefix: string;

  constructor(
    private readonly redis: Redis,
    private readonly ttlSeconds: number = env.state.ttlSeconds,
  ) {
    this.prefix = `${env.redis.keyPrefix}state:`;
  }

  private key(tenantId: string, conversationId: string): string {
    return `${this.prefix}${tenantId}:${conversationId}`;
  }

  async get(tenantId: string, conversationId: string): Promise<ConversationState | null> {
    const raw = await this.redis.get(this.key(tenantId, conversationId));
    return raw ? decode(raw) : null;
  }

  async save(state: ConversationState): Promise<void> {
    const payload = JSON.stringify(state.toJSON());
    await this.redis.set(this.key(state.tenantId, state.conversationId), payload, 'EX', this.ttlSeconds);
  }

  async delete(tenantId: string, conversationId: string): Promise<void> {
    await this.redis.del(this.key(tenantId, conversationId));
  }
}

/**
 * In-memory state store (dev/test fallback). Keeps serialized JSON so a
 * reload goes through the same validation as Redis.
 */
export class InMemoryConversationStateStore implements ConversationStateStore {
  private readonly store = new Map<string, string>();

  async get(tenantId: string, conversationId: string): Promise<ConversationState | null> {
    const raw = this.store.get(`${tenantId}:${conversationId}`);
    return raw ? decode(raw) : null;
  }

  async save(state: ConversationState): Promise<void> {
    this.store.set(`${state.tenantId}:${state.conversationId}`, JSON.stringify(state.toJSON()));
  }

  async delete(tenantId: string, conversationId: string): Promise<void> {
    this.store.delete(`${tenantId}:${conversationId}`);
  }

  /** Test helper: overwrite the raw persisted payload */
  putRaw(tenantId: string, conversationId: string, raw: string): void {
    this.store.set(`${tenantId}:${conversationId}`, raw);
  }

  /** Test helper: the raw persisted payload */
  raw(tenantId: string, conversationId: string): string | undefined {
    return this.store.get(`${tenantId}:${conversationId}`);
  }
}

export function createConversationStateStore(redis?: Redis): ConversationStateStore {
  if (redis) {
    return new RedisConversationStateStore(redis);
  }
  logger.warn('Using in-memory conversation state store (no Redis)');
  return new InMemoryConversationStateStore();
}
