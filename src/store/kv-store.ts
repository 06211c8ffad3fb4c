import Redis from 'ioredis';
import { KeyValueStore } from './types';
import { env } from '../config/env';
import { logger } from '../observability/logger';

const COMPARE_AND_DELETE = `
if redis.call('get', KEYS[1]) == ARGV[1] then
  return redis.call('del', KEYS[1])
end
return 0
`;

// ───── Redis Implementation ─────────────────────────────────────

export class RedisKeyValueStore implements KeyValueStore {
  constructor(
    private readonly redis: Redis,
    private readonly prefix: string = env.redis.keyPrefix,
  ) {}

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    // SET NX returns 'OK' if key was set, null if it already exists
    const result = await this.redis.set(this.k(key), value, 'EX', ttlSeconds, 'NX');
    return result === 'OK';
  }

  async get(key: string): Promise<string | null> {
    return this.redis.get(this.k(key));
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.redis.set(this.k(key), value, 'EX', ttlSeconds);
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(this.k(key));
  }

  async deleteIfEquals(key: string, expected: string): Promise<boolean> {
    const result = await this.redis.eval(COMPARE_AND_DELETE, 1, this.k(key), expected);
    return result === 1;
  }

  async increment(key: string, ttlSeconds: number): Promise<number> {
    const results = await this.redis.multi().incr(this.k(key)).expire(this.k(key), ttlSeconds).exec();
    const [incrErr, count] = results?.[0] ?? [null, null];
    if (incrErr) throw incrErr;
    if (typeof count !== 'number') {
      throw new Error(`INCR on ${key} returned no value`);
    }
    return count;
  }

  async ttl(key: string): Promise<number | null> {
    const seconds = await this.redis.ttl(this.k(key));
    return seconds >= 0 ? seconds : null;
  }

  private k(key: string): string {
    return `${this.prefix}${key}`;
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

interface MemoryEntry {
  value: string;
  expiresAt: number;
}

export class InMemoryKeyValueStore implements KeyValueStore {
  private readonly entries = new Map<string, MemoryEntry>();

  constructor() {
    // Cleanup expired entries every 60s
    setInterval(() => this.evict(), 60_000).unref();
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    if (this.live(key)) return false;
    this.entries.set(key, { value, expiresAt: Date.now() + ttlSeconds * 1000 });
    return true;
  }

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: Date.now() + ttlSeconds * 1000 });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async deleteIfEquals(key: string, expected: string): Promise<boolean> {
    const entry = this.live(key);
    if (!entry || entry.value !== expected) return false;
    this.entries.delete(key);
    return true;
  }

  async increment(key: string, ttlSeconds: number): Promise<number> {
    const current = this.live(key);
    const next = (current ? parseInt(current.value, 10) || 0 : 0) + 1;
    this.entries.set(key, { value: String(next), expiresAt: Date.now() + ttlSeconds * 1000 });
    return next;
  }

  async ttl(key: string): Promise<number | null> {
    const entry = this.live(key);
    if (!entry) return null;
    return Math.ceil((entry.expiresAt - Date.now()) / 1000);
  }

  /** Number of live keys (test helper) */
  size(): number {
    this.evict();
    return this.entries.size;
  }

  private live(key: string): MemoryEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private evict(): void {
    const now = Date.now();
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) this.entries.delete(key);
    }
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createKeyValueStore(redis?: Redis): KeyValueStore {
  if (redis) {
    logger.info('Key-value store: Redis-backed');
    return new RedisKeyValueStore(redis);
  }
  logger.info('Key-value store: In-memory');
  return new InMemoryKeyValueStore();
}
