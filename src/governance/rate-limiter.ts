/**
 * Conversation Rate Limiter
 *
 * Per-(tenant, customer) limits on the shared key-value store:
 * messages per hour / per minute in fixed buckets, plus the spam and abuse
 * cooldowns the governance engine applies. Counters are only ever changed
 * through the store's atomic increment.
 */

import { KeyValueStore } from '../store/types';
import { RateLimitReason } from '../routing/types';
import { env } from '../config/env';
import { logger } from '../observability/logger';

export interface RateLimits {
  messagesPerHour: number;
  messagesPerMinute: number;
  spamCooldownMinutes: number;
  abuseCooldownHours: number;
}

const DEFAULT_LIMITS: RateLimits = {
  messagesPerHour: env.rateLimit.messagesPerHour,
  messagesPerMinute: env.rateLimit.messagesPerMinute,
  spamCooldownMinutes: env.rateLimit.spamCooldownMinutes,
  abuseCooldownHours: env.rateLimit.abuseCooldownHours,
};

export interface RateLimitStatus {
  allowed: boolean;
  reason: RateLimitReason;
  retryAfterSeconds: number;
  currentCounts: { hour?: number; minute?: number };
}

type LimitKind = 'hour' | 'minute' | 'spam_cooldown' | 'abuse_cooldown';

const HOUR_MS = 3_600_000;
const MINUTE_MS = 60_000;

export class ConversationRateLimiter {
  private readonly log = logger.child({ component: 'rate-limiter' });
  private readonly limits: RateLimits;

  constructor(
    private readonly store: KeyValueStore,
    limits?: Partial<RateLimits>,
  ) {
    this.limits = { ...DEFAULT_LIMITS, ...limits };
  }

  async checkRateLimit(tenantId: string, customerId: string, now: number = Date.now()): Promise<RateLimitStatus> {
    const spamRemaining = await this.cooldownRemaining(tenantId, customerId, 'spam_cooldown', now);
    if (spamRemaining > 0) {
      return { allowed: false, reason: 'spam_cooldown', retryAfterSeconds: spamRemaining, currentCounts: {} };
    }

    const abuseRemaining = await this.cooldownRemaining(tenantId, customerId, 'abuse_cooldown', now);
    if (abuseRemaining > 0) {
      return { allowed: false, reason: 'abuse_cooldown', retryAfterSeconds: abuseRemaining, currentCounts: {} };
    }

    const hour = await this.readCount(this.key(tenantId, customerId, 'hour', now));
    const minute = await this.readCount(this.key(tenantId, customerId, 'minute', now));
    const currentCounts = { hour, minute };

    if (hour >= this.limits.messagesPerHour) {
      return { allowed: false, reason: 'hourly_limit_exceeded', retryAfterSeconds: 3600, currentCounts };
    }
    if (minute >= this.limits.messagesPerMinute) {
      return { allowed: false, reason: 'minute_limit_exceeded', retryAfterSeconds: 60, currentCounts };
    }

    return { allowed: true, reason: 'within_limits', retryAfterSeconds: 0, currentCounts };
  }

  async incrementMessageCount(tenantId: string, customerId: string, now: number = Date.now()): Promise<{ hour: number; minute: number }> {
    const hour = await this.store.increment(this.key(tenantId, customerId, 'hour', now), 3600);
    const minute = await this.store.increment(this.key(tenantId, customerId, 'minute', now), 60);
    this.log.debug({ tenantId, customerId, hour, minute }, 'Message counted');
    return { hour, minute };
  }

  async applySpamCooldown(tenantId: string, customerId: string, now: number = Date.now()): Promise<number> {
    const seconds = this.limits.spamCooldownMinutes * 60;
    const until = now + seconds * 1000;
    await this.store.set(this.key(tenantId, customerId, 'spam_cooldown'), String(until), seconds);
    this.log.warn({ tenantId, customerId, until: new Date(until).toISOString() }, 'Spam cooldown applied');
    return until;
  }

  async applyAbuseCooldown(tenantId: string, customerId: string, now: number = Date.now()): Promise<number> {
    const seconds = this.limits.abuseCooldownHours * 3600;
    const until = now + seconds * 1000;
    await this.store.set(this.key(tenantId, customerId, 'abuse_cooldown'), String(until), seconds);
    this.log.error({ tenantId, customerId, until: new Date(until).toISOString() }, 'Abuse cooldown applied');
    return until;
  }

  /** Snapshot of counters and cooldowns for one customer */
  async getStatus(tenantId: string, customerId: string, now: number = Date.now()) {
    return {
      hour: await this.readCount(this.key(tenantId, customerId, 'hour', now)),
      minute: await this.readCount(this.key(tenantId, customerId, 'minute', now)),
      spamCooldownSeconds: await this.cooldownRemaining(tenantId, customerId, 'spam_cooldown', now),
      abuseCooldownSeconds: await this.cooldownRemaining(tenantId, customerId, 'abuse_cooldown', now),
      limits: { ...this.limits },
    };
  }

  private async cooldownRemaining(tenantId: string, customerId: string, kind: LimitKind, now: number): Promise<number> {
    const raw = await this.store.get(this.key(tenantId, customerId, kind));
    if (!raw) return 0;
    const until = Number(raw);
    if (!Number.isFinite(until)) return 0;
    return Math.max(0, Math.ceil((until - now) / 1000));
  }

  private async readCount(key: string): Promise<number> {
    const raw = await this.store.get(key);
    return raw ? parseInt(raw, 10) || 0 : 0;
  }

  private key(tenantId: string, customerId: string, kind: LimitKind, now?: number): string {
    const base = `rate_limit:${tenantId}:${customerId}:${kind}`;
    if (kind === 'hour' && now !== undefined) return `${base}:${Math.floor(now / HOUR_MS)}`;
    if (kind === 'minute' && now !== undefined) return `${base}:${Math.floor(now / MINUTE_MS)}`;
    return base;
  }
}
