/**
 * Burst Coalescer
 *
 * Customers often send one thought as several quick messages. A message
 * that arrives within the burst window of the previous one for the same
 * conversation is buffered; the buffer drains as one turn (texts joined by
 * newline) once the window passes with no new message, or immediately when
 * it reaches the size cap.
 */

import { env } from '../config/env';
import { logger } from '../observability/logger';
import { burstBatches } from '../observability/metrics';

export interface BufferedMessage {
  messageId: string;
  text: string;
  receivedAt: number;
  phone?: string;
  customerId?: string;
}

export type DrainTrigger = 'quiet' | 'buffer_full' | 'flush';

export interface BurstBatch {
  tenantId: string;
  conversationId: string;
  messages: BufferedMessage[];
  text: string;
  trigger: DrainTrigger;
}

export type OfferResult = 'immediate' | 'queued';

export interface BurstOptions {
  windowMs: number;
  maxBufferSize: number;
  now: () => number;
}

interface Buffer {
  tenantId: string;
  conversationId: string;
  messages: BufferedMessage[];
  timer: NodeJS.Timeout;
}

const PRUNE_THRESHOLD = 10_000;

export class BurstCoalescer {
  private readonly log = logger.child({ component: 'burst-coalescer' });
  private readonly options: BurstOptions;
  private readonly buffers = new Map<string, Buffer>();
  private readonly lastInbound = new Map<string, number>();
  private readonly inflight = new Set<Promise<void>>();

  constructor(
    private readonly onDrain: (batch: BurstBatch) => Promise<void>,
    options: Partial<BurstOptions> = {},
  ) {
    this.options = {
      windowMs: env.burst.windowMs,
      maxBufferSize: env.burst.maxBufferSize,
      now: () => Date.now(),
      ...options,
    };
  }

  /**
   * `immediate`: the caller processes the message now.
   * `queued`: the message joins a burst that drains later.
   */
  offer(tenantId: string, conversationId: string, message: BufferedMessage): OfferResult {
    const key = `${tenantId}:${conversationId}`;
    const now = this.options.now();
    const previous = this.lastInbound.get(key);
    this.lastInbound.set(key, now);
    this.prune(now);

    const existing = this.buffers.get(key);
    if (existing) {
      existing.messages.push(message);
      clearTimeout(existing.timer);
      if (existing.messages.length >= this.options.maxBufferSize) {
        this.log.info({ tenantId, conversationId, size: existing.messages.length }, 'Burst buffer full; draining');
        this.startDrain(key, 'buffer_full');
      } else {
        existing.timer = this.schedule(key);
      }
      return 'queued';
    }

    if (previous !== undefined && now - previous < this.options.windowMs) {
      this.buffers.set(key, { tenantId, conversationId, messages: [message], timer: this.schedule(key) });
      this.log.debug({ tenantId, conversationId }, 'Message queued for burst');
      return 'queued';
    }

    return 'immediate';
  }

  pending(tenantId: string, conversationId: string): number {
    return this.buffers.get(`${tenantId}:${conversationId}`)?.messages.length ?? 0;
  }

  /** Drain every buffer now and wait for all drains, including ones already running */
  async flushAll(): Promise<void> {
    for (const key of [...this.buffers.keys()]) this.startDrain(key, 'flush');
    await this.idle();
  }

  /** Resolves once no drain is running */
  async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  private schedule(key: string): NodeJS.Timeout {
    return setTimeout(() => this.startDrain(key, 'quiet'), this.options.windowMs);
  }

  private startDrain(key: string, trigger: DrainTrigger): void {
    const buffer = this.buffers.get(key);
    if (!buffer) return;
    this.buffers.delete(key);
    clearTimeout(buffer.timer);

    const batch: BurstBatch = {
      tenantId: buffer.tenantId,
      conversationId: buffer.conversationId,
      messages: buffer.messages,
      text: buffer.messages.map((m) => m.text).join('\n'),
      trigger,
    };
    burstBatches.inc({ trigger });

    const run = this.onDrain(batch)
      .catch((err: unknown) => {
        this.log.error({ err, tenantId: batch.tenantId, conversationId: batch.conversationId }, 'Burst drain failed');
      })
      .finally(() => {
        this.inflight.delete(run);
      });
    this.inflight.add(run);
  }

  private prune(now: number): void {
    if (this.lastInbound.size < PRUNE_THRESHOLD) return;
    for (const [key, at] of this.lastInbound) {
      if (now - at >= this.options.windowMs && !this.buffers.has(key)) this.lastInbound.delete(key);
    }
  }
}
