/**
 * Message Intake
 *
 * Front door for inbound chat messages:
 *
 *   1. drop duplicates (message locked or recently completed)
 *   2. take the message lock; contention means another worker has it
 *   3. hand quick follow-ups to the burst coalescer
 *   4. run the turn in the background, serialized per conversation
 *   5. send the reply, record the outcome, release the lock(s)
 *
 * The caller gets its answer as soon as the message is accepted; `done`
 * settles when the turn has finished.
 */

import { v4 as uuidv4 } from 'uuid';
import { MessageDeduplicationLock, MessageLease, MessageRef } from '../dedup/message-lock';
import { BurstBatch, BurstCoalescer, BurstOptions } from '../dedup/burst-coalescer';
import { JourneyOrchestrator } from '../orchestrator/journey-orchestrator';
import { TurnResult } from '../orchestrator/types';
import { LockHeldError } from '../errors/app-errors';
import { logger } from '../observability/logger';
import { messagesReceived } from '../observability/metrics';

export interface InboundMessage {
  tenantId: string;
  conversationId: string;
  messageId: string;
  text: string;
  phone?: string;
  customerId?: string;
}

export type IntakeStatus = 'accepted' | 'duplicate' | 'queued' | 'skipped';

export interface IntakeResult {
  status: IntakeStatus;
  requestId: string;
  /** Settles when the turn finishes; null when it failed. Only set for `accepted` */
  done?: Promise<TurnResult | null>;
}

export interface OutboundReply {
  tenantId: string;
  conversationId: string;
  text: string;
  escalationRequired: boolean;
}

/** Delivers the bot's reply back to the customer's channel */
export interface ReplySender {
  sendReply(reply: OutboundReply): Promise<void>;
}

export class LoggingReplySender implements ReplySender {
  private readonly log = logger.child({ component: 'reply-sender' });

  async sendReply(reply: OutboundReply): Promise<void> {
    this.log.info(
      { tenantId: reply.tenantId, conversationId: reply.conversationId, escalationRequired: reply.escalationRequired, length: reply.text.length },
      'Reply ready',
    );
  }
}

export type TurnProcessor = Pick<JourneyOrchestrator, 'processMessage'>;

export class MessageIntake {
  private readonly log = logger.child({ component: 'intake' });
  private readonly coalescer: BurstCoalescer;
  /** Tail of the turn chain per conversation */
  private readonly chains = new Map<string, Promise<void>>();
  /** Leases held by messages waiting in a burst buffer */
  private readonly queuedLeases = new Map<string, MessageLease>();

  constructor(
    private readonly orchestrator: TurnProcessor,
    private readonly lock: MessageDeduplicationLock,
    private readonly sender: ReplySender = new LoggingReplySender(),
    burstOptions: Partial<BurstOptions> = {},
  ) {
    this.coalescer = new BurstCoalescer((batch) => this.processBatch(batch), burstOptions);
  }

  async receive(message: InboundMessage): Promise<IntakeResult> {
    const requestId = uuidv4();
    const ref: MessageRef = { conversationId: message.conversationId, messageId: message.messageId, text: message.text };
    const log = this.log.child({ requestId, tenantId: message.tenantId, conversationId: message.conversationId });

    if (await this.lock.isDuplicate(ref)) {
      messagesReceived.inc({ tenant: message.tenantId, outcome: 'duplicate' });
      return { status: 'duplicate', requestId };
    }

    let lease: MessageLease;
    try {
      lease = await this.lock.acquireLock(ref);
    } catch (err) {
      if (err instanceof LockHeldError) {
        messagesReceived.inc({ tenant: message.tenantId, outcome: 'skipped' });
        log.info({ heldBy: err.heldBy }, 'Message already being processed; skipped');
        return { status: 'skipped', requestId };
      }
      throw err;
    }

    const offered = this.coalescer.offer(message.tenantId, message.conversationId, {
      messageId: message.messageId,
      text: message.text,
      receivedAt: Date.now(),
      phone: message.phone,
      customerId: message.customerId,
    });

    if (offered === 'queued') {
      this.queuedLeases.set(leaseKey(message.tenantId, message.conversationId, message.messageId), lease);
      messagesReceived.inc({ tenant: message.tenantId, outcome: 'queued' });
      return { status: 'queued', requestId };
    }

    messagesReceived.inc({ tenant: message.tenantId, outcome: 'accepted' });
    const done = this.serialize(message.tenantId, message.conversationId, () =>
      this.runTurn(
        {
          tenantId: message.tenantId,
          conversationId: message.conversationId,
          requestId,
          messageText: message.text,
          phone: message.phone,
          customerId: message.customerId,
        },
        [lease],
      ),
    );
    return { status: 'accepted', requestId, done };
  }

  /** Drain burst buffers and wait for every running turn */
  async drain(): Promise<void> {
    await this.coalescer.flushAll();
    while (this.chains.size > 0) {
      await Promise.all([...this.chains.values()]);
    }
  }

  private async processBatch(batch: BurstBatch): Promise<void> {
    const leases: MessageLease[] = [];
    for (const m of batch.messages) {
      const key = leaseKey(batch.tenantId, batch.conversationId, m.messageId);
      const lease = this.queuedLeases.get(key);
      if (lease) {
        leases.push(lease);
        this.queuedLeases.delete(key);
      }
    }

    const first = batch.messages[0];
    const requestId = uuidv4();
    this.log.info(
      { requestId, tenantId: batch.tenantId, conversationId: batch.conversationId, size: batch.messages.length, trigger: batch.trigger },
      'Processing burst as one turn',
    );
    await this.serialize(batch.tenantId, batch.conversationId, () =>
      this.runTurn(
        {
          tenantId: batch.tenantId,
          conversationId: batch.conversationId,
          requestId,
          messageText: batch.text,
          phone: first?.phone,
          customerId: first?.customerId,
        },
        leases,
      ),
    );
  }

  private async runTurn(
    input: Parameters<TurnProcessor['processMessage']>[0],
    leases: MessageLease[],
  ): Promise<TurnResult | null> {
    let failure: unknown;
    try {
      const result = await this.orchestrator.processMessage(input);
      await this.sender.sendReply({
        tenantId: input.tenantId,
        conversationId: input.conversationId,
        text: result.responseText,
        escalationRequired: result.state.escalationRequired,
      });
      return result;
    } catch (err) {
      failure = err;
      this.log.error({ err, requestId: input.requestId, conversationId: input.conversationId }, 'Turn failed');
      return null;
    } finally {
      for (const lease of leases) {
        try {
          await this.lock.release(lease, failure);
        } catch (err) {
          this.log.error({ err, fingerprint: lease.fingerprint }, 'Failed to release message lock');
        }
      }
    }
  }

  /** Chain `task` after the conversation's previous turn */
  private serialize<T>(tenantId: string, conversationId: string, task: () => Promise<T>): Promise<T> {
    const key = `${tenantId}:${conversationId}`;
    const previous = this.chains.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.chains.set(key, tail);
    void tail.then(() => {
      if (this.chains.get(key) === tail) this.chains.delete(key);
    });
    return run;
  }
}

function leaseKey(tenantId: string, conversationId: string, messageId: string): string {
  return `${tenantId}:${conversationId}:${messageId}`;
}
