/**
 * Message Deduplication Lock
 *
 * Ensures one inbound message is processed by at most one worker at a
 * time and is not processed again shortly after it completed.
 *
 *   message_lock:<fingerprint>   held while processing (TTL 300s)
 *   message_state:<fingerprint>  processing | completed | failed (TTL 600s)
 */

import { createHash } from 'crypto';
import { KeyValueStore } from '../store/types';
import { DistributedLock, LockHandle } from './distributed-lock';
import { LockHeldError, errorMessage } from '../errors/app-errors';
import { env } from '../config/env';
import { logger } from '../observability/logger';
import { duplicateMessages, lockContention } from '../observability/metrics';

export interface MessageRef {
  conversationId: string;
  messageId: string;
  text: string;
}

export type ProcessingStatus = 'processing' | 'completed' | 'failed';

export interface ProcessingState {
  status: ProcessingStatus;
  owner: string;
  updatedAt: string;
  error?: string;
}

export interface MessageLease {
  fingerprint: string;
  handle: LockHandle;
}

export interface MessageLockOptions {
  lockTtlSeconds: number;
  stateTtlSeconds: number;
  /** Identifies this worker in lock records */
  owner: string;
  clock: () => Date;
}

const DEFAULT_OPTIONS: MessageLockOptions = {
  lockTtlSeconds: env.dedup.lockTtlSeconds,
  stateTtlSeconds: env.dedup.stateTtlSeconds,
  owner: `worker-${process.pid}`,
  clock: () => new Date(),
};

export function messageFingerprint(ref: MessageRef): string {
  const contentHash = createHash('sha256').update(ref.text, 'utf8').digest('hex').slice(0, 16);
  return `${ref.conversationId}:${ref.messageId}:${contentHash}`;
}

export class MessageDeduplicationLock {
  private readonly log = logger.child({ component: 'message-lock' });
  private readonly options: MessageLockOptions;
  private readonly lock: DistributedLock;

  constructor(
    private readonly store: KeyValueStore,
    options: Partial<MessageLockOptions> = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.lock = new DistributedLock(store, this.options.lockTtlSeconds);
  }

  fingerprint(ref: MessageRef): string {
    return messageFingerprint(ref);
  }

  /** True while the message is locked, or when it completed within the state TTL */
  async isDuplicate(ref: MessageRef): Promise<boolean> {
    const fingerprint = messageFingerprint(ref);
    if (await this.lock.isHeld(lockKey(fingerprint))) {
      duplicateMessages.inc();
      this.log.warn({ fingerprint }, 'Duplicate message (currently processing)');
      return true;
    }
    const state = await this.readState(fingerprint);
    if (state?.status === 'completed') {
      duplicateMessages.inc();
      this.log.warn({ fingerprint }, 'Duplicate message (recently completed)');
      return true;
    }
    return false;
  }

  /** Throws LockHeldError when another worker holds the message */
  async acquireLock(ref: MessageRef): Promise<MessageLease> {
    const fingerprint = messageFingerprint(ref);
    const owner = this.options.owner;
    const handle = await this.lock.tryAcquire(lockKey(fingerprint), {
      fingerprint,
      owner,
      acquiredAt: this.options.clock().toISOString(),
    });

    if (!handle) {
      lockContention.inc();
      const holder = await this.lock.holder(lockKey(fingerprint));
      this.log.warn({ fingerprint, heldBy: holder?.owner }, 'Message lock already held');
      throw new LockHeldError(fingerprint, holder?.owner);
    }

    await this.writeState(fingerprint, { status: 'processing', owner, updatedAt: this.options.clock().toISOString() });
    this.log.debug({ fingerprint, owner }, 'Message lock acquired');
    return { fingerprint, handle };
  }

  /** Record the outcome and release the lock */
  async release(lease: MessageLease, error?: unknown): Promise<void> {
    const state: ProcessingState = {
      status: error === undefined ? 'completed' : 'failed',
      owner: lease.handle.record.owner,
      updatedAt: this.options.clock().toISOString(),
    };
    if (error !== undefined) state.error = errorMessage(error);

    try {
      await this.writeState(lease.fingerprint, state);
    } finally {
      const released = await this.lock.release(lease.handle);
      if (!released) {
        this.log.warn({ fingerprint: lease.fingerprint }, 'Message lock expired before release');
      }
    }
  }

  /** Run `fn` under the message lock; the lock is always released */
  async withLock<T>(ref: MessageRef, fn: () => Promise<T>): Promise<T> {
    const lease = await this.acquireLock(ref);
    let result: T;
    try {
      result = await fn();
    } catch (err) {
      await this.release(lease, err);
      throw err;
    }
    await this.release(lease);
    return result;
  }

  async getProcessingState(ref: MessageRef): Promise<ProcessingState | null> {
    return this.readState(messageFingerprint(ref));
  }

  /** Recovery for stuck locks; returns false when nothing was held */
  async forceRelease(ref: MessageRef): Promise<boolean> {
    const fingerprint = messageFingerprint(ref);
    const released = await this.lock.forceRelease(lockKey(fingerprint));
    if (released) this.log.warn({ fingerprint }, 'Message lock force-released');
    return released;
  }

  private async writeState(fingerprint: string, state: ProcessingState): Promise<void> {
    await this.store.set(stateKey(fingerprint), JSON.stringify(state), this.options.stateTtlSeconds);
  }

  private async readState(fingerprint: string): Promise<ProcessingState | null> {
    const raw = await this.store.get(stateKey(fingerprint));
    if (!raw) return null;
    try {
      return parseProcessingState(JSON.parse(raw));
    } catch (err) {
      this.log.warn({ fingerprint, err }, 'Unreadable processing state');
      return null;
    }
  }
}

function lockKey(fingerprint: string): string {
  return `message_lock:${fingerprint}`;
}

function stateKey(fingerprint: string): string {
  return `message_state:${fingerprint}`;
}

function parseProcessingState(value: unknown): ProcessingState | null {
  if (typeof value !== 'object' || value === null) return null;
  const fields: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  const { status, owner, updatedAt, error } = fields;
  if (status !== 'processing' && status !== 'completed' && status !== 'failed') return null;
  if (typeof owner !== 'string' || typeof updatedAt !== 'string') return null;
  return typeof error === 'string' ? { status, owner, updatedAt, error } : { status, owner, updatedAt };
}
