/**
 * Distributed Lock
 *
 * Set-if-absent with TTL on the shared key-value store. The stored value
 * identifies the owner, and release is a compare-and-delete so a worker
 * whose lock already expired cannot remove someone else's.
 */

import { KeyValueStore } from '../store/types';

export interface LockRecord {
  fingerprint: string;
  owner: string;
  acquiredAt: string;
}

export interface LockHandle {
  key: string;
  /** Serialized record, compared on release */
  token: string;
  record: LockRecord;
}

export class DistributedLock {
  constructor(
    private readonly store: KeyValueStore,
    private readonly ttlSeconds: number,
  ) {}

  /** Returns a handle when acquired, null when another owner holds the key */
  async tryAcquire(key: string, record: LockRecord): Promise<LockHandle | null> {
    const token = JSON.stringify(record);
    const acquired = await this.store.setIfAbsent(key, token, this.ttlSeconds);
    return acquired ? { key, token, record } : null;
  }

  /** False when the lock had already expired or changed hands */
  async release(handle: LockHandle): Promise<boolean> {
    return this.store.deleteIfEquals(handle.key, handle.token);
  }

  async isHeld(key: string): Promise<boolean> {
    return (await this.store.get(key)) !== null;
  }

  async holder(key: string): Promise<LockRecord | null> {
    const raw = await this.store.get(key);
    return raw ? parseLockRecord(raw) : null;
  }

  /** Unconditional delete, for recovering stuck locks */
  async forceRelease(key: string): Promise<boolean> {
    if (!(await this.isHeld(key))) return false;
    await this.store.delete(key);
    return true;
  }
}

function parseLockRecord(raw: string): LockRecord | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== 'object' || parsed === null) return null;
    const fields: Record<string, unknown> = Object.fromEntries(Object.entries(parsed));
    const { fingerprint, owner, acquiredAt } = fields;
    if (typeof fingerprint !== 'string' || typeof owner !== 'string' || typeof acquiredAt !== 'string') return null;
    return { fingerprint, owner, acquiredAt };
  } catch {
    // Foreign or corrupt value: still held, owner unknown
    return null;
  }
}
