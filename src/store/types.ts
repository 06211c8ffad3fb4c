/**
 * Key-Value Store
 *
 * The only shared-storage primitive the engine relies on. Locks, processing
 * states and rate-limit counters all live behind this interface; values are
 * opaque strings and every write carries a TTL.
 */

export interface KeyValueStore {
  /** Atomically set `key` only if it does not exist. Returns true when written. */
  setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  /** Delete `key` only while it still holds `expected`. Returns true when deleted. */
  deleteIfEquals(key: string, expected: string): Promise<boolean>;
  /** Atomic increment; (re)applies the TTL and returns the new value. */
  increment(key: string, ttlSeconds: number): Promise<number>;
  /** Remaining TTL in seconds, or null when the key is absent. */
  ttl(key: string): Promise<number | null>;
}
