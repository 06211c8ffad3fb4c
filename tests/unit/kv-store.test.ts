import { InMemoryKeyValueStore } from '../../src/store/kv-store';

describe('InMemoryKeyValueStore', () => {
  let store: InMemoryKeyValueStore;

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2026-03-02T10:00:00Z'));
    store = new InMemoryKeyValueStore();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should set a key only when absent', async () => {
    expect(await store.setIfAbsent('k', 'a', 10)).toBe(true);
    expect(await store.setIfAbsent('k', 'b', 10)).toBe(false);
    expect(await store.get('k')).toBe('a');
  });

  it('should expire keys after their TTL', async () => {
    await store.set('k', 'v', 10);
    jest.advanceTimersByTime(9_000);
    expect(await store.ttl('k')).toBe(1);
    jest.advanceTimersByTime(1_000);
    expect(await store.get('k')).toBeNull();
    expect(await store.ttl('k')).toBeNull();
    expect(await store.setIfAbsent('k', 'again', 10)).toBe(true);
  });

  it('should delete only on a matching value', async () => {
    await store.set('k', 'mine', 10);
    expect(await store.deleteIfEquals('k', 'theirs')).toBe(false);
    expect(await store.deleteIfEquals('k', 'mine')).toBe(true);
    expect(await store.get('k')).toBeNull();
  });

  it('should increment and refresh the TTL', async () => {
    expect(await store.increment('n', 60)).toBe(1);
    jest.advanceTimersByTime(30_000);
    expect(await store.increment('n', 60)).toBe(2);
    jest.advanceTimersByTime(45_000);
    expect(await store.get('n')).toBe('2');
  });

  it('should evict expired entries when sized', async () => {
    await store.set('a', '1', 1);
    await store.set('b', '2', 100);
    jest.advanceTimersByTime(2_000);
    expect(store.size()).toBe(1);
  });
});
