import { InMemoryConversationStateStore } from '../../src/memory/state-store';
import { ConversationState } from '../../src/state/conversation-state';
import { InvalidStateError } from '../../src/errors/app-errors';

function state(): ConversationState {
  const s = ConversationState.create({ tenantId: 't-1', conversationId: 'c-1', requestId: 'r-1' });
  s.updateIntent('order_status', 0.8);
  s.incrementTurn();
  s.beginTurn('r-2', 'where is my parcel');
  s.responseText = 'Please share your order number.';
  return s;
}

describe('InMemoryConversationStateStore', () => {
  let store: InMemoryConversationStateStore;

  beforeEach(() => {
    store = new InMemoryConversationStateStore();
  });

  it('should round-trip a conversation', async () => {
    await store.save(state());
    const loaded = await store.get('t-1', 'c-1');

    expect(loaded?.intent).toBe('order_status');
    expect(loaded?.intentConfidence).toBe(0.8);
    expect(loaded?.turnCount).toBe(1);
    expect(loaded?.requestId).toBe('r-2');
    expect(loaded?.incomingMessage).toBe('where is my parcel');
    expect(loaded?.responseText).toBe('Please share your order number.');
  });

  it('should keep tenants apart', async () => {
    await store.save(state());
    expect(await store.get('t-2', 'c-1')).toBeNull();
  });

  it('should refuse to save an invalid state', async () => {
    const s = state();
    s.turnCount = -1;
    await expect(store.save(s)).rejects.toThrow('turn_count');
    expect(store.raw('t-1', 'c-1')).toBeUndefined();
  });

  it('should reject a stored state that breaks an invariant and leave it in place', async () => {
    const s = state();
    s.turnCount = 9;
    s.spamTurns = 1;
    const payload = JSON.stringify({ ...s.toJSON(), intent_confidence: 1.5 });
    store.putRaw('t-1', 'c-1', payload);

    const load = store.get('t-1', 'c-1');
    await expect(load).rejects.toBeInstanceOf(InvalidStateError);
    await expect(store.get('t-1', 'c-1')).rejects.toThrow('intent_confidence');
    expect(store.raw('t-1', 'c-1')).toBe(payload);
  });

  it('should reject a stored payload that is not JSON', async () => {
    store.putRaw('t-1', 'c-1', '{not json');
    await expect(store.get('t-1', 'c-1')).rejects.toThrow('payload');
  });

  it('should delete a conversation', async () => {
    await store.save(state());
    await store.delete('t-1', 'c-1');
    expect(await store.get('t-1', 'c-1')).toBeNull();
  });
});
