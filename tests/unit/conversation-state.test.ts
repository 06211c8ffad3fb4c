import { ConversationState } from '../../src/state/conversation-state';
import { InvalidStateError } from '../../src/errors/app-errors';

function newState(): ConversationState {
  return ConversationState.create({ tenantId: 't-1', conversationId: 'c-1', requestId: 'r-1' });
}

describe('ConversationState', () => {
  describe('create', () => {
    it('should apply defaults', () => {
      const state = newState();
      expect(state.intent).toBe('unknown');
      expect(state.journey).toBe('unknown');
      expect(state.responseLanguage).toBe('en');
      expect(state.allowedLanguages).toEqual(['en', 'sw', 'sheng']);
      expect(state.maxChattinessLevel).toBe(2);
      expect(state.turnCount).toBe(0);
      expect(state.escalationRequired).toBe(false);
    });

    it('should reject empty identity fields', () => {
      expect(() => ConversationState.create({ tenantId: ' ', conversationId: 'c-1', requestId: 'r-1' })).toThrow(InvalidStateError);
      expect(() => ConversationState.create({ tenantId: 't-1', conversationId: '', requestId: 'r-1' })).toThrow(
        'Invalid conversation state field "conversation_id": must be a non-empty string',
      );
    });
  });

  describe('classifier updates', () => {
    it('should store a valid intent', () => {
      const state = newState();
      state.updateIntent('order_status', 0.82);
      expect(state.intent).toBe('order_status');
      expect(state.intentConfidence).toBe(0.82);
    });

    it('should reject out-of-range confidence without mutating', () => {
      const state = newState();
      expect(() => state.updateIntent('order_status', 1.2)).toThrow(InvalidStateError);
      expect(state.intent).toBe('unknown');
      expect(state.intentConfidence).toBe(0);
    });

    it('should reject a negative governor confidence', () => {
      const state = newState();
      expect(() => state.updateGovernor('spam', -0.1)).toThrow('confidence must be within [0, 1] (got -0.1)');
      expect(state.governorClassification).toBe('business');
    });

    it('should accept the boundary confidences', () => {
      const state = newState();
      state.updateLanguage('sw', 0);
      state.updateGovernor('casual', 1);
      expect(state.responseLanguage).toBe('sw');
      expect(state.governorConfidence).toBe(1);
    });
  });

  describe('counters and escalation', () => {
    it('should increment counters', () => {
      const state = newState();
      expect(state.incrementTurn()).toBe(1);
      expect(state.incrementTurn()).toBe(2);
      expect(state.incrementCasualTurns()).toBe(1);
      expect(state.incrementSpamTurns()).toBe(1);
    });

    it('should set and clear escalation', () => {
      const state = newState();
      state.setEscalation('Escalation: payment_dispute', 'ticket-1');
      expect(state.escalationRequired).toBe(true);
      expect(state.escalationReason).toBe('Escalation: payment_dispute');
      expect(state.handoffTicketId).toBe('ticket-1');

      state.clearEscalation();
      expect(state.escalationRequired).toBe(false);
      expect(state.escalationReason).toBeUndefined();
      expect(state.handoffTicketId).toBeUndefined();
    });

    it('should keep the existing ticket when escalating again without one', () => {
      const state = newState();
      state.setEscalation('first', 'ticket-1');
      state.setEscalation('second');
      expect(state.escalationReason).toBe('second');
      expect(state.handoffTicketId).toBe('ticket-1');
    });

    it('should reset per-turn fields on beginTurn', () => {
      const state = newState();
      state.responseText = 'old reply';
      state.beginTurn('r-2', 'new message');
      expect(state.requestId).toBe('r-2');
      expect(state.incomingMessage).toBe('new message');
      expect(state.responseText).toBeUndefined();
    });
  });

  describe('clone', () => {
    it('should copy lists so the clone is independent', () => {
      const state = newState();
      state.presentedItemIds = ['a'];
      const copy = state.clone();
      copy.presentedItemIds.push('b');
      copy.allowedLanguages.push('mixed');
      copy.turnCount = 5;
      expect(state.presentedItemIds).toEqual(['a']);
      expect(state.allowedLanguages).toEqual(['en', 'sw', 'sheng']);
      expect(state.turnCount).toBe(0);
      expect(copy.presentedItemIds).toEqual(['a', 'b']);
    });
  });

  describe('serialization', () => {
    it('should round-trip through JSON with snake_case keys', () => {
      const state = newState();
      state.phone = '+254700000001';
      state.updateIntent('sales_discovery', 0.9);
      state.journey = 'sales';
      state.incrementTurn();
      state.lastCatalogQuery = 'solar lantern';
      state.presentedItemIds = ['sku-101'];

      const json = state.toJSON();
      expect(json.tenant_id).toBe('t-1');
      expect(json.intent).toBe('sales_discovery');
      expect(json.last_catalog_query).toBe('solar lantern');
      expect('customer_id' in json).toBe(false);

      const restored = ConversationState.fromJSON(JSON.parse(JSON.stringify(json)));
      expect(restored.toJSON()).toEqual(json);
    });

    it('should round-trip every combination of optional fields', () => {
      const optional: Array<[string, (state: ConversationState) => void]> = [
        ['customer_id', (st) => (st.customerId = 'cust-1')],
        ['phone', (st) => (st.phone = '+254700000001')],
        ['tenant_name', (st) => (st.tenantName = 'Demo Store')],
        ['bot_name', (st) => (st.botName = 'Amani')],
        ['catalog_link_base', (st) => (st.catalogLinkBase = 'https://shop.example.com')],
        ['customer_language_pref', (st) => (st.customerLanguagePref = 'sw')],
        ['escalation_reason', (st) => st.setEscalation('Escalation: payment_dispute')],
        ['handoff_ticket_id', (st) => (st.handoffTicketId = 'ticket-1')],
        ['last_catalog_query', (st) => (st.lastCatalogQuery = 'solar lantern')],
        ['catalog_total_matches_estimate', (st) => (st.catalogTotalMatchesEstimate = 120)],
        ['incoming_message', (st) => (st.incomingMessage = 'hello')],
        ['response_text', (st) => (st.responseText = 'Hi there')],
      ];

      for (let mask = 0; mask < 1 << optional.length; mask += 1) {
        const state = newState();
        const set = optional.filter((_, i) => (mask & (1 << i)) !== 0);
        for (const [, apply] of set) apply(state);

        const json = state.toJSON();
        for (const [field] of optional) {
          expect(field in json).toBe(set.some(([name]) => name === field));
        }
        expect(ConversationState.fromJSON(JSON.parse(JSON.stringify(json))).toJSON()).toEqual(json);
      }
    });

    it('should drop transient orchestration keys on load', () => {
      const payload = {
        ...newState().toJSON(),
        needs_clarification: true,
        routing_decision: { journey: 'sales' },
        previous_journey: 'unknown',
      };
      const restored = ConversationState.fromJSON(payload);
      expect(restored.toJSON()).toEqual(newState().toJSON());
    });

    it('should reject unknown keys', () => {
      const payload = { ...newState().toJSON(), favourite_colour: 'blue' };
      expect(() => ConversationState.fromJSON(payload)).toThrow('Invalid conversation state field "favourite_colour": unknown field');
    });

    it('should reject payloads missing identity', () => {
      const { tenant_id: _omit, ...payload } = newState().toJSON();
      expect(() => ConversationState.fromJSON(payload)).toThrow('Invalid conversation state field "tenant_id": required field is missing');
    });

    it('should treat null optional fields as unset', () => {
      const payload = { ...newState().toJSON(), escalation_reason: null, customer_language_pref: null };
      const restored = ConversationState.fromJSON(payload);
      expect(restored.escalationReason).toBeUndefined();
      expect(restored.customerLanguagePref).toBeUndefined();
    });

    it('should reject invalid enum values', () => {
      const payload = { ...newState().toJSON(), journey: 'checkout' };
      expect(() => ConversationState.fromJSON(payload)).toThrow(InvalidStateError);
    });

    it('should reject non-object payloads', () => {
      expect(() => ConversationState.fromJSON(['a'])).toThrow('Invalid conversation state field "payload": expected a JSON object');
    });

    it('should refuse to serialize an invalid state', () => {
      const state = newState();
      state.turnCount = -1;
      expect(() => state.toJSON()).toThrow('Invalid conversation state field "turn_count": must be a non-negative integer (got -1)');
    });
  });
});
