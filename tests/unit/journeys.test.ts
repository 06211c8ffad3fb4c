import { InMemoryCatalogSearch, CatalogSearch } from '../../src/catalog/catalog-search';
import { InMemoryHandoffService } from '../../src/handoff/in-memory-handoff';
import { createJourneyExecutors } from '../../src/journeys';
import { GovernanceJourney } from '../../src/journeys/governance-journey';
import { HoldingJourney } from '../../src/journeys/holding-journey';
import { SalesJourney } from '../../src/journeys/sales-journey';
import { UnknownJourney } from '../../src/journeys/unknown-journey';
import { logger } from '../../src/observability/logger';
import { createTraceContext } from '../../src/observability/trace';
import { JourneyExecutor, JourneyInput, TurnContext } from '../../src/orchestrator/types';
import { RouteDecision, RouteMetadata } from '../../src/routing/types';
import { ConversationState } from '../../src/state/conversation-state';
import { Journey } from '../../src/state/types';

const LINK_BASE = 'https://shop.example.com/catalog';
const OUTRO = "Once you find something you like, just let me know and I'll help you with the details!";

function newState(linkBase?: string): ConversationState {
  const state = ConversationState.create({ tenantId: 'demo-store', conversationId: 'c-1', requestId: 'r-1', phone: '+254700000001' });
  state.catalogLinkBase = linkBase;
  state.turnCount = 1;
  return state;
}

function turnFor(text: string): TurnContext {
  return {
    requestId: 'r-1',
    messageText: text,
    now: 0,
    trace: createTraceContext({ requestId: 'r-1' }),
    log: logger,
    startedFlagged: false,
    loadFailed: false,
    persisted: false,
  };
}

function decision(journey: Journey, metadata: RouteMetadata = {}, shouldClarify = false): RouteDecision {
  return { journey, reason: `Routed to ${journey}`, confidence: 0.9, shouldClarify, metadata };
}

function input(state: ConversationState, text: string, d: RouteDecision = decision('sales')): JourneyInput {
  return { state, turn: turnFor(text), decision: d };
}

describe('SalesJourney', () => {
  const search = new InMemoryCatalogSearch();

  it('should present a numbered shortlist', async () => {
    const state = newState();
    const reply = await new SalesJourney(search).execute(input(state, 'solar'));

    expect(reply).toBe(
      [
        'Here are some options I found:',
        '1. Solar Lantern 10W - KES 2,499',
        '2. Solar Home Kit 50W - KES 14,999',
        '3. Portable Solar Charger - KES 3,299',
        "Reply with the number of the one you like, or tell me if you'd like something else.",
      ].join('\n'),
    );
    expect(state.presentedItemIds).toEqual(['sku-101', 'sku-102', 'sku-103']);
    expect(state.lastCatalogQuery).toBe('solar');
    expect(state.catalogTotalMatchesEstimate).toBe(3);
  });

  it('should record a numeric selection', async () => {
    const state = newState();
    const journey = new SalesJourney(search);
    await journey.execute(input(state, 'solar'));

    const reply = await journey.execute(input(state, ' 2 '));
    expect(reply).toBe('Great choice! I\'ve noted option 2. Would you like to go ahead with the order or keep browsing?');
    expect(state.selectedItemIds).toEqual(['sku-102']);
    expect(state.presentedItemIds).toEqual([]);
  });

  it('should rerun the last query when the shortlist is rejected', async () => {
    const state = newState();
    const journey = new SalesJourney(search);
    await journey.execute(input(state, 'solar'));

    await journey.execute(input(state, 'none of these'));
    expect(state.shortlistRejections).toBe(1);
    expect(state.lastCatalogQuery).toBe('solar');
    expect(state.presentedItemIds).toEqual(['sku-101', 'sku-102', 'sku-103']);
  });

  it('should offer the catalog link when results are not clearly ranked', async () => {
    const state = newState(LINK_BASE);
    const reply = await new SalesJourney(search).execute(input(state, 'solar'));

    expect(reply).toBe(
      'I found several options, but you might prefer to browse visually:\n\n' +
        `${LINK_BASE}?tenant_id=demo-store&search=solar&conversation_id=c-1&return_context=whatsapp\n\n${OUTRO}`,
    );
    expect(state.presentedItemIds).toEqual([]);
  });

  it('should say so when nothing matches', async () => {
    const reply = await new SalesJourney(search).execute(input(newState(), 'blue bicycle'));
    expect(reply).toBe("I couldn't find anything matching that. Could you describe it differently?");
  });

  it('should narrow a large catalog once and then link a vague follow-up', async () => {
    const large: CatalogSearch = {
      search: jest.fn().mockResolvedValue({
        items: [
          { id: 'a', name: 'A', score: 0.9 },
          { id: 'b', name: 'B', score: 0.8 },
          { id: 'c', name: 'C', score: 0.7 },
        ],
        totalEstimate: 80,
      }),
    };
    const state = newState(LINK_BASE);
    const journey = new SalesJourney(large);

    expect(await journey.execute(input(state, 'phone'))).toBe(
      'I found quite a few matches. Could you tell me more, such as a brand, size or budget?',
    );
    expect(state.catalogClarifications).toBe(1);

    expect(await journey.execute(input(state, 'anything'))).toBe(
      'I have many options that might interest you! For the best browsing experience:\n\n' +
        `${LINK_BASE}?tenant_id=demo-store&search=anything&conversation_id=c-1&return_context=whatsapp\n\n${OUTRO}`,
    );
    expect(state.catalogClarifications).toBe(0);
  });

  it('should answer without a catalog search backend', async () => {
    const journey = new SalesJourney();
    expect(await journey.execute(input(newState(LINK_BASE), 'show all products'))).toBe(
      "Here's our complete catalog for you to browse:\n\n" +
        `${LINK_BASE}?tenant_id=demo-store&conversation_id=c-1&return_context=whatsapp\n\n${OUTRO}`,
    );
    expect(await journey.execute(input(newState(), 'show all products'))).toBe(
      "I'd love to help you find the right product. What are you shopping for?",
    );
  });
});

describe('GovernanceJourney', () => {
  let handoff: InMemoryHandoffService;
  let journey: GovernanceJourney;

  beforeEach(() => {
    handoff = new InMemoryHandoffService();
    journey = new GovernanceJourney(handoff);
  });

  it('should open a ticket for an escalation and quote it', async () => {
    const state = newState();
    state.setEscalation('Escalation: explicit_human_request');
    const d = decision('governance', {
      escalationTrigger: 'explicit_human_request',
      escalationPriority: 'high',
      escalationCategory: 'general_inquiry',
      matchedKeyword: 'human',
    });

    const reply = await journey.execute(input(state, 'Let me talk to a human', d));

    expect(reply.split('\n').slice(2, 4)).toEqual(['Reference: HO-000001', 'Expected response: 1 hour']);
    const [ticket] = handoff.getAllTickets();
    expect(ticket).toMatchObject({
      tenantId: 'demo-store',
      conversationId: 'c-1',
      customerId: '+254700000001',
      trigger: 'explicit_human_request',
      reason: 'Escalation: explicit_human_request',
      priority: 'high',
      category: 'general_inquiry',
      summary: 'Let me talk to a human',
    });
    expect(ticket?.context.matchedKeyword).toBe('human');
    expect(state.handoffTicketId).toBe(ticket?.ticketId);
  });

  it('should quote the open ticket for an already flagged conversation', async () => {
    await handoff.createTicket({
      tenantId: 'demo-store',
      conversationId: 'c-1',
      trigger: 'payment_dispute',
      reason: 'Escalation: payment_dispute',
      priority: 'high',
      category: 'payment_issue',
      summary: 'refund',
      context: {},
    });
    const reply = await journey.execute(input(newState(), 'hello?', decision('governance', { escalationTrigger: 'state_flagged' })));
    expect(reply).toBe(
      [
        'Your conversation has been passed to our team. An agent will reply here shortly.',
        '',
        'Reference: HO-000001',
        'Expected response: 1 hour',
        '',
        'This has been marked as high priority and will be addressed quickly.',
      ].join('\n'),
    );
    expect(handoff.getAllTickets()).toHaveLength(1);
  });

  it('should stop abusive conversations and log a ticket', async () => {
    const state = newState();
    const reply = await journey.execute(input(state, 'you idiot', decision('governance', { governanceAction: 'abuse_stop' })));
    expect(reply).toBe("I'm unable to continue this conversation. If you need assistance, please contact our support team.");
    expect(handoff.getAllTickets()[0]).toMatchObject({ trigger: 'abuse', priority: 'high', category: 'abuse' });
    expect(state.escalationRequired).toBe(true);
  });

  it('should explain a spam cooldown', async () => {
    const d = decision('governance', { governanceAction: 'rate_limited', rateLimitReason: 'spam_cooldown' });
    expect(await journey.execute(input(newState(), 'hi', d))).toBe(
      "Please wait before sending more messages. I'll be here when you're ready to discuss our products or services.",
    );
    expect(handoff.getAllTickets()[0]).toMatchObject({ trigger: 'rate_limited', priority: 'low', category: 'rate_limit' });
  });

  it('should redirect casual chat without a ticket', async () => {
    const state = newState();
    state.casualTurns = 3;
    const reply = await journey.execute(input(state, 'lol', decision('governance', { governanceAction: 'redirect_to_business' })));
    expect(reply).toBe('I can help with products, orders, payments, offers and support. What interests you?');
    expect(handoff.getAllTickets()).toHaveLength(0);
  });

  it('should hand off a confident human request routed by intent', async () => {
    const state = newState();
    state.updateIntent('human_request', 0.9);
    const reply = await journey.execute(input(state, 'agent', decision('governance')));
    expect(reply.startsWith("I'll connect you with a human agent right away.")).toBe(true);
    expect(state.escalationReason).toBe('Escalation: explicit_human_request');
    expect(handoff.getAllTickets()[0]?.trigger).toBe('explicit_human_request');
  });
});

describe('UnknownJourney', () => {
  const journey = new UnknownJourney();

  it('should ask a clarifying question with a journey hint', async () => {
    const d = decision('unknown', { intent: 'order_status', suggestedJourney: 'orders' }, true);
    expect(await journey.execute(input(newState(), 'my thing', d))).toBe(
      'Are you checking on an existing order? If so, could you share your order number or the phone number used for the order? ' +
        'I can help you track orders, check delivery status or handle order changes.',
    );
  });

  it('should ask without a hint for journeys that have none', async () => {
    const d = decision('unknown', { intent: 'discounts_offers', suggestedJourney: 'offers' }, true);
    expect(await journey.execute(input(newState(), 'deal?', d))).toBe(
      "Are you looking for current promotions, or do you have a specific coupon code you'd like to use?",
    );
  });

  it('should welcome a first-time customer and list capabilities later', async () => {
    const state = newState();
    state.botName = 'Amani';
    expect(await journey.execute(input(state, 'hmm', decision('unknown')))).toBe(
      "Hello! I'm Amani, here to help you with shopping, orders and support. What can I assist you with today?",
    );
    state.turnCount = 2;
    expect((await journey.execute(input(state, 'hmm', decision('unknown')))).startsWith("I'm not sure how I can help with that.")).toBe(true);
  });
});

describe('createJourneyExecutors', () => {
  it('should build the default executors', async () => {
    const executors = createJourneyExecutors({ handoff: new InMemoryHandoffService() });
    expect(executors.sales).toBeInstanceOf(SalesJourney);
    expect(executors.governance).toBeInstanceOf(GovernanceJourney);
    expect(executors.orders).toBeInstanceOf(HoldingJourney);
    expect(await executors.orders.execute(input(newState(), 'order 123', decision('orders')))).toBe(
      'I can help with your order. Please share your order number.',
    );
  });

  it('should apply overrides', () => {
    const custom: JourneyExecutor = { execute: async () => 'custom' };
    const executors = createJourneyExecutors({ handoff: new InMemoryHandoffService(), overrides: { orders: custom } });
    expect(executors.orders).toBe(custom);
    expect(executors.support).toBeInstanceOf(HoldingJourney);
  });
});
