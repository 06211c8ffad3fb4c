import { FastifyInstance } from 'fastify';
import { AppContext, buildApp } from '../../src/app';
import { HeuristicClassifier } from '../../src/classification/heuristic-classifier';
import { OutboundReply, ReplySender } from '../../src/intake/message-intake';

class RecordingSender implements ReplySender {
  readonly sent: OutboundReply[] = [];

  async sendReply(reply: OutboundReply): Promise<void> {
    this.sent.push(reply);
  }
}

describe('Message webhook flow', () => {
  let ctx: AppContext;
  let app: FastifyInstance;
  let sender: RecordingSender;

  beforeAll(async () => {
    sender = new RecordingSender();
    ctx = await buildApp({ classifier: new HeuristicClassifier(), replySender: sender, burst: { windowMs: 0 } });
    app = ctx.app;
    await app.ready();
  });

  afterAll(async () => {
    await ctx.intake.drain();
    await app.close();
  });

  function post(payload: Record<string, unknown>, headers: Record<string, string> = {}) {
    return app.inject({ method: 'POST', url: '/webhooks/messages', payload, headers });
  }

  it('should accept a message and reply with a clarifying question', async () => {
    const res = await post({
      tenantId: 'demo-store',
      conversationId: 'c-1',
      messageId: 'm-1',
      text: 'Where is my order?',
      phone: '+254700000001',
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'accepted' });

    await ctx.intake.drain();
    expect(sender.sent.at(-1)).toEqual({
      tenantId: 'demo-store',
      conversationId: 'c-1',
      text:
        'Are you checking on an existing order? If so, could you share your order number or the phone number used for the order? ' +
        'I can help you track orders, check delivery status or handle order changes.',
      escalationRequired: false,
    });

    const stored = await ctx.stateStore.get('demo-store', 'c-1');
    expect(stored?.intent).toBe('order_status');
    expect(stored?.clarificationRounds).toBe(1);
  });

  it('should report a redelivered message as a duplicate', async () => {
    const res = await post({ tenantId: 'demo-store', conversationId: 'c-1', messageId: 'm-1', text: 'Where is my order?' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'duplicate' });
  });

  it('should take the tenant from the header', async () => {
    const res = await post({ conversationId: 'c-2', messageId: 'm-1', text: 'hello' }, { 'x-tenant-id': 'demo-store' });
    expect(res.json()).toMatchObject({ status: 'accepted' });
    await ctx.intake.drain();
    expect(await ctx.stateStore.get('demo-store', 'c-2')).not.toBeNull();
  });

  it('should hand a human request to the team', async () => {
    await post({ tenantId: 'demo-store', conversationId: 'c-3', messageId: 'm-1', text: 'I want to talk to a human agent', phone: '+254700000003' });
    await ctx.intake.drain();

    const reply = sender.sent.at(-1);
    expect(reply?.escalationRequired).toBe(true);
    expect(reply?.text.split('\n')[0]).toBe(
      "I'll connect you with a human agent right away. Please hold on while I transfer you to someone who can assist you personally.",
    );
    const ticket = await ctx.handoff.getOpenTicket('demo-store', 'c-3');
    expect(ticket?.trigger).toBe('explicit_human_request');
    expect(ticket?.customerId).toBe('+254700000003');
  });

  it('should reject an invalid payload', async () => {
    const res = await post({ conversationId: 'c-4', messageId: 'm-1' });
    expect(res.statusCode).toBe(400);
  });

  it('should answer the health probes', async () => {
    const health = await app.inject({ method: 'GET', url: '/health' });
    expect(health.json()).toMatchObject({ status: 'ok' });

    const ready = await app.inject({ method: 'GET', url: '/ready' });
    expect(ready.statusCode).toBe(200);
    expect(ready.json()).toMatchObject({ status: 'ready', checks: { redis: { status: 'skipped' }, llm: { status: 'skipped' } } });
  });
});
