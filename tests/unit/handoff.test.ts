import { InMemoryHandoffService } from '../../src/handoff/in-memory-handoff';
import { formatHandoffMessage } from '../../src/handoff/handoff-messages';
import { CreateTicketParams } from '../../src/handoff/types';

const params: CreateTicketParams = {
  tenantId: 'demo-store',
  conversationId: 'c-1',
  customerId: '+254700000001',
  trigger: 'payment_dispute',
  reason: 'Escalation: payment_dispute',
  priority: 'high',
  category: 'payment_issue',
  summary: 'I paid but nothing came',
  context: { turnCount: 2 },
};

describe('InMemoryHandoffService', () => {
  let service: InMemoryHandoffService;

  beforeEach(() => {
    service = new InMemoryHandoffService();
  });

  it('should open a numbered ticket', async () => {
    const ref = await service.createTicket(params);
    expect(ref.ticketNumber).toBe('HO-000001');

    const ticket = await service.getTicket(ref.ticketId);
    expect(ticket).toMatchObject({ ...params, ticketId: ref.ticketId, status: 'open' });
    expect(await service.getOpenTicket('demo-store', 'c-1')).toEqual(ticket);
  });

  it('should reuse the open ticket of a conversation', async () => {
    const first = await service.createTicket(params);
    const second = await service.createTicket({ ...params, trigger: 'user_frustration' });
    expect(second).toEqual(first);
    expect(service.getAllTickets()).toHaveLength(1);
  });

  it('should open a new ticket once the previous one is resolved', async () => {
    const first = await service.createTicket(params);
    const resolved = await service.updateStatus(first.ticketId, 'resolved');
    expect(resolved.status).toBe('resolved');
    expect(await service.getOpenTicket('demo-store', 'c-1')).toBeNull();

    const next = await service.createTicket(params);
    expect(next.ticketNumber).toBe('HO-000002');
  });

  it('should keep an assigned ticket open', async () => {
    const ref = await service.createTicket(params);
    await service.updateStatus(ref.ticketId, 'assigned');
    expect((await service.getOpenTicket('demo-store', 'c-1'))?.status).toBe('assigned');
  });

  it('should reject updates to unknown tickets', async () => {
    await expect(service.updateStatus('missing', 'resolved')).rejects.toThrow('Ticket missing not found');
  });
});

describe('formatHandoffMessage', () => {
  it('should quote the ticket and a high priority note', () => {
    expect(formatHandoffMessage('explicit_human_request', 'high', 'HO-000001')).toBe(
      [
        "I'll connect you with a human agent right away. Please hold on while I transfer you to someone who can assist you personally.",
        '',
        'Reference: HO-000001',
        'Expected response: 1 hour',
        '',
        'This has been marked as high priority and will be addressed quickly.',
      ].join('\n'),
    );
  });

  it('should fall back to the default opening without a ticket', () => {
    expect(formatHandoffMessage('system_error', 'medium')).toBe(
      [
        'Let me connect you with a human agent who can better assist you.',
        '',
        'Expected response: 4 hours',
        '',
        'Thank you for your patience while we connect you with the right person to help.',
      ].join('\n'),
    );
  });
});
