import { v4 as uuid } from 'uuid';
import { CreateTicketParams, HandoffService, HandoffTicket, TicketRef, TicketStatus } from './types';
import { logger } from '../observability/logger';
import { handoffTickets } from '../observability/metrics';

/**
 * In-process handoff queue. Tickets live in memory and every operation is
 * logged; agents pick them up from the log or through `getTicket`.
 */
export class InMemoryHandoffService implements HandoffService {
  private readonly tickets = new Map<string, HandoffTicket>();
  private readonly openByConversation = new Map<string, string>();
  private sequence = 1;
  private readonly log = logger.child({ component: 'handoff' });

  async createTicket(params: CreateTicketParams): Promise<TicketRef> {
    const existing = await this.getOpenTicket(params.tenantId, params.conversationId);
    if (existing) {
      handoffTickets.inc({ status: 'reused' });
      this.log.info({ ticketId: existing.ticketId, conversationId: params.conversationId }, 'Open ticket reused');
      return { ticketId: existing.ticketId, ticketNumber: existing.ticketNumber };
    }

    const now = Date.now();
    const ticket: HandoffTicket = {
      ...params,
      ticketId: uuid(),
      ticketNumber: `HO-${String(this.sequence++).padStart(6, '0')}`,
      status: 'open',
      createdAt: now,
      updatedAt: now,
    };

    this.tickets.set(ticket.ticketId, ticket);
    this.openByConversation.set(conversationKey(params.tenantId, params.conversationId), ticket.ticketId);

    handoffTickets.inc({ status: 'created' });
    this.log.info(
      {
        ticketId: ticket.ticketId,
        ticketNumber: ticket.ticketNumber,
        tenantId: params.tenantId,
        conversationId: params.conversationId,
        trigger: params.trigger,
        priority: params.priority,
      },
      'Handoff ticket created',
    );

    return { ticketId: ticket.ticketId, ticketNumber: ticket.ticketNumber };
  }

  async getTicket(ticketId: string): Promise<HandoffTicket | null> {
    return this.tickets.get(ticketId) ?? null;
  }

  async getOpenTicket(tenantId: string, conversationId: string): Promise<HandoffTicket | null> {
    const ticketId = this.openByConversation.get(conversationKey(tenantId, conversationId));
    if (!ticketId) return null;
    return this.tickets.get(ticketId) ?? null;
  }

  async updateStatus(ticketId: string, status: TicketStatus): Promise<HandoffTicket> {
    const ticket = this.tickets.get(ticketId);
    if (!ticket) {
      handoffTickets.inc({ status: 'error' });
      throw new Error(`Ticket ${ticketId} not found`);
    }

    ticket.status = status;
    ticket.updatedAt = Date.now();
    if (status === 'resolved') {
      this.openByConversation.delete(conversationKey(ticket.tenantId, ticket.conversationId));
    }

    handoffTickets.inc({ status });
    this.log.info({ ticketId, status }, 'Handoff ticket updated');
    return ticket;
  }

  /** Test helper */
  getAllTickets(): HandoffTicket[] {
    return Array.from(this.tickets.values());
  }
}

function conversationKey(tenantId: string, conversationId: string): string {
  return `${tenantId}:${conversationId}`;
}
