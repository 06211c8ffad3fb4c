import { EscalationPriority, EscalationTrigger } from '../routing/types';

export type HandoffTrigger = EscalationTrigger | 'abuse' | 'rate_limited' | 'system_error';

export type TicketStatus = 'open' | 'assigned' | 'resolved';

export interface CreateTicketParams {
  tenantId: string;
  conversationId: string;
  customerId?: string;
  trigger: HandoffTrigger;
  reason: string;
  priority: EscalationPriority;
  category: string;
  summary: string;
  context: Record<string, unknown>;
}

export interface TicketRef {
  ticketId: string;
  /** Human-facing reference quoted to the customer */
  ticketNumber: string;
}

export interface HandoffTicket extends CreateTicketParams, TicketRef {
  status: TicketStatus;
  createdAt: number;
  updatedAt: number;
}

export interface HandoffService {
  /** Returns the conversation's open ticket instead of opening a second one */
  createTicket(params: CreateTicketParams): Promise<TicketRef>;
  getTicket(ticketId: string): Promise<HandoffTicket | null>;
  getOpenTicket(tenantId: string, conversationId: string): Promise<HandoffTicket | null>;
  updateStatus(ticketId: string, status: TicketStatus): Promise<HandoffTicket>;
}
