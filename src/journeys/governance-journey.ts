/**
 * Governance journey
 *
 * Replies for everything routed to `governance`: casual / spam / abuse /
 * rate-limit outcomes and escalations. Escalations open (or reuse) a
 * handoff ticket and quote its reference to the customer.
 */

import { ResponseCatalog, getResponses } from '../config/responses';
import { governanceReply, redirectToBusiness } from '../governance/replies';
import { TRIGGER_PROFILES } from '../routing/escalation-detector';
import { EscalationPriority, RouteDecision } from '../routing/types';
import { ConversationState } from '../state/conversation-state';
import { formatHandoffMessage } from '../handoff/handoff-messages';
import { HandoffService, HandoffTrigger } from '../handoff/types';
import { JourneyExecutor, JourneyInput, TurnContext } from '../orchestrator/types';

interface TicketKind {
  trigger: HandoffTrigger;
  priority: EscalationPriority;
  category: string;
}

export class GovernanceJourney implements JourneyExecutor {
  constructor(
    private readonly handoff: HandoffService,
    private readonly responses: ResponseCatalog = getResponses(),
  ) {}

  async execute({ state, turn, decision }: JourneyInput): Promise<string> {
    const meta = decision.metadata;

    if (meta.escalationTrigger === 'state_flagged') {
      const open = await this.handoff.getOpenTicket(state.tenantId, state.conversationId);
      return formatHandoffMessage('state_flagged', open?.priority ?? 'medium', open?.ticketNumber, this.responses);
    }

    if (meta.escalationTrigger) {
      const priority = meta.escalationPriority ?? TRIGGER_PROFILES[meta.escalationTrigger].priority;
      const category = meta.escalationCategory ?? TRIGGER_PROFILES[meta.escalationTrigger].category;
      const ticketNumber = await this.openTicket(state, turn, decision, { trigger: meta.escalationTrigger, priority, category });
      return formatHandoffMessage(meta.escalationTrigger, priority, ticketNumber, this.responses);
    }

    switch (meta.governanceAction) {
      case 'abuse_stop':
        await this.openTicket(state, turn, decision, { trigger: 'abuse', priority: 'high', category: 'abuse' });
        return this.responses.abuseStop;
      case 'rate_limited':
        await this.openTicket(state, turn, decision, { trigger: 'rate_limited', priority: 'low', category: 'rate_limit' });
        return governanceReply('rate_limited', state, meta.rateLimitReason, this.responses) ?? this.responses.rateLimited.default;
      case undefined:
      case 'proceed_to_journey':
        break;
      default:
        return governanceReply(meta.governanceAction, state, undefined, this.responses) ?? redirectToBusiness(state, this.responses);
    }

    // Confident intent routing into governance without a governance decision
    if (state.intent === 'human_request') {
      const profile = TRIGGER_PROFILES.explicit_human_request;
      state.setEscalation('Escalation: explicit_human_request');
      const ticketNumber = await this.openTicket(state, turn, decision, {
        trigger: 'explicit_human_request',
        priority: profile.priority,
        category: profile.category,
      });
      return formatHandoffMessage('explicit_human_request', profile.priority, ticketNumber, this.responses);
    }
    return redirectToBusiness(state, this.responses);
  }

  private async openTicket(state: ConversationState, turn: TurnContext, decision: RouteDecision, kind: TicketKind): Promise<string> {
    const reason = state.escalationReason ?? decision.reason;
    const ticket = await this.handoff.createTicket({
      tenantId: state.tenantId,
      conversationId: state.conversationId,
      customerId: state.customerId ?? state.phone,
      trigger: kind.trigger,
      reason,
      priority: kind.priority,
      category: kind.category,
      summary: summarize(turn.messageText),
      context: {
        requestId: turn.requestId,
        turnCount: state.turnCount,
        intent: state.intent,
        intentConfidence: state.intentConfidence,
        journey: state.journey,
        governorClassification: state.governorClassification,
        responseLanguage: state.responseLanguage,
        matchedKeyword: decision.metadata.matchedKeyword,
      },
    });
    state.setEscalation(reason, ticket.ticketId);
    turn.log.info({ ticketId: ticket.ticketId, trigger: kind.trigger }, 'Conversation handed off');
    return ticket.ticketNumber;
  }
}

const SUMMARY_MAX_LENGTH = 200;

function summarize(message: string): string {
  const text = message.replace(/\s+/g, ' ').trim();
  return text.length > SUMMARY_MAX_LENGTH ? `${text.slice(0, SUMMARY_MAX_LENGTH - 3)}...` : text;
}
