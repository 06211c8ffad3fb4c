import { ResponseCatalog, fill, getResponses } from '../config/responses';
import { EscalationPriority } from '../routing/types';
import { HandoffTrigger } from './types';

/**
 * Customer-facing handoff message: the trigger's opening line, the ticket
 * reference (when one was created), the expected response time and a
 * priority note.
 */
export function formatHandoffMessage(
  trigger: HandoffTrigger | undefined,
  priority: EscalationPriority,
  ticketNumber?: string,
  responses: ResponseCatalog = getResponses(),
): string {
  const opening = escalationOpening(trigger, responses);
  const lines = [opening, ''];
  if (ticketNumber) lines.push(fill(responses.handoff.reference, { ticket: ticketNumber }));
  lines.push(fill(responses.handoff.expected, { eta: responses.handoff.eta[priority] }), '');
  lines.push(priority === 'urgent' || priority === 'high' ? responses.handoff.highPriority : responses.handoff.normal);
  return lines.join('\n');
}

function escalationOpening(trigger: HandoffTrigger | undefined, responses: ResponseCatalog): string {
  switch (trigger) {
    case 'explicit_human_request':
    case 'payment_dispute':
    case 'sensitive_content':
    case 'user_frustration':
    case 'repeated_failures':
    case 'state_flagged':
      return responses.escalation[trigger];
    default:
      return responses.escalation.default;
  }
}
