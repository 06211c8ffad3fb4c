/**
 * Governance replies
 *
 * Deterministic template selection for non-business turns. The rotating
 * sets are indexed by turn count so a customer sees variety without any
 * randomness in tests.
 */

import { ResponseCatalog, fill, getResponses, rotate } from '../config/responses';
import { ConversationState } from '../state/conversation-state';
import { GovernanceAction, RateLimitReason } from '../routing/types';

type ReplyState = Pick<ConversationState, 'turnCount' | 'casualTurns' | 'spamTurns' | 'maxChattinessLevel' | 'botName'>;

export function botName(state: Pick<ConversationState, 'botName'>, responses: ResponseCatalog = getResponses()): string {
  return state.botName ?? responses.defaultBotName;
}

export function redirectToBusiness(state: ReplyState, responses: ResponseCatalog = getResponses()): string {
  const sets = responses.redirectToBusiness;
  if (state.maxChattinessLevel === 0) return rotate(sets.strict, state.turnCount);
  if (state.casualTurns <= 2) return rotate(sets.early, state.turnCount);
  return rotate(sets.direct, state.turnCount);
}

export function friendlyCasual(state: ReplyState, responses: ResponseCatalog = getResponses()): string {
  const set = state.casualTurns <= 1 ? responses.friendlyCasual.first : responses.friendlyCasual.later;
  return fill(rotate(set, state.turnCount), { name: botName(state, responses) });
}

export function spamWarning(state: ReplyState, responses: ResponseCatalog = getResponses()): string {
  const set = state.spamTurns <= 1 ? responses.spamWarning.first : responses.spamWarning.repeat;
  return rotate(set, state.turnCount);
}

export function rateLimitedReply(reason: RateLimitReason | undefined, responses: ResponseCatalog = getResponses()): string {
  if (reason === 'spam_cooldown' || reason === 'abuse_cooldown') return responses.rateLimited[reason];
  return responses.rateLimited.default;
}

export function governanceReply(
  action: GovernanceAction,
  state: ReplyState,
  rateLimitReason?: RateLimitReason,
  responses: ResponseCatalog = getResponses(),
): string | undefined {
  switch (action) {
    case 'redirect_to_business':
      return redirectToBusiness(state, responses);
    case 'friendly_casual_response':
      return friendlyCasual(state, responses);
    case 'spam_warning':
      return spamWarning(state, responses);
    case 'disengage':
      return rotate(responses.disengage, state.turnCount);
    case 'abuse_stop':
      return responses.abuseStop;
    case 'rate_limited':
      return rateLimitedReply(rateLimitReason, responses);
    case 'proceed_to_journey':
      return undefined;
  }
}
