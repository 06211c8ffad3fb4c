/**
 * Governance Engine
 *
 * Keeps conversations on business topics. Casual chat is tolerated up to
 * the tenant's chattiness level, spam gets one warning before the bot
 * disengages, abuse stops the conversation and flags it for a human.
 * Rate limits are checked first and short-circuit everything else.
 */

import { ConversationState } from '../state/conversation-state';
import { ChattinessLevel } from '../state/types';
import { GovernanceResult } from '../classification/types';
import { GovernanceAction, RouteDecision } from '../routing/types';
import { ConversationRateLimiter, RateLimitStatus } from './rate-limiter';
import { logger } from '../observability/logger';
import { governanceActions } from '../observability/metrics';

/** Casual turns tolerated per chattiness level */
export const CASUAL_TURN_LIMITS: Readonly<Record<ChattinessLevel, number>> = { 0: 0, 1: 1, 2: 2, 3: 4 };

export const SPAM_TURN_LIMIT = 2;

export const ABUSE_ESCALATION_REASON = 'Abusive content detected';

export interface GovernanceOutcome {
  action: GovernanceAction;
  /** null when the turn is business and should continue to intent routing */
  decision: RouteDecision | null;
  rateLimit?: RateLimitStatus;
}

export class GovernanceEngine {
  private readonly log = logger.child({ component: 'governance' });

  constructor(private readonly rateLimiter?: ConversationRateLimiter) {}

  /** Pure routing half: reads the counters already on the state */
  decide(state: ConversationState): RouteDecision | null {
    const confidence = state.governorConfidence;

    switch (state.governorClassification) {
      case 'casual': {
        const max = CASUAL_TURN_LIMITS[state.maxChattinessLevel];
        if (state.casualTurns > max) {
          return governanceDecision(`Exceeded casual turn limit (${state.casualTurns}/${max})`, confidence, {
            governanceAction: 'redirect_to_business',
            casualTurns: state.casualTurns,
            maxAllowed: max,
            chattinessLevel: state.maxChattinessLevel,
          });
        }
        return governanceDecision('Casual conversation within limits', confidence, {
          governanceAction: 'friendly_casual_response',
          casualTurns: state.casualTurns,
          maxAllowed: max,
        });
      }

      case 'spam':
        if (state.spamTurns >= SPAM_TURN_LIMIT) {
          return governanceDecision(`Exceeded spam turn limit (${state.spamTurns}/${SPAM_TURN_LIMIT})`, confidence, {
            governanceAction: 'disengage',
            spamTurns: state.spamTurns,
          });
        }
        return governanceDecision('Spam detected - warning', confidence, {
          governanceAction: 'spam_warning',
          spamTurns: state.spamTurns,
        });

      case 'abuse':
        return governanceDecision('Abuse detected - immediate stop', confidence, { governanceAction: 'abuse_stop' });

      case 'business':
        return null;
    }
  }

  /**
   * Record the classification on the state, enforce rate limits, bump the
   * counters and decide. Mutates `state`.
   */
  async apply(state: ConversationState, result: GovernanceResult, now: number = Date.now()): Promise<GovernanceOutcome> {
    state.updateGovernor(result.classification, result.confidence);

    const customerKey = state.customerId ?? state.phone;
    let rateLimit: RateLimitStatus | undefined;

    if (this.rateLimiter && customerKey) {
      rateLimit = await this.rateLimiter.checkRateLimit(state.tenantId, customerKey, now);
      if (!rateLimit.allowed) {
        const reason = `Rate limited: ${rateLimit.reason}`;
        state.setEscalation(reason);
        governanceActions.inc({ action: 'rate_limited' });
        this.log.warn(
          { tenantId: state.tenantId, conversationId: state.conversationId, reason: rateLimit.reason, retryAfterSeconds: rateLimit.retryAfterSeconds },
          'Customer rate limited',
        );
        return {
          action: 'rate_limited',
          decision: governanceDecision(reason, 1.0, {
            governanceAction: 'rate_limited',
            rateLimitReason: rateLimit.reason,
            retryAfterSeconds: rateLimit.retryAfterSeconds,
            escalationRequired: true,
          }),
          rateLimit,
        };
      }
      await this.rateLimiter.incrementMessageCount(state.tenantId, customerKey, now);
    }

    if (result.classification === 'casual') state.incrementCasualTurns();
    if (result.classification === 'spam') state.incrementSpamTurns();

    const decision = this.decide(state);
    const action = decision?.metadata.governanceAction ?? 'proceed_to_journey';

    if (action === 'disengage' && this.rateLimiter && customerKey) {
      await this.rateLimiter.applySpamCooldown(state.tenantId, customerKey, now);
    }
    if (action === 'abuse_stop') {
      state.setEscalation(ABUSE_ESCALATION_REASON);
      if (this.rateLimiter && customerKey) {
        await this.rateLimiter.applyAbuseCooldown(state.tenantId, customerKey, now);
      }
    }

    governanceActions.inc({ action });
    if (decision) {
      this.log.info(
        { tenantId: state.tenantId, conversationId: state.conversationId, action, reason: decision.reason },
        'Governance decision',
      );
    }

    return { action, decision, rateLimit };
  }
}

function governanceDecision(reason: string, confidence: number, metadata: RouteDecision['metadata']): RouteDecision {
  return { journey: 'governance', reason, confidence, shouldClarify: false, metadata };
}
