/**
 * Routing Types
 */

import { Intent, Journey } from '../state/types';

export type RoutingThreshold = 'high_confidence' | 'medium_confidence' | 'low_confidence';

export type GovernanceAction =
  | 'proceed_to_journey'
  | 'redirect_to_business'
  | 'friendly_casual_response'
  | 'spam_warning'
  | 'disengage'
  | 'abuse_stop'
  | 'rate_limited';

export type EscalationTrigger =
  | 'state_flagged'
  | 'explicit_human_request'
  | 'payment_dispute'
  | 'sensitive_content'
  | 'user_frustration'
  | 'repeated_failures';

export type EscalationPriority = 'urgent' | 'high' | 'medium' | 'low';

export type RateLimitReason =
  | 'spam_cooldown'
  | 'abuse_cooldown'
  | 'hourly_limit_exceeded'
  | 'minute_limit_exceeded'
  | 'within_limits';

/** Open key/value map; the well-known keys are typed */
export interface RouteMetadata {
  routingThreshold?: RoutingThreshold;
  intent?: Intent;
  suggestedJourney?: Journey;
  thresholdMet?: boolean;
  clarificationType?: 'intent_disambiguation';
  clarificationRounds?: number;
  governanceAction?: GovernanceAction;
  casualTurns?: number;
  spamTurns?: number;
  maxAllowed?: number;
  chattinessLevel?: number;
  escalationRequired?: boolean;
  escalationTrigger?: EscalationTrigger;
  escalationPriority?: EscalationPriority;
  escalationCategory?: string;
  matchedKeyword?: string;
  rateLimitReason?: RateLimitReason;
  retryAfterSeconds?: number;
  [key: string]: unknown;
}

/** Produced once per turn; never persisted */
export interface RouteDecision {
  journey: Journey;
  reason: string;
  confidence: number;
  shouldClarify: boolean;
  metadata: RouteMetadata;
}
