/**
 * Intent Router
 *
 * Maps a classified intent to a journey, gated by confidence.
 *
 * | Confidence       | Journey        | shouldClarify |
 * |------------------|----------------|---------------|
 * | >= 0.70          | mapped journey | false         |
 * | 0.50 ≤ c < 0.70  | unknown        | true          |
 * | < 0.50           | unknown        | false         |
 *
 * In the medium band the mapped journey is only recorded as
 * `metadata.suggestedJourney`; it is never entered.
 */

import { Intent, Journey } from '../state/types';
import { RouteDecision } from './types';
import { logger } from '../observability/logger';

export const INTENT_JOURNEY_MAP: Readonly<Record<Intent, Journey>> = {
  sales_discovery: 'sales',
  product_question: 'sales',
  support_question: 'support',
  order_status: 'orders',
  discounts_offers: 'offers',
  preferences_consent: 'prefs',
  payment_help: 'support',
  human_request: 'governance',
  spam_casual: 'governance',
  unknown: 'unknown',
};

export interface RoutingPolicy {
  highThreshold: number;   // default: 0.70
  mediumThreshold: number; // default: 0.50
}

const DEFAULT_POLICY: RoutingPolicy = {
  highThreshold: 0.7,
  mediumThreshold: 0.5,
};

export class IntentRouter {
  private readonly log = logger.child({ component: 'intent-router' });
  private readonly policy: RoutingPolicy;

  constructor(policy?: Partial<RoutingPolicy>) {
    this.policy = { ...DEFAULT_POLICY, ...policy };
  }

  route(intent: Intent, confidence: number): RouteDecision {
    const mapped = INTENT_JOURNEY_MAP[intent] ?? 'unknown';

    if (confidence >= this.policy.highThreshold) {
      return {
        journey: mapped,
        reason: `High confidence ${intent} routed to ${mapped}`,
        confidence,
        shouldClarify: false,
        metadata: {
          routingThreshold: 'high_confidence',
          intent,
          suggestedJourney: mapped,
          thresholdMet: true,
        },
      };
    }

    if (confidence >= this.policy.mediumThreshold) {
      this.log.debug({ intent, confidence, suggestedJourney: mapped }, 'Medium confidence; asking to clarify');
      return {
        journey: 'unknown',
        reason: `Medium confidence ${intent} needs clarification`,
        confidence,
        shouldClarify: true,
        metadata: {
          routingThreshold: 'medium_confidence',
          intent,
          suggestedJourney: mapped,
          clarificationType: 'intent_disambiguation',
        },
      };
    }

    return {
      journey: 'unknown',
      reason: `Low confidence ${intent}`,
      confidence,
      shouldClarify: false,
      metadata: {
        routingThreshold: 'low_confidence',
        intent,
        thresholdMet: false,
      },
    };
  }

  mappedJourney(intent: Intent): Journey {
    return INTENT_JOURNEY_MAP[intent] ?? 'unknown';
  }
}
