/**
 * Escalation Detector
 *
 * Runs before intent routing. Rules are evaluated in order and the first
 * match wins:
 *   1. conversation already flagged at the start of the turn
 *   2. explicit request for a human
 *   3. payment dispute / delivery complaint
 *   4. sensitive, legal or medical content
 *   5. frustration, once the conversation has reached 3 turns
 */

import { EscalationLexicon, PhraseMatcher, getLexicon } from '../config/lexicon';
import { EscalationPriority, EscalationTrigger, RouteDecision } from './types';
import { logger } from '../observability/logger';

export interface EscalationInput {
  message: string;
  turnCount: number;
  /** Escalation flag as persisted before this turn's stages ran */
  alreadyFlagged: boolean;
  flaggedReason?: string;
  /** Tenant-specific phrases, merged with the global lexicon */
  tenantKeywords?: Partial<EscalationLexicon>;
}

interface TriggerProfile {
  confidence: number;
  priority: EscalationPriority;
  category: string;
}

export const TRIGGER_PROFILES: Readonly<Record<EscalationTrigger, TriggerProfile>> = {
  state_flagged: { confidence: 1.0, priority: 'medium', category: 'technical_support' },
  explicit_human_request: { confidence: 1.0, priority: 'high', category: 'general_inquiry' },
  payment_dispute: { confidence: 0.9, priority: 'high', category: 'payment_issue' },
  sensitive_content: { confidence: 0.8, priority: 'high', category: 'complaint' },
  user_frustration: { confidence: 0.7, priority: 'medium', category: 'complaint' },
  repeated_failures: { confidence: 1.0, priority: 'medium', category: 'technical_support' },
};

const FRUSTRATION_MIN_TURNS = 3;

type KeywordRule = {
  trigger: EscalationTrigger;
  key: keyof EscalationLexicon;
  minTurns?: number;
};

const KEYWORD_RULES: readonly KeywordRule[] = [
  { trigger: 'explicit_human_request', key: 'humanRequest' },
  { trigger: 'payment_dispute', key: 'paymentDispute' },
  { trigger: 'sensitive_content', key: 'sensitive' },
  { trigger: 'user_frustration', key: 'frustration', minTurns: FRUSTRATION_MIN_TURNS },
];

export class EscalationDetector {
  private readonly log = logger.child({ component: 'escalation-detector' });
  private readonly matchers: Record<keyof EscalationLexicon, PhraseMatcher>;

  constructor(lexicon: EscalationLexicon = getLexicon().escalation) {
    this.matchers = {
      humanRequest: new PhraseMatcher(lexicon.humanRequest, { plurals: true }),
      paymentDispute: new PhraseMatcher(lexicon.paymentDispute, { plurals: true }),
      sensitive: new PhraseMatcher(lexicon.sensitive, { plurals: true }),
      frustration: new PhraseMatcher(lexicon.frustration, { plurals: true }),
    };
  }

  /** Returns an escalation decision, or null when no rule fires */
  detect(input: EscalationInput): RouteDecision | null {
    if (input.alreadyFlagged) {
      return this.decision('state_flagged', `Escalation already in progress${input.flaggedReason ? `: ${input.flaggedReason}` : ''}`);
    }

    for (const rule of KEYWORD_RULES) {
      if (rule.minTurns !== undefined && input.turnCount < rule.minTurns) continue;
      const matched = this.match(rule.key, input.message, input.tenantKeywords);
      if (matched) {
        this.log.info({ trigger: rule.trigger, matched }, 'Escalation trigger matched');
        return this.decision(rule.trigger, `Escalation: ${rule.trigger}`, matched);
      }
    }

    return null;
  }

  /** Decision forced by the clarification-loop bound */
  repeatedFailures(rounds: number): RouteDecision {
    const decision = this.decision('repeated_failures', `Escalation: ${rounds} clarification rounds without resolution`);
    decision.metadata.clarificationRounds = rounds;
    return decision;
  }

  private match(key: keyof EscalationLexicon, message: string, tenantKeywords?: Partial<EscalationLexicon>): string | undefined {
    const found = this.matchers[key].firstMatch(message);
    if (found) return found;
    const extra = tenantKeywords?.[key];
    if (!extra || extra.length === 0) return undefined;
    return new PhraseMatcher(extra, { plurals: true }).firstMatch(message);
  }

  private decision(trigger: EscalationTrigger, reason: string, matchedKeyword?: string): RouteDecision {
    const profile = TRIGGER_PROFILES[trigger];
    return {
      journey: 'governance',
      reason,
      confidence: profile.confidence,
      shouldClarify: false,
      metadata: {
        escalationRequired: true,
        escalationTrigger: trigger,
        escalationPriority: profile.priority,
        escalationCategory: profile.category,
        ...(matchedKeyword ? { matchedKeyword } : {}),
      },
    };
  }
}
