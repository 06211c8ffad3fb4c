import { GovernorClass, Intent, Journey, Lang } from '../state/types';

export type RecommendedAction = 'proceed' | 'redirect' | 'limit' | 'stop' | 'handoff';

export interface IntentResult {
  intent: Intent;
  confidence: number;
  /** Short rationale, at most 100 characters */
  notes: string;
  suggestedJourney: Journey;
}

export interface LanguageResult {
  responseLanguage: Lang;
  confidence: number;
  shouldAskLanguageQuestion: boolean;
}

export interface GovernanceResult {
  classification: GovernorClass;
  confidence: number;
  recommendedAction: RecommendedAction;
}

/** What a classifier may see about the conversation */
export interface ClassificationContext {
  tenantId: string;
  conversationId: string;
  message: string;
  turnCount: number;
  currentJourney: Journey;
  allowedLanguages: Lang[];
  /** Set once intent classification has run for this turn */
  intent?: Intent;
  intentConfidence?: number;
}

export interface Classifier {
  classifyIntent(ctx: ClassificationContext): Promise<IntentResult>;
  detectLanguage(ctx: ClassificationContext): Promise<LanguageResult>;
  classifyGovernance(ctx: ClassificationContext): Promise<GovernanceResult>;
}
