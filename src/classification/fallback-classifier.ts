import { ClassifierFailureError, ClassifierName } from '../errors/app-errors';
import { logger } from '../observability/logger';
import { classifierFallbacks } from '../observability/metrics';
import { HeuristicClassifier } from './heuristic-classifier';
import { ClassificationContext, Classifier, GovernanceResult, IntentResult, LanguageResult } from './types';

/** Ceiling on confidence when a heuristic answers for a failed model call */
export const FALLBACK_CONFIDENCE = 0.5;

/**
 * Wraps a primary classifier. A ClassifierFailureError from the primary is
 * answered by the heuristic classifier with capped confidence; any other
 * error propagates.
 */
export class FallbackClassifier implements Classifier {
  private readonly log = logger.child({ component: 'fallback-classifier' });

  constructor(
    private readonly primary: Classifier,
    private readonly heuristic: HeuristicClassifier = new HeuristicClassifier(),
  ) {}

  classifyIntent(ctx: ClassificationContext): Promise<IntentResult> {
    return this.withFallback('intent', ctx, () => this.primary.classifyIntent(ctx), () => this.heuristic.intentFor(ctx.message));
  }

  detectLanguage(ctx: ClassificationContext): Promise<LanguageResult> {
    return this.withFallback('language', ctx, () => this.primary.detectLanguage(ctx), () => this.heuristic.languageFor(ctx.message));
  }

  classifyGovernance(ctx: ClassificationContext): Promise<GovernanceResult> {
    return this.withFallback('governance', ctx, () => this.primary.classifyGovernance(ctx), () => this.heuristic.governanceFor(ctx));
  }

  private async withFallback<T extends { confidence: number }>(
    classifier: ClassifierName,
    ctx: ClassificationContext,
    primary: () => Promise<T>,
    heuristic: () => T,
  ): Promise<T> {
    try {
      return await primary();
    } catch (err) {
      if (!(err instanceof ClassifierFailureError)) throw err;
      classifierFallbacks.inc({ classifier, reason: err.reason });
      this.log.warn(
        { classifier, reason: err.reason, conversationId: ctx.conversationId, err },
        'Classifier failed; using heuristic fallback',
      );
      const result = heuristic();
      return { ...result, confidence: Math.min(result.confidence, FALLBACK_CONFIDENCE) };
    }
  }
}
