/**
 * LLM Classifier
 *
 * One JSON-mode completion per classification. Every failure (budget,
 * transport, unparseable or invalid output) surfaces as a
 * ClassifierFailureError; this class never falls back on its own.
 */

import { ClassifierFailureError, ClassifierName, errorMessage } from '../errors/app-errors';
import { LLMProvider } from '../llm/types';
import { LLMCostLimiter } from '../llm/cost-limiter';
import { fill } from '../config/responses';
import { logger } from '../observability/logger';
import { llmTokensUsed } from '../observability/metrics';
import { parseModelJson, toGovernanceResult, toIntentResult, toLanguageResult } from './contracts';
import { ClassifierPrompts, loadPrompts } from './prompts';
import { ClassificationContext, Classifier, GovernanceResult, IntentResult, LanguageResult } from './types';

export interface LlmClassifierOptions {
  maxTokens: number;
  temperature: number;
}

export class LlmClassifier implements Classifier {
  private readonly log = logger.child({ component: 'llm-classifier' });

  constructor(
    private readonly provider: LLMProvider,
    private readonly costLimiter: LLMCostLimiter,
    private readonly options: LlmClassifierOptions,
    private readonly prompts: ClassifierPrompts = loadPrompts(),
  ) {}

  async classifyIntent(ctx: ClassificationContext): Promise<IntentResult> {
    return toIntentResult(await this.run('intent', this.prompts.intent, ctx));
  }

  async detectLanguage(ctx: ClassificationContext): Promise<LanguageResult> {
    const system = fill(this.prompts.language, { allowedLanguages: ctx.allowedLanguages.join(', ') });
    return toLanguageResult(await this.run('language', system, ctx));
  }

  async classifyGovernance(ctx: ClassificationContext): Promise<GovernanceResult> {
    const system = fill(this.prompts.governance, {
      intent: ctx.intent ?? 'unknown',
      intentConfidence: (ctx.intentConfidence ?? 0).toFixed(2),
      turnCount: ctx.turnCount,
    });
    return toGovernanceResult(await this.run('governance', system, ctx));
  }

  private async run(classifier: ClassifierName, system: string, ctx: ClassificationContext): Promise<Record<string, unknown>> {
    const budget = this.costLimiter.canMakeRequest(ctx.conversationId, ctx.tenantId);
    if (!budget.allowed) {
      throw new ClassifierFailureError(classifier, 'budget_exceeded', budget.reason);
    }

    let content: string;
    try {
      const response = await this.provider.complete({
        messages: [
          { role: 'system', content: system },
          { role: 'user', content: ctx.message },
        ],
        temperature: this.options.temperature,
        maxTokens: this.options.maxTokens,
        jsonMode: true,
      });
      this.costLimiter.recordUsage(ctx.conversationId, ctx.tenantId, response.usage.totalTokens, response.provider);
      llmTokensUsed.inc({ provider: response.provider }, response.usage.totalTokens);
      this.log.debug(
        { classifier, conversationId: ctx.conversationId, tokens: response.usage.totalTokens, latencyMs: response.latencyMs },
        'Classifier completion',
      );
      content = response.content;
    } catch (err) {
      throw new ClassifierFailureError(classifier, 'transport', errorMessage(err), err);
    }

    return parseModelJson(classifier, content);
  }
}
