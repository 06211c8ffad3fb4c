/**
 * LLM Cost Limiter
 *
 * Caps classifier spend: max tokens per conversation and a daily budget
 * per tenant. Usage is tracked in process and resets at UTC midnight.
 */

import { LLMProviderName } from './types';
import { logger } from '../observability/logger';

export interface CostLimits {
  maxTokensPerConversation: number;
  dailyBudgetPerTenant: number; // in USD
}

// Approximate blended cost per 1K tokens
const COST_PER_1K_TOKENS: Record<LLMProviderName, number> = {
  openai: 0.0004,
};

export interface BudgetCheck {
  allowed: boolean;
  reason?: string;
}

export class LLMCostLimiter {
  private readonly conversationTokens = new Map<string, number>();
  private readonly tenantDailyCost = new Map<string, { cost: number; date: string }>();
  private readonly log = logger.child({ component: 'llm-cost-limiter' });

  constructor(
    private readonly limits: CostLimits,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  recordUsage(conversationId: string, tenantId: string, tokens: number, provider: LLMProviderName): void {
    const key = conversationKey(tenantId, conversationId);
    this.conversationTokens.set(key, (this.conversationTokens.get(key) ?? 0) + tokens);

    const today = this.today();
    const addedCost = (tokens * COST_PER_1K_TOKENS[provider]) / 1000;
    const entry = this.tenantDailyCost.get(tenantId);
    if (!entry || entry.date !== today) {
      this.tenantDailyCost.set(tenantId, { cost: addedCost, date: today });
    } else {
      entry.cost += addedCost;
    }
  }

  canMakeRequest(conversationId: string, tenantId: string): BudgetCheck {
    const tokens = this.conversationTokens.get(conversationKey(tenantId, conversationId)) ?? 0;
    if (tokens >= this.limits.maxTokensPerConversation) {
      const reason = `Conversation token limit exceeded (${tokens}/${this.limits.maxTokensPerConversation})`;
      this.log.warn({ tenantId, conversationId }, reason);
      return { allowed: false, reason };
    }

    const entry = this.tenantDailyCost.get(tenantId);
    if (entry && entry.date === this.today() && entry.cost >= this.limits.dailyBudgetPerTenant) {
      const reason = `Tenant daily budget exceeded ($${entry.cost.toFixed(2)}/$${this.limits.dailyBudgetPerTenant})`;
      this.log.warn({ tenantId }, reason);
      return { allowed: false, reason };
    }

    return { allowed: true };
  }

  getTenantCost(tenantId: string): { dailyCost: number; date: string } {
    const entry = this.tenantDailyCost.get(tenantId);
    const today = this.today();
    return entry && entry.date === today ? { dailyCost: entry.cost, date: today } : { dailyCost: 0, date: today };
  }

  private today(): string {
    return this.clock().toISOString().slice(0, 10);
  }
}

function conversationKey(tenantId: string, conversationId: string): string {
  return `${tenantId}:${conversationId}`;
}
