/**
 * Journey Orchestrator
 *
 * Runs one inbound message through the fixed stage pipeline:
 *
 *   entry → tenant_resolve → customer_resolve → intent_classify →
 *   language_policy → governance → journey_router → journey_execution →
 *   response_generation → persistence
 *
 * Every stage works on a clone of the state. When a stage throws, the
 * snapshot taken before it is restored, the conversation is flagged for a
 * human and the run jumps to response_generation (generic reply) and then
 * persistence. A persistence failure keeps the reply and flags the turn.
 * When the stored state could not be loaded, nothing is written back.
 */

import { ConversationState } from '../state/conversation-state';
import { ClassificationContext } from '../classification/types';
import { resolveResponseLanguage } from '../classification/language-policy';
import { ResponseCatalog, getResponses } from '../config/responses';
import { RouteDecision } from '../routing/types';
import { StageExecutionError, errorMessage } from '../errors/app-errors';
import { turnLogger } from '../observability/logger';
import { createTraceContext, endSpan, spanTimings, startSpan } from '../observability/trace';
import {
  escalationsTotal,
  routeDecisions,
  stageDuration,
  stageFailures,
  turnsProcessed,
} from '../observability/metrics';
import {
  OrchestratorDeps,
  ProcessMessageInput,
  STAGES,
  Stage,
  StageName,
  TurnContext,
  TurnResult,
} from './types';

/** Clarifying turns in a row before the conversation is handed to a human */
export const MAX_CLARIFICATION_ROUNDS = 3;

const LAST_RESORT_REPLY = "I'm sorry, something went wrong on our side. A member of our team will follow up shortly.";

const RESPONSE_STAGE = STAGES.indexOf('response_generation');
const PERSISTENCE_STAGE = STAGES.indexOf('persistence');

export class JourneyOrchestrator {
  private readonly stages: Record<StageName, Stage>;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly responses: ResponseCatalog = getResponses(),
  ) {
    this.stages = {
      entry: (s, t) => this.entry(s, t),
      tenant_resolve: (s, t) => this.resolveTenant(s, t),
      customer_resolve: (s, t) => this.resolveCustomer(s, t),
      intent_classify: (s, t) => this.classifyIntent(s, t),
      language_policy: (s, t) => this.applyLanguagePolicy(s, t),
      governance: (s, t) => this.applyGovernance(s, t),
      journey_router: (s, t) => this.routeJourney(s, t),
      journey_execution: (s, t) => this.executeJourney(s, t),
      response_generation: (s, t) => this.generateResponse(s, t),
      persistence: (s, t) => this.persist(s, t),
    };
  }

  async processMessage(input: ProcessMessageInput): Promise<TurnResult> {
    const trace = createTraceContext({
      requestId: input.requestId,
      tenantId: input.tenantId,
      conversationId: input.conversationId,
    });
    const turn: TurnContext = {
      requestId: input.requestId,
      messageText: input.messageText,
      now: Date.now(),
      trace,
      log: turnLogger({ requestId: input.requestId, tenantId: input.tenantId, conversationId: input.conversationId }),
      existingState: input.existingState,
      startedFlagged: false,
      loadFailed: false,
      persisted: false,
    };

    let state = ConversationState.create({
      tenantId: input.tenantId,
      conversationId: input.conversationId,
      requestId: input.requestId,
      customerId: input.customerId,
      phone: input.phone,
    });

    let index = 0;
    while (index < STAGES.length) {
      const name = STAGES[index];
      const snapshot = state.clone();
      const span = startSpan(trace, `stage.${name}`, { stage: name });
      try {
        state = await this.stages[name](state, turn);
        stageDuration.observe({ stage: name }, endSpan(span));
        index += 1;
      } catch (err) {
        stageDuration.observe({ stage: name }, endSpan(span, err));
        stageFailures.inc({ stage: name });
        state = snapshot;
        index = this.recover(name, err, state, turn);
      }
    }

    const decision = turn.failure ? systemErrorDecision(turn.failure.stage) : turn.decision ?? systemErrorDecision('journey_router');
    turnsProcessed.inc({ tenant: state.tenantId, journey: state.journey });
    turn.log.info(
      {
        journey: state.journey,
        intent: state.intent,
        escalationRequired: state.escalationRequired,
        failedStage: turn.failure?.stage,
        persisted: turn.persisted,
        timingsMs: spanTimings(trace),
      },
      'Turn processed',
    );

    return {
      state,
      decision,
      responseText: state.responseText ?? LAST_RESORT_REPLY,
      failedStage: turn.failure ? stageName(turn.failure.stage) : undefined,
      persisted: turn.persisted,
    };
  }

  /** Decide where the run continues after `name` threw; returns the next stage index */
  private recover(name: StageName, err: unknown, state: ConversationState, turn: TurnContext): number {
    if (name === 'persistence') {
      turn.log.error({ err }, 'Failed to persist conversation state');
      turn.failure ??= new StageExecutionError(name, err);
      state.setEscalation(`System error in ${name}`);
      return STAGES.length;
    }

    if (turn.failure || name === 'response_generation') {
      // Already recovering, or the reply itself failed: keep whatever reply exists
      turn.log.error({ err, stage: name }, 'Stage failed while recovering');
      turn.failure ??= new StageExecutionError(name, err);
      state.setEscalation(`System error in ${name}`);
      state.responseText ??= this.fallbackReply(state);
      return PERSISTENCE_STAGE;
    }

    turn.failure = new StageExecutionError(name, err);
    turn.loadFailed = name === 'entry';
    turn.log.error({ err, stage: name }, 'Stage failed; escalating');
    state.setEscalation(`System error in ${name}`);
    return RESPONSE_STAGE;
  }

  // ───── Stages ─────

  private async entry(state: ConversationState, turn: TurnContext): Promise<ConversationState> {
    const stored = turn.existingState ?? (await this.deps.stateStore.get(state.tenantId, state.conversationId));
    const current = stored ? stored.clone() : state;

    if (!current.customerId && state.customerId) current.customerId = state.customerId;
    if (!current.phone && state.phone) current.phone = state.phone;

    turn.startedFlagged = current.escalationRequired;
    turn.flaggedReason = current.escalationReason;

    current.beginTurn(turn.requestId, turn.messageText);
    current.incrementTurn();
    return current;
  }

  private async resolveTenant(state: ConversationState, turn: TurnContext): Promise<ConversationState> {
    const policy = await this.deps.tenants.resolve(state.tenantId);
    turn.tenantPolicy = policy;

    state.tenantName = policy.tenantName;
    state.botName = policy.botName;
    state.catalogLinkBase = policy.catalogLinkBase;
    state.defaultLanguage = policy.defaultLanguage;
    state.allowedLanguages = [...policy.allowedLanguages];
    state.maxChattinessLevel = policy.maxChattinessLevel;
    state.validate();
    return state;
  }

  private async resolveCustomer(state: ConversationState, turn: TurnContext): Promise<ConversationState> {
    if (!this.deps.customers) return state;

    const profile = await this.deps.customers.resolve(state.tenantId, state.phone);
    if (!profile) return state;

    if (profile.customerId && !state.customerId) state.customerId = profile.customerId;
    if (profile.languagePref && !state.customerLanguagePref) state.customerLanguagePref = profile.languagePref;
    turn.log.debug({ customerId: state.customerId }, 'Customer resolved');
    return state;
  }

  private async classifyIntent(state: ConversationState, turn: TurnContext): Promise<ConversationState> {
    const result = await this.deps.classifier.classifyIntent(classificationContext(state, turn));
    turn.intentResult = result;
    state.updateIntent(result.intent, result.confidence);
    return state;
  }

  private async applyLanguagePolicy(state: ConversationState, turn: TurnContext): Promise<ConversationState> {
    const detected = await this.deps.classifier.detectLanguage(classificationContext(state, turn));
    turn.languageResult = detected;

    const resolution = resolveResponseLanguage(state, detected);
    state.updateLanguage(resolution.language, resolution.confidence);
    if (resolution.newPreference) state.customerLanguagePref = resolution.newPreference;
    return state;
  }

  private async applyGovernance(state: ConversationState, turn: TurnContext): Promise<ConversationState> {
    const result = await this.deps.classifier.classifyGovernance(classificationContext(state, turn));
    turn.governanceResult = result;
    turn.governance = await this.deps.governance.apply(state, result, turn.now);
    return state;
  }

  private async routeJourney(state: ConversationState, turn: TurnContext): Promise<ConversationState> {
    const governance = turn.governance;

    let decision: RouteDecision | null = governance?.action === 'rate_limited' ? governance.decision : null;
    decision ??= this.deps.escalation.detect({
      message: turn.messageText,
      turnCount: state.turnCount,
      alreadyFlagged: turn.startedFlagged,
      flaggedReason: turn.flaggedReason,
      tenantKeywords: turn.tenantPolicy?.escalationKeywords,
    });
    decision ??= governance?.decision ?? null;

    if (decision) {
      state.clarificationRounds = 0;
    } else {
      decision = this.boundClarification(state, this.deps.router.route(state.intent, state.intentConfidence));
    }

    state.journey = decision.journey;
    const meta = decision.metadata;
    if (meta.escalationRequired && meta.escalationTrigger !== 'state_flagged') {
      state.setEscalation(decision.reason);
    }

    routeDecisions.inc({
      journey: decision.journey,
      reason: meta.escalationTrigger ?? meta.governanceAction ?? meta.routingThreshold ?? 'other',
    });
    if (meta.escalationRequired) {
      escalationsTotal.inc({ trigger: meta.escalationTrigger ?? meta.governanceAction ?? 'other' });
    }

    turn.decision = decision;
    turn.log.debug({ journey: decision.journey, reason: decision.reason, confidence: decision.confidence }, 'Route decided');
    return state;
  }

  private boundClarification(state: ConversationState, decision: RouteDecision): RouteDecision {
    if (!decision.shouldClarify) {
      state.clarificationRounds = 0;
      return decision;
    }
    state.clarificationRounds += 1;
    if (state.clarificationRounds >= MAX_CLARIFICATION_ROUNDS) {
      const escalation = this.deps.escalation.repeatedFailures(state.clarificationRounds);
      state.clarificationRounds = 0;
      return escalation;
    }
    decision.metadata.clarificationRounds = state.clarificationRounds;
    return decision;
  }

  private async executeJourney(state: ConversationState, turn: TurnContext): Promise<ConversationState> {
    const decision = turn.decision;
    if (!decision) throw new Error('No route decision for this turn');
    turn.reply = await this.deps.journeys[state.journey].execute({ state, turn, decision });
    return state;
  }

  private async generateResponse(state: ConversationState, turn: TurnContext): Promise<ConversationState> {
    if (!turn.failure) {
      state.responseText = turn.reply ?? this.fallbackReply(state);
      return state;
    }

    state.responseText = this.fallbackReply(state);
    const reason = state.escalationReason ?? `System error in ${turn.failure.stage}`;
    try {
      const ticket = await this.deps.handoff.createTicket({
        tenantId: state.tenantId,
        conversationId: state.conversationId,
        customerId: state.customerId ?? state.phone,
        trigger: 'system_error',
        reason,
        priority: 'medium',
        category: 'technical_support',
        summary: `Pipeline failure in ${turn.failure.stage}`,
        context: { requestId: turn.requestId, error: errorMessage(turn.failure.cause) },
      });
      state.setEscalation(reason, ticket.ticketId);
    } catch (err) {
      turn.log.error({ err }, 'Could not open handoff ticket for system error');
    }
    return state;
  }

  private async persist(state: ConversationState, turn: TurnContext): Promise<ConversationState> {
    if (turn.loadFailed) {
      turn.log.warn('Stored state was not loaded; leaving it untouched');
      return state;
    }
    await this.deps.stateStore.save(state);
    turn.persisted = true;
    return state;
  }

  private fallbackReply(state: ConversationState): string {
    return this.responses.fallback[state.responseLanguage] ?? this.responses.fallback.en ?? LAST_RESORT_REPLY;
  }
}

function classificationContext(state: ConversationState, turn: TurnContext): ClassificationContext {
  return {
    tenantId: state.tenantId,
    conversationId: state.conversationId,
    message: turn.messageText,
    turnCount: state.turnCount,
    currentJourney: state.journey,
    allowedLanguages: state.allowedLanguages,
    intent: turn.intentResult?.intent,
    intentConfidence: turn.intentResult?.confidence,
  };
}

function systemErrorDecision(stage: string): RouteDecision {
  return {
    journey: 'governance',
    reason: `System error in ${stage}`,
    confidence: 1,
    shouldClarify: false,
    metadata: { escalationRequired: true },
  };
}

function stageName(value: string): StageName | undefined {
  return STAGES.find((s) => s === value);
}
