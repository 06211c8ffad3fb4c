import pino from 'pino';
import { ConversationState } from '../state/conversation-state';
import { Journey, Lang } from '../state/types';
import { Classifier, GovernanceResult, IntentResult, LanguageResult } from '../classification/types';
import { TenantResolver } from '../config/config-service';
import { TenantPolicy } from '../config/types';
import { GovernanceEngine, GovernanceOutcome } from '../governance/governance-engine';
import { EscalationDetector } from '../routing/escalation-detector';
import { IntentRouter } from '../routing/intent-router';
import { RouteDecision } from '../routing/types';
import { HandoffService } from '../handoff/types';
import { ConversationStateStore } from '../memory/state-store';
import { StageExecutionError } from '../errors/app-errors';
import { TraceContext } from '../observability/trace';

export const STAGES = [
  'entry',
  'tenant_resolve',
  'customer_resolve',
  'intent_classify',
  'language_policy',
  'governance',
  'journey_router',
  'journey_execution',
  'response_generation',
  'persistence',
] as const;
export type StageName = (typeof STAGES)[number];

/** Per-turn scratch data. Never persisted. */
export interface TurnContext {
  requestId: string;
  messageText: string;
  /** Epoch ms used for rate-limit buckets this turn */
  now: number;
  trace: TraceContext;
  log: pino.Logger;
  existingState?: ConversationState;

  /** Escalation flag as loaded, before any stage ran */
  startedFlagged: boolean;
  flaggedReason?: string;

  tenantPolicy?: TenantPolicy;
  intentResult?: IntentResult;
  languageResult?: LanguageResult;
  governanceResult?: GovernanceResult;
  governance?: GovernanceOutcome;
  decision?: RouteDecision;
  reply?: string;

  failure?: StageExecutionError;
  /** The stored state could not be loaded; nothing may be written back this turn */
  loadFailed: boolean;
  persisted: boolean;
}

export type Stage = (state: ConversationState, turn: TurnContext) => Promise<ConversationState>;

// ───── Collaborators ─────

export interface CustomerProfile {
  customerId?: string;
  languagePref?: Lang;
}

export interface CustomerResolver {
  resolve(tenantId: string, phone?: string): Promise<CustomerProfile | null>;
}

export interface JourneyInput {
  state: ConversationState;
  turn: TurnContext;
  decision: RouteDecision;
}

/** Produces the reply for one journey; may update the journey's fields on the state */
export interface JourneyExecutor {
  execute(input: JourneyInput): Promise<string>;
}

export type JourneyExecutors = Record<Journey, JourneyExecutor>;

export interface OrchestratorDeps {
  classifier: Classifier;
  tenants: TenantResolver;
  customers?: CustomerResolver;
  governance: GovernanceEngine;
  escalation: EscalationDetector;
  router: IntentRouter;
  journeys: JourneyExecutors;
  handoff: HandoffService;
  stateStore: ConversationStateStore;
}

// ───── Entry contract ─────

export interface ProcessMessageInput {
  tenantId: string;
  conversationId: string;
  requestId: string;
  messageText: string;
  phone?: string;
  customerId?: string;
  /** Skips the state-store load when the caller already holds the state */
  existingState?: ConversationState;
}

export interface TurnResult {
  state: ConversationState;
  decision: RouteDecision;
  responseText: string;
  failedStage?: StageName;
  persisted: boolean;
}
