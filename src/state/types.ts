// ───── Closed enumerations ─────

export const INTENTS = [
  'sales_discovery',
  'product_question',
  'support_question',
  'order_status',
  'discounts_offers',
  'preferences_consent',
  'payment_help',
  'human_request',
  'spam_casual',
  'unknown',
] as const;
export type Intent = (typeof INTENTS)[number];

export const JOURNEYS = ['sales', 'support', 'orders', 'offers', 'prefs', 'governance', 'unknown'] as const;
export type Journey = (typeof JOURNEYS)[number];

export const LANGUAGES = ['en', 'sw', 'sheng', 'mixed'] as const;
export type Lang = (typeof LANGUAGES)[number];

export const GOVERNOR_CLASSES = ['business', 'casual', 'spam', 'abuse'] as const;
export type GovernorClass = (typeof GOVERNOR_CLASSES)[number];

export type ChattinessLevel = 0 | 1 | 2 | 3;

export function isIntent(value: unknown): value is Intent {
  return typeof value === 'string' && INTENTS.some((v) => v === value);
}

export function isJourney(value: unknown): value is Journey {
  return typeof value === 'string' && JOURNEYS.some((v) => v === value);
}

export function isLang(value: unknown): value is Lang {
  return typeof value === 'string' && LANGUAGES.some((v) => v === value);
}

export function isGovernorClass(value: unknown): value is GovernorClass {
  return typeof value === 'string' && GOVERNOR_CLASSES.some((v) => v === value);
}

export function isChattinessLevel(value: unknown): value is ChattinessLevel {
  return value === 0 || value === 1 || value === 2 || value === 3;
}

// ───── Persisted shape ─────

/** Fields supplied when a conversation is first seen */
export interface ConversationStateInit {
  tenantId: string;
  conversationId: string;
  requestId: string;
  customerId?: string;
  phone?: string;
}

/** Wire format written to the state store (snake_case keys) */
export interface ConversationStateJSON {
  tenant_id: string;
  conversation_id: string;
  request_id: string;
  customer_id?: string;
  phone?: string;
  tenant_name?: string;
  bot_name?: string;
  catalog_link_base?: string;
  default_language: Lang;
  allowed_languages: Lang[];
  customer_language_pref?: Lang;
  max_chattiness_level: ChattinessLevel;
  intent: Intent;
  intent_confidence: number;
  journey: Journey;
  response_language: Lang;
  language_confidence: number;
  governor_classification: GovernorClass;
  governor_confidence: number;
  turn_count: number;
  casual_turns: number;
  spam_turns: number;
  clarification_rounds: number;
  escalation_required: boolean;
  escalation_reason?: string;
  handoff_ticket_id?: string;
  last_catalog_query?: string;
  catalog_total_matches_estimate?: number;
  catalog_clarifications: number;
  presented_item_ids: string[];
  selected_item_ids: string[];
  shortlist_rejections: number;
  incoming_message?: string;
  response_text?: string;
}

/**
 * Orchestration-only keys that older writers left in persisted payloads.
 * They are dropped on load and never written.
 */
export const TRANSIENT_STATE_KEYS: ReadonlySet<string> = new Set([
  'needs_clarification',
  'clarification_reason',
  'clarification_metadata',
  'escalation_metadata',
  'routing_metadata',
  'routing_decision',
  'routing_confidence',
  'journey_transition_reason',
  'journey_transition_confidence',
  'journey_transition_metadata',
  'previous_journey',
]);
