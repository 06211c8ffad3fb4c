/**
 * Conversation State
 *
 * The per-(tenant, conversation) record every pipeline stage reads and
 * writes. Invariants are enforced at construction, on every classifier
 * update and before serialization; nothing is clamped or coerced here.
 */

import { InvalidStateError } from '../errors/app-errors';
import {
  ChattinessLevel,
  ConversationStateInit,
  ConversationStateJSON,
  GovernorClass,
  Intent,
  Journey,
  Lang,
  TRANSIENT_STATE_KEYS,
  isChattinessLevel,
  isGovernorClass,
  isIntent,
  isJourney,
  isLang,
} from './types';

const KNOWN_KEYS: ReadonlySet<string> = new Set<keyof ConversationStateJSON>([
  'tenant_id',
  'conversation_id',
  'request_id',
  'customer_id',
  'phone',
  'tenant_name',
  'bot_name',
  'catalog_link_base',
  'default_language',
  'allowed_languages',
  'customer_language_pref',
  'max_chattiness_level',
  'intent',
  'intent_confidence',
  'journey',
  'response_language',
  'language_confidence',
  'governor_classification',
  'governor_confidence',
  'turn_count',
  'casual_turns',
  'spam_turns',
  'clarification_rounds',
  'escalation_required',
  'escalation_reason',
  'handoff_ticket_id',
  'last_catalog_query',
  'catalog_total_matches_estimate',
  'catalog_clarifications',
  'presented_item_ids',
  'selected_item_ids',
  'shortlist_rejections',
  'incoming_message',
  'response_text',
]);

export class ConversationState {
  tenantId: string;
  conversationId: string;
  requestId: string;
  customerId?: string;
  phone?: string;

  // ───── Tenant context ─────
  tenantName?: string;
  botName?: string;
  catalogLinkBase?: string;
  defaultLanguage: Lang = 'en';
  allowedLanguages: Lang[] = ['en', 'sw', 'sheng'];
  customerLanguagePref?: Lang;
  maxChattinessLevel: ChattinessLevel = 2;

  // ───── Classifier outputs ─────
  intent: Intent = 'unknown';
  intentConfidence = 0;
  journey: Journey = 'unknown';
  responseLanguage: Lang = 'en';
  languageConfidence = 0;
  governorClassification: GovernorClass = 'business';
  governorConfidence = 0;

  // ───── Counters ─────
  turnCount = 0;
  casualTurns = 0;
  spamTurns = 0;
  clarificationRounds = 0;

  // ───── Escalation ─────
  escalationRequired = false;
  escalationReason?: string;
  handoffTicketId?: string;

  // ───── Catalog ─────
  lastCatalogQuery?: string;
  catalogTotalMatchesEstimate?: number;
  catalogClarifications = 0;
  presentedItemIds: string[] = [];
  selectedItemIds: string[] = [];
  shortlistRejections = 0;

  // ───── Current turn I/O ─────
  incomingMessage?: string;
  responseText?: string;

  private constructor(init: ConversationStateInit) {
    this.tenantId = init.tenantId;
    this.conversationId = init.conversationId;
    this.requestId = init.requestId;
    this.customerId = init.customerId;
    this.phone = init.phone;
  }

  static create(init: ConversationStateInit): ConversationState {
    const state = new ConversationState(init);
    state.validate();
    return state;
  }

  // ───── Invariants ─────

  validate(): void {
    assertIdentity('tenant_id', this.tenantId);
    assertIdentity('conversation_id', this.conversationId);
    assertIdentity('request_id', this.requestId);

    if (!isLang(this.defaultLanguage)) throw new InvalidStateError('default_language', `unknown language ${String(this.defaultLanguage)}`);
    if (!Array.isArray(this.allowedLanguages) || this.allowedLanguages.length === 0) {
      throw new InvalidStateError('allowed_languages', 'must list at least one language');
    }
    for (const lang of this.allowedLanguages) {
      if (!isLang(lang)) throw new InvalidStateError('allowed_languages', `unknown language ${String(lang)}`);
    }
    if (this.customerLanguagePref !== undefined && !isLang(this.customerLanguagePref)) {
      throw new InvalidStateError('customer_language_pref', `unknown language ${String(this.customerLanguagePref)}`);
    }
    if (!isChattinessLevel(this.maxChattinessLevel)) {
      throw new InvalidStateError('max_chattiness_level', `must be 0, 1, 2 or 3 (got ${String(this.maxChattinessLevel)})`);
    }

    if (!isIntent(this.intent)) throw new InvalidStateError('intent', `unknown intent ${String(this.intent)}`);
    if (!isJourney(this.journey)) throw new InvalidStateError('journey', `unknown journey ${String(this.journey)}`);
    if (!isLang(this.responseLanguage)) throw new InvalidStateError('response_language', `unknown language ${String(this.responseLanguage)}`);
    if (!isGovernorClass(this.governorClassification)) {
      throw new InvalidStateError('governor_classification', `unknown class ${String(this.governorClassification)}`);
    }
    assertConfidence('intent_confidence', this.intentConfidence);
    assertConfidence('language_confidence', this.languageConfidence);
    assertConfidence('governor_confidence', this.governorConfidence);

    assertCounter('turn_count', this.turnCount);
    assertCounter('casual_turns', this.casualTurns);
    assertCounter('spam_turns', this.spamTurns);
    assertCounter('clarification_rounds', this.clarificationRounds);
    assertCounter('catalog_clarifications', this.catalogClarifications);
    assertCounter('shortlist_rejections', this.shortlistRejections);
    if (this.catalogTotalMatchesEstimate !== undefined) {
      assertCounter('catalog_total_matches_estimate', this.catalogTotalMatchesEstimate);
    }

    if (typeof this.escalationRequired !== 'boolean') {
      throw new InvalidStateError('escalation_required', 'must be a boolean');
    }
    assertStringList('presented_item_ids', this.presentedItemIds);
    assertStringList('selected_item_ids', this.selectedItemIds);
  }

  // ───── Classifier updates (validate before mutating) ─────

  updateIntent(intent: Intent, confidence: number): void {
    if (!isIntent(intent)) throw new InvalidStateError('intent', `unknown intent ${String(intent)}`);
    assertConfidence('intent_confidence', confidence);
    this.intent = intent;
    this.intentConfidence = confidence;
  }

  updateLanguage(language: Lang, confidence: number): void {
    if (!isLang(language)) throw new InvalidStateError('response_language', `unknown language ${String(language)}`);
    assertConfidence('language_confidence', confidence);
    this.responseLanguage = language;
    this.languageConfidence = confidence;
  }

  updateGovernor(classification: GovernorClass, confidence: number): void {
    if (!isGovernorClass(classification)) {
      throw new InvalidStateError('governor_classification', `unknown class ${String(classification)}`);
    }
    assertConfidence('governor_confidence', confidence);
    this.governorClassification = classification;
    this.governorConfidence = confidence;
  }

  // ───── Counters ─────

  incrementTurn(): number {
    this.turnCount += 1;
    return this.turnCount;
  }

  incrementCasualTurns(): number {
    this.casualTurns += 1;
    return this.casualTurns;
  }

  incrementSpamTurns(): number {
    this.spamTurns += 1;
    return this.spamTurns;
  }

  /** Reset the per-turn I/O fields for a new inbound message */
  beginTurn(requestId: string, message: string): void {
    assertIdentity('request_id', requestId);
    this.requestId = requestId;
    this.incomingMessage = message;
    this.responseText = undefined;
  }

  // ───── Escalation ─────

  setEscalation(reason: string, ticketId?: string): void {
    this.escalationRequired = true;
    this.escalationReason = reason;
    if (ticketId) this.handoffTicketId = ticketId;
  }

  clearEscalation(): void {
    this.escalationRequired = false;
    this.escalationReason = undefined;
    this.handoffTicketId = undefined;
  }

  clone(): ConversationState {
    const copy = new ConversationState(this);
    Object.assign(copy, this);
    copy.allowedLanguages = [...this.allowedLanguages];
    copy.presentedItemIds = [...this.presentedItemIds];
    copy.selectedItemIds = [...this.selectedItemIds];
    return copy;
  }

  // ───── Serialization ─────

  toJSON(): ConversationStateJSON {
    this.validate();
    const json: ConversationStateJSON = {
      tenant_id: this.tenantId,
      conversation_id: this.conversationId,
      request_id: this.requestId,
      default_language: this.defaultLanguage,
      allowed_languages: [...this.allowedLanguages],
      max_chattiness_level: this.maxChattinessLevel,
      intent: this.intent,
      intent_confidence: this.intentConfidence,
      journey: this.journey,
      response_language: this.responseLanguage,
      language_confidence: this.languageConfidence,
      governor_classification: this.governorClassification,
      governor_confidence: this.governorConfidence,
      turn_count: this.turnCount,
      casual_turns: this.casualTurns,
      spam_turns: this.spamTurns,
      clarification_rounds: this.clarificationRounds,
      escalation_required: this.escalationRequired,
      catalog_clarifications: this.catalogClarifications,
      presented_item_ids: [...this.presentedItemIds],
      selected_item_ids: [...this.selectedItemIds],
      shortlist_rejections: this.shortlistRejections,
    };

    if (this.customerId !== undefined) json.customer_id = this.customerId;
    if (this.phone !== undefined) json.phone = this.phone;
    if (this.tenantName !== undefined) json.tenant_name = this.tenantName;
    if (this.botName !== undefined) json.bot_name = this.botName;
    if (this.catalogLinkBase !== undefined) json.catalog_link_base = this.catalogLinkBase;
    if (this.customerLanguagePref !== undefined) json.customer_language_pref = this.customerLanguagePref;
    if (this.escalationReason !== undefined) json.escalation_reason = this.escalationReason;
    if (this.handoffTicketId !== undefined) json.handoff_ticket_id = this.handoffTicketId;
    if (this.lastCatalogQuery !== undefined) json.last_catalog_query = this.lastCatalogQuery;
    if (this.catalogTotalMatchesEstimate !== undefined) json.catalog_total_matches_estimate = this.catalogTotalMatchesEstimate;
    if (this.incomingMessage !== undefined) json.incoming_message = this.incomingMessage;
    if (this.responseText !== undefined) json.response_text = this.responseText;

    return json;
  }

  /**
   * Rebuild a state from its persisted JSON. Transient orchestration keys are
   * dropped; any other unrecognized key is rejected.
   */
  static fromJSON(payload: unknown): ConversationState {
    if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
      throw new InvalidStateError('payload', 'expected a JSON object');
    }
    const raw: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(payload)) {
      if (TRANSIENT_STATE_KEYS.has(key)) continue;
      if (!KNOWN_KEYS.has(key)) throw new InvalidStateError(key, 'unknown field');
      raw[key] = value;
    }

    const state = new ConversationState({
      tenantId: readRequiredString(raw, 'tenant_id'),
      conversationId: readRequiredString(raw, 'conversation_id'),
      requestId: readRequiredString(raw, 'request_id'),
      customerId: readString(raw, 'customer_id'),
      phone: readString(raw, 'phone'),
    });

    state.tenantName = readString(raw, 'tenant_name');
    state.botName = readString(raw, 'bot_name');
    state.catalogLinkBase = readString(raw, 'catalog_link_base');
    state.defaultLanguage = readEnum(raw, 'default_language', isLang) ?? state.defaultLanguage;
    state.allowedLanguages = readList(raw, 'allowed_languages', isLang) ?? state.allowedLanguages;
    state.customerLanguagePref = readEnum(raw, 'customer_language_pref', isLang);
    state.maxChattinessLevel = readEnum(raw, 'max_chattiness_level', isChattinessLevel) ?? state.maxChattinessLevel;

    state.intent = readEnum(raw, 'intent', isIntent) ?? state.intent;
    state.intentConfidence = readNumber(raw, 'intent_confidence') ?? 0;
    state.journey = readEnum(raw, 'journey', isJourney) ?? state.journey;
    state.responseLanguage = readEnum(raw, 'response_language', isLang) ?? state.responseLanguage;
    state.languageConfidence = readNumber(raw, 'language_confidence') ?? 0;
    state.governorClassification = readEnum(raw, 'governor_classification', isGovernorClass) ?? state.governorClassification;
    state.governorConfidence = readNumber(raw, 'governor_confidence') ?? 0;

    state.turnCount = readNumber(raw, 'turn_count') ?? 0;
    state.casualTurns = readNumber(raw, 'casual_turns') ?? 0;
    state.spamTurns = readNumber(raw, 'spam_turns') ?? 0;
    state.clarificationRounds = readNumber(raw, 'clarification_rounds') ?? 0;

    state.escalationRequired = readBoolean(raw, 'escalation_required') ?? false;
    state.escalationReason = readString(raw, 'escalation_reason');
    state.handoffTicketId = readString(raw, 'handoff_ticket_id');

    state.lastCatalogQuery = readString(raw, 'last_catalog_query');
    state.catalogTotalMatchesEstimate = readNumber(raw, 'catalog_total_matches_estimate');
    state.catalogClarifications = readNumber(raw, 'catalog_clarifications') ?? 0;
    state.presentedItemIds = readList(raw, 'presented_item_ids', isString) ?? [];
    state.selectedItemIds = readList(raw, 'selected_item_ids', isString) ?? [];
    state.shortlistRejections = readNumber(raw, 'shortlist_rejections') ?? 0;

    state.incomingMessage = readString(raw, 'incoming_message');
    state.responseText = readString(raw, 'response_text');

    state.validate();
    return state;
  }
}

// ───── Field assertions ─────

function assertIdentity(field: string, value: unknown): void {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new InvalidStateError(field, 'must be a non-empty string');
  }
}

function assertConfidence(field: string, value: unknown): void {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidStateError(field, `confidence must be within [0, 1] (got ${String(value)})`);
  }
}

function assertCounter(field: string, value: unknown): void {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new InvalidStateError(field, `must be a non-negative integer (got ${String(value)})`);
  }
}

function assertStringList(field: string, value: unknown): void {
  if (!Array.isArray(value) || !value.every(isString)) {
    throw new InvalidStateError(field, 'must be a list of strings');
  }
}

// ───── Payload readers (null and absent both mean "unset") ─────

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function readRequiredString(raw: Record<string, unknown>, key: string): string {
  const value = readString(raw, key);
  if (value === undefined || value.trim() === '') {
    throw new InvalidStateError(key, 'required field is missing');
  }
  return value;
}

function readString(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (!isString(value)) throw new InvalidStateError(key, 'must be a string');
  return value;
}

function readNumber(raw: Record<string, unknown>, key: string): number | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number') throw new InvalidStateError(key, 'must be a number');
  return value;
}

function readBoolean(raw: Record<string, unknown>, key: string): boolean | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') throw new InvalidStateError(key, 'must be a boolean');
  return value;
}

function readEnum<T>(raw: Record<string, unknown>, key: string, guard: (v: unknown) => v is T): T | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (!guard(value)) throw new InvalidStateError(key, `unsupported value ${JSON.stringify(value)}`);
  return value;
}

function readList<T>(raw: Record<string, unknown>, key: string, guard: (v: unknown) => v is T): T[] | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) throw new InvalidStateError(key, 'must be a list');
  const out: T[] = [];
  for (const item of value) {
    if (!guard(item)) throw new InvalidStateError(key, `unsupported entry ${JSON.stringify(item)}`);
    out.push(item);
  }
  return out;
}
