/**
 * Classifier result contracts
 *
 * Model output is parsed, sanitized (the only place values are clamped or
 * replaced) and then validated once against the typed contract. Anything
 * that still fails raises ClassifierFailureError so the caller falls back.
 */

import { ClassifierFailureError, ClassifierName } from '../errors/app-errors';
import { INTENT_JOURNEY_MAP } from '../routing/intent-router';
import { GOVERNOR_CLASSES, GovernorClass, INTENTS, JOURNEYS, LANGUAGES, isGovernorClass, isIntent, isJourney } from '../state/types';
import { ajv, describeErrors } from '../validation/ajv';
import { GovernanceResult, IntentResult, LanguageResult, RecommendedAction } from './types';

export const NOTES_MAX_LENGTH = 100;

const RECOMMENDED_ACTIONS: readonly RecommendedAction[] = ['proceed', 'redirect', 'limit', 'stop', 'handoff'];

const DEFAULT_ACTION: Readonly<Record<GovernorClass, RecommendedAction>> = {
  business: 'proceed',
  casual: 'redirect',
  spam: 'limit',
  abuse: 'stop',
};

const confidence = { type: 'number', minimum: 0, maximum: 1 };

const validateIntent = ajv.compile<IntentResult>({
  type: 'object',
  required: ['intent', 'confidence', 'notes', 'suggestedJourney'],
  additionalProperties: false,
  properties: {
    intent: { enum: [...INTENTS] },
    confidence,
    notes: { type: 'string', maxLength: NOTES_MAX_LENGTH },
    suggestedJourney: { enum: [...JOURNEYS] },
  },
});

const validateLanguage = ajv.compile<LanguageResult>({
  type: 'object',
  required: ['responseLanguage', 'confidence', 'shouldAskLanguageQuestion'],
  additionalProperties: false,
  properties: {
    responseLanguage: { enum: [...LANGUAGES] },
    confidence,
    shouldAskLanguageQuestion: { type: 'boolean' },
  },
});

const validateGovernance = ajv.compile<GovernanceResult>({
  type: 'object',
  required: ['classification', 'confidence', 'recommendedAction'],
  additionalProperties: false,
  properties: {
    classification: { enum: [...GOVERNOR_CLASSES] },
    confidence,
    recommendedAction: { enum: [...RECOMMENDED_ACTIONS] },
  },
});

// ───── Parsing ─────

/** Parse model text into a JSON object, tolerating a fenced code block */
export function parseModelJson(classifier: ClassifierName, content: string): Record<string, unknown> {
  const trimmed = content.trim().replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '');
  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (err) {
    throw new ClassifierFailureError(classifier, 'parse', 'model output is not JSON', err);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ClassifierFailureError(classifier, 'parse', 'model output is not a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

function clampConfidence(classifier: ClassifierName, value: unknown): number {
  const n = typeof value === 'string' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isFinite(n)) {
    throw new ClassifierFailureError(classifier, 'schema', 'confidence is missing or not numeric');
  }
  return Math.min(1, Math.max(0, n));
}

// ───── Sanitize + validate ─────

export function toIntentResult(raw: Record<string, unknown>): IntentResult {
  const intent = isIntent(raw.intent) ? raw.intent : 'unknown';
  const suggested = raw.suggested_journey ?? raw.suggestedJourney;
  const candidate = {
    intent,
    confidence: clampConfidence('intent', raw.confidence),
    notes: typeof raw.notes === 'string' ? raw.notes.slice(0, NOTES_MAX_LENGTH) : '',
    suggestedJourney: isJourney(suggested) ? suggested : INTENT_JOURNEY_MAP[intent],
  };
  if (!validateIntent(candidate)) {
    throw new ClassifierFailureError('intent', 'schema', describeErrors(validateIntent.errors));
  }
  return candidate;
}

export function toLanguageResult(raw: Record<string, unknown>): LanguageResult {
  const ask = raw.should_ask_language_question ?? raw.shouldAskLanguageQuestion;
  const candidate = {
    responseLanguage: raw.response_language ?? raw.responseLanguage,
    confidence: clampConfidence('language', raw.confidence),
    shouldAskLanguageQuestion: typeof ask === 'boolean' ? ask : false,
  };
  if (!validateLanguage(candidate)) {
    throw new ClassifierFailureError('language', 'schema', describeErrors(validateLanguage.errors));
  }
  return candidate;
}

export function toGovernanceResult(raw: Record<string, unknown>): GovernanceResult {
  const reported = isGovernorClass(raw.classification) ? raw.classification : undefined;
  const classification: GovernorClass = reported ?? 'business';
  const action = raw.recommended_action ?? raw.recommendedAction;
  const candidate = {
    classification,
    confidence: reported ? clampConfidence('governance', raw.confidence) : 0.5,
    recommendedAction: isRecommendedAction(action) ? action : DEFAULT_ACTION[classification],
  };
  if (!validateGovernance(candidate)) {
    throw new ClassifierFailureError('governance', 'schema', describeErrors(validateGovernance.errors));
  }
  return candidate;
}

function isRecommendedAction(value: unknown): value is RecommendedAction {
  return typeof value === 'string' && RECOMMENDED_ACTIONS.some((v) => v === value);
}
