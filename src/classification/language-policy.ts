import { Lang } from '../state/types';
import { ConversationState } from '../state/conversation-state';
import { LanguageResult } from './types';

export const LANGUAGE_SWITCH_THRESHOLD = 0.75;
/** Detections this confident (an explicit "speak Swahili") become the customer's preference */
export const LANGUAGE_PREFERENCE_THRESHOLD = 0.9;

export type LanguageSource = 'preference' | 'detected' | 'default';

export interface LanguageResolution {
  language: Lang;
  confidence: number;
  source: LanguageSource;
  /** Set when this turn's detection should be remembered as the preference */
  newPreference?: Lang;
}

type PolicyState = Pick<ConversationState, 'allowedLanguages' | 'defaultLanguage' | 'customerLanguagePref'>;

/**
 * Pick the reply language for this turn. An allowed stored preference wins,
 * then a confident allowed detection, then the tenant default.
 */
export function resolveResponseLanguage(state: PolicyState, detected: LanguageResult): LanguageResolution {
  const allowed = (lang: Lang) => state.allowedLanguages.includes(lang);

  const newPreference =
    detected.confidence >= LANGUAGE_PREFERENCE_THRESHOLD && allowed(detected.responseLanguage) && detected.responseLanguage !== 'mixed'
      ? detected.responseLanguage
      : undefined;

  const preference = newPreference ?? state.customerLanguagePref;
  if (preference && allowed(preference)) {
    return { language: preference, confidence: detected.confidence, source: 'preference', newPreference };
  }

  if (detected.confidence >= LANGUAGE_SWITCH_THRESHOLD && allowed(detected.responseLanguage)) {
    return { language: detected.responseLanguage, confidence: detected.confidence, source: 'detected' };
  }

  return { language: state.defaultLanguage, confidence: detected.confidence, source: 'default' };
}
