/**
 * Heuristic Classifier
 *
 * Keyword rules over the lexicon. Used on its own when no model is
 * configured and as the fallback whenever the model classifier fails.
 *
 * Confidences are fixed per rule:
 *   intent      keyword hit 0.6, no hit 0.3
 *   language    explicit request 0.9, word scoring 0.5
 *   governance  abuse 0.8, spam 0.7, business / casual 0.6
 */

import { Lexicon, PhraseMatcher, getLexicon, normalizeText } from '../config/lexicon';
import { INTENT_JOURNEY_MAP } from '../routing/intent-router';
import { GovernorClass, Intent, Lang } from '../state/types';
import { ClassificationContext, Classifier, GovernanceResult, IntentResult, LanguageResult, RecommendedAction } from './types';

export const HEURISTIC_CONFIDENCE = {
  intentMatched: 0.6,
  intentUnmatched: 0.3,
  languageExplicit: 0.9,
  languageScored: 0.5,
  abuse: 0.8,
  spam: 0.7,
  default: 0.6,
} as const;

/** Evaluation order: first matching intent wins */
const INTENT_ORDER = [
  'human_request',
  'order_status',
  'payment_help',
  'discounts_offers',
  'preferences_consent',
  'support_question',
  'product_question',
  'sales_discovery',
  'spam_casual',
] as const satisfies readonly Intent[];

const BUSINESS_INTENTS: ReadonlySet<Intent> = new Set<Intent>([
  'sales_discovery',
  'product_question',
  'support_question',
  'order_status',
  'discounts_offers',
  'preferences_consent',
  'payment_help',
]);

const ACTION_FOR: Readonly<Record<GovernorClass, RecommendedAction>> = {
  business: 'proceed',
  casual: 'redirect',
  spam: 'limit',
  abuse: 'stop',
};

const MIN_MESSAGE_LENGTH = 3;
const SHORT_QUESTION_WORDS = 5;

export class HeuristicClassifier implements Classifier {
  private readonly intentMatchers: Array<{ intent: Intent; matcher: PhraseMatcher }>;
  private readonly language: Record<keyof Lexicon['language'], PhraseMatcher>;
  private readonly governance: Record<keyof Lexicon['governance'], PhraseMatcher>;

  constructor(lexicon: Lexicon = getLexicon()) {
    this.intentMatchers = INTENT_ORDER.map((intent) => ({ intent, matcher: new PhraseMatcher(lexicon.intent[intent]) }));
    this.language = {
      explicitSwahili: new PhraseMatcher(lexicon.language.explicitSwahili),
      explicitEnglish: new PhraseMatcher(lexicon.language.explicitEnglish),
      explicitSheng: new PhraseMatcher(lexicon.language.explicitSheng),
      swahili: new PhraseMatcher(lexicon.language.swahili),
      sheng: new PhraseMatcher(lexicon.language.sheng),
      english: new PhraseMatcher(lexicon.language.english),
    };
    this.governance = {
      abuse: new PhraseMatcher(lexicon.governance.abuse),
      spam: new PhraseMatcher(lexicon.governance.spam),
      business: new PhraseMatcher(lexicon.governance.business, { plurals: true }),
      casual: new PhraseMatcher(lexicon.governance.casual),
      question: new PhraseMatcher(lexicon.governance.question),
    };
  }

  async classifyIntent(ctx: ClassificationContext): Promise<IntentResult> {
    return this.intentFor(ctx.message);
  }

  async detectLanguage(ctx: ClassificationContext): Promise<LanguageResult> {
    return this.languageFor(ctx.message);
  }

  async classifyGovernance(ctx: ClassificationContext): Promise<GovernanceResult> {
    return this.governanceFor(ctx);
  }

  // ───── Intent ─────

  intentFor(message: string): IntentResult {
    const text = normalizeText(message);
    if (!text) return this.intentResult('unknown', HEURISTIC_CONFIDENCE.intentUnmatched, 'empty message');

    for (const { intent, matcher } of this.intentMatchers) {
      const hit = matcher.firstMatch(text);
      if (hit) return this.intentResult(intent, HEURISTIC_CONFIDENCE.intentMatched, `keyword "${hit}"`);
    }

    if (text.length < MIN_MESSAGE_LENGTH) {
      return this.intentResult('spam_casual', HEURISTIC_CONFIDENCE.intentMatched, 'very short message');
    }
    return this.intentResult('unknown', HEURISTIC_CONFIDENCE.intentUnmatched, 'no keyword matched');
  }

  private intentResult(intent: Intent, confidence: number, notes: string): IntentResult {
    return { intent, confidence, notes: `heuristic: ${notes}`.slice(0, 100), suggestedJourney: INTENT_JOURNEY_MAP[intent] };
  }

  // ───── Language ─────

  languageFor(message: string): LanguageResult {
    const text = normalizeText(message);
    const result = (responseLanguage: Lang, confidence: number): LanguageResult => ({
      responseLanguage,
      confidence,
      shouldAskLanguageQuestion: false,
    });

    if (!text) return result('en', HEURISTIC_CONFIDENCE.languageScored);

    if (this.language.explicitSwahili.matches(text)) return result('sw', HEURISTIC_CONFIDENCE.languageExplicit);
    if (this.language.explicitEnglish.matches(text)) return result('en', HEURISTIC_CONFIDENCE.languageExplicit);
    if (this.language.explicitSheng.matches(text)) return result('sheng', HEURISTIC_CONFIDENCE.languageExplicit);

    const sw = this.language.swahili.count(text);
    const sheng = this.language.sheng.count(text);
    const en = this.language.english.count(text);
    const total = sw + sheng + en;

    // Code-switching
    if (total >= 2 && sw > 0 && en > 0) return result('mixed', HEURISTIC_CONFIDENCE.languageScored);
    if (total >= 2 && sheng > 0 && (sw > 0 || en > 0)) return result('mixed', HEURISTIC_CONFIDENCE.languageScored);

    if (sheng > sw && sheng > en) return result('sheng', HEURISTIC_CONFIDENCE.languageScored);
    if (sw > en) return result('sw', HEURISTIC_CONFIDENCE.languageScored);
    return result('en', HEURISTIC_CONFIDENCE.languageScored);
  }

  // ───── Governance ─────

  governanceFor(ctx: Pick<ClassificationContext, 'message' | 'intent' | 'intentConfidence'>): GovernanceResult {
    const raw = ctx.message.trim();
    const text = normalizeText(raw);
    const chars = Array.from(raw);

    if (!text) return this.governanceResult('spam', HEURISTIC_CONFIDENCE.spam);
    if (this.governance.abuse.matches(text)) return this.governanceResult('abuse', HEURISTIC_CONFIDENCE.abuse);

    // Short greetings ("hi") are casual, not spam
    if (chars.length < MIN_MESSAGE_LENGTH) {
      return this.governance.casual.matches(text)
        ? this.governanceResult('casual', HEURISTIC_CONFIDENCE.default)
        : this.governanceResult('spam', HEURISTIC_CONFIDENCE.spam);
    }

    // Repeated characters, test strings, mostly symbols
    if (new Set(chars).size <= 2 && chars.length > MIN_MESSAGE_LENGTH) {
      return this.governanceResult('spam', HEURISTIC_CONFIDENCE.spam);
    }
    if (this.governance.spam.matches(text)) return this.governanceResult('spam', HEURISTIC_CONFIDENCE.spam);
    const alphanumeric = chars.filter((c) => /[\p{L}\p{N}]/u.test(c)).length;
    if (alphanumeric < chars.length * 0.5) return this.governanceResult('spam', HEURISTIC_CONFIDENCE.spam);

    if (this.governance.business.matches(text)) return this.governanceResult('business', HEURISTIC_CONFIDENCE.default);
    if (ctx.intent && BUSINESS_INTENTS.has(ctx.intent) && (ctx.intentConfidence ?? 0) >= 0.5) {
      return this.governanceResult('business', HEURISTIC_CONFIDENCE.default);
    }

    if (this.governance.casual.matches(text)) return this.governanceResult('casual', HEURISTIC_CONFIDENCE.default);

    const isQuestion = this.governance.question.matches(text) || raw.includes('?');
    if (isQuestion && text.split(/\s+/).length <= SHORT_QUESTION_WORDS) {
      return this.governanceResult('casual', HEURISTIC_CONFIDENCE.default);
    }

    // Benefit of the doubt
    return this.governanceResult('business', HEURISTIC_CONFIDENCE.default);
  }

  private governanceResult(classification: GovernorClass, confidence: number): GovernanceResult {
    return { classification, confidence, recommendedAction: ACTION_FOR[classification] };
  }
}
