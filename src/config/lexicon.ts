/**
 * Keyword lexicon
 *
 * Phrase lists used by the heuristic classifiers, the escalation detector and
 * the catalog fallback policy. Loaded once from config/lexicon.json.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ajv, describeErrors } from '../validation/ajv';

const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
const LEXICON_PATH = path.resolve(PROJECT_ROOT, 'config', 'lexicon.json');

export interface EscalationLexicon {
  humanRequest: string[];
  paymentDispute: string[];
  sensitive: string[];
  frustration: string[];
}

export interface IntentLexicon {
  human_request: string[];
  order_status: string[];
  payment_help: string[];
  discounts_offers: string[];
  preferences_consent: string[];
  support_question: string[];
  product_question: string[];
  sales_discovery: string[];
  spam_casual: string[];
}

export interface Lexicon {
  escalation: EscalationLexicon;
  intent: IntentLexicon;
  language: {
    explicitSwahili: string[];
    explicitEnglish: string[];
    explicitSheng: string[];
    swahili: string[];
    sheng: string[];
    english: string[];
  };
  governance: {
    abuse: string[];
    spam: string[];
    business: string[];
    casual: string[];
    question: string[];
  };
  catalog: {
    seeAll: string[];
    vague: string[];
    rejection: string[];
    visualAttributes: string[];
    visualCategories: string[];
  };
}

const phraseList = { type: 'array', items: { type: 'string', minLength: 1 } };

function section(keys: string[]) {
  return {
    type: 'object',
    required: keys,
    properties: Object.fromEntries(keys.map((k) => [k, phraseList])),
  };
}

const validateLexicon = ajv.compile<Lexicon>({
  type: 'object',
  required: ['escalation', 'intent', 'language', 'governance', 'catalog'],
  properties: {
    escalation: section(['humanRequest', 'paymentDispute', 'sensitive', 'frustration']),
    intent: section([
      'human_request', 'order_status', 'payment_help', 'discounts_offers', 'preferences_consent',
      'support_question', 'product_question', 'sales_discovery', 'spam_casual',
    ]),
    language: section(['explicitSwahili', 'explicitEnglish', 'explicitSheng', 'swahili', 'sheng', 'english']),
    governance: section(['abuse', 'spam', 'business', 'casual', 'question']),
    catalog: section(['seeAll', 'vague', 'rejection', 'visualAttributes', 'visualCategories']),
  },
});

let cached: Lexicon | undefined;

export function loadLexicon(file: string = LEXICON_PATH): Lexicon {
  const data: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  if (!validateLexicon(data)) {
    throw new Error(`Invalid lexicon ${file}: ${describeErrors(validateLexicon.errors)}`);
  }
  return data;
}

export function getLexicon(): Lexicon {
  if (!cached) cached = loadLexicon();
  return cached;
}

// ───── Phrase matching ─────

export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/[‘’]/g, "'").trim();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Matches whole words / phrases, case-insensitively. With `plurals`, a
 * trailing "s" or "es" on a phrase that ends in a letter still matches.
 */
export class PhraseMatcher {
  private readonly patterns: Array<{ phrase: string; re: RegExp }>;

  constructor(phrases: readonly string[], options: { plurals?: boolean } = {}) {
    this.patterns = phrases.map((phrase) => {
      const p = normalizeText(phrase);
      const suffix = options.plurals && /\p{L}$/u.test(p) ? '(?:e?s)?' : '';
      return { phrase: p, re: new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(p)}${suffix}(?![\\p{L}\\p{N}])`, 'u') };
    });
  }

  /** First phrase found in the text, in list order */
  firstMatch(text: string): string | undefined {
    const normalized = normalizeText(text);
    return this.patterns.find(({ re }) => re.test(normalized))?.phrase;
  }

  matches(text: string): boolean {
    return this.firstMatch(text) !== undefined;
  }

  /** Number of distinct phrases present */
  count(text: string): number {
    const normalized = normalizeText(text);
    return this.patterns.filter(({ re }) => re.test(normalized)).length;
  }
}
