/**
 * Reply templates, loaded once from config/responses.json.
 *
 * Templates may contain `{placeholder}` slots filled by `fill()`.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ajv, describeErrors } from '../validation/ajv';

const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
const RESPONSES_PATH = path.resolve(PROJECT_ROOT, 'config', 'responses.json');

type TemplateSet<K extends string> = Record<K, string>;
type RotatingSet<K extends string> = Record<K, string[]>;

export interface ResponseCatalog {
  redirectToBusiness: RotatingSet<'strict' | 'early' | 'direct'>;
  friendlyCasual: RotatingSet<'first' | 'later'>;
  spamWarning: RotatingSet<'first' | 'repeat'>;
  disengage: string[];
  abuseStop: string;
  rateLimited: TemplateSet<'spam_cooldown' | 'abuse_cooldown' | 'default'>;
  escalation: TemplateSet<
    | 'explicit_human_request'
    | 'payment_dispute'
    | 'sensitive_content'
    | 'user_frustration'
    | 'repeated_failures'
    | 'state_flagged'
    | 'default'
  >;
  handoff: TemplateSet<'reference' | 'expected' | 'highPriority' | 'normal'> & {
    eta: TemplateSet<'urgent' | 'high' | 'medium' | 'low'>;
  };
  clarification: Record<string, string>;
  clarificationHints: Record<string, string>;
  unknown: TemplateSet<'welcome' | 'capabilities'>;
  journeyHolding: TemplateSet<'sales' | 'support' | 'orders' | 'offers' | 'prefs'>;
  catalog: TemplateSet<
    | 'large_vague_catalog'
    | 'see_all_request'
    | 'low_confidence_results'
    | 'visual_selection'
    | 'repeated_rejections'
    | 'outro'
    | 'narrowing'
    | 'shortlistIntro'
    | 'shortlistOutro'
    | 'noResults'
    | 'selected'
  >;
  fallback: Record<string, string> & { en: string };
  defaultBotName: string;
}

const text = { type: 'string', minLength: 1 };
const rotation = { type: 'array', minItems: 1, items: text };

function templates(keys: string[]) {
  return { type: 'object', required: keys, properties: Object.fromEntries(keys.map((k) => [k, text])) };
}

function rotations(keys: string[]) {
  return { type: 'object', required: keys, properties: Object.fromEntries(keys.map((k) => [k, rotation])) };
}

const validateCatalog = ajv.compile<ResponseCatalog>({
  type: 'object',
  required: [
    'redirectToBusiness', 'friendlyCasual', 'spamWarning', 'disengage', 'abuseStop', 'rateLimited',
    'escalation', 'handoff', 'clarification', 'clarificationHints', 'unknown', 'journeyHolding',
    'catalog', 'fallback', 'defaultBotName',
  ],
  properties: {
    redirectToBusiness: rotations(['strict', 'early', 'direct']),
    friendlyCasual: rotations(['first', 'later']),
    spamWarning: rotations(['first', 'repeat']),
    disengage: rotation,
    abuseStop: text,
    rateLimited: templates(['spam_cooldown', 'abuse_cooldown', 'default']),
    escalation: templates([
      'explicit_human_request', 'payment_dispute', 'sensitive_content', 'user_frustration',
      'repeated_failures', 'state_flagged', 'default',
    ]),
    handoff: {
      ...templates(['reference', 'expected', 'highPriority', 'normal']),
      required: ['reference', 'expected', 'highPriority', 'normal', 'eta'],
      properties: {
        ...templates(['reference', 'expected', 'highPriority', 'normal']).properties,
        eta: templates(['urgent', 'high', 'medium', 'low']),
      },
    },
    clarification: { type: 'object', required: ['unknown'], additionalProperties: text },
    clarificationHints: { type: 'object', additionalProperties: text },
    unknown: templates(['welcome', 'capabilities']),
    journeyHolding: templates(['sales', 'support', 'orders', 'offers', 'prefs']),
    catalog: templates([
      'large_vague_catalog', 'see_all_request', 'low_confidence_results', 'visual_selection',
      'repeated_rejections', 'outro', 'narrowing', 'shortlistIntro', 'shortlistOutro', 'noResults', 'selected',
    ]),
    fallback: { type: 'object', required: ['en'], additionalProperties: text },
    defaultBotName: text,
  },
});

let cached: ResponseCatalog | undefined;

export function loadResponses(file: string = RESPONSES_PATH): ResponseCatalog {
  const data: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  if (!validateCatalog(data)) {
    throw new Error(`Invalid response catalog ${file}: ${describeErrors(validateCatalog.errors)}`);
  }
  return data;
}

export function getResponses(): ResponseCatalog {
  if (!cached) cached = loadResponses();
  return cached;
}

/** Replace `{key}` slots; unknown slots are left as-is */
export function fill(template: string, vars: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (slot, key: string) => (key in vars ? String(vars[key]) : slot));
}

/** Deterministic pick from a rotating list, indexed by (turn - 1) mod length */
export function rotate(list: readonly string[], turnCount: number): string {
  const index = (((turnCount - 1) % list.length) + list.length) % list.length;
  return list[index] ?? list[0] ?? '';
}
