/**
 * Catalog Fallback Policy
 *
 * Decides when a chat shortlist stops being useful and the customer should
 * get a link to the web catalog instead. Conditions, first match wins:
 *
 *   large_vague_catalog     ≥ 50 matches, still vague after a clarifying question
 *   see_all_request         "see all", "browse", "full catalog", ...
 *   low_confidence_results  no clear top 3
 *   visual_selection        many variants, visual attributes or a visual category
 *   repeated_rejections     two shortlists rejected
 */

import { Lexicon, PhraseMatcher, getLexicon } from '../config/lexicon';
import { ResponseCatalog, getResponses } from '../config/responses';
import { ConversationState } from '../state/conversation-state';

export type CatalogFallbackReason =
  | 'large_vague_catalog'
  | 'see_all_request'
  | 'low_confidence_results'
  | 'visual_selection'
  | 'repeated_rejections';

export type CatalogVariant = Record<string, string | number | boolean>;

export interface CatalogItem {
  id: string;
  name: string;
  price?: number;
  currency?: string;
  /** Relevance in [0, 1], when the search backend scores results */
  score?: number;
  category?: string;
  variants?: CatalogVariant[];
}

export interface CatalogFallbackInput {
  state: Pick<ConversationState, 'catalogTotalMatchesEstimate' | 'shortlistRejections'>;
  message?: string;
  /** Omitted when no search ran this turn */
  results?: CatalogItem[];
  clarifyingQuestionsAsked: number;
}

export const LARGE_CATALOG_THRESHOLD = 50;
export const MIN_CLEAR_RESULTS = 3;
export const UNSCORED_RESULTS_LIMIT = 10;
export const MIN_TOP_SCORE = 0.7;
export const MIN_SCORE_SPREAD = 0.1;
export const MAX_CHAT_VARIANTS = 3;
export const MAX_SHORTLIST_REJECTIONS = 2;
const VAGUE_MESSAGE_LENGTH = 10;

export class CatalogFallbackPolicy {
  private readonly seeAll: PhraseMatcher;
  private readonly vague: PhraseMatcher;
  private readonly rejection: PhraseMatcher;
  private readonly visualAttributes: string[];
  private readonly visualCategories: string[];

  constructor(lexicon: Lexicon['catalog'] = getLexicon().catalog) {
    this.seeAll = new PhraseMatcher(lexicon.seeAll);
    this.vague = new PhraseMatcher(lexicon.vague);
    this.rejection = new PhraseMatcher(lexicon.rejection);
    this.visualAttributes = lexicon.visualAttributes.map((a) => a.toLowerCase());
    this.visualCategories = lexicon.visualCategories.map((c) => c.toLowerCase());
  }

  /** The reason to show the catalog link, or null to keep chatting */
  evaluate(input: CatalogFallbackInput): CatalogFallbackReason | null {
    const total = input.state.catalogTotalMatchesEstimate ?? 0;
    if (total >= LARGE_CATALOG_THRESHOLD && input.clarifyingQuestionsAsked >= 1 && this.isStillVague(input.message)) {
      return 'large_vague_catalog';
    }
    if (input.message && this.isSeeAllRequest(input.message)) return 'see_all_request';
    if (input.results !== undefined && this.areResultsLowConfidence(input.results)) return 'low_confidence_results';
    if (input.results && this.requiresVisualSelection(input.results)) return 'visual_selection';
    if (input.state.shortlistRejections >= MAX_SHORTLIST_REJECTIONS) return 'repeated_rejections';
    return null;
  }

  isStillVague(message?: string): boolean {
    if (!message) return true;
    if (message.trim().length < VAGUE_MESSAGE_LENGTH) return true;
    return this.vague.matches(message);
  }

  isSeeAllRequest(message: string): boolean {
    return this.seeAll.matches(message);
  }

  /** "none of these", "something else", ... */
  isShortlistRejection(message: string): boolean {
    return this.rejection.matches(message);
  }

  areResultsLowConfidence(results: readonly CatalogItem[]): boolean {
    if (results.length < MIN_CLEAR_RESULTS) return true;

    const scored = results.filter((r) => typeof r.score === 'number');
    if (scored.length === 0) return results.length > UNSCORED_RESULTS_LIMIT;

    const top = scored.slice(0, MIN_CLEAR_RESULTS).map((r) => r.score ?? 0);
    const max = Math.max(...top);
    const min = Math.min(...top);
    return max < MIN_TOP_SCORE || max - min < MIN_SCORE_SPREAD;
  }

  requiresVisualSelection(results: readonly CatalogItem[]): boolean {
    return results.some((item) => {
      const variants = item.variants ?? [];
      if (variants.length > MAX_CHAT_VARIANTS) return true;
      const hasVisualAttribute = variants.some((variant) =>
        Object.keys(variant).some((key) => this.visualAttributes.some((attr) => key.toLowerCase().includes(attr))),
      );
      if (hasVisualAttribute) return true;
      const category = (item.category ?? '').toLowerCase();
      return this.visualCategories.some((c) => category.includes(c));
    });
  }
}

// ───── Catalog links ─────

type LinkState = Pick<ConversationState, 'catalogLinkBase' | 'tenantId' | 'conversationId' | 'lastCatalogQuery'>;

/** Deep link into the web catalog; null when the tenant has no catalog base URL */
export function buildCatalogUrl(state: LinkState, options: { productId?: string; query?: string } = {}): string | null {
  if (!state.catalogLinkBase) return null;

  const params: Array<[string, string]> = [['tenant_id', state.tenantId]];
  if (options.productId) params.push(['product_id', options.productId]);
  const search = options.query ?? state.lastCatalogQuery;
  if (search) params.push(['search', search]);
  params.push(['conversation_id', state.conversationId], ['return_context', 'whatsapp']);

  const query = params.map(([k, v]) => `${k}=${encodeURIComponent(v)}`).join('&');
  return `${state.catalogLinkBase}?${query}`;
}

export function formatCatalogLinkMessage(
  url: string,
  reason: CatalogFallbackReason,
  context?: string,
  responses: ResponseCatalog = getResponses(),
): string {
  return `${responses.catalog[reason]}\n\n${url}\n\n${context ?? responses.catalog.outro}`;
}
