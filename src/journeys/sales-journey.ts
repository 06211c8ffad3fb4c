/**
 * Sales journey
 *
 * Searches the catalog and offers a short numbered shortlist in chat. The
 * catalog fallback policy decides when the web catalog link is the better
 * answer; a large catalog gets one narrowing question first.
 */

import { ResponseCatalog, fill, getResponses } from '../config/responses';
import {
  CatalogFallbackPolicy,
  CatalogItem,
  LARGE_CATALOG_THRESHOLD,
  buildCatalogUrl,
  formatCatalogLinkMessage,
} from '../catalog/catalog-fallback';
import { CatalogSearch } from '../catalog/catalog-search';
import { ConversationState } from '../state/conversation-state';
import { JourneyExecutor, JourneyInput } from '../orchestrator/types';

export const SHORTLIST_SIZE = 3;
export const SEARCH_LIMIT = 10;

export class SalesJourney implements JourneyExecutor {
  constructor(
    private readonly search?: CatalogSearch,
    private readonly policy: CatalogFallbackPolicy = new CatalogFallbackPolicy(),
    private readonly responses: ResponseCatalog = getResponses(),
  ) {}

  async execute({ state, turn }: JourneyInput): Promise<string> {
    const message = turn.messageText.trim();

    const selected = selection(message, state.presentedItemIds);
    if (selected) {
      state.selectedItemIds = [selected.id];
      state.presentedItemIds = [];
      state.shortlistRejections = 0;
      turn.log.info({ itemId: selected.id }, 'Shortlist item selected');
      return fill(this.responses.catalog.selected, { item: `option ${selected.position}` });
    }

    const rejected = state.presentedItemIds.length > 0 && this.policy.isShortlistRejection(message);
    if (rejected) state.shortlistRejections += 1;
    const query = rejected ? (state.lastCatalogQuery ?? message) : message;

    if (!this.search) {
      const reason = this.policy.evaluate({ state, message, clarifyingQuestionsAsked: state.catalogClarifications });
      const url = reason ? buildCatalogUrl(state) : null;
      return reason && url ? formatCatalogLinkMessage(url, reason, undefined, this.responses) : this.responses.journeyHolding.sales;
    }

    const { items, totalEstimate } = await this.search.search(state.tenantId, query, SEARCH_LIMIT);
    state.lastCatalogQuery = query;
    state.catalogTotalMatchesEstimate = totalEstimate;

    const reason = this.policy.evaluate({ state, message, results: items, clarifyingQuestionsAsked: state.catalogClarifications });
    const url = reason ? buildCatalogUrl(state, { query }) : null;
    if (reason && url) {
      turn.log.info({ reason, totalEstimate }, 'Offering catalog link');
      state.presentedItemIds = [];
      state.catalogClarifications = 0;
      return formatCatalogLinkMessage(url, reason, undefined, this.responses);
    }

    if (items.length === 0) return this.responses.catalog.noResults;

    if (totalEstimate >= LARGE_CATALOG_THRESHOLD && state.catalogClarifications === 0) {
      state.catalogClarifications += 1;
      return this.responses.catalog.narrowing;
    }

    return this.presentShortlist(state, items.slice(0, SHORTLIST_SIZE));
  }

  private presentShortlist(state: ConversationState, shortlist: CatalogItem[]): string {
    state.presentedItemIds = shortlist.map((item) => item.id);
    const lines = shortlist.map((item, i) => `${i + 1}. ${item.name}${formatPrice(item)}`);
    return [this.responses.catalog.shortlistIntro, ...lines, this.responses.catalog.shortlistOutro].join('\n');
  }
}

function selection(message: string, presented: readonly string[]): { id: string; position: number } | null {
  if (!/^\d{1,2}$/.test(message)) return null;
  const position = Number(message);
  const id = presented[position - 1];
  return id ? { id, position } : null;
}

function formatPrice(item: CatalogItem): string {
  if (item.price === undefined) return '';
  const amount = item.price.toLocaleString('en-US');
  return item.currency ? ` - ${item.currency} ${amount}` : ` - ${amount}`;
}
