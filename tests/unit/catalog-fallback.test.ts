import {
  CatalogFallbackPolicy,
  CatalogItem,
  buildCatalogUrl,
  formatCatalogLinkMessage,
} from '../../src/catalog/catalog-fallback';
import { ConversationState } from '../../src/state/conversation-state';

function items(scores: Array<number | undefined>, extra: Partial<CatalogItem> = {}): CatalogItem[] {
  return scores.map((score, i) => ({ id: `sku-${i + 1}`, name: `Item ${i + 1}`, score, ...extra }));
}

describe('CatalogFallbackPolicy', () => {
  const policy = new CatalogFallbackPolicy();
  const fresh = { catalogTotalMatchesEstimate: 4, shortlistRejections: 0 };

  describe('evaluate', () => {
    it('should link a large catalog that is still vague after one clarification', () => {
      const state = { catalogTotalMatchesEstimate: 60, shortlistRejections: 0 };
      expect(policy.evaluate({ state, message: 'anything really', clarifyingQuestionsAsked: 1 })).toBe('large_vague_catalog');
      expect(policy.evaluate({ state, message: 'anything really', clarifyingQuestionsAsked: 0 })).toBeNull();
    });

    it('should not treat a specific follow-up as vague', () => {
      const state = { catalogTotalMatchesEstimate: 60, shortlistRejections: 0 };
      expect(policy.evaluate({ state, message: 'a 50W solar home kit', clarifyingQuestionsAsked: 1 })).toBeNull();
    });

    it('should honour a see-all request', () => {
      expect(policy.evaluate({ state: fresh, message: 'Show all your lamps', clarifyingQuestionsAsked: 0 })).toBe('see_all_request');
    });

    it('should flag fewer than three results as low confidence', () => {
      expect(policy.evaluate({ state: fresh, results: items([0.9, 0.8]), clarifyingQuestionsAsked: 0 })).toBe('low_confidence_results');
      expect(policy.evaluate({ state: fresh, results: [], clarifyingQuestionsAsked: 0 })).toBe('low_confidence_results');
    });

    it('should keep chatting when the top three are clearly ranked', () => {
      expect(policy.evaluate({ state: fresh, results: items([0.9, 0.85, 0.6]), clarifyingQuestionsAsked: 0 })).toBeNull();
    });

    it('should flag repeated rejections', () => {
      const state = { catalogTotalMatchesEstimate: 4, shortlistRejections: 2 };
      expect(policy.evaluate({ state, clarifyingQuestionsAsked: 0 })).toBe('repeated_rejections');
    });
  });

  describe('areResultsLowConfidence', () => {
    it('should flag a weak or flat top three', () => {
      expect(policy.areResultsLowConfidence(items([0.6, 0.5, 0.4]))).toBe(true);
      expect(policy.areResultsLowConfidence(items([0.9, 0.88, 0.85]))).toBe(true);
    });

    it('should only flag long unscored lists', () => {
      expect(policy.areResultsLowConfidence(items(new Array<undefined>(5).fill(undefined)))).toBe(false);
      expect(policy.areResultsLowConfidence(items(new Array<undefined>(11).fill(undefined)))).toBe(true);
    });
  });

  describe('requiresVisualSelection', () => {
    it('should flag visual categories', () => {
      expect(policy.requiresVisualSelection(items([0.9], { category: 'Womens Clothing' }))).toBe(true);
      expect(policy.requiresVisualSelection(items([0.9], { category: 'kitchen' }))).toBe(false);
    });

    it('should flag visual variant attributes and many variants', () => {
      expect(policy.requiresVisualSelection(items([0.9], { variants: [{ Colour: 'red' }] }))).toBe(true);
      expect(policy.requiresVisualSelection(items([0.9], { variants: [{ size: 1 }, { size: 2 }, { size: 3 }, { size: 4 }] }))).toBe(true);
      expect(policy.requiresVisualSelection(items([0.9], { variants: [{ size: 1 }, { size: 2 }] }))).toBe(false);
    });
  });

  it('should recognise shortlist rejections', () => {
    expect(policy.isShortlistRejection('None of these, sorry')).toBe(true);
    expect(policy.isShortlistRejection('the second one')).toBe(false);
  });
});

describe('catalog links', () => {
  function linkState(): ConversationState {
    const state = ConversationState.create({ tenantId: 'demo-store', conversationId: 'c-1', requestId: 'r-1' });
    state.catalogLinkBase = 'https://shop.example.com/catalog';
    return state;
  }

  it('should build a deep link with the search query', () => {
    expect(buildCatalogUrl(linkState(), { query: 'solar lamp' })).toBe(
      'https://shop.example.com/catalog?tenant_id=demo-store&search=solar%20lamp&conversation_id=c-1&return_context=whatsapp',
    );
  });

  it('should fall back to the last catalog query and include a product id', () => {
    const state = linkState();
    state.lastCatalogQuery = 'kettle';
    expect(buildCatalogUrl(state, { productId: 'sku-403' })).toBe(
      'https://shop.example.com/catalog?tenant_id=demo-store&product_id=sku-403&search=kettle&conversation_id=c-1&return_context=whatsapp',
    );
  });

  it('should return null without a catalog base', () => {
    const state = linkState();
    state.catalogLinkBase = undefined;
    expect(buildCatalogUrl(state)).toBeNull();
  });

  it('should format the link message with the reason text', () => {
    expect(formatCatalogLinkMessage('https://shop.example.com/catalog', 'see_all_request')).toBe(
      "Here's our complete catalog for you to browse:\n\nhttps://shop.example.com/catalog\n\n" +
        "Once you find something you like, just let me know and I'll help you with the details!",
    );
    expect(formatCatalogLinkMessage('https://x.test/c', 'visual_selection', 'Ask me anything.')).toBe(
      'These products are best viewed with images. Check out our catalog:\n\nhttps://x.test/c\n\nAsk me anything.',
    );
  });
});
