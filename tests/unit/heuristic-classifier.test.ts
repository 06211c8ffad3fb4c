import { HeuristicClassifier } from '../../src/classification/heuristic-classifier';

describe('HeuristicClassifier', () => {
  const classifier = new HeuristicClassifier();

  describe('intent', () => {
    it('should classify by the first matching keyword group', () => {
      expect(classifier.intentFor('Where is my order?')).toEqual({
        intent: 'order_status',
        confidence: 0.6,
        notes: 'heuristic: keyword "order"',
        suggestedJourney: 'orders',
      });
    });

    it('should detect purchase intent', () => {
      const result = classifier.intentFor('I want to buy a solar lantern');
      expect(result.intent).toBe('sales_discovery');
      expect(result.suggestedJourney).toBe('sales');
    });

    it('should give human requests priority', () => {
      expect(classifier.intentFor('I need a human to check my order').intent).toBe('human_request');
    });

    it('should treat greetings as spam_casual', () => {
      const result = classifier.intentFor('hello there');
      expect(result.intent).toBe('spam_casual');
      expect(result.suggestedJourney).toBe('governance');
    });

    it('should treat very short messages as casual', () => {
      expect(classifier.intentFor('ok')).toEqual({
        intent: 'spam_casual',
        confidence: 0.6,
        notes: 'heuristic: very short message',
        suggestedJourney: 'governance',
      });
    });

    it('should return unknown with low confidence when nothing matches', () => {
      expect(classifier.intentFor('blue bicycle tomorrow')).toEqual({
        intent: 'unknown',
        confidence: 0.3,
        notes: 'heuristic: no keyword matched',
        suggestedJourney: 'unknown',
      });
      expect(classifier.intentFor('   ').notes).toBe('heuristic: empty message');
    });
  });

  describe('language', () => {
    it('should honour explicit language requests', () => {
      expect(classifier.languageFor('Please speak Swahili')).toEqual({
        responseLanguage: 'sw',
        confidence: 0.9,
        shouldAskLanguageQuestion: false,
      });
      expect(classifier.languageFor('english please').responseLanguage).toBe('en');
    });

    it('should score Swahili words', () => {
      const result = classifier.languageFor('habari yako, nataka simu');
      expect(result.responseLanguage).toBe('sw');
      expect(result.confidence).toBe(0.5);
    });

    it('should detect Sheng', () => {
      expect(classifier.languageFor('niaje msee').responseLanguage).toBe('sheng');
    });

    it('should detect code-switching as mixed', () => {
      expect(classifier.languageFor('hello, nataka phone').responseLanguage).toBe('mixed');
    });

    it('should default to English', () => {
      expect(classifier.languageFor('Where is my order').responseLanguage).toBe('en');
      expect(classifier.languageFor('').responseLanguage).toBe('en');
    });
  });

  describe('governance', () => {
    const govern = (message: string, extra: { intent?: 'product_question'; intentConfidence?: number } = {}) =>
      classifier.governanceFor({ message, ...extra });

    it('should flag abuse first', () => {
      expect(govern('you are an idiot')).toEqual({ classification: 'abuse', confidence: 0.8, recommendedAction: 'stop' });
    });

    it('should treat short greetings as casual and other short input as spam', () => {
      expect(govern('hi')).toEqual({ classification: 'casual', confidence: 0.6, recommendedAction: 'redirect' });
      expect(govern('??')).toEqual({ classification: 'spam', confidence: 0.7, recommendedAction: 'limit' });
    });

    it('should detect spam patterns', () => {
      expect(govern('').classification).toBe('spam');
      expect(govern('aaaaaa').classification).toBe('spam');
      expect(govern('testing 123').classification).toBe('spam');
      expect(govern('$$$ %%% !!').classification).toBe('spam');
    });

    it('should recognise business messages', () => {
      expect(govern('I want to buy shoes')).toEqual({ classification: 'business', confidence: 0.6, recommendedAction: 'proceed' });
    });

    it('should trust a confident business intent over casual words', () => {
      expect(govern('lol lantern').classification).toBe('casual');
      expect(govern('lol lantern', { intent: 'product_question', intentConfidence: 0.7 }).classification).toBe('business');
      expect(govern('lol lantern', { intent: 'product_question', intentConfidence: 0.4 }).classification).toBe('casual');
    });

    it('should treat casual phrases and short questions as casual', () => {
      expect(govern('good morning').classification).toBe('casual');
      expect(govern('who are you?').classification).toBe('casual');
    });

    it('should give everything else the benefit of the doubt', () => {
      expect(govern('blue bicycle tomorrow afternoon').classification).toBe('business');
    });
  });

  it('should expose the classifier interface asynchronously', async () => {
    const ctx = {
      tenantId: 't-1',
      conversationId: 'c-1',
      message: 'Where is my order?',
      turnCount: 1,
      currentJourney: 'unknown' as const,
      allowedLanguages: ['en' as const],
    };
    expect((await classifier.classifyIntent(ctx)).intent).toBe('order_status');
    expect((await classifier.detectLanguage(ctx)).responseLanguage).toBe('en');
    expect((await classifier.classifyGovernance(ctx)).classification).toBe('business');
  });
});
