import { resolveResponseLanguage } from '../../src/classification/language-policy';
import { Lang } from '../../src/state/types';

function policyState(customerLanguagePref?: Lang, allowedLanguages: Lang[] = ['en', 'sw']) {
  return { allowedLanguages, defaultLanguage: 'en' as const, customerLanguagePref };
}

function detected(responseLanguage: Lang, confidence: number) {
  return { responseLanguage, confidence, shouldAskLanguageQuestion: false };
}

describe('resolveResponseLanguage', () => {
  it('should use a confident allowed detection', () => {
    expect(resolveResponseLanguage(policyState(), detected('sw', 0.8))).toEqual({ language: 'sw', confidence: 0.8, source: 'detected' });
  });

  it('should fall back to the tenant default below the switch threshold', () => {
    expect(resolveResponseLanguage(policyState(), detected('sw', 0.7))).toEqual({ language: 'en', confidence: 0.7, source: 'default' });
  });

  it('should ignore languages the tenant does not allow', () => {
    expect(resolveResponseLanguage(policyState(), detected('sheng', 0.85)).language).toBe('en');
  });

  it('should remember an explicit request as the preference', () => {
    expect(resolveResponseLanguage(policyState(), detected('sw', 0.9))).toEqual({
      language: 'sw',
      confidence: 0.9,
      source: 'preference',
      newPreference: 'sw',
    });
  });

  it('should let a stored preference win over the detection', () => {
    const resolution = resolveResponseLanguage(policyState('sw'), detected('en', 0.8));
    expect(resolution.language).toBe('sw');
    expect(resolution.source).toBe('preference');
    expect(resolution.newPreference).toBeUndefined();
  });

  it('should skip a preference the tenant no longer allows', () => {
    expect(resolveResponseLanguage(policyState('sheng'), detected('en', 0.5)).source).toBe('default');
  });

  it('should never store mixed as a preference', () => {
    const resolution = resolveResponseLanguage(policyState(undefined, ['en', 'sw', 'mixed']), detected('mixed', 0.95));
    expect(resolution).toEqual({ language: 'mixed', confidence: 0.95, source: 'detected' });
  });
});
