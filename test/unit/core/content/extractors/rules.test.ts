import { describe, test, expect } from '@jest/globals';
import {
  NOISE_RULES,
  SECTION_HINT_RULES,
  SECTION_TAG_RULES,
  matchRule,
} from '../../../../../src/core/content/extractors/rules';

describe('matchRule', () => {
  test('matches case-insensitive substrings of class or id', () => {
    expect(matchRule(NOISE_RULES, 'Cookie-Bar')).toBe('cookie');
    expect(matchRule(NOISE_RULES, undefined, 'newsletter-popup')).toBe('popup');
  });

  test('returns null when nothing matches or no attributes are present', () => {
    expect(matchRule(NOISE_RULES, 'content', 'main')).toBeNull();
    expect(matchRule(NOISE_RULES, undefined, '')).toBeNull();
  });

  test('rule order decides between several matches', () => {
    expect(matchRule(SECTION_HINT_RULES, 'pricing-table', 'hero')).toBe('hero');
  });
});

describe('SECTION_TAG_RULES', () => {
  test('maps header and nav to nav and footer to footer', () => {
    expect(SECTION_TAG_RULES.get('header')).toBe('nav');
    expect(SECTION_TAG_RULES.get('nav')).toBe('nav');
    expect(SECTION_TAG_RULES.get('footer')).toBe('footer');
    expect(SECTION_TAG_RULES.get('section')).toBeUndefined();
  });
});
