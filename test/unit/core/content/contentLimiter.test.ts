import { describe, test, expect } from '@jest/globals';
import { DEFAULT_SCRAPE_CONFIG } from '../../../../src/config/scrapeConfig';
import { limitSection, TRUNCATION_MARKER } from '../../../../src/core/content/contentLimiter';
import type { RawSection } from '../../../../src/core/content/types/scrape';

const LIMITS = DEFAULT_SCRAPE_CONFIG.limits;
const CONTEXT = {
  sourceUrl: 'https://example.com/page',
  baseUrl: 'https://example.com/docs/',
  index: 4,
};

function rawSection(overrides: Partial<RawSection> = {}): RawSection {
  return {
    type: 'hero',
    label: 'Hero',
    text: 'Hello',
    rawHtml: '<section>Hello</section>',
    headings: [],
    links: [],
    images: [],
    lists: [],
    tables: [],
    ...overrides,
  };
}

describe('limitSection', () => {
  test('derives the id from type and index and records the source page', () => {
    const section = limitSection(rawSection(), CONTEXT, LIMITS);

    expect(section.id).toBe('hero-4');
    expect(section.sourceUrl).toBe('https://example.com/page');
    expect(section.truncated).toBe(false);
    expect(section.rawHtml).toBe('<section>Hello</section>');
  });

  test('cuts oversized HTML and marks it truncated', () => {
    const section = limitSection(rawSection({ rawHtml: 'a'.repeat(6000) }), CONTEXT, LIMITS);

    expect(section.truncated).toBe(true);
    expect(section.rawHtml).toHaveLength(5000 + TRUNCATION_MARKER.length);
    expect(section.rawHtml.endsWith('a...')).toBe(true);
  });

  test('leaves HTML at exactly the cap untouched', () => {
    const section = limitSection(rawSection({ rawHtml: 'a'.repeat(5000) }), CONTEXT, LIMITS);

    expect(section.truncated).toBe(false);
    expect(section.rawHtml).toHaveLength(5000);
  });

  test('resolves links against the base URL and drops non-http schemes', () => {
    const section = limitSection(
      rawSection({
        links: [
          'guide',
          '/about',
          'javascript:void(0)',
          'mailto:a@example.com',
          '//cdn.example.com/x',
        ],
      }),
      CONTEXT,
      LIMITS
    );

    expect(section.links).toEqual([
      'https://example.com/docs/guide',
      'https://example.com/about',
      'https://cdn.example.com/x',
    ]);
  });

  test('applies every count cap', () => {
    const section = limitSection(
      rawSection({
        text: 'x'.repeat(7000),
        label: 'L'.repeat(150),
        headings: Array.from({ length: 12 }, (_, i) => `H${i}`),
        links: Array.from({ length: 60 }, (_, i) => `/p${i}`),
        images: Array.from({ length: 25 }, (_, i) => `/i${i}.png`),
        lists: Array.from({ length: 12 }, () => ['item']),
        tables: Array.from({ length: 7 }, () => [['cell']]),
      }),
      CONTEXT,
      LIMITS
    );

    expect(section.text).toHaveLength(5000);
    expect(section.label).toHaveLength(100);
    expect(section.headings).toHaveLength(10);
    expect(section.links).toHaveLength(50);
    expect(section.links[49]).toBe('https://example.com/p49');
    expect(section.images).toHaveLength(20);
    expect(section.lists).toHaveLength(10);
    expect(section.tables).toHaveLength(5);
  });

  test('fills the link cap with valid links when invalid ones come first', () => {
    const section = limitSection(
      rawSection({ links: ['mailto:x@example.com', '/a', '/b'] }),
      CONTEXT,
      { ...LIMITS, links: 1 }
    );

    expect(section.links).toEqual(['https://example.com/a']);
  });

  test('copies nested arrays instead of sharing them', () => {
    const lists = [['one']];
    const section = limitSection(rawSection({ lists }), CONTEXT, LIMITS);

    lists[0].push('two');
    expect(section.lists).toEqual([['one']]);
  });
});
