import { describe, test, expect } from '@jest/globals';
import { DEFAULT_SCRAPE_CONFIG } from '../../../../src/config/scrapeConfig';
import { analyzePage, describeAnalysis } from '../../../../src/core/content/pageAnalyzer';

describe('analyzePage', () => {
  const html =
    '<html lang="de"><head><title>Seite</title><base href="/root/"></head><body>' +
    '<div class="cookie-banner"><p>Accept cookies</p></div>' +
    '<main><h1>Hallo</h1><p>Welt</p></main>' +
    '<script>track()</script>' +
    '</body></html>';

  test('reads meta before pruning and segments the pruned page', () => {
    const analysis = analyzePage(html, 'https://example.com/a/b', DEFAULT_SCRAPE_CONFIG.limits);

    expect(analysis.url).toBe('https://example.com/a/b');
    expect(analysis.baseUrl).toBe('https://example.com/root/');
    expect(analysis.meta.title).toBe('Seite');
    expect(analysis.meta.language).toBe('de');
    expect(analysis.segmentation.tier).toBe('landmark');
    expect(analysis.segmentation.sections.map(s => s.text)).toEqual(['Hallo Welt']);
  });

  test('summarises the analysis for logging', () => {
    const analysis = analyzePage(html, 'https://example.com/a/b', DEFAULT_SCRAPE_CONFIG.limits);

    expect(describeAnalysis(analysis)).toEqual({
      url: 'https://example.com/a/b',
      tier: 'landmark',
      sectionCount: 1,
      removedNodes: 2,
      parseIssues: 0,
    });
  });
});
