import { describe, test, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { runCli } from '../../src/cli';
import { APP_VERSION } from '../../src/config/constants';
import { scrapeWebsite } from '../../src/core/content/scrapePipeline';
import { closeBrowserPool } from '../../src/core/render/browserPool';
import type { ScrapeResult } from '../../src/core/content/types/scrape';

jest.mock('../../src/core/content/scrapePipeline', () => ({
  scrapeWebsite: jest.fn(),
}));
jest.mock('../../src/core/render/browserPool', () => ({
  closeBrowserPool: jest.fn(async () => undefined),
}));

const mockScrape = jest.mocked(scrapeWebsite);

const RESULT: ScrapeResult = {
  url: 'https://example.com/',
  scrapedAt: '2024-01-02T03:04:05.000Z',
  strategy: 'static',
  meta: { title: null, description: null, language: null, canonical: null },
  sections: [
    {
      id: 'section-0',
      type: 'section',
      label: 'Hello',
      sourceUrl: 'https://example.com/',
      text: 'Hello',
      rawHtml: '<main><p>Hello</p></main>',
      truncated: false,
      headings: [],
      links: [],
      images: [],
      lists: [],
      tables: [],
    },
  ],
  interactions: { clicks: [], scrolls: 0, pages: [] },
  errors: [],
};

describe('runCli', () => {
  let lines: string[];
  const out = (line: string) => {
    lines.push(line);
  };

  beforeEach(() => {
    lines = [];
    mockScrape.mockReset();
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('prints help', async () => {
    await expect(runCli(['--help'], out)).resolves.toBe(0);
    expect(lines[0]).toContain('scrape <url>   Scrape one page and print the result as JSON');
  });

  test('prints the version', async () => {
    await expect(runCli(['--version'], out)).resolves.toBe(0);
    expect(lines).toEqual([`section-scraper v${APP_VERSION}`]);
  });

  test('scrapes a URL and prints indented JSON', async () => {
    mockScrape.mockResolvedValue(RESULT);

    await expect(runCli(['scrape', 'https://example.com/'], out)).resolves.toBe(0);

    expect(mockScrape).toHaveBeenCalledWith('https://example.com/');
    expect(lines).toEqual([JSON.stringify(RESULT, null, 2)]);
    expect(closeBrowserPool).toHaveBeenCalledTimes(1);
  });

  test('prints compact JSON on request', async () => {
    mockScrape.mockResolvedValue(RESULT);

    await runCli(['scrape', 'https://example.com/', '--compact'], out);

    expect(lines).toEqual([JSON.stringify(RESULT)]);
  });

  test('exits with 2 when nothing could be extracted', async () => {
    mockScrape.mockResolvedValue({
      ...RESULT,
      sections: [],
      errors: [{ stage: 'fetch', kind: 'FetchError', message: 'HTTP error (status: 500)' }],
    });

    await expect(runCli(['scrape', 'https://example.com/'], out)).resolves.toBe(2);
  });

  test('rejects a missing or non-http URL', async () => {
    await expect(runCli(['scrape'], out)).resolves.toBe(1);
    await expect(runCli(['scrape', 'file:///etc/hosts'], out)).resolves.toBe(1);
    expect(mockScrape).not.toHaveBeenCalled();
  });

  test('reports health', async () => {
    await expect(runCli(['health'], out)).resolves.toBe(0);
    expect(lines).toEqual(['{"status":"ok"}']);
  });

  test('rejects unknown commands and options', async () => {
    await expect(runCli(['crawl'], out)).resolves.toBe(1);
    await expect(runCli(['--bogus'], out)).resolves.toBe(1);
    expect(lines).toEqual([]);
  });
});
