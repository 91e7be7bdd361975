import * as cheerio from 'cheerio';
import type { ContentLimits } from '../../config/scrapeConfig';
import type { MetaInfo } from './types/scrape';
import { extractMeta, resolveBaseUrl } from './extractors/metaExtractor';
import { countRemoved, pruneNoise, type NoiseReport } from './extractors/noiseFilter';
import { segmentDocument, type Segmentation } from './extractors/sectionSegmenter';

export interface PageAnalysis {
  url: string;
  baseUrl: string;
  meta: MetaInfo;
  noise: NoiseReport;
  segmentation: Segmentation;
}

/** Parses one page: metadata first, then noise pruning, then segmentation. */
export function analyzePage(
  html: string,
  url: string,
  limits: Pick<ContentLimits, 'labelChars' | 'labelWords'>
): PageAnalysis {
  const $ = cheerio.load(html);

  const meta = extractMeta($, url);
  const baseUrl = resolveBaseUrl($, url);
  const noise = pruneNoise($);
  const segmentation = segmentDocument($, limits);

  return { url, baseUrl, meta, noise, segmentation };
}

export function describeAnalysis(analysis: PageAnalysis): Record<string, unknown> {
  return {
    url: analysis.url,
    tier: analysis.segmentation.tier,
    sectionCount: analysis.segmentation.sections.length,
    removedNodes: countRemoved(analysis.noise),
    parseIssues: analysis.segmentation.issues.length,
  };
}
