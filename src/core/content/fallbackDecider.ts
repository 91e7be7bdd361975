import type { FallbackSettings } from '../../config/scrapeConfig';
import type { Segmentation } from './extractors/sectionSegmenter';
import type { PageSnapshot } from './types/scrape';

export type FallbackReason = 'fetch_failed' | 'insufficient_text' | 'no_main_content';

export interface FallbackDecision {
  shouldRender: boolean;
  reasons: FallbackReason[];
  textLength: number;
}

export function totalTextLength(segmentation: Segmentation | null): number {
  if (!segmentation) return 0;
  return segmentation.sections.reduce((total, section) => total + section.text.length, 0);
}

/**
 * Decides whether the static snapshot is good enough or the page needs a browser.
 * Any single reason is sufficient; all reasons that apply are reported.
 */
export function decideFallback(
  snapshot: PageSnapshot,
  segmentation: Segmentation | null,
  settings: FallbackSettings
): FallbackDecision {
  const textLength = totalTextLength(segmentation);
  const reasons: FallbackReason[] = [];

  if (snapshot.status === 'failed' || !segmentation) {
    reasons.push('fetch_failed');
  }
  if (textLength < settings.minTextLength) {
    reasons.push('insufficient_text');
  }
  if (!segmentation || !segmentation.mainContentFound) {
    reasons.push('no_main_content');
  }

  return { shouldRender: reasons.length > 0, reasons, textLength };
}
