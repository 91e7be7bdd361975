import type { ContentLimits } from '../../../config/scrapeConfig';
import type { SectionType } from '../types/scrape';
import { SECTION_HINT_RULES, SECTION_TAG_RULES, matchRule } from './rules';
import { firstWords, hasVisibleText, truncateChars } from './textCleaner';

export const DEFAULT_SECTION_LABEL = 'Section';

/**
 * Tag rules win over class/id hints; anything left over is a plain `section` when
 * it carries text and `unknown` when it doesn't.
 */
export function classifySection(
  originTag: string | null,
  hints: readonly string[],
  text: string
): SectionType {
  const byTag = originTag ? SECTION_TAG_RULES.get(originTag) : undefined;
  if (byTag) return byTag;

  const byHint = matchRule(SECTION_HINT_RULES, ...hints);
  if (byHint) return byHint;

  return hasVisibleText(text) ? 'section' : 'unknown';
}

export function deriveLabel(
  headings: readonly string[],
  text: string,
  limits: Pick<ContentLimits, 'labelChars' | 'labelWords'>
): string {
  const heading = headings.find(hasVisibleText);
  if (heading) return truncateChars(heading, limits.labelChars);

  const opening = firstWords(text, limits.labelWords);
  if (opening) return truncateChars(opening, limits.labelChars);

  return DEFAULT_SECTION_LABEL;
}
