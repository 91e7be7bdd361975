import type { ContentLimits } from '../../config/scrapeConfig';
import { resolveHttpUrl } from '../../utils/urlValidator';
import type { RawSection, Section } from './types/scrape';
import { truncateChars } from './extractors/textCleaner';

export const TRUNCATION_MARKER = '...';

export interface LimitContext {
  /** Page the section came from; recorded as `sourceUrl`. */
  sourceUrl: string;
  /** Base for relative links and images, usually the page's `<base href>` or its URL. */
  baseUrl: string;
  /** Position of the section across the whole result, used for its id. */
  index: number;
}

function resolveAll(values: readonly string[], baseUrl: string, cap: number): string[] {
  const resolved: string[] = [];
  for (const value of values) {
    if (resolved.length >= cap) break;
    const url = resolveHttpUrl(value, baseUrl);
    if (url) resolved.push(url);
  }
  return resolved;
}

export function limitSection(
  raw: RawSection,
  context: LimitContext,
  limits: ContentLimits
): Section {
  const truncated = raw.rawHtml.length > limits.rawHtmlChars;
  const rawHtml = truncated
    ? `${raw.rawHtml.slice(0, limits.rawHtmlChars)}${TRUNCATION_MARKER}`
    : raw.rawHtml;

  return {
    id: `${raw.type}-${context.index}`,
    type: raw.type,
    label: truncateChars(raw.label, limits.labelChars),
    sourceUrl: context.sourceUrl,
    text: truncateChars(raw.text, limits.textChars),
    rawHtml,
    truncated,
    headings: raw.headings.slice(0, limits.headings),
    links: resolveAll(raw.links, context.baseUrl, limits.links),
    images: resolveAll(raw.images, context.baseUrl, limits.images),
    lists: raw.lists.slice(0, limits.lists).map(items => [...items]),
    tables: raw.tables.slice(0, limits.tables).map(rows => rows.map(cells => [...cells])),
  };
}
