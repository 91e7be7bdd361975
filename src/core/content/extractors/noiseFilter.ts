import type * as cheerio from 'cheerio';
import { isDocument, type AnyNode, type Element } from 'domhandler';
import { NON_CONTENT_SELECTORS, PROTECTED_TAGS } from './selectors';
import { NOISE_RULES, matchRule, type NoiseCategory } from './rules';

export interface NoiseReport {
  nonContentRemoved: number;
  removedByCategory: Record<NoiseCategory, number>;
}

function emptyReport(): NoiseReport {
  return {
    nonContentRemoved: 0,
    removedByCategory: { cookie: 0, modal: 0, popup: 0, overlay: 0, banner: 0 },
  };
}

function isAttached(node: AnyNode): boolean {
  let current: AnyNode = node;
  while (current.parent) current = current.parent;
  return isDocument(current);
}

/**
 * Prunes non-content nodes from a parsed document in place: script/style-like nodes
 * unconditionally, then every element whose class or id matches a noise rule.
 */
export function pruneNoise($: cheerio.CheerioAPI): NoiseReport {
  const report = emptyReport();

  const nonContent = $(NON_CONTENT_SELECTORS);
  report.nonContentRemoved = nonContent.length;
  nonContent.remove();

  const doomed: Array<{ element: Element; category: NoiseCategory }> = [];
  $('[class], [id]').each((_, element) => {
    if (PROTECTED_TAGS.has(element.tagName.toLowerCase())) return;
    const category = matchRule(NOISE_RULES, element.attribs.class, element.attribs.id);
    if (category) doomed.push({ element, category });
  });

  doomed.forEach(({ element, category }) => {
    // A noisy ancestor may already have taken this element with it
    if (!isAttached(element)) return;
    report.removedByCategory[category] += 1;
    $(element).remove();
  });

  return report;
}

export function countRemoved(report: NoiseReport): number {
  return (
    report.nonContentRemoved +
    Object.values(report.removedByCategory).reduce((total, count) => total + count, 0)
  );
}
