import type * as cheerio from 'cheerio';
import { isTag, type AnyNode, type Element } from 'domhandler';
import type { ContentLimits } from '../../../config/scrapeConfig';
import { ParseError } from '../../../mcp/errors';
import { toErrorRecord } from '../errorCollector';
import type { ErrorRecord, RawSection } from '../types/scrape';
import { classifySection, deriveLabel } from './classification';
import { extractSectionContent } from './sectionContent';
import { HEADING_SELECTORS, LANDMARK_SELECTORS, MAIN_CONTENT_SELECTORS } from './selectors';
import { hasVisibleText } from './textCleaner';

export type SegmentationTier = 'landmark' | 'heading' | 'body';

export interface Segmentation {
  tier: SegmentationTier;
  sections: RawSection[];
  issues: ErrorRecord[];
  /** False only when the body tier was used and no main-content container exists. */
  mainContentFound: boolean;
}

interface SegmentSource {
  originTag: string | null;
  hints: string[];
  nodes: AnyNode[];
}

function hintsOf(element: Element): string[] {
  return [element.attribs.class, element.attribs.id].filter(
    (value): value is string => typeof value === 'string' && value.length > 0
  );
}

function emitLandmark($: cheerio.CheerioAPI, landmark: Element, sources: SegmentSource[]): void {
  const originTag = landmark.tagName.toLowerCase();
  const nested = $(landmark)
    .find(LANDMARK_SELECTORS)
    .toArray()
    .filter(child => $(child).parent().closest(LANDMARK_SELECTORS).get(0) === landmark);

  if (nested.length === 0) {
    sources.push({ originTag, hints: hintsOf(landmark), nodes: [landmark] });
    return;
  }

  // Container landmark: whatever sits outside its nested landmarks is a section of its own
  const remainder = $(landmark).clone();
  remainder.find(LANDMARK_SELECTORS).remove();
  if (hasVisibleText(remainder.text())) {
    sources.push({ originTag, hints: hintsOf(landmark), nodes: remainder.toArray() });
  }

  nested.forEach(child => emitLandmark($, child, sources));
}

function collectLandmarkSources($: cheerio.CheerioAPI): SegmentSource[] {
  const sources: SegmentSource[] = [];
  $(LANDMARK_SELECTORS)
    .toArray()
    .filter(landmark => $(landmark).parents(LANDMARK_SELECTORS).length === 0)
    .forEach(landmark => emitLandmark($, landmark, sources));
  return sources;
}

function collectHeadingSources($: cheerio.CheerioAPI): SegmentSource[] {
  const body = $('body').get(0);
  if (!body || $(body).find(HEADING_SELECTORS).length === 0) return [];

  const groups: AnyNode[][] = [[]];
  const walk = (parent: Element): void => {
    for (const child of parent.children) {
      if (isTag(child) && $(child).is(HEADING_SELECTORS)) {
        groups.push([child]);
      } else if (isTag(child) && $(child).find(HEADING_SELECTORS).length > 0) {
        walk(child);
      } else {
        groups[groups.length - 1].push(child);
      }
    }
  };
  walk(body);

  return groups
    .filter((nodes, index) => index > 0 || nodes.some(node => hasVisibleText($(node).text())))
    .map(nodes => ({
      originTag: null,
      hints: nodes.filter(isTag).flatMap(hintsOf),
      nodes,
    }));
}

function collectBodySources($: cheerio.CheerioAPI): SegmentSource[] {
  const body = $('body').get(0);
  if (!body) return [];
  return [{ originTag: null, hints: hintsOf(body), nodes: [body] }];
}

function buildSection(
  $: cheerio.CheerioAPI,
  source: SegmentSource,
  limits: Pick<ContentLimits, 'labelChars' | 'labelWords'>
): RawSection {
  const content = extractSectionContent($, source.nodes);
  return {
    type: classifySection(source.originTag, source.hints, content.text),
    label: deriveLabel(content.headings, content.text, limits),
    rawHtml: source.nodes
      .map(node => $.html(node))
      .join('')
      .trim(),
    ...content,
  };
}

/**
 * Splits an already-pruned document into sections. Landmarks are preferred; pages
 * without any fall back to heading groups, then to the body as a single section.
 * A segment that fails to extract is skipped with a parse issue.
 */
export function segmentDocument(
  $: cheerio.CheerioAPI,
  limits: Pick<ContentLimits, 'labelChars' | 'labelWords'>
): Segmentation {
  let tier: SegmentationTier = 'landmark';
  let sources = collectLandmarkSources($);
  if (sources.length === 0) {
    tier = 'heading';
    sources = collectHeadingSources($);
  }
  if (sources.length === 0) {
    tier = 'body';
    sources = collectBodySources($);
  }

  const sections: RawSection[] = [];
  const issues: ErrorRecord[] = [];
  sources.forEach((source, index) => {
    try {
      sections.push(buildSection($, source, limits));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      issues.push(
        toErrorRecord(new ParseError(`Failed to extract segment ${index}: ${reason}`), 'parse')
      );
    }
  });

  return {
    tier,
    sections,
    issues,
    mainContentFound: tier !== 'body' || $(MAIN_CONTENT_SELECTORS).length > 0,
  };
}
