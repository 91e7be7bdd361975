import type * as cheerio from 'cheerio';
import { isTag, type AnyNode, type Element } from 'domhandler';
import {
  FALLBACK_TEXT_SELECTORS,
  HEADING_SELECTORS,
  IMAGE_SELECTORS,
  LINK_SELECTORS,
  LIST_SELECTORS,
  TABLE_CELL_SELECTORS,
  TABLE_ROW_SELECTORS,
  TABLE_SELECTORS,
  TEXT_BLOCK_SELECTORS,
} from './selectors';
import { normalizeWhitespace } from './textCleaner';

export interface SectionContent {
  text: string;
  headings: string[];
  links: string[];
  images: string[];
  lists: string[][];
  tables: string[][][];
}

/**
 * Elements matching `selector` among the scope roots and their descendants, in
 * document order. Scope roots are disjoint, so concatenation keeps that order.
 */
export function selectWithin(
  $: cheerio.CheerioAPI,
  scope: readonly AnyNode[],
  selector: string
): Element[] {
  const found: Element[] = [];
  for (const root of scope) {
    if (!isTag(root)) continue;
    if ($(root).is(selector)) found.push(root);
    $(root)
      .find(selector)
      .each((_, element) => {
        found.push(element);
      });
  }
  return found;
}

function outermostOnly(elements: Element[]): Element[] {
  const members = new Set(elements);
  return elements.filter(element => {
    for (let parent = element.parent; parent; parent = parent.parent) {
      if (isTag(parent) && members.has(parent)) return false;
    }
    return true;
  });
}

function textsOf($: cheerio.CheerioAPI, elements: Element[]): string[] {
  return elements.map(element => normalizeWhitespace($(element).text())).filter(Boolean);
}

function extractText($: cheerio.CheerioAPI, scope: readonly AnyNode[]): string {
  const blocks = textsOf($, outermostOnly(selectWithin($, scope, TEXT_BLOCK_SELECTORS)));
  if (blocks.length > 0) return blocks.join(' ');

  // Div soup: take the innermost containers so nested wrappers don't repeat text
  const leaves = selectWithin($, scope, FALLBACK_TEXT_SELECTORS).filter(
    element => $(element).find('div').length === 0
  );
  return textsOf($, outermostOnly(leaves)).join(' ');
}

function extractLists($: cheerio.CheerioAPI, scope: readonly AnyNode[]): string[][] {
  return selectWithin($, scope, LIST_SELECTORS)
    .map(list =>
      $(list)
        .children('li')
        .toArray()
        .map(item => normalizeWhitespace($(item).text()))
        .filter(Boolean)
    )
    .filter(items => items.length > 0);
}

function extractTables($: cheerio.CheerioAPI, scope: readonly AnyNode[]): string[][][] {
  return selectWithin($, scope, TABLE_SELECTORS)
    .map(table =>
      $(table)
        .find(TABLE_ROW_SELECTORS)
        .toArray()
        .map(row =>
          $(row)
            .children(TABLE_CELL_SELECTORS)
            .toArray()
            .map(cell => normalizeWhitespace($(cell).text()))
        )
        .filter(row => row.length > 0)
    )
    .filter(rows => rows.length > 0);
}

/**
 * Structured content of one section. URLs are returned as written in the markup;
 * resolution happens in the content limiter.
 */
export function extractSectionContent(
  $: cheerio.CheerioAPI,
  scope: readonly AnyNode[]
): SectionContent {
  const links = selectWithin($, scope, LINK_SELECTORS)
    .map(anchor => (anchor.attribs.href ?? '').trim())
    .filter(Boolean);

  const images = selectWithin($, scope, IMAGE_SELECTORS)
    .map(image => (image.attribs.src || image.attribs['data-src'] || '').trim())
    .filter(Boolean);

  return {
    text: extractText($, scope),
    headings: textsOf($, selectWithin($, scope, HEADING_SELECTORS)),
    links,
    images,
    lists: extractLists($, scope),
    tables: extractTables($, scope),
  };
}
