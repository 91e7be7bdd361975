import type * as cheerio from 'cheerio';
import type { MetaInfo } from '../types/scrape';
import { resolveHttpUrl } from '../../../utils/urlValidator';
import { normalizeWhitespace } from './textCleaner';

function firstNonEmpty(...candidates: Array<string | undefined>): string | null {
  for (const candidate of candidates) {
    const value = candidate === undefined ? '' : normalizeWhitespace(candidate);
    if (value) return value;
  }
  return null;
}

/** Base for relative URLs: `<base href>` when present and resolvable, else the page URL. */
export function resolveBaseUrl($: cheerio.CheerioAPI, pageUrl: string): string {
  const baseHref = $('base[href]').first().attr('href');
  if (!baseHref) return pageUrl;
  return resolveHttpUrl(baseHref, pageUrl) ?? pageUrl;
}

/**
 * Page metadata. Must run before noise pruning; Open Graph values are preferred
 * over their plain HTML counterparts.
 */
export function extractMeta($: cheerio.CheerioAPI, pageUrl: string): MetaInfo {
  const title = firstNonEmpty(
    $('meta[property="og:title"]').attr('content'),
    $('title').first().text()
  );

  const description = firstNonEmpty(
    $('meta[property="og:description"]').attr('content'),
    $('meta[name="description"]').attr('content')
  );

  const lang = firstNonEmpty($('html').attr('lang'));
  const language = lang ? lang.split(/[-_]/)[0].toLowerCase() || null : null;

  const canonicalHref = firstNonEmpty(
    $('link[rel="canonical"]').attr('href'),
    $('meta[property="og:url"]').attr('content')
  );
  const canonical = canonicalHref
    ? resolveHttpUrl(canonicalHref, resolveBaseUrl($, pageUrl))
    : null;

  return { title, description, language, canonical };
}
