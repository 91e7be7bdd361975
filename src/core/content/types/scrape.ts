import type { ScrapeStage } from '../../../mcp/errors';

export const SECTION_TYPES = [
  'nav',
  'header',
  'footer',
  'hero',
  'faq',
  'pricing',
  'section',
  'unknown',
] as const;

export type SectionType = (typeof SECTION_TYPES)[number];

export type ErrorKind = 'FetchError' | 'RenderError' | 'InteractionError' | 'ParseError';

export interface ErrorRecord {
  stage: ScrapeStage;
  kind: ErrorKind;
  message: string;
}

export type SnapshotStatus = 'success' | 'partial' | 'failed';

export interface PageSnapshot {
  url: string;
  html: string;
  status: SnapshotStatus;
  issues: ErrorRecord[];
}

export interface MetaInfo {
  title: string | null;
  description: string | null;
  language: string | null;
  canonical: string | null;
}

/** Section content as segmented, before URL resolution and caps. */
export interface RawSection {
  type: SectionType;
  label: string;
  text: string;
  rawHtml: string;
  headings: string[];
  links: string[];
  images: string[];
  lists: string[][];
  tables: string[][][];
}

export interface Section {
  id: string;
  type: SectionType;
  label: string;
  sourceUrl: string;
  text: string;
  rawHtml: string;
  truncated: boolean;
  headings: string[];
  links: string[];
  images: string[];
  lists: string[][];
  tables: string[][][];
}

export interface InteractionSummary {
  clicks: string[];
  scrolls: number;
  pages: string[];
}

export type ScrapeStrategy = 'static' | 'rendered';

export interface ScrapeResult {
  url: string;
  scrapedAt: string;
  strategy: ScrapeStrategy;
  meta: MetaInfo;
  sections: Section[];
  interactions: InteractionSummary;
  errors: ErrorRecord[];
}
