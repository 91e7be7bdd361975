import { z } from 'zod';
import { SECTION_TYPES } from '../core/content/types/scrape';

// web.scrape tool schemas
export const ScrapeInput = z.object({
  url: z
    .string()
    .url()
    .describe('Absolute http(s) URL of the page to scrape (e.g. "https://example.com/pricing")'),
});

export const ErrorRecordSchema = z.object({
  stage: z.enum(['fetch', 'render', 'interaction', 'parse']),
  kind: z.enum(['FetchError', 'RenderError', 'InteractionError', 'ParseError']),
  message: z.string(),
});

export const MetaSchema = z.object({
  title: z.string().nullable().describe('og:title, else <title>'),
  description: z.string().nullable().describe('og:description, else meta description'),
  language: z.string().nullable().describe('Primary language subtag from <html lang>'),
  canonical: z.string().nullable().describe('Absolute canonical URL if declared'),
});

export const SectionSchema = z.object({
  id: z.string().describe('Type and position, unique within one result (e.g. "nav-0")'),
  type: z.enum(SECTION_TYPES),
  label: z.string().describe('First heading, else the opening words of the text'),
  sourceUrl: z.string().describe('Page the section was taken from'),
  text: z.string(),
  rawHtml: z.string(),
  truncated: z.boolean().describe('True when rawHtml was cut to the size cap'),
  headings: z.array(z.string()),
  links: z.array(z.string()),
  images: z.array(z.string()),
  lists: z.array(z.array(z.string())),
  tables: z.array(z.array(z.array(z.string()))),
});

export const ScrapeOutput = z.object({
  url: z.string(),
  scrapedAt: z.string().describe('ISO timestamp of the scrape'),
  strategy: z.enum(['static', 'rendered']),
  meta: MetaSchema,
  sections: z.array(SectionSchema),
  interactions: z.object({
    clicks: z.array(z.string()),
    scrolls: z.number().int(),
    pages: z.array(z.string()),
  }),
  errors: z.array(ErrorRecordSchema),
});

// system.health tool schemas
export const HealthInput = z.object({});

export const HealthOutput = z.object({
  status: z.literal('ok'),
});

// Type exports
export type ScrapeInputType = z.infer<typeof ScrapeInput>;
export type ScrapeOutputType = z.infer<typeof ScrapeOutput>;
export type HealthOutputType = z.infer<typeof HealthOutput>;
