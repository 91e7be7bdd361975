import type {
  ErrorRecord,
  InteractionSummary,
  MetaInfo,
  ScrapeResult,
  ScrapeStrategy,
  Section,
} from './types/scrape';

export interface AssemblyInput {
  url: string;
  strategy: ScrapeStrategy;
  meta: MetaInfo | null;
  sections: readonly Section[];
  interactions: InteractionSummary | null;
  errors: readonly ErrorRecord[];
  scrapedAt?: Date;
}

export const EMPTY_META: MetaInfo = Object.freeze({
  title: null,
  description: null,
  language: null,
  canonical: null,
});

function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    Object.values(value).forEach(child => deepFreeze(child));
  }
  return value;
}

/** Builds the final, deeply frozen result. Inputs are copied, never frozen in place. */
export function assembleResult(input: AssemblyInput): Readonly<ScrapeResult> {
  const meta = input.meta ?? EMPTY_META;
  const interactions = input.interactions ?? { clicks: [], scrolls: 0, pages: [] };

  const result: ScrapeResult = {
    url: input.url,
    scrapedAt: (input.scrapedAt ?? new Date()).toISOString(),
    strategy: input.strategy,
    meta: { ...meta },
    sections: input.sections.map(section => ({
      ...section,
      headings: [...section.headings],
      links: [...section.links],
      images: [...section.images],
      lists: section.lists.map(items => [...items]),
      tables: section.tables.map(rows => rows.map(cells => [...cells])),
    })),
    interactions: {
      clicks: [...interactions.clicks],
      scrolls: interactions.scrolls,
      pages: [...interactions.pages],
    },
    errors: input.errors.map(record => ({ ...record })),
  };

  return deepFreeze(result);
}
