import { getEnvironment } from './environment';

export interface FetchSettings {
  timeoutMs: number;
  maxRedirections: number;
}

export interface FallbackSettings {
  minTextLength: number;
}

export interface RenderSettings {
  navigationTimeoutMs: number;
  settleMaxMs: number;
  settlePollMs: number;
}

export interface InteractionSettings {
  maxPages: number;
  maxScrolls: number;
  interactionTimeoutMs: number;
  navigationTimeoutMs: number;
  /** Upper bound on the settle wait after a click or a pagination hop. */
  clickSettleMs: number;
  settlePollMs: number;
  scrollDelayMs: number;
  maxTabClicks: number;
  maxLoadMoreClicks: number;
}

export interface ContentLimits {
  textChars: number;
  rawHtmlChars: number;
  links: number;
  images: number;
  lists: number;
  tables: number;
  headings: number;
  labelChars: number;
  labelWords: number;
}

/**
 * Every timeout, cap and stop condition the pipeline honours.
 * Components receive the slice they need; nothing reads these values from call sites.
 */
export interface ScrapeConfig {
  fetch: FetchSettings;
  fallback: FallbackSettings;
  render: RenderSettings;
  interaction: InteractionSettings;
  limits: ContentLimits;
}

export type ScrapeConfigOverrides = {
  [K in keyof ScrapeConfig]?: Partial<ScrapeConfig[K]>;
};

export const DEFAULT_SCRAPE_CONFIG: ScrapeConfig = {
  fetch: {
    timeoutMs: 10000,
    maxRedirections: 3,
  },
  fallback: {
    minTextLength: 500,
  },
  render: {
    navigationTimeoutMs: 30000,
    settleMaxMs: 2000,
    settlePollMs: 250,
  },
  interaction: {
    maxPages: 3,
    maxScrolls: 3,
    interactionTimeoutMs: 5000,
    navigationTimeoutMs: 30000,
    clickSettleMs: 1500,
    settlePollMs: 250,
    scrollDelayMs: 2000,
    maxTabClicks: 10,
    maxLoadMoreClicks: 5,
  },
  limits: {
    textChars: 5000,
    rawHtmlChars: 5000,
    links: 50,
    images: 20,
    lists: 10,
    tables: 5,
    headings: 10,
    labelChars: 100,
    labelWords: 7,
  },
};

export function createScrapeConfig(
  overrides: ScrapeConfigOverrides = {},
  base: ScrapeConfig = DEFAULT_SCRAPE_CONFIG
): ScrapeConfig {
  return {
    fetch: { ...base.fetch, ...overrides.fetch },
    fallback: { ...base.fallback, ...overrides.fallback },
    render: { ...base.render, ...overrides.render },
    interaction: { ...base.interaction, ...overrides.interaction },
    limits: { ...base.limits, ...overrides.limits },
  };
}

export function getScrapeConfig(): ScrapeConfig {
  const env = getEnvironment();

  return createScrapeConfig({
    fetch: { timeoutMs: env.FETCH_TIMEOUT_MS },
    fallback: { minTextLength: env.MIN_STATIC_TEXT_LENGTH },
    render: { navigationTimeoutMs: env.NAVIGATION_TIMEOUT_MS },
    interaction: {
      maxPages: env.MAX_PAGES,
      maxScrolls: env.MAX_SCROLLS,
      interactionTimeoutMs: env.INTERACTION_TIMEOUT_MS,
      navigationTimeoutMs: env.NAVIGATION_TIMEOUT_MS,
    },
  });
}
