import type pino from 'pino';
import { getScrapeConfig, type ScrapeConfig } from '../../config/scrapeConfig';
import { ParseError, type ScrapeStage } from '../../mcp/errors';
import { createChildLogger, generateCorrelationId, withTiming } from '../../utils/logger';
import { PlaywrightPageSource } from '../render/pageSource';
import { RenderEngine, type Renderer, type RenderOutcome } from '../render/renderEngine';
import { limitSection } from './contentLimiter';
import { ErrorCollector } from './errorCollector';
import { decideFallback } from './fallbackDecider';
import { fetchStatic } from './httpContentFetcher';
import { analyzePage, describeAnalysis, type PageAnalysis } from './pageAnalyzer';
import { assembleResult } from './resultAssembler';
import type { PageSnapshot, ScrapeResult, ScrapeStrategy, Section } from './types/scrape';

export type StaticFetch = typeof fetchStatic;

export interface ScrapeOptions {
  correlationId?: string;
  config?: ScrapeConfig;
  fetcher?: StaticFetch;
  renderer?: Renderer;
}

function createDefaultRenderer(config: ScrapeConfig, log: pino.Logger): Renderer {
  return new RenderEngine(new PlaywrightPageSource(log), config.render, config.interaction);
}

function analyzeSnapshot(
  snapshot: PageSnapshot,
  config: ScrapeConfig,
  collector: ErrorCollector,
  log: pino.Logger
): PageAnalysis | null {
  try {
    const analysis = analyzePage(snapshot.html, snapshot.url, config.limits);
    log.debug({ event: 'page_analyzed', ...describeAnalysis(analysis) }, 'Page segmented');
    return analysis;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    collector.capture(new ParseError(`Failed to parse ${snapshot.url}: ${reason}`), 'parse');
    return null;
  }
}

function limitAll(analyses: readonly PageAnalysis[], config: ScrapeConfig): Section[] {
  const sections: Section[] = [];
  for (const analysis of analyses) {
    for (const raw of analysis.segmentation.sections) {
      sections.push(
        limitSection(
          raw,
          { sourceUrl: analysis.url, baseUrl: analysis.baseUrl, index: sections.length },
          config.limits
        )
      );
    }
  }
  return sections;
}

function hasSections(analyses: readonly PageAnalysis[]): boolean {
  return analyses.some(analysis => analysis.segmentation.sections.length > 0);
}

/**
 * Scrapes one URL into section-labelled content. Never rejects: every failure
 * along the way is recorded in `errors` and the best available content is returned.
 */
export async function scrapeWebsite(
  url: string,
  options: ScrapeOptions = {}
): Promise<Readonly<ScrapeResult>> {
  const correlationId = options.correlationId ?? generateCorrelationId();
  const log = createChildLogger(correlationId);
  const collector = new ErrorCollector();
  // Attribution for anything unexpected that escapes a stage
  let stage: ScrapeStage = 'fetch';

  try {
    return await withTiming(
      log,
      'scrape',
      async () => {
        const config = options.config ?? getScrapeConfig();
        const fetcher = options.fetcher ?? fetchStatic;

        const staticSnapshot = await fetcher(url, config.fetch, log);
        collector.addAll(staticSnapshot.issues);

        stage = 'parse';
        const staticAnalysis =
          staticSnapshot.status === 'failed'
            ? null
            : analyzeSnapshot(staticSnapshot, config, collector, log);

        const decision = decideFallback(
          staticSnapshot,
          staticAnalysis ? staticAnalysis.segmentation : null,
          config.fallback
        );
        log.info({ event: 'fallback_decision', ...decision }, 'Fallback decided');

        let rendered: RenderOutcome | null = null;
        if (decision.shouldRender) {
          stage = 'render';
          const renderer = options.renderer ?? createDefaultRenderer(config, log);
          rendered = await renderer.render(url, log);
          collector.addAll(rendered.issues);
        }

        stage = 'parse';
        const renderedAnalyses = rendered
          ? rendered.pages
              .map(page => analyzeSnapshot(page, config, collector, log))
              .filter((analysis): analysis is PageAnalysis => analysis !== null)
          : [];

        const strategy: ScrapeStrategy = hasSections(renderedAnalyses) ? 'rendered' : 'static';
        const chosen =
          strategy === 'rendered' ? renderedAnalyses : staticAnalysis ? [staticAnalysis] : [];
        chosen.forEach(analysis => collector.addAll(analysis.segmentation.issues));

        // Meta comes from the requested page: the first page of whichever source was chosen
        const metaSource = [...chosen, ...renderedAnalyses, staticAnalysis].find(
          (analysis): analysis is PageAnalysis => analysis !== null
        );

        return assembleResult({
          url,
          strategy,
          meta: metaSource ? metaSource.meta : null,
          sections: limitAll(chosen, config),
          interactions: rendered ? rendered.interactions : null,
          errors: collector.records(),
        });
      },
      { url }
    );
  } catch (error) {
    collector.capture(error, stage);
    return assembleResult({
      url,
      strategy: 'static',
      meta: null,
      sections: [],
      interactions: null,
      errors: collector.records(),
    });
  }
}
