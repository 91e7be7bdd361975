import type pino from 'pino';
import type { InteractionSettings, RenderSettings } from '../../config/scrapeConfig';
import { RenderError, timeoutMessage } from '../../mcp/errors';
import { withTiming } from '../../utils/logger';
import { withTimeout } from '../../utils/timeout';
import { toErrorRecord } from '../content/errorCollector';
import type {
  ErrorRecord,
  InteractionSummary,
  PageSnapshot,
  SnapshotStatus,
} from '../content/types/scrape';
import { InteractionController } from './interactionController';
import type { PageSource } from './pageSource';
import { waitForStableContent } from './settle';

export interface RenderOutcome {
  status: SnapshotStatus;
  /** One snapshot per visited page, in visiting order. */
  pages: PageSnapshot[];
  interactions: InteractionSummary;
  issues: ErrorRecord[];
}

/** Anything that can turn a URL into rendered snapshots; the pipeline depends on this only. */
export interface Renderer {
  render(url: string, log: pino.Logger): Promise<RenderOutcome>;
}

export class RenderEngine implements Renderer {
  constructor(
    private readonly source: PageSource,
    private readonly settings: RenderSettings,
    private readonly interaction: InteractionSettings
  ) {}

  /** Never throws: launch, navigation and capture failures come back as a failed outcome. */
  async render(url: string, log: pino.Logger): Promise<RenderOutcome> {
    try {
      return await withTiming(log, 'browser.render', () =>
        this.source.withPage(async handle => {
          const { navigationTimeoutMs, settleMaxMs, settlePollMs } = this.settings;
          try {
            await withTimeout(
              handle.goto(url, navigationTimeoutMs),
              navigationTimeoutMs,
              () => new RenderError(timeoutMessage('Navigation timed out', navigationTimeoutMs))
            );
          } catch (error) {
            if (error instanceof RenderError) throw error;
            // Playwright raises its own TimeoutError when `goto` hits the same bound
            if (error instanceof Error && error.name === 'TimeoutError') {
              throw new RenderError(timeoutMessage('Navigation timed out', navigationTimeoutMs));
            }
            const reason = error instanceof Error ? error.message : String(error);
            throw new RenderError(`Navigation failed: ${reason}`, url);
          }

          const issues: ErrorRecord[] = [];
          try {
            const settled = await waitForStableContent(
              handle,
              settleMaxMs,
              settlePollMs,
              this.interaction.interactionTimeoutMs
            );
            log.debug({ event: 'render_settled', ...settled }, 'Initial render settled');
          } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            const issue = toErrorRecord(new RenderError(`Settle failed: ${reason}`), 'render');
            issues.push(issue);
            log.warn(
              { event: 'settle_failed', url, error: issue.message },
              'Initial settle failed'
            );
          }

          const controller = new InteractionController(this.interaction, log);
          const crawl = await controller.run(handle);
          issues.push(...crawl.issues);
          const status: SnapshotStatus =
            crawl.pages.length === 0 ? 'failed' : issues.length > 0 ? 'partial' : 'success';

          return {
            status,
            pages: crawl.pages,
            interactions: crawl.interactions,
            issues,
          };
        })
      );
    } catch (error) {
      const issue = toErrorRecord(error, 'render');
      log.warn({ event: 'render_failed', url, error: issue.message }, 'Render failed');
      return {
        status: 'failed',
        pages: [],
        interactions: { clicks: [], scrolls: 0, pages: [] },
        issues: [issue],
      };
    }
  }
}
