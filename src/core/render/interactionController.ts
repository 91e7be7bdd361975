import type pino from 'pino';
import type { InteractionSettings } from '../../config/scrapeConfig';
import { InteractionError, RenderError, timeoutMessage } from '../../mcp/errors';
import { withTimeout } from '../../utils/timeout';
import {
  isSameDocument,
  isSameOrigin,
  normalizeUrl,
  resolveHttpUrl,
} from '../../utils/urlValidator';
import { toErrorRecord } from '../content/errorCollector';
import type { ErrorRecord, InteractionSummary, PageSnapshot } from '../content/types/scrape';
import type { InteractionTarget, PageHandle } from './pageHandle';
import { type SettleResult, waitForStableContent } from './settle';

export type CrawlPhase = 'idle' | 'clickTabs' | 'clickLoadMore' | 'scroll' | 'paginate' | 'done';

export interface CrawlState {
  readonly phase: CrawlPhase;
  readonly pageCount: number;
  readonly scrollCount: number;
  /** Normalized URLs of every page loaded so far. */
  readonly visited: readonly string[];
  /** First loaded page; pagination never leaves its origin. */
  readonly originUrl: string;
  /** The current page's DOM has not been captured yet. */
  readonly pendingCapture: boolean;
  /** Index into `issues` where the current page's issues begin. */
  readonly pageIssueStart: number;
  readonly clicks: readonly string[];
  readonly captured: readonly PageSnapshot[];
  readonly issues: readonly ErrorRecord[];
  readonly terminal: boolean;
}

export interface CrawlOutcome {
  pages: PageSnapshot[];
  interactions: InteractionSummary;
  issues: ErrorRecord[];
}

const TARGET_LABELS: Record<InteractionTarget, string> = {
  tab: 'tab',
  loadMore: 'load-more',
};

export function initialCrawlState(url: string): CrawlState {
  return {
    phase: 'idle',
    pageCount: 1,
    scrollCount: 0,
    visited: [],
    originUrl: url,
    pendingCapture: true,
    pageIssueStart: 0,
    clicks: [],
    captured: [],
    issues: [],
    terminal: false,
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function asInteractionError(error: unknown, context: string): InteractionError {
  if (error instanceof InteractionError) return error;
  return new InteractionError(`${context}: ${errorMessage(error)}`);
}

/**
 * Explores a rendered page as a finite-state machine:
 * idle → clickTabs → clickLoadMore → scroll → paginate → (clickTabs | done).
 * Each transition takes the previous state by value and returns the next one.
 * Every operation on the page is bounded; a failed or timed-out step is recorded
 * and the machine moves on to the next phase.
 */
export class InteractionController {
  constructor(
    private readonly settings: InteractionSettings,
    private readonly log: pino.Logger
  ) {}

  async run(handle: PageHandle): Promise<CrawlOutcome> {
    const maxSteps = this.settings.maxPages * 5 + 2;
    let state = initialCrawlState(handle.url());

    for (let step = 0; !state.terminal; step += 1) {
      if (step >= maxSteps && state.phase !== 'done') {
        this.log.warn({ event: 'crawl_step_guard', phase: state.phase }, 'Step guard forced done');
        state = { ...state, phase: 'done' };
      }
      try {
        state = await this.step(handle, state);
      } catch (error) {
        const issues = [...state.issues];
        const failure = asInteractionError(error, `${state.phase} step failed`);
        this.recordIssue(issues, failure, state.phase);
        state = { ...state, phase: 'done', issues, terminal: state.phase === 'done' };
      }
    }

    return {
      pages: [...state.captured],
      interactions: {
        clicks: [...state.clicks],
        scrolls: state.scrollCount,
        pages: state.captured.map(page => page.url),
      },
      issues: [...state.issues],
    };
  }

  async step(handle: PageHandle, state: CrawlState): Promise<CrawlState> {
    this.log.debug(
      { event: 'crawl_step', phase: state.phase, pageCount: state.pageCount },
      'Crawl step'
    );

    switch (state.phase) {
      case 'idle':
        return {
          ...state,
          phase: 'clickTabs',
          visited: [normalizeUrl(state.originUrl)],
        };
      case 'clickTabs':
        return this.clickTargets(
          handle,
          state,
          'tab',
          this.settings.maxTabClicks,
          'clickLoadMore'
        );
      case 'clickLoadMore':
        return this.clickTargets(
          handle,
          state,
          'loadMore',
          this.settings.maxLoadMoreClicks,
          'scroll'
        );
      case 'scroll':
        return this.scroll(handle, state);
      case 'paginate':
        return this.paginate(handle, state);
      case 'done':
        return this.finish(handle, state);
    }
  }

  private bounded<T>(operation: Promise<T>, what: string): Promise<T> {
    const timeoutMs = this.settings.interactionTimeoutMs;
    return withTimeout(
      operation,
      timeoutMs,
      () => new InteractionError(timeoutMessage(`${what} timed out`, timeoutMs))
    );
  }

  private settle(handle: PageHandle): Promise<SettleResult> {
    return waitForStableContent(
      handle,
      this.settings.clickSettleMs,
      this.settings.settlePollMs,
      this.settings.interactionTimeoutMs
    );
  }

  private async navigate(handle: PageHandle, url: string, what: string): Promise<void> {
    const navigationTimeoutMs = this.settings.navigationTimeoutMs;
    await withTimeout(
      handle.goto(url, navigationTimeoutMs),
      navigationTimeoutMs,
      () => new InteractionError(timeoutMessage(`${what} timed out`, navigationTimeoutMs))
    ).catch((error: unknown) => {
      throw asInteractionError(error, `${what} failed`);
    });
  }

  private recordIssue(issues: ErrorRecord[], error: unknown, phase: CrawlPhase): void {
    const record = toErrorRecord(error, 'interaction');
    issues.push(record);
    this.log.warn(
      { event: 'interaction_failed', phase, error: record.message },
      'Interaction failed'
    );
  }

  private async clickTargets(
    handle: PageHandle,
    state: CrawlState,
    target: InteractionTarget,
    cap: number,
    next: CrawlPhase
  ): Promise<CrawlState> {
    const label = TARGET_LABELS[target];
    const clicks = [...state.clicks];
    const issues = [...state.issues];
    const pageUrl = handle.url();
    let stranded = false;

    try {
      let count = await this.bounded(handle.countTargets(target), `Locating ${label} elements`);
      for (let index = 0, clicked = 0; index < count && clicked < cap; index += 1) {
        const name = `${label}[${index}]`;
        await this.bounded(
          handle.clickTarget(target, index, this.settings.interactionTimeoutMs),
          `Click on ${name}`
        ).catch((error: unknown) => {
          throw asInteractionError(error, `Click on ${name} failed`);
        });

        // Anchors styled as tabs or buttons can load another document
        const landedUrl = handle.url();
        if (!isSameDocument(landedUrl, pageUrl)) {
          stranded = true;
          await this.navigate(handle, pageUrl, `Return to ${pageUrl}`);
          stranded = false;
          throw new InteractionError(`Click on ${name} navigated away to ${landedUrl}`);
        }

        clicked += 1;
        clicks.push(name);
        await this.settle(handle);

        // Load-more buttons come and go as content arrives
        if (target === 'loadMore') {
          count = await this.bounded(handle.countTargets(target), `Locating ${label} elements`);
        }
      }
    } catch (error) {
      this.recordIssue(
        issues,
        asInteractionError(error, `${label} interaction failed`),
        state.phase
      );
    }

    // Still on the foreign document
    if (stranded) return { ...state, phase: 'done', pendingCapture: false, clicks, issues };
    return { ...state, phase: next, clicks, issues };
  }

  private async scrollOnce(handle: PageHandle): Promise<boolean> {
    const before = await handle.scrollHeight();
    await handle.scrollToBottom();
    await handle.pause(this.settings.scrollDelayMs);
    const after = await handle.scrollHeight();
    return after > before;
  }

  private async scroll(handle: PageHandle, state: CrawlState): Promise<CrawlState> {
    const issues = [...state.issues];
    const timeoutMs = this.settings.interactionTimeoutMs + this.settings.scrollDelayMs;
    let scrollCount = state.scrollCount;
    let grew = false;

    try {
      while (scrollCount < this.settings.maxScrolls) {
        scrollCount += 1;
        const grewThisTime = await withTimeout(
          this.scrollOnce(handle),
          timeoutMs,
          () => new InteractionError(timeoutMessage('Scroll timed out', timeoutMs))
        );
        if (!grewThisTime) break;
        grew = true;
      }
    } catch (error) {
      this.recordIssue(issues, asInteractionError(error, 'Scroll failed'), state.phase);
    }

    return { ...state, phase: grew ? 'done' : 'paginate', scrollCount, issues };
  }

  private pageSnapshot(
    state: CrawlState,
    issues: readonly ErrorRecord[],
    url: string,
    html: string
  ): PageSnapshot {
    const pageIssues = issues.slice(state.pageIssueStart);
    return {
      url,
      html,
      status: pageIssues.length > 0 ? 'partial' : 'success',
      issues: pageIssues.map(issue => ({ ...issue })),
    };
  }

  private async capture(
    handle: PageHandle,
    state: CrawlState,
    issues: ErrorRecord[]
  ): Promise<PageSnapshot | null> {
    const url = handle.url();
    try {
      const html = await this.bounded(handle.content(), 'DOM capture');
      return this.pageSnapshot(state, issues, url, html);
    } catch (error) {
      const record = toErrorRecord(
        new RenderError(`DOM capture failed: ${errorMessage(error)}`, url),
        'render'
      );
      issues.push(record);
      this.log.warn({ event: 'capture_failed', url, error: record.message }, 'DOM capture failed');
      return null;
    }
  }

  private async paginate(handle: PageHandle, state: CrawlState): Promise<CrawlState> {
    const done: CrawlState = { ...state, phase: 'done' };
    if (state.pageCount >= this.settings.maxPages) return done;

    const issues = [...state.issues];
    let href: string | null;
    try {
      href = await this.bounded(handle.findNextPageHref(), 'Next-page lookup');
    } catch (error) {
      this.recordIssue(issues, asInteractionError(error, 'Next-page lookup failed'), state.phase);
      return { ...done, issues };
    }
    if (!href) return done;

    const nextUrl = resolveHttpUrl(href, handle.url());
    if (!nextUrl || !isSameOrigin(nextUrl, state.originUrl)) return done;
    const key = normalizeUrl(nextUrl);
    if (state.visited.includes(key)) return done;

    const snapshot = await this.capture(handle, state, issues);
    const captured = snapshot ? [...state.captured, snapshot] : [...state.captured];

    try {
      await this.navigate(handle, nextUrl, `Pagination to ${nextUrl}`);
    } catch (error) {
      this.recordIssue(issues, error, state.phase);
      return { ...done, captured, issues, pendingCapture: false };
    }

    const landedUrl = handle.url();
    if (!isSameOrigin(landedUrl, state.originUrl)) {
      this.recordIssue(
        issues,
        new InteractionError(`Pagination to ${nextUrl} was redirected to ${landedUrl}`),
        state.phase
      );
      return { ...done, captured, issues, pendingCapture: false };
    }

    const pageIssueStart = issues.length;
    try {
      await this.settle(handle);
    } catch (error) {
      this.recordIssue(
        issues,
        asInteractionError(error, `Settling after pagination to ${nextUrl} failed`),
        state.phase
      );
    }
    this.log.info(
      { event: 'paginated', url: nextUrl, pageCount: state.pageCount + 1 },
      'Moved to next page'
    );

    return {
      ...state,
      phase: 'clickTabs',
      pageCount: state.pageCount + 1,
      visited: [...state.visited, key],
      pendingCapture: true,
      pageIssueStart,
      captured,
      issues,
    };
  }

  private async finish(handle: PageHandle, state: CrawlState): Promise<CrawlState> {
    if (!state.pendingCapture) return { ...state, phase: 'done', terminal: true };

    const issues = [...state.issues];
    const snapshot = await this.capture(handle, state, issues);
    return {
      ...state,
      phase: 'done',
      terminal: true,
      pendingCapture: false,
      captured: snapshot ? [...state.captured, snapshot] : [...state.captured],
      issues,
    };
  }
}
