import type { Browser } from 'playwright';
import type pino from 'pino';
import { BROWSER_USER_AGENT, BROWSER_VIEWPORT } from '../../config/constants';
import { RenderError } from '../../mcp/errors';
import { getBrowserPool, type BrowserPool } from './browserPool';
import { PlaywrightPageHandle, type PageHandle } from './pageHandle';

/** Lends a fresh page for the duration of `fn` and cleans it up afterwards. */
export interface PageSource {
  withPage<T>(fn: (handle: PageHandle) => Promise<T>): Promise<T>;
}

export class PlaywrightPageSource implements PageSource {
  constructor(
    private readonly log: pino.Logger,
    private readonly pool: BrowserPool<Browser> = getBrowserPool()
  ) {}

  async withPage<T>(fn: (handle: PageHandle) => Promise<T>): Promise<T> {
    let checkedOut = false;
    try {
      return await this.pool.withBrowser(async browser => {
        checkedOut = true;
        return this.inContext(browser, fn);
      });
    } catch (error) {
      if (checkedOut) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new RenderError(`Browser unavailable: ${reason}`);
    }
  }

  private async inContext<T>(browser: Browser, fn: (handle: PageHandle) => Promise<T>): Promise<T> {
    const context = await browser.newContext({
      userAgent: BROWSER_USER_AGENT,
      viewport: { ...BROWSER_VIEWPORT },
    });
    try {
      const page = await context.newPage();
      return await fn(new PlaywrightPageHandle(page));
    } finally {
      await context.close().catch((error: unknown) => {
        this.log.warn(
          { event: 'context_close_failed', error: error instanceof Error ? error.message : error },
          'Failed to close browser context'
        );
      });
    }
  }
}
