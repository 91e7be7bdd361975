import type { Locator, Page } from 'playwright';
import {
  LOAD_MORE_CLASS_SELECTORS,
  LOAD_MORE_CLICKABLE_SELECTORS,
  LOAD_MORE_TEXT_PATTERN,
  NEXT_PAGE_SELECTORS,
  NEXT_PAGE_TEXT_PATTERN,
  PAGINATION_CONTAINER_SELECTORS,
  TAB_SELECTORS,
} from '../content/extractors/selectors';

export type InteractionTarget = 'tab' | 'loadMore';

/**
 * The operations the interaction controller needs from a live page. Kept narrow so
 * the controller can be driven by something other than a real browser.
 */
export interface PageHandle {
  url(): string;
  goto(url: string, timeoutMs: number): Promise<void>;
  content(): Promise<string>;
  /** Serialized size of the body, used to detect when the DOM stops changing. */
  contentSize(): Promise<number>;
  scrollHeight(): Promise<number>;
  scrollToBottom(): Promise<void>;
  countTargets(target: InteractionTarget): Promise<number>;
  clickTarget(target: InteractionTarget, index: number, timeoutMs: number): Promise<void>;
  /** Raw href of the next-page link, unresolved, or null when there is none. */
  findNextPageHref(): Promise<string | null>;
  pause(ms: number): Promise<void>;
}

export class PlaywrightPageHandle implements PageHandle {
  constructor(private readonly page: Page) {}

  url(): string {
    return this.page.url();
  }

  async goto(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { waitUntil: 'networkidle', timeout: timeoutMs });
  }

  async content(): Promise<string> {
    return this.page.content();
  }

  async contentSize(): Promise<number> {
    return this.page.evaluate(() => (document.body ? document.body.innerHTML.length : 0));
  }

  async scrollHeight(): Promise<number> {
    return this.page.evaluate(() => document.documentElement.scrollHeight);
  }

  async scrollToBottom(): Promise<void> {
    await this.page.evaluate(() => window.scrollTo(0, document.documentElement.scrollHeight));
  }

  async countTargets(target: InteractionTarget): Promise<number> {
    return this.locate(target).count();
  }

  async clickTarget(target: InteractionTarget, index: number, timeoutMs: number): Promise<void> {
    await this.locate(target).nth(index).click({ timeout: timeoutMs });
  }

  async findNextPageHref(): Promise<string | null> {
    return this.page.evaluate(
      ({ relSelector, textPattern, containerSelector }) => {
        const rel = document.querySelector(relSelector);
        const relHref = rel ? rel.getAttribute('href') : null;
        if (relHref) return relHref;

        const pattern = new RegExp(textPattern, 'i');
        for (const anchor of Array.from(document.querySelectorAll('a[href]'))) {
          const text = (anchor.textContent || '').trim();
          const aria = (anchor.getAttribute('aria-label') || '').trim();
          if (pattern.test(text) || pattern.test(aria)) return anchor.getAttribute('href');
        }

        const container = document.querySelector(containerSelector);
        const links = container ? container.querySelectorAll('a[href]') : null;
        if (!links || links.length === 0) return null;
        return links[links.length - 1].getAttribute('href');
      },
      {
        relSelector: NEXT_PAGE_SELECTORS,
        textPattern: NEXT_PAGE_TEXT_PATTERN.source,
        containerSelector: PAGINATION_CONTAINER_SELECTORS,
      }
    );
  }

  async pause(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  private locate(target: InteractionTarget): Locator {
    if (target === 'tab') return this.page.locator(TAB_SELECTORS);
    return this.page
      .locator(LOAD_MORE_CLICKABLE_SELECTORS, { hasText: LOAD_MORE_TEXT_PATTERN })
      .or(this.page.locator(LOAD_MORE_CLASS_SELECTORS));
  }
}
