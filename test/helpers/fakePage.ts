import type { InteractionTarget, PageHandle } from '../../src/core/render/pageHandle';
import type { PageSource } from '../../src/core/render/pageSource';

export interface FakePageContent {
  html: string;
  height?: number;
  tabs?: number;
  loadMore?: number;
  nextHref?: string | null;
}

type Hook<A extends unknown[]> = (...args: A) => Promise<void> | void;

/**
 * In-memory stand-in for a browser page. `site` maps URLs to the content `goto`
 * loads; the hooks let a test change the page when it is clicked or scrolled.
 */
export class FakePage implements PageHandle {
  currentUrl = 'about:blank';
  html = '';
  height = 1000;
  targets: Record<InteractionTarget, number> = { tab: 0, loadMore: 0 };
  nextHref: string | null = null;
  pausedMs = 0;
  scrollCalls = 0;
  readonly clicked: string[] = [];
  readonly visits: string[] = [];

  onClick: Hook<[FakePage, InteractionTarget, number]> = () => undefined;
  onScroll: Hook<[FakePage]> = () => undefined;

  constructor(private readonly site: Record<string, FakePageContent>) {}

  url(): string {
    return this.currentUrl;
  }

  async goto(url: string): Promise<void> {
    const content = this.site[url];
    if (!content) throw new Error('net::ERR_NAME_NOT_RESOLVED');
    this.visits.push(url);
    this.currentUrl = url;
    this.html = content.html;
    this.height = content.height ?? 1000;
    this.targets = { tab: content.tabs ?? 0, loadMore: content.loadMore ?? 0 };
    this.nextHref = content.nextHref ?? null;
  }

  async content(): Promise<string> {
    return this.html;
  }

  async contentSize(): Promise<number> {
    return this.html.length;
  }

  async scrollHeight(): Promise<number> {
    return this.height;
  }

  async scrollToBottom(): Promise<void> {
    this.scrollCalls += 1;
    await this.onScroll(this);
  }

  async countTargets(target: InteractionTarget): Promise<number> {
    return this.targets[target];
  }

  async clickTarget(target: InteractionTarget, index: number): Promise<void> {
    if (index >= this.targets[target]) throw new Error(`No ${target} element at ${index}`);
    this.clicked.push(`${target}:${index}`);
    await this.onClick(this, target, index);
  }

  async findNextPageHref(): Promise<string | null> {
    return this.nextHref;
  }

  async pause(ms: number): Promise<void> {
    this.pausedMs += ms;
  }
}

export class FakePageSource implements PageSource {
  opened = 0;
  closed = 0;

  constructor(
    private readonly page: FakePage,
    private readonly failure?: Error
  ) {}

  async withPage<T>(fn: (handle: PageHandle) => Promise<T>): Promise<T> {
    if (this.failure) throw this.failure;
    this.opened += 1;
    try {
      return await fn(this.page);
    } finally {
      this.closed += 1;
    }
  }
}

/** A promise that never settles, for exercising timeouts. */
export function never<T = void>(): Promise<T> {
  return new Promise<T>(() => undefined);
}
