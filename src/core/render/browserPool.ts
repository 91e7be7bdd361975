import type { Browser } from 'playwright';
import { getEnvironment } from '../../config/environment';
import { BROWSER_LAUNCH_ARGS } from '../../config/constants';
import { logger } from '../../utils/logger';

/** The slice of a browser the pool manages. */
export interface PooledBrowser {
  isConnected(): boolean;
  close(): Promise<void>;
}

export type BrowserLauncher<B extends PooledBrowser> = () => Promise<B>;

interface Waiter<B> {
  resolve: (browser: B) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

interface IdleEntry<B> {
  browser: B;
  lastUsed: number;
  idleTimer: NodeJS.Timeout;
}

export interface BrowserPoolOptions {
  max?: number;
  acquireTimeoutMs?: number;
  idleTimeoutMs?: number;
}

export class BrowserPool<B extends PooledBrowser> {
  private readonly launch: BrowserLauncher<B>;
  private readonly max: number;
  private readonly acquireTimeoutMs: number;
  private readonly idleTimeoutMs: number;
  private total = 0;
  private idle: IdleEntry<B>[] = [];
  private queue: Waiter<B>[] = [];
  private isClosing = false;
  private closeFailures = 0;

  constructor(launch: BrowserLauncher<B>, opts?: BrowserPoolOptions) {
    const env = getEnvironment();
    this.launch = launch;
    this.max = opts?.max ?? env.BROWSER_POOL_SIZE;
    this.acquireTimeoutMs = opts?.acquireTimeoutMs ?? env.BROWSER_ACQUIRE_TIMEOUT_MS;
    this.idleTimeoutMs = opts?.idleTimeoutMs ?? 60000;
  }

  async acquire(): Promise<B> {
    if (this.isClosing) throw new Error('Browser pool is closing');

    const now = Date.now();
    for (let item = this.idle.pop(); item; item = this.idle.pop()) {
      clearTimeout(item.idleTimer);
      if (now - item.lastUsed > this.idleTimeoutMs || !item.browser.isConnected()) {
        this.discard(item.browser);
        continue;
      }
      return item.browser;
    }

    if (this.total < this.max) {
      this.total += 1;
      try {
        return await this.launch();
      } catch (error) {
        this.total = Math.max(0, this.total - 1);
        throw error;
      }
    }

    return await new Promise<B>((resolve, reject) => {
      const timer = setTimeout(() => {
        const idx = this.queue.findIndex(w => w.timer === timer);
        if (idx >= 0) this.queue.splice(idx, 1);
        reject(new Error('Browser pool acquire timeout'));
      }, this.acquireTimeoutMs);
      timer.unref();
      this.queue.push({ resolve, reject, timer });
    });
  }

  release(browser: B): void {
    if (this.isClosing || !browser.isConnected()) {
      this.discard(browser);
      return;
    }

    const waiter = this.queue.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(browser);
      return;
    }

    const idleTimer = setTimeout(() => this.pruneIdle(browser), this.idleTimeoutMs);
    idleTimer.unref();
    this.idle.push({ browser, lastUsed: Date.now(), idleTimer });
  }

  /** Scoped checkout: the browser goes back to the pool (or is discarded) on every exit path. */
  async withBrowser<T>(fn: (browser: B) => Promise<T>): Promise<T> {
    const browser = await this.acquire();
    try {
      return await fn(browser);
    } finally {
      this.release(browser);
    }
  }

  async close(): Promise<void> {
    this.isClosing = true;
    this.queue.splice(0).forEach(w => {
      clearTimeout(w.timer);
      w.reject(new Error('Browser pool closing'));
    });
    await Promise.all(
      this.idle.splice(0).map(item => {
        clearTimeout(item.idleTimer);
        return this.closeBrowser(item.browser);
      })
    );
  }

  private pruneIdle(browser: B): void {
    const idx = this.idle.findIndex(item => item.browser === browser);
    if (idx < 0) return;
    this.idle.splice(idx, 1);
    this.discard(browser);
  }

  private discard(browser: B): void {
    void this.closeBrowser(browser).then(() => this.serveWaiter());
  }

  private async closeBrowser(browser: B): Promise<void> {
    try {
      await browser.close();
    } catch (error) {
      this.closeFailures += 1;
      logger.warn(
        { event: 'browser_close_failed', error: error instanceof Error ? error.message : error },
        'Failed to close browser'
      );
    } finally {
      this.total = Math.max(0, this.total - 1);
    }
  }

  // A freed slot goes to the oldest waiter, if any
  private async serveWaiter(): Promise<void> {
    if (this.isClosing || this.total >= this.max) return;
    const waiter = this.queue.shift();
    if (!waiter) return;
    clearTimeout(waiter.timer);
    this.total += 1;
    try {
      waiter.resolve(await this.launch());
    } catch (error) {
      this.total = Math.max(0, this.total - 1);
      waiter.reject(error instanceof Error ? error : new Error(String(error)));
    }
  }

  getStats(): {
    total: number;
    idle: number;
    queueLength: number;
    closeFailures: number;
    max: number;
  } {
    return {
      total: this.total,
      idle: this.idle.length,
      queueLength: this.queue.length,
      closeFailures: this.closeFailures,
      max: this.max,
    };
  }
}

export async function launchChromium(): Promise<Browser> {
  const { chromium } = await import('playwright');
  const env = getEnvironment();
  return chromium.launch({
    headless: env.BROWSER_HEADLESS === 'true',
    args: [...BROWSER_LAUNCH_ARGS],
  });
}

let globalPool: BrowserPool<Browser> | null = null;

export function getBrowserPool(): BrowserPool<Browser> {
  if (!globalPool) globalPool = new BrowserPool<Browser>(launchChromium);
  return globalPool;
}

export async function closeBrowserPool(): Promise<void> {
  const pool = globalPool;
  if (!pool) return;
  try {
    await pool.close();
  } finally {
    globalPool = null;
  }
}
