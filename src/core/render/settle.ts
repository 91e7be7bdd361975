import { timeoutMessage } from '../../mcp/errors';
import { withTimeout } from '../../utils/timeout';
import type { PageHandle } from './pageHandle';

export interface SettleResult {
  stable: boolean;
  waitedMs: number;
}

/**
 * Polls the body size until two consecutive readings match or `maxMs` has been
 * spent waiting. Time is counted in poll intervals, not read from the clock.
 * Each reading is bounded by `readTimeoutMs`; a failed or timed-out reading rejects.
 */
export async function waitForStableContent(
  handle: PageHandle,
  maxMs: number,
  pollMs: number,
  readTimeoutMs: number
): Promise<SettleResult> {
  const read = (): Promise<number> =>
    withTimeout(
      handle.contentSize(),
      readTimeoutMs,
      () => new Error(timeoutMessage('Content size read timed out', readTimeoutMs))
    );

  const interval = Math.max(1, Math.min(pollMs, maxMs));
  let previous = await read();
  let waitedMs = 0;

  while (waitedMs + interval <= maxMs) {
    await handle.pause(interval);
    waitedMs += interval;
    const current = await read();
    if (current === previous) return { stable: true, waitedMs };
    previous = current;
  }

  return { stable: false, waitedMs };
}
