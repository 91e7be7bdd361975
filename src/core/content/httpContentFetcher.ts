import { Client, interceptors, type Dispatcher } from 'undici';
const { redirect } = interceptors;
import { brotliDecompressSync, gunzipSync, inflateSync } from 'zlib';
import type pino from 'pino';
import type { FetchSettings } from '../../config/scrapeConfig';
import { BROWSER_USER_AGENT } from '../../config/constants';
import { FetchError, timeoutMessage } from '../../mcp/errors';
import { withTiming } from '../../utils/logger';
import { withTimeout } from '../../utils/timeout';
import { isHttpUrl } from '../../utils/urlValidator';
import { toErrorRecord } from './errorCollector';
import type { PageSnapshot } from './types/scrape';

export interface FetchResult {
  statusCode: number;
  bodyText: string;
}

const REQUEST_HEADERS: Record<string, string> = {
  'accept-language': 'en-US,en;q=0.9',
  'accept-encoding': 'gzip, br, deflate',
  'user-agent': BROWSER_USER_AGENT,
  accept:
    'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8',
  dnt: '1',
  'upgrade-insecure-requests': '1',
  'sec-fetch-dest': 'document',
  'sec-fetch-mode': 'navigate',
  'sec-fetch-site': 'none',
  'sec-fetch-user': '?1',
  'cache-control': 'max-age=0',
};

function headerValue(headers: Dispatcher.ResponseData['headers'], name: string): string {
  const value = headers[name];
  if (Array.isArray(value)) return value.join(', ');
  return value ?? '';
}

function decodeBody(buffer: Buffer, encoding: string): Buffer {
  if (encoding.includes('br')) return brotliDecompressSync(buffer);
  if (encoding.includes('gzip')) return gunzipSync(buffer);
  if (encoding.includes('deflate')) return inflateSync(buffer);
  return buffer;
}

async function closeQuietly(client: Dispatcher, log: pino.Logger): Promise<void> {
  try {
    await client.close();
  } catch (error) {
    log.warn(
      { error: error instanceof Error ? error.message : String(error) },
      'Client close failed - continuing'
    );
  }
}

/**
 * Single GET with redirects followed and the body decoded. Anything other than a
 * 2xx response, including timeouts and transport failures, becomes a FetchError.
 */
export async function fetchUrl(
  url: string,
  settings: FetchSettings,
  log: pino.Logger
): Promise<FetchResult> {
  if (!isHttpUrl(url)) {
    throw new FetchError('Only http(s) schemes are allowed');
  }

  const controller = new AbortController();
  const target = new URL(url);
  const client = new Client(target.origin).compose(
    redirect({ maxRedirections: settings.maxRedirections })
  );

  // Headers and body share one deadline; aborting the signal also stops a stalled body stream
  const readResponse = async (): Promise<{ res: Dispatcher.ResponseData; raw: Buffer }> => {
    const res = await client.request({
      path: target.pathname + target.search,
      method: 'GET',
      signal: controller.signal,
      headers: REQUEST_HEADERS,
    });
    const raw = Buffer.from(await res.body.arrayBuffer());
    return { res, raw };
  };

  try {
    const { res, raw } = await withTiming(log, 'http.fetch', () =>
      withTimeout(readResponse(), settings.timeoutMs, () => {
        controller.abort();
        return new FetchError(timeoutMessage('Request timed out', settings.timeoutMs));
      })
    );

    const encoding = headerValue(res.headers, 'content-encoding').toLowerCase();
    const bodyText = decodeBody(raw, encoding).toString('utf8');

    log.debug(
      { statusCode: res.statusCode, encoding, bytes: raw.length, textLength: bodyText.length },
      'HTTP response read'
    );

    if (res.statusCode < 200 || res.statusCode >= 300) {
      throw new FetchError('HTTP error', res.statusCode);
    }

    return { statusCode: res.statusCode, bodyText };
  } catch (error) {
    if (error instanceof FetchError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new FetchError(`Request failed: ${reason}`);
  } finally {
    await closeQuietly(client, log);
  }
}

/** Static strategy: never throws, failures come back as a failed snapshot. */
export async function fetchStatic(
  url: string,
  settings: FetchSettings,
  log: pino.Logger
): Promise<PageSnapshot> {
  try {
    const { bodyText } = await fetchUrl(url, settings, log);
    return { url, html: bodyText, status: 'success', issues: [] };
  } catch (error) {
    const issue = toErrorRecord(error, 'fetch');
    log.warn({ event: 'static_fetch_failed', url, error: issue.message }, 'Static fetch failed');
    return { url, html: '', status: 'failed', issues: [issue] };
  }
}
