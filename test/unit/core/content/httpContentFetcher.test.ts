import { describe, test, expect, beforeEach, jest } from '@jest/globals';
import { gzipSync } from 'zlib';
import pino from 'pino';
import { fetchStatic, fetchUrl } from '../../../../src/core/content/httpContentFetcher';

// Simple mock that works around method chaining issues
const mockRequest = jest.fn<(options: Record<string, unknown>) => Promise<unknown>>();
const mockClose = jest.fn<() => Promise<void>>();

jest.mock('undici', () => ({
  Client: jest.fn().mockImplementation(() => ({
    request: mockRequest,
    close: mockClose,
    compose: jest.fn().mockReturnThis(),
  })),
  interceptors: {
    redirect: jest.fn().mockReturnValue(() => ({})),
  },
  Dispatcher: {},
}));

const log = pino({ level: 'silent' });
const SETTINGS = { timeoutMs: 2000, maxRedirections: 3 };

function response(statusCode: number, body: Buffer, headers: Record<string, string> = {}) {
  return {
    statusCode,
    headers,
    body: {
      arrayBuffer: () =>
        Promise.resolve(body.buffer.slice(body.byteOffset, body.byteOffset + body.length)),
    },
  };
}

describe('fetchUrl', () => {
  beforeEach(() => {
    mockRequest.mockReset();
    mockClose.mockReset();
    mockClose.mockResolvedValue(undefined);
  });

  test('returns the body of a 200 response', async () => {
    mockRequest.mockResolvedValue(response(200, Buffer.from('<p>Hello</p>')));

    const res = await fetchUrl('https://example.com/test?q=1', SETTINGS, log);

    expect(res).toEqual({ statusCode: 200, bodyText: '<p>Hello</p>' });
    expect(mockRequest).toHaveBeenCalledWith(
      expect.objectContaining({
        path: '/test?q=1',
        method: 'GET',
        headers: expect.objectContaining({ 'accept-encoding': 'gzip, br, deflate' }),
      })
    );
    expect(mockClose).toHaveBeenCalledTimes(1);
  });

  test('decodes gzip-encoded bodies', async () => {
    mockRequest.mockResolvedValue(
      response(200, gzipSync(Buffer.from('compressed page')), { 'content-encoding': 'gzip' })
    );

    const res = await fetchUrl('https://example.com/', SETTINGS, log);

    expect(res.bodyText).toBe('compressed page');
  });

  test('rejects non-2xx responses with the status code', async () => {
    mockRequest.mockResolvedValue(response(500, Buffer.from('oops')));

    await expect(fetchUrl('https://example.com/', SETTINGS, log)).rejects.toMatchObject({
      name: 'FetchError',
      statusCode: 500,
      detail: 'HTTP error (status: 500)',
    });
    expect(mockClose).toHaveBeenCalledTimes(1);
  });

  test('times out a request that never answers', async () => {
    mockRequest.mockReturnValue(new Promise(() => undefined));

    await expect(
      fetchUrl('https://example.com/slow', { ...SETTINGS, timeoutMs: 50 }, log)
    ).rejects.toMatchObject({ detail: 'Request timed out (timeout: 50ms)' });
  });

  test('times out a body that stops arriving after the headers', async () => {
    mockRequest.mockResolvedValue({
      statusCode: 200,
      headers: {},
      body: { arrayBuffer: () => new Promise<ArrayBuffer>(() => undefined) },
    });

    await expect(
      fetchUrl('https://example.com/stream', { ...SETTINGS, timeoutMs: 50 }, log)
    ).rejects.toMatchObject({ name: 'FetchError', detail: 'Request timed out (timeout: 50ms)' });

    const [options] = mockRequest.mock.calls[0];
    expect(options.signal).toMatchObject({ aborted: true });
    expect(mockClose).toHaveBeenCalledTimes(1);
  });

  test('wraps transport failures', async () => {
    mockRequest.mockRejectedValue(new Error('ECONNREFUSED'));

    await expect(fetchUrl('https://example.com/', SETTINGS, log)).rejects.toMatchObject({
      detail: 'Request failed: ECONNREFUSED',
    });
  });

  test('rejects non-http(s) URLs without a request', async () => {
    await expect(fetchUrl('file:///etc/passwd', SETTINGS, log)).rejects.toMatchObject({
      detail: 'Only http(s) schemes are allowed',
    });
    expect(mockRequest).not.toHaveBeenCalled();
  });

  test('still succeeds when closing the client fails', async () => {
    mockRequest.mockResolvedValue(response(200, Buffer.from('ok')));
    mockClose.mockRejectedValue(new Error('close failed'));

    await expect(fetchUrl('https://example.com/', SETTINGS, log)).resolves.toEqual({
      statusCode: 200,
      bodyText: 'ok',
    });
  });
});

describe('fetchStatic', () => {
  beforeEach(() => {
    mockRequest.mockReset();
    mockClose.mockReset();
    mockClose.mockResolvedValue(undefined);
  });

  test('wraps a successful fetch in a snapshot', async () => {
    mockRequest.mockResolvedValue(response(200, Buffer.from('<html></html>')));

    await expect(fetchStatic('https://example.com/', SETTINGS, log)).resolves.toEqual({
      url: 'https://example.com/',
      html: '<html></html>',
      status: 'success',
      issues: [],
    });
  });

  test('turns a failure into a failed snapshot instead of throwing', async () => {
    mockRequest.mockResolvedValue(response(500, Buffer.from('')));

    await expect(fetchStatic('https://example.com/', SETTINGS, log)).resolves.toEqual({
      url: 'https://example.com/',
      html: '',
      status: 'failed',
      issues: [{ stage: 'fetch', kind: 'FetchError', message: 'HTTP error (status: 500)' }],
    });
  });
});
