import { afterEach, describe, expect, test, vi } from 'vitest';
import { TwoCaptchaClient } from '../../src/services/solvingService';
import { instantTiming } from '../helpers/timing';

const OPTIONS = { baseUrl: 'https://solver.test', pollIntervalMs: 5000, maxPolls: 3 };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function stubFetch(...replies: Array<() => Response>) {
  const fetchMock = vi.fn(async (_url: string) => {
    const next = replies.shift();
    if (!next) throw new Error('unexpected fetch');
    return next();
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('TwoCaptchaClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  test('submits the task and polls until the token is ready', async () => {
    const fetchMock = stubFetch(
      () => jsonResponse({ status: 1, request: 'task-1' }),
      () => jsonResponse({ status: 0, request: 'CAPCHA_NOT_READY' }),
      () => jsonResponse({ status: 1, request: 'token-xyz' })
    );
    const timing = instantTiming();
    const client = new TwoCaptchaClient('test-secret', timing, OPTIONS);

    const result = await client.solve('recaptcha', 'site-key-1', 'https://careers.example.com/jobs/42');

    expect(result).toEqual({ kind: 'ok', value: 'token-xyz' });
    expect(timing.sleeps).toEqual([5000, 5000]);

    const submitUrl = new URL(fetchMock.mock.calls[0][0]);
    expect(submitUrl.pathname).toBe('/in.php');
    expect(submitUrl.searchParams.get('method')).toBe('userrecaptcha');
    expect(submitUrl.searchParams.get('googlekey')).toBe('site-key-1');
    expect(submitUrl.searchParams.get('pageurl')).toBe('https://careers.example.com/jobs/42');

    const pollUrl = new URL(fetchMock.mock.calls[1][0]);
    expect(pollUrl.pathname).toBe('/res.php');
    expect(pollUrl.searchParams.get('id')).toBe('task-1');
    expect(pollUrl.searchParams.get('action')).toBe('get');
  });

  test('sends hCaptcha tasks with the sitekey parameter', async () => {
    const fetchMock = stubFetch(
      () => jsonResponse({ status: 1, request: 'task-2' }),
      () => jsonResponse({ status: 1, request: 'token-h' })
    );
    const client = new TwoCaptchaClient('test-secret', instantTiming(), OPTIONS);

    expect(await client.solve('hcaptcha', 'h-key', 'https://careers.example.com')).toEqual({ kind: 'ok', value: 'token-h' });
    const submitUrl = new URL(fetchMock.mock.calls[0][0]);
    expect(submitUrl.searchParams.get('method')).toBe('hcaptcha');
    expect(submitUrl.searchParams.get('sitekey')).toBe('h-key');
  });

  test('reports service errors from the API', async () => {
    stubFetch(() => jsonResponse({ status: 0, request: 'ERROR_WRONG_USER_KEY' }));
    const client = new TwoCaptchaClient('test-secret', instantTiming(), OPTIONS);

    expect(await client.solve('recaptcha', 'site-key-1', 'https://careers.example.com')).toEqual({
      kind: 'service_error',
      detail: '2Captcha error: ERROR_WRONG_USER_KEY',
    });
  });

  test('reports HTTP failures', async () => {
    stubFetch(() => new Response('unavailable', { status: 503 }));
    const client = new TwoCaptchaClient('test-secret', instantTiming(), OPTIONS);

    expect(await client.solve('recaptcha', 'site-key-1', 'https://careers.example.com')).toEqual({
      kind: 'service_error',
      detail: '2Captcha HTTP 503',
    });
  });

  test('times out when the token never becomes ready', async () => {
    stubFetch(
      () => jsonResponse({ status: 1, request: 'task-3' }),
      () => jsonResponse({ status: 0, request: 'CAPCHA_NOT_READY' }),
      () => jsonResponse({ status: 0, request: 'CAPCHA_NOT_READY' }),
      () => jsonResponse({ status: 0, request: 'CAPCHA_NOT_READY' })
    );
    const timing = instantTiming();
    const client = new TwoCaptchaClient('test-secret', timing, OPTIONS);

    expect(await client.solve('recaptcha', 'site-key-1', 'https://careers.example.com')).toEqual({
      kind: 'timeout',
      detail: '2Captcha task task-3 not solved after 3 polls',
    });
    expect(timing.sleeps).toEqual([5000, 5000, 5000]);
  });

  test('turns network failures into service errors', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new Error('connect ECONNREFUSED');
      })
    );
    const client = new TwoCaptchaClient('test-secret', instantTiming(), OPTIONS);

    expect(await client.solve('recaptcha', 'site-key-1', 'https://careers.example.com')).toEqual({
      kind: 'service_error',
      detail: '2Captcha request failed: connect ECONNREFUSED',
    });
  });
});
