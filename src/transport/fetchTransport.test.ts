import { afterEach, beforeEach, describe, expect, it, type MockedFunction, vi } from 'vitest';
import type { OutgoingRequest } from '../core/types.js';
import { AbortError } from '../error/abortError.js';
import { getHttpError, HTTPError } from '../error/httpError.js';
import { TimeoutError } from '../error/timeoutError.js';
import { unwrapErrorType } from '../error/unwrapErrorType.js';
import { safeWrapAsync } from '../utils/wrap.js';
import { FetchTransport } from './fetchTransport.js';

const POST_REQUEST: OutgoingRequest = {
  method: 'POST',
  url: 'https://api.sparkpost.com:443/api/v1/transmissions',
  headers: { Authorization: 'test-key', 'Content-Type': 'application/json' },
  body: '{"campaign_id":"spring"}',
};

const GET_REQUEST: OutgoingRequest = {
  method: 'GET',
  url: 'https://api.sparkpost.com:443/api/v1/transmissions?campaign_id=spring',
  headers: { Authorization: 'test-key', 'Content-Type': 'application/json' },
  body: '{}',
};

/** fetch stand-in that only settles when its signal aborts */
const hangingFetch = (_: unknown, init?: RequestInit) =>
  new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(init?.signal?.reason), { once: true });
  });

describe('FetchTransport', () => {
  let fetchImpl: MockedFunction<typeof fetch>;

  beforeEach(() => {
    fetchImpl = vi.fn();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  describe('send', () => {
    it('sends method, url, headers and body', async () => {
      const response = new Response('{"results":{"id":"1"}}', { status: 200 });
      fetchImpl.mockResolvedValueOnce(response);

      const transport = new FetchTransport({ fetchImpl, timeout: false });

      await expect(transport.send(POST_REQUEST)).resolves.toBe(response);
      expect(fetchImpl).toHaveBeenCalledWith(POST_REQUEST.url, {
        method: 'POST',
        headers: POST_REQUEST.headers,
        body: '{"campaign_id":"spring"}',
      });
    });

    it('drops the body for GET requests', async () => {
      fetchImpl.mockResolvedValueOnce(new Response(null, { status: 200 }));

      await new FetchTransport({ fetchImpl, timeout: false }).send(GET_REQUEST);

      expect(fetchImpl.mock.calls[0][1]?.body).toBeUndefined();
      expect(fetchImpl.mock.calls[0][1]?.method).toBe('GET');
    });

    it('passes a signal when a timeout is configured', async () => {
      fetchImpl.mockResolvedValueOnce(new Response(null, { status: 200 }));

      await new FetchTransport({ fetchImpl, timeout: 5_000 }).send(POST_REQUEST);

      expect(fetchImpl.mock.calls[0][1]?.signal).toBeInstanceOf(AbortSignal);
    });

    it('clears the timeout timer once the response arrived', async () => {
      vi.useFakeTimers();
      fetchImpl.mockResolvedValueOnce(new Response(null, { status: 200 }));

      await new FetchTransport({ fetchImpl, timeout: 5_000 }).send(POST_REQUEST);

      expect(vi.getTimerCount()).toBe(0);
    });

    it('rejects with HTTPError for non-2xx responses', async () => {
      fetchImpl.mockResolvedValueOnce(new Response('{"errors":[{"message":"Unauthorized."}]}', { status: 401 }));

      const transport = new FetchTransport({ fetchImpl, timeout: false });
      const [error] = await safeWrapAsync(() => transport.send(POST_REQUEST));

      expect(error).toBeInstanceOf(HTTPError);
      expect(getHttpError(error)?.status).toBe(401);
      expect(error?.message).toBe('error in POST request in FetchTransport');
    });

    it('wraps network failures with the original cause', async () => {
      const failure = new TypeError('fetch failed');
      fetchImpl.mockRejectedValueOnce(failure);

      const transport = new FetchTransport({ fetchImpl, timeout: false });
      const [error] = await safeWrapAsync(() => transport.send(POST_REQUEST));

      expect(error?.message).toBe('error sending POST request in FetchTransport');
      expect(error?.cause).toBe(failure);
    });

    it('fails with a TimeoutError cause when the request takes too long', async () => {
      vi.useFakeTimers();
      fetchImpl.mockImplementationOnce(hangingFetch);

      const pending = new FetchTransport({ fetchImpl, timeout: 100 }).send(POST_REQUEST).catch((e) => e);
      await vi.advanceTimersByTimeAsync(100);
      const error = await pending;

      expect(unwrapErrorType(TimeoutError, error)?.timeout).toBe(100);
    });

    it('fails when the transport-wide signal aborts', async () => {
      const controller = new AbortController();
      fetchImpl.mockImplementationOnce(hangingFetch);

      const pending = new FetchTransport({ fetchImpl, timeout: false, signal: controller.signal })
        .send(POST_REQUEST)
        .catch((e) => e);
      controller.abort(new AbortError('shutting down'));
      const error = await pending;

      expect(unwrapErrorType(AbortError, error)?.message).toBe('shutting down');
    });

    it('leaves no listeners on the transport-wide signal once requests settle', async () => {
      const controller = new AbortController();
      const addSpy = vi.spyOn(controller.signal, 'addEventListener');
      const removeSpy = vi.spyOn(controller.signal, 'removeEventListener');
      fetchImpl.mockImplementation(() => Promise.resolve(new Response(null, { status: 200 })));
      const transport = new FetchTransport({ fetchImpl, timeout: 5_000, signal: controller.signal });

      for (let i = 0; i < 12; i++) {
        await transport.send(POST_REQUEST);
      }

      expect(addSpy).toHaveBeenCalledTimes(12);
      expect(removeSpy).toHaveBeenCalledTimes(12);
    });

    it('leaves no listeners behind when requests fail', async () => {
      const controller = new AbortController();
      const addSpy = vi.spyOn(controller.signal, 'addEventListener');
      const removeSpy = vi.spyOn(controller.signal, 'removeEventListener');
      fetchImpl.mockRejectedValueOnce(new TypeError('fetch failed'));
      const transport = new FetchTransport({ fetchImpl, timeout: 5_000, signal: controller.signal });

      const [error] = await safeWrapAsync(() => transport.send(POST_REQUEST));

      expect(error?.message).toBe('error sending POST request in FetchTransport');
      expect(addSpy).toHaveBeenCalledTimes(1);
      expect(removeSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe('sendAsync', () => {
    it('returns the pending response', async () => {
      const response = new Response(null, { status: 202 });
      fetchImpl.mockResolvedValueOnce(response);

      const deferred = new FetchTransport({ fetchImpl, timeout: false }).sendAsync(POST_REQUEST);

      expect(deferred).toBeInstanceOf(Promise);
      await expect(deferred).resolves.toBe(response);
    });
  });

  it('falls back to the global fetch', async () => {
    const globalFetch = vi.spyOn(globalThis, 'fetch').mockResolvedValueOnce(new Response(null, { status: 200 }));

    await new FetchTransport({ timeout: false }).send(POST_REQUEST);

    expect(globalFetch).toHaveBeenCalledOnce();
  });
});
