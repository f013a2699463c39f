import type { OutgoingRequest } from '../core/types.js';
import { HTTPError } from '../error/httpError.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import type { AsyncCapableTransport } from './types.js';

/** Options to configure the {@link FetchTransport}. */
export interface FetchTransportOptions {
  /** `fetch` implementation; defaults to the global one. */
  fetchImpl?: typeof fetch;
  /**
   * Request timeout in milliseconds, `false` disables it.
   * @default 60000
   */
  timeout?: number | false;
  /** Signal that aborts every request sent through this transport. */
  signal?: AbortSignal;
}

/** Methods `fetch` refuses to send a body with. */
const BODYLESS_METHODS = new Set(['GET', 'HEAD']);

/**
 * Transport over the WHATWG `fetch` API.
 *
 * `fetch` never blocks, so `send` and `sendAsync` share one code path and only differ in how they are
 * used by the client. Errors:
 * - Network / fetch errors (timeouts and aborts included) are wrapped in `Error` with the failure as `cause`.
 * - Non-2xx responses are wrapped in `HTTPError`.
 */
export class FetchTransport implements AsyncCapableTransport {
  readonly async = true;
  /** Fetch implementation requests are sent through. */
  #fetch: typeof fetch;
  /** Per-request timeout. */
  #timeout: number | false;
  /** Transport-wide abort signal. */
  #signal?: AbortSignal;

  /** Creates a new fetch transport */
  constructor({ fetchImpl, timeout = 60_000, signal }: FetchTransportOptions = {}) {
    this.#fetch = fetchImpl ?? globalThis.fetch.bind(globalThis);
    this.#timeout = timeout;
    this.#signal = signal;
  }

  /**
   * Sends the request and resolves once the response arrived.
   * @throws the wrapped fetch failure or an {@link HTTPError}
   */
  async send(request: OutgoingRequest): Promise<Response> {
    const [err, response] = await this.#request(request);
    if (err) {
      throw err;
    }

    return response;
  }

  /**
   * Starts the request and returns the pending response.
   */
  sendAsync(request: OutgoingRequest): Promise<Response> {
    return this.send(request);
  }

  /**
   * Core request implementation.
   *
   * GET and HEAD requests are sent without their body; every other method sends the JSON body as is.
   */
  async #request({ method, url, headers, body }: OutgoingRequest): SafeWrapAsync<Error, Response> {
    const timeout = createTimeoutSignal(this.#timeout);
    const merged = mergeSignals([this.#signal, timeout?.signal]);

    const [err, res] = await safeWrapAsync(() =>
      this.#fetch(url, {
        method,
        headers,
        body: BODYLESS_METHODS.has(method) ? undefined : body,
        ...(merged && { signal: merged.signal }),
      }),
    );
    timeout?.clear();
    merged?.clear();

    if (err) {
      return [new Error(`error sending ${method} request in FetchTransport`, { cause: err }), null];
    }

    if (!res.ok) {
      return [new HTTPError(res, `error in ${method} request in FetchTransport`), null];
    }

    return [null, res];
  }
}
