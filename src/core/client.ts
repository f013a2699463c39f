import { CapabilityError } from '../error/capabilityError.js';
import { RequestError } from '../error/requestError.js';
import { Transmissions } from '../resources/transmissions.js';
import { MailPromise } from '../response/mailPromise.js';
import { MailResponse } from '../response/mailResponse.js';
import { isAsyncCapable, type Transport } from '../transport/types.js';
import { constructUrl } from '../utils/constructUrl.js';
import { type Logger, noopLogger } from '../utils/logger.js';
import { mergeHeaders } from '../utils/mergeHeaders.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import { mergeOptions } from './options.js';
import type { ClientInput, HeaderOptions, MailConfig, OutgoingRequest, Payload } from './types.js';

/** Library version, sent in the `User-Agent` header. */
export const LIBRARY_VERSION = '1.0.0';

/** `User-Agent` header value. */
export const USER_AGENT = `postwire/${LIBRARY_VERSION}`;

/**
 * Client for the email API that:
 * - merges configuration from defaults and caller overrides,
 * - builds authenticated JSON requests (query params for GET, body otherwise),
 * - dispatches them through an injected transport, blocking or deferred depending on the `async` option.
 *
 * Request methods return error-first tuples via {@link SafeWrapAsync} or {@link SafeWrap}; only
 * configuration errors are thrown.
 *
 * @example
 * const client = new MailClient(new FetchTransport(), { key: process.env.MAIL_API_KEY ?? '', async: false });
 * const [err, response] = await client.request('GET', 'transmissions', { campaign_id: 'spring' });
 */
export class MailClient {
  /** Transport requests are sent through. */
  #transport: Transport;
  /** Live configuration; replaced on every setOptions. */
  #options: MailConfig;
  /** Logger receiving dispatch events. */
  #logger: Logger;

  /** `transmissions` endpoint helpers. */
  readonly transmissions: Transmissions;

  /**
   * Creates a client bound to a transport.
   *
   * @param transport - Transport used to send requests; must be async capable unless `async` is disabled.
   * @param options - API key, or a map of option overrides including the key.
   * @param logger - Optional structured logger.
   * @throws {ConfigurationError} when no usable API key is provided.
   */
  constructor(transport: Transport, options: ClientInput, logger: Logger = noopLogger) {
    this.#options = mergeOptions(null, options);
    this.#transport = transport;
    this.#logger = logger;
    this.transmissions = new Transmissions(this);
  }

  /** Snapshot of the current configuration. */
  get options(): Readonly<MailConfig> {
    return Object.freeze({ ...this.#options });
  }

  /**
   * Merges option overrides into the current configuration. Earlier customizations are kept;
   * do not call while requests are in flight.
   *
   * @throws {ConfigurationError} when a recognized option has the wrong type or the key is blanked.
   */
  setOptions(options: ClientInput): void {
    this.#options = mergeOptions(this.#options, options);
  }

  /** Replaces the transport used for subsequent requests. */
  setTransport(transport: Transport): void {
    this.#transport = transport;
  }

  /**
   * Sends a request, blocking or deferred depending on the `async` option at call time.
   *
   * - Async: fails with {@link CapabilityError} when the transport cannot send asynchronously; otherwise
   *   awaits the deferred, whose rejection reason is returned unchanged.
   * - Sync: transport failures are returned wrapped in a {@link RequestError}.
   *
   * @param method - HTTP method, any casing.
   * @param uri - Path below `/api/{version}/`.
   * @param payload - Query parameters for GET, JSON body otherwise.
   * @param headers - Extra headers; `Authorization`, `Content-Type` and `User-Agent` are always overwritten.
   * @returns A promise resolving to `[error, response]`.
   */
  async request<T = unknown>(
    method = 'GET',
    uri = '',
    payload: Payload = {},
    headers: HeaderOptions = {},
  ): SafeWrapAsync<Error, MailResponse<T>> {
    if (this.#options.async !== true) {
      return this.syncRequest<T>(method, uri, payload, headers);
    }

    const [errAsync, deferred] = this.asyncRequest<T>(method, uri, payload, headers);
    if (errAsync) {
      return [errAsync, null];
    }

    return deferred.wait();
  }

  /**
   * Sends a request and waits for the transport to settle.
   *
   * @returns A promise resolving to `[RequestError, null]` with the transport failure as `cause`,
   * or `[null, response]`.
   */
  async syncRequest<T = unknown>(
    method = 'GET',
    uri = '',
    payload: Payload = {},
    headers: HeaderOptions = {},
  ): SafeWrapAsync<RequestError, MailResponse<T>> {
    const request = this.buildRequest(method, uri, payload, headers);
    this.#logger.debug?.('sending request', { method: request.method, url: request.url, async: false });

    const [err, response] = await safeWrapAsync(() => this.#transport.send(request));
    if (err) {
      this.#logger.error?.('request failed', { method: request.method, url: request.url, error: err });
      return [new RequestError(`error sending ${request.method} request to ${uri}`, request, { cause: err }), null];
    }

    return [null, new MailResponse<T>(response)];
  }

  /**
   * Starts a request through the transport's non-blocking send and returns at once.
   *
   * @returns `[CapabilityError, null]` when the transport only sends synchronously (nothing is built or
   * sent in that case), or `[null, deferred]`.
   */
  asyncRequest<T = unknown>(
    method = 'GET',
    uri = '',
    payload: Payload = {},
    headers: HeaderOptions = {},
  ): SafeWrap<CapabilityError, MailPromise<T>> {
    const transport = this.#transport;
    if (!isAsyncCapable(transport)) {
      this.#logger.warn?.('transport cannot send asynchronously', { method, uri });
      return [
        new CapabilityError(
          'Your transport does not support asynchronous requests. Please use a different transport or use synchronous requests.',
        ),
        null,
      ];
    }

    const request = this.buildRequest(method, uri, payload, headers);
    this.#logger.debug?.('sending request', { method: request.method, url: request.url, async: true });

    const [errSend, deferred] = safeWrap(() => transport.sendAsync(request));
    if (errSend) {
      return [null, new MailPromise<T>(Promise.reject(errSend))];
    }

    return [null, new MailPromise<T>(deferred)];
  }

  /**
   * Builds a transport-ready request.
   *
   * GET requests carry the payload as query parameters and an empty JSON object as body; every
   * other method carries the payload as JSON body and no query.
   */
  buildRequest(method: string, uri: string, payload: Payload = {}, headers?: HeaderOptions): OutgoingRequest {
    const normalized = method.trim().toUpperCase();
    const isGet = normalized === 'GET';

    return {
      method: normalized,
      url: this.getUrl(uri, isGet ? payload : {}),
      headers: this.getHttpHeaders(headers),
      body: JSON.stringify(isGet ? {} : payload),
    };
  }

  /**
   * Merges caller headers with the headers every request carries.
   */
  getHttpHeaders(headers?: HeaderOptions): Record<string, string> {
    return mergeHeaders(headers, {
      Authorization: this.#options.key,
      'Content-Type': 'application/json',
      'User-Agent': USER_AGENT,
    });
  }

  /**
   * Builds the absolute URL for a path and optional query params.
   */
  getUrl(path: string, params?: Payload): string {
    return constructUrl(this.#options, path, params);
  }
}
