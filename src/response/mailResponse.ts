import { getResponseData } from '../utils/getResponseData.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/**
 * Uniform wrapper around a transport response.
 *
 * The wrapped response is never consumed directly; `body()` and `raw` work on clones,
 * so both can be used any number of times.
 *
 * @typeParam T - Expected shape of the parsed body.
 */
export class MailResponse<T = unknown> {
  /** Response as returned by the transport */
  #response: Response;

  /** Wraps a transport response */
  constructor(response: Response) {
    this.#response = response;
  }

  /** HTTP status code */
  get status(): number {
    return this.#response.status;
  }

  /** HTTP reason phrase */
  get statusText(): string {
    return this.#response.statusText;
  }

  /** Whether the status is in the 2xx range */
  get ok(): boolean {
    return this.#response.ok;
  }

  /** Response headers */
  get headers(): Headers {
    return this.#response.headers;
  }

  /** Fresh clone of the underlying response */
  get raw(): Response {
    return this.#response.clone();
  }

  /**
   * Parses the body: JSON for JSON content types, text otherwise, `null` for empty bodies.
   * @returns A promise resolving to `[error, body]`.
   */
  body(): SafeWrapAsync<Error, T | null> {
    return getResponseData<T>(this.#response.clone());
  }
}
