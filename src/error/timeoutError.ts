import { isErrorType } from './isErrorType.js';

/**
 * Error raised by {@link FetchTransport} when a request exceeds its configured timeout.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  name = 'TimeoutError';
  /** Internal timeout that was exceeded, in milliseconds */
  #timeout: number;

  /** Creates a new instance of a TimeoutError with the exceeded timeout */
  constructor(timeout: number, opts?: ErrorOptions) {
    super(`error request timed out after ${timeout}ms`, opts);
    this.#timeout = timeout;
  }

  /** Timeout that was exceeded, in milliseconds */
  get timeout(): number {
    return this.#timeout;
  }
}

/**
 * Type guard for {@link TimeoutError}.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}
