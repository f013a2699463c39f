import type { OutgoingRequest } from '../core/types.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error wrapping a transport failure on the synchronous request path.
 * The original failure is kept as `cause`.
 */
export class RequestError extends Error {
  /** RequestError error-name */
  name = 'RequestError';
  /** Request that was being sent when the transport failed */
  #request: OutgoingRequest;

  /** Creates a new instance of a RequestError for the failed request */
  constructor(message: string, request: OutgoingRequest, opts?: ErrorOptions) {
    super(message, opts);
    this.#request = request;
  }

  /** Request that was being sent when the transport failed */
  get request(): OutgoingRequest {
    return this.#request;
  }
}

/**
 * Type guard for {@link RequestError}.
 */
export function isRequestError(error: unknown): error is RequestError {
  return isErrorType(RequestError, error);
}

/**
 * Extract a {@link RequestError} from an unknown error value, following nested causes.
 */
export function getRequestError(error: unknown): null | RequestError {
  return unwrapErrorType(RequestError, error);
}
