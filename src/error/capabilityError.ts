import { isErrorType } from './isErrorType.js';

/**
 * Error returned when asynchronous dispatch is requested but the injected transport
 * only supports synchronous sends. Produced before any request is built or sent.
 */
export class CapabilityError extends Error {
  /** CapabilityError error-name */
  name = 'CapabilityError';
}

/**
 * Type guard for {@link CapabilityError}.
 */
export function isCapabilityError(error: unknown): error is CapabilityError {
  return isErrorType(CapabilityError, error);
}
