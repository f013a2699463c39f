/**
 * Error entrypoint: exports the client's error classes and helpers for identifying and unwrapping them.
 * Use this when you only need error utilities without the client.
 * @module
 */

/** Error thrown when a request is aborted via AbortController. */
export { AbortError, isAbortError } from './abortError.js';

/** Error returned when async dispatch is requested against a sync-only transport. */
export { CapabilityError, isCapabilityError } from './capabilityError.js';

/** Error thrown when the client options hold no usable API key or a mistyped value. */
export { ConfigurationError, isConfigurationError } from './configurationError.js';

/** Error representing a non-2xx HTTP response. */
export { getHttpError, HTTPError, isHttpError } from './httpError.js';

/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';

/** Error wrapping a transport failure on the synchronous request path. */
export { getRequestError, isRequestError, RequestError } from './requestError.js';

/** Error thrown when a request exceeds the configured timeout. */
export { isTimeoutError, TimeoutError } from './timeoutError.js';

/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';

/** Error thrown when validation of payloads fails. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
