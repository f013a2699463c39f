import { isErrorType } from './isErrorType.js';

/**
 * Error thrown while merging client options, when no usable API key is present
 * or a recognized option holds a value of the wrong type.
 */
export class ConfigurationError extends Error {
  /** ConfigurationError error-name */
  name = 'ConfigurationError';
}

/**
 * Type guard for {@link ConfigurationError}.
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return isErrorType(ConfigurationError, error);
}
