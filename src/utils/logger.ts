/**
 * Structured logger accepted by the client. Every level is optional, so console,
 * pino or winston instances can be passed as is.
 */
export interface Logger {
  debug?(message: string, metadata?: Record<string, unknown>): void;
  warn?(message: string, metadata?: Record<string, unknown>): void;
  error?(message: string, metadata?: Record<string, unknown>): void;
}

/** Logger used when none is injected. */
export const noopLogger: Logger = {
  debug: () => {},
  warn: () => {},
  error: () => {},
};
