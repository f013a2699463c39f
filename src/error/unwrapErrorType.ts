/** Constructor of any error class, used to match errors in a cause chain. */
// biome-ignore lint/suspicious/noExplicitAny: errorClass needs to handle any type of class handling, hence the any class-type
export type ErrorClass<T extends Error> = new (...args: any[]) => T;

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 *
 * An error matches when it is an instance of `errorClass`, or when its `name` equals the class name
 * (errors that crossed a realm or were re-created from plain objects lose their prototype).
 * With `shallow` set only the outermost error is inspected.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown, shallow = false): T | null {
  let current: unknown = err;
  while (current instanceof Error) {
    if (current instanceof errorClass || current.name === errorClass.name) {
      return current as T;
    }

    if (shallow) {
      return null;
    }

    current = current.cause;
  }

  return null;
}
