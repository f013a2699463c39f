/**
 * Tuple-based result used on every request path of the client, `[error, data]`.
 */
export type SafeWrap<ErrorType = Error, DataType = unknown> =
  | [error: ErrorType, data: null]
  | [error: null, data: DataType];

/**
 * Async variant of {@link SafeWrap}.
 */
export type SafeWrapAsync<ErrorType = Error, DataType = unknown> = Promise<SafeWrap<ErrorType, DataType>>;

/**
 * Runs a Promise factory and settles it into a tuple; a synchronous throw from the factory is captured too.
 * @example
 * const [error, response] = await safeWrapAsync(() => transport.send(request));
 */
export async function safeWrapAsync<ErrorType = Error, DataType = unknown>(
  promise: () => PromiseLike<DataType>,
): SafeWrapAsync<ErrorType, DataType> {
  try {
    const data = await promise();
    return [null, data];
  } catch (error) {
    return [error as ErrorType, null];
  }
}

/**
 * Wrap a synchronous function in a tuple-style result.
 * @example
 * const [error, body] = safeWrap(() => JSON.parse(text));
 */
export function safeWrap<ErrorType = Error, DataType = unknown>(fn: () => DataType): SafeWrap<ErrorType, DataType> {
  try {
    const data = fn();
    return [null, data];
  } catch (error) {
    return [error as ErrorType, null];
  }
}
