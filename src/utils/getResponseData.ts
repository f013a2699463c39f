import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Reads a response body into a tuple-style result.
 *
 * - 204 and 205 responses yield `[null, null]` without touching the body.
 * - Empty bodies yield `[null, null]`.
 * - `application/json` and `+json` content types are parsed; a parse failure yields an error with the
 *   `SyntaxError` as `cause`.
 * - Any other content type yields the raw text.
 *
 * The body is consumed; pass a clone when the response is read elsewhere too.
 */
export async function getResponseData<ReturnValue>(response: Response): SafeWrapAsync<Error, ReturnValue | null> {
  if (response.status === 204 || response.status === 205) {
    return [null, null];
  }

  // Read as text once; calling json() after text() would hit an already consumed body
  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new Error('error reading response body in getResponseData', { cause: errText }), null];
  }

  if (!text) {
    return [null, null];
  }

  const contentType = response.headers?.get('Content-Type')?.toLowerCase();
  if (!contentType?.includes('application/json') && !contentType?.includes('+json')) {
    return [null, text as ReturnValue];
  }

  const [errJson, json] = safeWrap<Error, ReturnValue>(() => JSON.parse(text));
  if (errJson) {
    return [new Error('error parsing json response body in getResponseData', { cause: errJson }), null];
  }

  return [null, json];
}
