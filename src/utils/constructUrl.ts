import type { MailConfig, Payload } from '../core/types.js';

/** Renders one query value; nested objects fall back to their JSON text. */
function formatScalar(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }

  if (typeof value === 'object') {
    return JSON.stringify(value);
  }

  return String(value);
}

/**
 * Builds the query string (without the leading `?`) for the given params.
 *
 * - Array values are joined with `,` into a single value (`ids=a,b`).
 * - `null` and `undefined` values are skipped.
 * - Booleans are written as `true` / `false`, so `{ verbose: false }` becomes `verbose=false`, never `verbose=`.
 * - Keys and values are interpolated as is; nothing is percent-encoded, so values containing `&`, `=`
 *   or whitespace must be encoded by the caller.
 */
export function constructQuery(params: Payload = {}): string {
  const pairs: string[] = [];
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null) {
      continue;
    }

    const formatted = Array.isArray(value) ? value.map(formatScalar).join(',') : formatScalar(value);
    pairs.push(`${key}=${formatted}`);
  }

  return pairs.join('&');
}

/**
 * Builds the absolute request URL: `{protocol}://{host}{:port}/api/{version}/{path}{?query}`.
 * The port segment is left out when `port` is falsy, the query when there are no params.
 */
export function constructUrl(
  { protocol, host, port, version }: Pick<MailConfig, 'protocol' | 'host' | 'port' | 'version'>,
  path: string,
  params?: Payload,
): string {
  const query = constructQuery(params);

  return `${protocol}://${host}${port ? `:${port}` : ''}/api/${version}/${path}${query ? `?${query}` : ''}`;
}
