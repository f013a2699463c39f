import type { HeaderOptions } from '../core/types.js';

/**
 * Filters out unsupported values and turns remaining into strings.
 */
function sanitize(value: unknown): string | null {
  const type = typeof value;
  return value == null || type === 'object' || type === 'function' || type === 'symbol' ? null : String(value);
}

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<[string, unknown]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (Array.isArray(headers)) {
    return headers;
  }

  return Object.entries(headers);
}

/**
 * Merges caller headers with headers the client always sets, into a plain record.
 *
 * - Caller header names keep their casing; for repeated names the last value wins.
 * - `null`/`undefined` and non-scalar caller values are dropped.
 * - Every `overrides` entry replaces any caller header of the same name, compared case-insensitively.
 */
export function mergeHeaders(headers: HeaderOptions | undefined, overrides: Record<string, string>): Record<string, string> {
  const merged: Record<string, string> = {};
  const reserved = new Set(Object.keys(overrides).map((name) => name.toLowerCase()));

  for (const [key, value] of toEntries(headers)) {
    const clean = sanitize(value);
    if (clean === null || reserved.has(key.toLowerCase())) {
      continue;
    }

    merged[key] = clean;
  }

  return { ...merged, ...overrides };
}
