import type { HeaderMap, IncomingHeaders } from '../types/http.js';

/** Copy any header record into a frozen, lower-cased multimap. */
export function normalizeHeaders(headers: IncomingHeaders | HeaderMap): HeaderMap {
  const result: Record<string, readonly string[]> = {};
  for (const [rawName, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    const name = rawName.toLowerCase();
    const values = typeof value === 'string' ? [value] : [...value];
    const existing = result[name];
    result[name] = Object.freeze(existing ? [...existing, ...values] : values);
  }
  return Object.freeze(result);
}

export function headerValues(headers: HeaderMap, name: string): string[] {
  return [...(headers[name.toLowerCase()] ?? [])];
}

/** Split comma separated header values into bare lower-cased tokens. */
export function headerTokens(headers: HeaderMap, name: string): string[] {
  return headerValues(headers, name)
    .flatMap((value) => value.split(','))
    .map((token) => (token.split(';')[0] ?? '').trim().toLowerCase())
    .filter((token) => token.length > 0);
}

export function hasHeader(headers: HeaderMap, name: string): boolean {
  return (headers[name.toLowerCase()]?.length ?? 0) > 0;
}
