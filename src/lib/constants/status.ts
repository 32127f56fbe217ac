/**
 * HTTP status code helpers
 *
 * Used by redirect handling and by the status-based retry predicates.
 */

/** Statuses the round trip follows when a `location` header is present. */
export const REDIRECT_STATUS = {
  MOVED_PERMANENTLY: 301,
  FOUND: 302,
  SEE_OTHER: 303,
  TEMPORARY_REDIRECT: 307,
  PERMANENT_REDIRECT: 308,
} as const;

export type RedirectStatus = (typeof REDIRECT_STATUS)[keyof typeof REDIRECT_STATUS];

const REDIRECT_STATUSES: ReadonlySet<number> = new Set(Object.values(REDIRECT_STATUS));

export function isRedirect(code: number): code is RedirectStatus {
  return REDIRECT_STATUSES.has(code);
}

export function is2xx(code: number): boolean {
  return code >= 200 && code < 300;
}

export function is4xx(code: number): boolean {
  return code >= 400 && code < 500;
}

export function is5xx(code: number): boolean {
  return code >= 500 && code < 600;
}
