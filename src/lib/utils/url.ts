/**
 * Accepts absolute URLs whose host looks like a real network name: non-blank,
 * at least two dot-separated labels and no nested scheme.
 */
export function isValidUrl(rawUrl: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(rawUrl);
  } catch {
    return false;
  }

  const host = parsed.hostname.trim();
  if (host === '') return false;
  if (host.split('.').length < 2) return false;
  if (/https?:/i.test(host)) return false;

  return true;
}

/** Append encoded query parameters to a URL that may already carry a query. */
export function composeUrl(base: URL, params: URLSearchParams): string {
  const url = new URL(base.toString());
  const encoded = params.toString();
  if (encoded === '') return url.toString();

  url.search = url.search === '' ? encoded : `${url.search.slice(1)}&${encoded}`;
  return url.toString();
}
