import { DEFAULT_MAX_REDIRECTS } from '../constants/defaults.js';
import { isRedirect, REDIRECT_STATUS } from '../constants/status.js';
import { TransportError } from '../errors/http-client-errors.js';
import type { HeaderMap } from '../types/http.js';
import { debugHttp } from '../utils/debug.js';
import { headerValues, normalizeHeaders } from '../utils/headers.js';
import type { CookieJar } from './cookie-jar.js';
import type { RawResponse, Transport, TransportRequest } from './transport.js';

/** Returned by a redirect policy to stop following and hand back the redirect response itself. */
export const USE_LAST_RESPONSE: unique symbol = Symbol('retryhttp.useLastResponse');

export type RedirectDecision = void | typeof USE_LAST_RESPONSE;

/**
 * Called before every redirect with the request about to be sent and the
 * requests already made, oldest first. Throwing stops the round trip with
 * that error.
 */
export type RedirectPolicy = (
  next: TransportRequest,
  via: readonly TransportRequest[],
) => RedirectDecision | Promise<RedirectDecision>;

export const defaultRedirectPolicy: RedirectPolicy = (next, via) => {
  if (via.length >= DEFAULT_MAX_REDIRECTS) {
    throw TransportError.tooManyRedirects(next.url, via.length);
  }
};

export interface RoundTripOptions {
  cookieJar?: CookieJar;
  checkRedirect: RedirectPolicy;
}

export interface RoundTripResult {
  raw: RawResponse;
  /** URL of the request that produced `raw`. */
  url: string;
}

const SENSITIVE_HEADERS = ['authorization', 'www-authenticate', 'cookie', 'cookie2'];
const BODY_HEADERS = ['content-type', 'content-length', 'content-encoding', 'transfer-encoding'];

function withoutHeaders(headers: HeaderMap, names: string[]): HeaderMap {
  return Object.fromEntries(Object.entries(headers).filter(([name]) => !names.includes(name)));
}

/**
 * Build the follow-up request for a redirect response, or `undefined` when
 * the response must be returned as-is (no location, or a body that cannot be
 * replayed for 307/308).
 */
export function redirectRequest(current: TransportRequest, raw: RawResponse): TransportRequest | undefined {
  if (!isRedirect(raw.statusCode)) return undefined;

  const location = headerValues(normalizeHeaders(raw.headers), 'location')[0];
  if (!location) return undefined;

  const url = new URL(location, current.url);
  let headers = current.headers;
  if (url.host !== new URL(current.url).host) {
    headers = withoutHeaders(headers, SENSITIVE_HEADERS);
  }

  const keepsMethod =
    raw.statusCode === REDIRECT_STATUS.TEMPORARY_REDIRECT ||
    raw.statusCode === REDIRECT_STATUS.PERMANENT_REDIRECT;

  if (keepsMethod) {
    if (current.body !== undefined && !Buffer.isBuffer(current.body)) return undefined;
    return { ...current, url: url.toString(), headers };
  }

  return {
    method: current.method === 'HEAD' ? 'HEAD' : 'GET',
    url: url.toString(),
    headers: withoutHeaders(headers, BODY_HEADERS),
    signal: current.signal,
  };
}

async function attachCookies(request: TransportRequest, jar: CookieJar | undefined): Promise<TransportRequest> {
  if (!jar) return request;
  const cookies = await jar.getCookieString(request.url);
  if (cookies === '') return request;

  const existing = headerValues(request.headers, 'cookie');
  return { ...request, headers: { ...request.headers, cookie: [[...existing, cookies].join('; ')] } };
}

async function storeCookies(raw: RawResponse, url: string, jar: CookieJar | undefined): Promise<void> {
  if (!jar) return;
  for (const cookie of headerValues(normalizeHeaders(raw.headers), 'set-cookie')) {
    await jar.setCookie(cookie, url);
  }
}

function discard(raw: RawResponse): void {
  if (!raw.body.destroyed) raw.body.destroy();
}

/**
 * Send a request through the transport, applying the cookie jar and
 * following redirects under the configured policy.
 *
 * Intermediate redirect bodies are discarded; the caller owns the body of
 * the returned response.
 */
export async function roundTrip(
  transport: Transport,
  request: TransportRequest,
  options: RoundTripOptions,
): Promise<RoundTripResult> {
  const via: TransportRequest[] = [];
  let current = request;

  for (;;) {
    const raw = await transport.send(await attachCookies(current, options.cookieJar));

    let next: TransportRequest | undefined;
    try {
      await storeCookies(raw, current.url, options.cookieJar);
      next = redirectRequest(current, raw);
      if (next) {
        via.push(current);
        const decision = await options.checkRedirect(next, via);
        if (decision === USE_LAST_RESPONSE) next = undefined;
      }
    } catch (error) {
      discard(raw);
      throw error;
    }

    if (!next) return { raw, url: current.url };

    debugHttp('%s %s redirected (%d) to %s %s', current.method, current.url, raw.statusCode, next.method, next.url);
    discard(raw);
    current = next;
  }
}
