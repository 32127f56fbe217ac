import { RetriesExhaustedError, TransportError } from '../errors/http-client-errors.js';
import { newRequest, type BodyInput } from '../request/request-builder.js';
import type { RequestSpec } from '../request/request-spec.js';
import type { HttpResponse } from '../response/response.js';
import { materialize, type AttemptResult } from '../transport/materialize.js';
import { debugClient } from '../utils/debug.js';
import { logWarn } from '../../logger.js';
import { CallScope } from './call-scope.js';
import { LinearBackoff } from './retry.js';
import { buildSettings, type ClientSettings, type Option } from './settings.js';

/** Per-call extras for the verb helpers. */
export interface CallInit {
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

/**
 * Retrying HTTP client
 *
 * Each call runs sequentially: one rate limiter slot, the pre-request hook,
 * then up to `retryCount` attempts separated by a linearly growing delay.
 * Any number of calls may share one client; they only meet in the rate
 * limiter, the transport and the cookie jar.
 *
 * @example
 * ```typescript
 * const client = createClient(
 *   withRetryCount(3),
 *   withRetryDelay(500),
 *   withRetryCondition(retryOnStatus(502, 503)),
 * );
 * const response = await client.get('https://api.example.com/items');
 * console.log(response.statusCode(), response.json());
 * ```
 */
export class HttpClient {
  private readonly standing: Readonly<ClientSettings>;

  constructor(...options: Option[]) {
    this.standing = buildSettings(options);
  }

  get settings(): Readonly<ClientSettings> {
    return this.standing;
  }

  /**
   * Execute a request.
   *
   * Call-scoped options replace the client's settings for this call: they are
   * applied over fresh defaults, not merged with the client's options.
   *
   * Resolves with the final response whenever the last attempt produced one
   * without error, whatever its status. Rejects with the pre-request hook's
   * own error on veto, a {@link CancellationError} when the request signal or
   * deadline fires, the attempt's error when the retry condition stops on a
   * failure or only one attempt was allowed, and a
   * {@link RetriesExhaustedError} otherwise. A stream body is never resent:
   * once an attempt has read it, a retry ends the call with that attempt's
   * response, or with a {@link TransportError} wrapping its failure.
   */
  async do(request: RequestSpec, ...overrides: Option[]): Promise<HttpResponse> {
    const settings = overrides.length > 0 ? buildSettings(overrides) : this.standing;
    const scope = new CallScope(request.signal, settings.timeoutMs);

    try {
      try {
        await settings.rateLimiter.take(scope.signal);
      } catch (error) {
        if (scope.aborted) throw scope.toError();
        throw error;
      }

      await settings.preRequestHook(request);

      return await this.execute(request, settings, scope);
    } finally {
      scope.close();
    }
  }

  private async execute(
    request: RequestSpec,
    settings: Readonly<ClientSettings>,
    scope: CallScope,
  ): Promise<HttpResponse> {
    const maxAttempts = Math.max(1, settings.retryCount);
    const backoff = new LinearBackoff(settings.retryDelayMs, settings.retryDelayDeltaMs);

    let result: AttemptResult;
    for (let attempt = 1; ; attempt++) {
      result = await materialize(settings.transport, request, settings, scope.signal);
      debugClient(
        '%s %s attempt %d/%d status=%d error=%s',
        request.method,
        request.url,
        attempt,
        maxAttempts,
        result.response.statusCode(),
        result.error?.message ?? 'none',
      );

      await this.observe(settings, request, result);

      if (!settings.retryCondition(result.response, result.error)) {
        return this.settle(result, scope);
      }
      if (attempt >= maxAttempts) break;
      if (!request.canResend()) {
        debugClient('%s %s: stream body already consumed, not retrying', request.method, request.url);
        if (!result.error) return result.response;
        if (scope.aborted) throw scope.toError();
        throw TransportError.bodyConsumed(request.method, request.url, attempt, result.error);
      }

      debugClient('%s %s retrying in %dms', request.method, request.url, backoff.delayMs);
      await backoff.wait(scope.signal);
    }

    if (!result.error) return result.response;
    if (scope.aborted) throw scope.toError();
    if (maxAttempts === 1) throw result.error;

    debugClient('%s %s: all %d attempts failed', request.method, request.url, maxAttempts);
    throw new RetriesExhaustedError(maxAttempts, result.error, result.response);
  }

  private settle(result: AttemptResult, scope: CallScope): HttpResponse {
    if (!result.error) return result.response;
    if (scope.aborted) throw scope.toError();
    throw result.error;
  }

  private async observe(settings: Readonly<ClientSettings>, request: RequestSpec, result: AttemptResult): Promise<void> {
    try {
      await settings.postRequestHook(request, result.response, result.error);
    } catch (error) {
      logWarn(
        `post-request hook failed for ${request.method} ${request.url}: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
    }
  }

  private send(method: string, url: string, body: BodyInput | undefined, init: CallInit): Promise<HttpResponse> {
    const request = newRequest()
      .setMethod(method)
      .setUrl(url)
      .setBody(body)
      .setSignal(init.signal)
      .setHeaders(init.headers ?? {})
      .build();
    return this.do(request);
  }

  async get(url: string, init: CallInit = {}): Promise<HttpResponse> {
    return this.send('GET', url, undefined, init);
  }

  async head(url: string, init: CallInit = {}): Promise<HttpResponse> {
    return this.send('HEAD', url, undefined, init);
  }

  async delete(url: string, init: CallInit = {}): Promise<HttpResponse> {
    return this.send('DELETE', url, undefined, init);
  }

  async options(url: string, init: CallInit = {}): Promise<HttpResponse> {
    return this.send('OPTIONS', url, undefined, init);
  }

  async post(url: string, body?: BodyInput, init: CallInit = {}): Promise<HttpResponse> {
    return this.send('POST', url, body, init);
  }

  async put(url: string, body?: BodyInput, init: CallInit = {}): Promise<HttpResponse> {
    return this.send('PUT', url, body, init);
  }

  async patch(url: string, body?: BodyInput, init: CallInit = {}): Promise<HttpResponse> {
    return this.send('PATCH', url, body, init);
  }

  /** Store cookies for `url` in the configured jar; without a jar this does nothing. */
  async setCookies(url: string, cookies: string[]): Promise<void> {
    const jar = this.standing.cookieJar;
    if (!jar) return;
    for (const cookie of cookies) {
      await jar.setCookie(cookie, url);
    }
  }
}

export function createClient(...options: Option[]): HttpClient {
  return new HttpClient(...options);
}

/** Shared client with default settings. */
export const defaultClient = new HttpClient();
