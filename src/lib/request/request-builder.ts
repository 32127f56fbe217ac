import { Readable } from 'node:stream';
import { RequestBuildError } from '../errors/http-client-errors.js';
import type { BasicAuthCredentials } from '../types/http.js';
import { composeUrl, isValidUrl } from '../utils/url.js';
import { RequestSpec, type RequestBody } from './request-spec.js';

export type BodyInput = string | Uint8Array | Readable;

export interface RequestCookie {
  name: string;
  value: string;
}

function toRequestBody(body: BodyInput | undefined): RequestBody | undefined {
  if (body === undefined) return undefined;
  if (body instanceof Readable) return body;
  if (typeof body === 'string') return Buffer.from(body, 'utf8');
  return Buffer.from(body);
}

function decodeQueryComponent(component: string): string {
  return decodeURIComponent(component.replace(/\+/g, ' '));
}

/**
 * Fluent builder for {@link RequestSpec}
 *
 * Setters never throw. The first error met (an invalid URL, a malformed query
 * string) is remembered and reported by {@link build}, so a chain can be
 * written without intermediate checks.
 */
export class RequestBuilder {
  private error: RequestBuildError | undefined;
  private url: URL | undefined;
  private method = '';
  private body: BodyInput | undefined;
  private signal: AbortSignal | undefined;
  private readonly headers = new Map<string, string[]>();
  private readonly queryParams = new URLSearchParams();
  private cookies: RequestCookie[] = [];
  private basicAuth: BasicAuthCredentials | undefined;

  private fail(error: RequestBuildError): this {
    this.error ??= error;
    return this;
  }

  setUrl(requestUrl: string): this {
    if (!isValidUrl(requestUrl)) {
      this.url = undefined;
      return this.fail(RequestBuildError.invalidUrl(requestUrl));
    }
    this.url = new URL(requestUrl);
    return this;
  }

  setMethod(method: string): this {
    this.method = method;
    return this;
  }

  private verb(method: string, requestUrl: string, body?: BodyInput): this {
    this.method = method;
    this.setUrl(requestUrl);
    this.body = body;
    return this;
  }

  get(requestUrl: string, body?: BodyInput): this {
    return this.verb('GET', requestUrl, body);
  }

  post(requestUrl: string, body?: BodyInput): this {
    return this.verb('POST', requestUrl, body);
  }

  put(requestUrl: string, body?: BodyInput): this {
    return this.verb('PUT', requestUrl, body);
  }

  patch(requestUrl: string, body?: BodyInput): this {
    return this.verb('PATCH', requestUrl, body);
  }

  delete(requestUrl: string, body?: BodyInput): this {
    return this.verb('DELETE', requestUrl, body);
  }

  options(requestUrl: string, body?: BodyInput): this {
    return this.verb('OPTIONS', requestUrl, body);
  }

  head(requestUrl: string): this {
    return this.verb('HEAD', requestUrl);
  }

  trace(requestUrl: string): this {
    return this.verb('TRACE', requestUrl);
  }

  connect(requestUrl: string): this {
    return this.verb('CONNECT', requestUrl);
  }

  setBody(body: BodyInput | undefined): this {
    this.body = body;
    return this;
  }

  /** Signal canceling the call (and every retry of it). */
  setSignal(signal: AbortSignal | undefined): this {
    this.signal = signal;
    return this;
  }

  /** Append a value to a header; repeated calls keep every value in order. */
  setHeader(name: string, value: string): this {
    const key = name.toLowerCase();
    this.headers.set(key, [...(this.headers.get(key) ?? []), value]);
    return this;
  }

  setHeaders(headers: Record<string, string>): this {
    for (const [name, value] of Object.entries(headers)) {
      this.setHeader(name, value);
    }
    return this;
  }

  /** Parse a raw `a=1&b=2` query string and append its parameters. */
  setQueryString(query: string): this {
    const parsed: Array<[string, string]> = [];
    for (const pair of query.replace(/^\?/, '').split('&')) {
      if (pair === '') continue;
      if (pair.includes(';')) {
        return this.fail(RequestBuildError.malformedQuery(query, 'invalid semicolon separator in query'));
      }
      const separator = pair.indexOf('=');
      const rawKey = separator === -1 ? pair : pair.slice(0, separator);
      const rawValue = separator === -1 ? '' : pair.slice(separator + 1);
      try {
        parsed.push([decodeQueryComponent(rawKey), decodeQueryComponent(rawValue)]);
      } catch (error) {
        return this.fail(RequestBuildError.malformedQuery(query, error));
      }
    }

    for (const [key, value] of parsed) {
      this.queryParams.append(key, value);
    }
    return this;
  }

  /** Set (replace) a query parameter. Blank keys are ignored. */
  setQueryParam(key: string, value: string): this {
    if (key.trim() === '') return this;
    this.queryParams.set(key, value);
    return this;
  }

  setQueryParams(params: Record<string, string>): this {
    for (const [key, value] of Object.entries(params)) {
      this.setQueryParam(key, value);
    }
    return this;
  }

  setCookies(cookies: RequestCookie[]): this {
    this.cookies = cookies.map((cookie) => ({ ...cookie }));
    return this;
  }

  setBasicAuth(user: string, password: string): this {
    this.basicAuth = { user, password };
    return this;
  }

  /**
   * Compose the immutable request.
   *
   * @throws RequestBuildError for the first error recorded by a setter, or when no URL was set
   */
  build(): RequestSpec {
    if (this.error) throw this.error;
    if (!this.url) throw RequestBuildError.missingUrl();

    const headers: Record<string, string[]> = {};
    for (const [name, values] of this.headers) {
      headers[name] = [...values];
    }

    if (this.basicAuth) {
      const token = Buffer.from(`${this.basicAuth.user}:${this.basicAuth.password}`, 'utf8').toString('base64');
      headers['authorization'] = [`Basic ${token}`];
    }

    if (this.cookies.length > 0) {
      const pairs = this.cookies.map(({ name, value }) => `${name}=${value}`);
      const existing = headers['cookie'] ?? [];
      headers['cookie'] = [[...existing, ...pairs].join('; ')];
    }

    return new RequestSpec({
      method: this.method === '' ? 'GET' : this.method.toUpperCase(),
      url: composeUrl(this.url, this.queryParams),
      headers,
      body: toRequestBody(this.body),
      signal: this.signal,
    });
  }
}

export function newRequest(): RequestBuilder {
  return new RequestBuilder();
}
