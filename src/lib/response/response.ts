import { Readable } from 'node:stream';
import type { HeaderMap } from '../types/http.js';
import { headerValues, normalizeHeaders } from '../utils/headers.js';

export interface HttpResponseInit {
  statusCode: number;
  headers?: HeaderMap;
  body?: Uint8Array;
  /** URL of the request that produced the response (after redirects). */
  url?: string;
}

const EMPTY_HEADERS: HeaderMap = Object.freeze({});

/**
 * Fully buffered HTTP response
 *
 * A response is immutable once materialized: the body is copied in and every
 * accessor hands out copies. A zero-valued instance (`new HttpResponse()` or
 * {@link HttpResponse.empty}) stands in for an absent response, and every
 * accessor on it returns the zero value of its type.
 */
export class HttpResponse {
  private readonly status: number;
  private readonly headerMap: HeaderMap;
  private readonly body: Buffer;
  private readonly url: string;

  constructor(init?: HttpResponseInit) {
    this.status = init?.statusCode ?? 0;
    this.headerMap = init?.headers ? normalizeHeaders(init.headers) : EMPTY_HEADERS;
    this.body = init?.body ? Buffer.from(init.body) : Buffer.alloc(0);
    this.url = init?.url ?? '';
  }

  static empty(): HttpResponse {
    return new HttpResponse();
  }

  /** True when no response was received. */
  isEmpty(): boolean {
    return this.status === 0;
  }

  bytes(): Buffer {
    return Buffer.from(this.body);
  }

  text(): string {
    return this.body.toString('utf8');
  }

  /** Parsed JSON body, or `undefined` when there is no body. */
  json<T = unknown>(): T | undefined {
    if (this.body.length === 0) return undefined;
    return JSON.parse(this.text());
  }

  reader(): Readable {
    return Readable.from(this.body.length === 0 ? [] : [this.bytes()]);
  }

  statusCode(): number {
    return this.status;
  }

  /** First value of every header. */
  headers(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, values] of Object.entries(this.headerMap)) {
      const first = values[0];
      if (first !== undefined) result[name] = first;
    }
    return result;
  }

  headerValues(name: string): string[] {
    return headerValues(this.headerMap, name);
  }

  header(name: string): string {
    return this.headerValues(name)[0] ?? '';
  }

  /** Raw `set-cookie` values. */
  cookies(): string[] {
    return this.headerValues('set-cookie');
  }

  requestUrl(): string {
    return this.url;
  }
}
