import type { Readable } from 'node:stream';
import type { HeaderMap } from '../types/http.js';
import { headerValues, normalizeHeaders } from '../utils/headers.js';

/** Body resolved at build time: bytes can be replayed, a stream is consumed once. */
export type RequestBody = Buffer | Readable;

export interface RequestSpecInit {
  method: string;
  url: string;
  headers: HeaderMap;
  body?: RequestBody;
  signal?: AbortSignal;
}

/**
 * Immutable, fully built request descriptor
 *
 * Produced by {@link RequestBuilder.build}. Headers are a frozen copy, so
 * nothing the caller mutates after building leaks into an in-flight call.
 */
export class RequestSpec {
  readonly method: string;
  readonly url: string;
  readonly headers: HeaderMap;
  readonly body: RequestBody | undefined;
  readonly signal: AbortSignal | undefined;

  constructor(init: RequestSpecInit) {
    this.method = init.method;
    this.url = init.url;
    this.headers = normalizeHeaders(init.headers);
    this.body = init.body;
    this.signal = init.signal;
    Object.freeze(this);
  }

  header(name: string): string {
    return headerValues(this.headers, name)[0] ?? '';
  }

  headerValues(name: string): string[] {
    return headerValues(this.headers, name);
  }

  /** Bytes can always be sent again; a stream only until something has read from it. */
  canResend(): boolean {
    const body = this.body;
    if (body === undefined || Buffer.isBuffer(body)) return true;
    return !(body.readableDidRead || body.readableEnded || body.destroyed);
  }
}
