/**
 * In-process transport doubles and small helpers shared by the unit tests
 */

import { Readable } from 'node:stream';
import type { CookieJar, IncomingHeaders, RawResponse, Transport, TransportRequest } from '../src/index.js';

export const API_URL = 'https://api.example.com/items';

/** Body stream that yields `body` as a single chunk (or nothing when empty). */
export function bodyStream(body: string | Buffer = ''): Readable {
  const bytes = typeof body === 'string' ? Buffer.from(body, 'utf8') : body;
  return Readable.from(bytes.length === 0 ? [] : [bytes]);
}

export function rawResponse(statusCode: number, body: string | Buffer = '', headers: IncomingHeaders = {}): RawResponse {
  return { statusCode, headers, body: bodyStream(body) };
}

export type Responder = (request: TransportRequest, call: number) => RawResponse | Promise<RawResponse>;

/** Records every request and answers through `responder` (call numbers start at 1). */
export class FakeTransport implements Transport {
  readonly requests: TransportRequest[] = [];

  constructor(private readonly responder: Responder) {}

  async send(request: TransportRequest): Promise<RawResponse> {
    this.requests.push(request);
    return this.responder(request, this.requests.length);
  }
}

/** Fails every request with `message`. */
export function failingTransport(message = 'connection refused'): FakeTransport {
  return new FakeTransport(() => {
    throw new Error(message);
  });
}

/** Never answers; rejects with the signal's reason once the request is aborted. */
export function hangingTransport(): FakeTransport {
  return new FakeTransport(
    (request) =>
      new Promise<RawResponse>((_resolve, reject) => {
        const signal = request.signal;
        if (signal?.aborted) {
          reject(signal.reason);
          return;
        }
        signal?.addEventListener('abort', () => reject(signal.reason), { once: true });
      }),
  );
}

/** Cookie jar keeping `name=value` pairs regardless of domain or path. */
export class MemoryCookieJar implements CookieJar {
  readonly stored: Array<{ cookie: string; url: string }> = [];

  async getCookieString(_url: string): Promise<string> {
    return this.stored.map(({ cookie }) => cookie.split(';')[0] ?? '').join('; ');
  }

  async setCookie(cookie: string, url: string): Promise<void> {
    this.stored.push({ cookie, url });
  }
}
