import type { Readable } from 'node:stream';
import { Agent, request, type Dispatcher } from 'undici';
import { DEFAULT_CONNECT_TIMEOUT_MS, DEFAULT_CONNECTIONS_PER_ORIGIN } from '../constants/defaults.js';
import type { RequestBody } from '../request/request-spec.js';
import type { HeaderMap, IncomingHeaders } from '../types/http.js';
import { debugHttp } from '../utils/debug.js';

/** One outgoing round trip as handed to a {@link Transport}. */
export interface TransportRequest {
  readonly method: string;
  readonly url: string;
  readonly headers: HeaderMap;
  readonly body?: RequestBody;
  readonly signal?: AbortSignal;
}

/** Unbuffered response; whoever receives it owns `body` and must release it. */
export interface RawResponse {
  statusCode: number;
  headers: IncomingHeaders;
  body: Readable;
}

/**
 * Sends a single request and resolves once response headers arrive
 *
 * Rejects on connection, DNS, TLS or abort failures. Pooling, TLS and proxy
 * behaviour are the implementation's business.
 */
export interface Transport {
  send(request: TransportRequest): Promise<RawResponse>;
}

const HTTP_METHODS: ReadonlySet<string> = new Set([
  'GET',
  'HEAD',
  'POST',
  'PUT',
  'DELETE',
  'CONNECT',
  'OPTIONS',
  'TRACE',
  'PATCH',
]);

function isHttpMethod(method: string): method is Dispatcher.HttpMethod {
  return HTTP_METHODS.has(method);
}

function toUndiciHeaders(headers: HeaderMap): Record<string, string | string[]> {
  const result: Record<string, string | string[]> = {};
  for (const [name, values] of Object.entries(headers)) {
    result[name] = values.length === 1 && values[0] !== undefined ? values[0] : [...values];
  }
  return result;
}

/**
 * Undici-backed transport
 *
 * Uses undici's global dispatcher unless one is supplied. Redirects are never
 * followed here; the client's round trip applies its own redirect policy.
 */
export class UndiciTransport implements Transport {
  constructor(private readonly dispatcher?: Dispatcher) {}

  async send(req: TransportRequest): Promise<RawResponse> {
    if (!isHttpMethod(req.method)) {
      throw new Error(`unsupported HTTP method '${req.method}'`);
    }

    const headers = toUndiciHeaders(req.headers);
    debugHttp('%s %s init headers=%j', req.method, req.url, headers);
    const start = Date.now();

    try {
      const res = await request(req.url, {
        method: req.method,
        headers,
        body: req.body ?? null,
        signal: req.signal,
        dispatcher: this.dispatcher,
      });
      debugHttp(
        '%s %s response status=%d durationMs=%d content-encoding=%s',
        req.method,
        req.url,
        res.statusCode,
        Date.now() - start,
        res.headers['content-encoding'] ?? 'none',
      );
      return { statusCode: res.statusCode, headers: res.headers, body: res.body };
    } catch (err) {
      debugHttp('%s %s network error: %s', req.method, req.url, err instanceof Error ? err.message : String(err));
      throw err;
    }
  }

  /** Close the owned dispatcher, if any. */
  async close(): Promise<void> {
    await this.dispatcher?.close();
  }
}

/** Pooled undici transport: 100 connections per origin, one-minute connect timeout. */
export function defaultTransport(): UndiciTransport {
  return new UndiciTransport(
    new Agent({
      connections: DEFAULT_CONNECTIONS_PER_ORIGIN,
      connect: { timeout: DEFAULT_CONNECT_TIMEOUT_MS },
    }),
  );
}
