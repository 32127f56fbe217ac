import type { HeaderMap } from '../types/http.js';
import { hasHeader } from '../utils/headers.js';
import { defaultTransport, type RawResponse, type Transport, type TransportRequest } from './transport.js';

function withAuthorization(headers: HeaderMap, value: string): HeaderMap {
  return { ...headers, authorization: [value] };
}

/** Adds basic credentials to requests that carry no `authorization` header. */
export class BasicAuthTransport implements Transport {
  private readonly header: string;

  constructor(
    user: string,
    password: string,
    private readonly inner: Transport = defaultTransport(),
  ) {
    this.header = `Basic ${Buffer.from(`${user}:${password}`, 'utf8').toString('base64')}`;
  }

  send(request: TransportRequest): Promise<RawResponse> {
    if (hasHeader(request.headers, 'authorization')) {
      return this.inner.send(request);
    }
    return this.inner.send({ ...request, headers: withAuthorization(request.headers, this.header) });
  }
}

/** Sets a bearer token on every request, replacing any `authorization` header. */
export class BearerAuthTransport implements Transport {
  constructor(
    private readonly token: string,
    private readonly inner: Transport = defaultTransport(),
  ) {}

  send(request: TransportRequest): Promise<RawResponse> {
    return this.inner.send({ ...request, headers: withAuthorization(request.headers, `Bearer ${this.token}`) });
  }
}

export function basicAuthTransport(user: string, password: string, inner?: Transport): Transport {
  return new BasicAuthTransport(user, password, inner);
}

export function bearerAuthTransport(token: string, inner?: Transport): Transport {
  return new BearerAuthTransport(token, inner);
}
