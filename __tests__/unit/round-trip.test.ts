import { describe, it, expect } from '@jest/globals';
import { Readable } from 'node:stream';
import {
  TransportError,
  USE_LAST_RESPONSE,
  createClient,
  defaultRedirectPolicy,
  roundTrip,
  withCheckRedirect,
  withCookieJar,
  withTransport,
  type TransportRequest,
} from '../../src/index.js';
import { FakeTransport, MemoryCookieJar, rawResponse } from '../test-utils.js';

function post(body: Buffer | Readable, headers: Record<string, string[]> = {}): TransportRequest {
  return {
    method: 'POST',
    url: 'https://api.example.com/orders',
    headers: { 'content-type': ['application/json'], ...headers },
    body,
  };
}

describe('roundTrip', () => {
  it('follows a 302 after a POST as a bodiless GET', async () => {
    const transport = new FakeTransport((_req, call) =>
      call === 1 ? rawResponse(302, '', { location: '/orders/7' }) : rawResponse(200, 'order 7'),
    );

    const { raw, url } = await roundTrip(transport, post(Buffer.from('{}')), {
      checkRedirect: defaultRedirectPolicy,
    });

    expect(raw.statusCode).toBe(200);
    expect(url).toBe('https://api.example.com/orders/7');
    const follow = transport.requests[1];
    expect(follow?.method).toBe('GET');
    expect(follow?.body).toBeUndefined();
    expect(follow?.headers['content-type']).toBeUndefined();
  });

  it('replays method and body on a 307 when the body is bytes', async () => {
    const body = Buffer.from('{"sku":"A1"}');
    const transport = new FakeTransport((_req, call) =>
      call === 1 ? rawResponse(307, '', { location: 'https://api.example.com/v2/orders' }) : rawResponse(201),
    );

    await roundTrip(transport, post(body), { checkRedirect: defaultRedirectPolicy });

    const follow = transport.requests[1];
    expect(follow?.method).toBe('POST');
    expect(follow?.body).toBe(body);
    expect(follow?.url).toBe('https://api.example.com/v2/orders');
  });

  it('returns a 308 unfollowed when the body is a stream', async () => {
    const transport = new FakeTransport(() => rawResponse(308, '', { location: '/elsewhere' }));

    const { raw } = await roundTrip(transport, post(Readable.from([Buffer.from('{}')])), {
      checkRedirect: defaultRedirectPolicy,
    });

    expect(raw.statusCode).toBe(308);
    expect(transport.requests).toHaveLength(1);
  });

  it('drops credentials when redirected to another host', async () => {
    const transport = new FakeTransport((_req, call) =>
      call === 1 ? rawResponse(301, '', { location: 'https://cdn.example.net/file' }) : rawResponse(200),
    );
    const request: TransportRequest = {
      method: 'GET',
      url: 'https://api.example.com/file',
      headers: { authorization: ['Bearer test-token'], accept: ['*/*'] },
    };

    await roundTrip(transport, request, { checkRedirect: defaultRedirectPolicy });

    expect(transport.requests[1]?.headers['authorization']).toBeUndefined();
    expect(transport.requests[1]?.headers['accept']).toEqual(['*/*']);
  });

  it('keeps credentials on same-host redirects', async () => {
    const transport = new FakeTransport((_req, call) =>
      call === 1 ? rawResponse(302, '', { location: '/next' }) : rawResponse(200),
    );
    const request: TransportRequest = {
      method: 'GET',
      url: 'https://api.example.com/start',
      headers: { authorization: ['Bearer test-token'] },
    };

    await roundTrip(transport, request, { checkRedirect: defaultRedirectPolicy });

    expect(transport.requests[1]?.headers['authorization']).toEqual(['Bearer test-token']);
  });

  it('stops after ten redirects', async () => {
    const transport = new FakeTransport(() => rawResponse(302, '', { location: '/loop' }));
    const request: TransportRequest = { method: 'GET', url: 'https://api.example.com/loop', headers: {} };

    const error = await roundTrip(transport, request, { checkRedirect: defaultRedirectPolicy }).catch(
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toHaveProperty('message', 'stopped after 10 redirects');
    expect(transport.requests).toHaveLength(10);
  });

  it('hands back the redirect response when the policy asks for it', async () => {
    const transport = new FakeTransport(() => rawResponse(301, 'moved', { location: '/new-home' }));
    const request: TransportRequest = { method: 'GET', url: 'https://api.example.com/old-home', headers: {} };

    const { raw, url } = await roundTrip(transport, request, { checkRedirect: () => USE_LAST_RESPONSE });

    expect(raw.statusCode).toBe(301);
    expect(url).toBe('https://api.example.com/old-home');
    expect(transport.requests).toHaveLength(1);
  });

  it('stores cookies from every hop and sends them on the next one', async () => {
    const jar = new MemoryCookieJar();
    const transport = new FakeTransport((_req, call) =>
      call === 1
        ? rawResponse(302, '', { location: '/home', 'set-cookie': ['session=test-session; Path=/; HttpOnly'] })
        : rawResponse(200),
    );
    const request: TransportRequest = { method: 'GET', url: 'https://api.example.com/login', headers: {} };

    await roundTrip(transport, request, { cookieJar: jar, checkRedirect: defaultRedirectPolicy });

    expect(jar.stored).toEqual([
      { cookie: 'session=test-session; Path=/; HttpOnly', url: 'https://api.example.com/login' },
    ]);
    expect(transport.requests[0]?.headers['cookie']).toBeUndefined();
    expect(transport.requests[1]?.headers['cookie']).toEqual(['session=test-session']);
  });
});

describe('redirects through the client', () => {
  it('reports the final URL on the response', async () => {
    const transport = new FakeTransport((_req, call) =>
      call === 1 ? rawResponse(303, '', { location: '/result' }) : rawResponse(200, 'done'),
    );
    const client = createClient(withTransport(transport));

    const response = await client.post('https://api.example.com/jobs', 'run');

    expect(response.text()).toBe('done');
    expect(response.requestUrl()).toBe('https://api.example.com/result');
    expect(transport.requests[1]?.method).toBe('GET');
  });

  it('fails the attempt when the redirect policy throws', async () => {
    const transport = new FakeTransport(() => rawResponse(302, '', { location: '/next' }));
    const client = createClient(
      withTransport(transport),
      withCookieJar(new MemoryCookieJar()),
      withCheckRedirect(() => {
        throw new Error('redirects disabled');
      }),
    );

    await expect(client.get('https://api.example.com/start')).rejects.toThrow(
      'GET https://api.example.com/start failed: redirects disabled',
    );
  });
});
