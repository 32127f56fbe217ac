import { describe, it, expect } from '@jest/globals';
import { Readable } from 'node:stream';
import { deflateSync, gzipSync } from 'node:zlib';
import { pack } from 'tar-stream';
import {
  MaterializationError,
  TransportError,
  defaultRedirectPolicy,
  materialize,
  newRequest,
  selectCompression,
  setLogger,
  type MaterializeOptions,
} from '../../src/index.js';
import { API_URL, FakeTransport, failingTransport, rawResponse } from '../test-utils.js';

const decoding: MaterializeOptions = { decompress: true, checkRedirect: defaultRedirectPolicy };
const passthrough: MaterializeOptions = { decompress: false, checkRedirect: defaultRedirectPolicy };

function request(headers: Record<string, string> = {}) {
  return newRequest().get(API_URL).setHeaders(headers).build();
}

/**
 * Body that stays open after its last chunk and throws when released.
 * With `failure` set, it emits that error instead of ending.
 */
function unreleasableBody(content: string, failure?: Error): Readable {
  let sent = false;
  let failed = false;
  const body = new Readable({
    autoDestroy: false,
    read() {
      if (!sent) {
        sent = true;
        this.push(content);
      } else if (!failure) {
        this.push(null);
      } else if (!failed) {
        failed = true;
        setImmediate(() => this.emit('error', failure));
      }
    },
  });
  body.destroy = () => {
    throw new Error('release failed');
  };
  return body;
}

async function tarball(files: Array<[string, string]>): Promise<Buffer> {
  const archive = pack();
  for (const [name, content] of files) {
    archive.entry({ name }, content);
  }
  archive.entry({ name: 'nested', type: 'directory' });
  archive.finalize();

  const chunks: Buffer[] = [];
  for await (const chunk of archive) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

describe('materialize', () => {
  it('decodes gzip bodies announced by content-encoding', async () => {
    const transport = new FakeTransport(() =>
      rawResponse(200, gzipSync('hello gzip'), { 'content-encoding': 'gzip' }),
    );

    const { response, error } = await materialize(transport, request(), decoding, new AbortController().signal);

    expect(error).toBeUndefined();
    expect(response.text()).toBe('hello gzip');
    expect(response.header('content-encoding')).toBe('gzip');
    expect(transport.requests[0]?.headers['accept-encoding']).toEqual(['gzip, deflate']);
  });

  it('decodes zlib deflate bodies', async () => {
    const transport = new FakeTransport(() =>
      rawResponse(200, deflateSync('hello deflate'), { 'content-encoding': 'deflate' }),
    );

    const { response, error } = await materialize(transport, request(), decoding, new AbortController().signal);

    expect(error).toBeUndefined();
    expect(response.text()).toBe('hello deflate');
  });

  it('lets the request accept header select the decoder', async () => {
    const transport = new FakeTransport(() => rawResponse(200, gzipSync('[1,2,3]')));

    const { response } = await materialize(
      transport,
      request({ Accept: 'application/x-gzip' }),
      decoding,
      new AbortController().signal,
    );

    expect(response.json()).toEqual([1, 2, 3]);
  });

  it('concatenates the file entries of a tar body', async () => {
    const archive = await tarball([
      ['a.txt', 'hello '],
      ['b.txt', 'tar'],
    ]);
    const transport = new FakeTransport(() => rawResponse(200, archive, { 'content-encoding': 'tar' }));

    const { response, error } = await materialize(transport, request(), decoding, new AbortController().signal);

    expect(error).toBeUndefined();
    expect(response.text()).toBe('hello tar');
  });

  it('leaves the body untouched when decompression is disabled', async () => {
    const zipped = gzipSync('still zipped');
    const transport = new FakeTransport(() => rawResponse(200, zipped, { 'content-encoding': 'gzip' }));

    const { response, error } = await materialize(transport, request(), passthrough, new AbortController().signal);

    expect(error).toBeUndefined();
    expect(response.bytes().equals(zipped)).toBe(true);
    expect(transport.requests[0]?.headers['accept-encoding']).toBeUndefined();
  });

  it('passes unknown encodings through', async () => {
    const transport = new FakeTransport(() => rawResponse(200, 'opaque', { 'content-encoding': 'br' }));

    const { response, error } = await materialize(transport, request(), decoding, new AbortController().signal);

    expect(error).toBeUndefined();
    expect(response.text()).toBe('opaque');
  });

  it('returns an empty response and a transport error when the send fails', async () => {
    const { response, error } = await materialize(
      failingTransport('getaddrinfo ENOTFOUND'),
      request(),
      decoding,
      new AbortController().signal,
    );

    expect(response.isEmpty()).toBe(true);
    expect(error).toBeInstanceOf(TransportError);
    expect(error?.message).toBe(`GET ${API_URL} failed: getaddrinfo ENOTFOUND`);
  });

  it('reports a corrupt body with the partial response', async () => {
    const transport = new FakeTransport(() =>
      rawResponse(200, Buffer.from('definitely not gzip'), { 'content-encoding': 'gzip' }),
    );

    const { response, error } = await materialize(transport, request(), decoding, new AbortController().signal);

    expect(error).toBeInstanceOf(MaterializationError);
    expect(error?.message).toMatch(/^unable to decode 'gzip' response body: /);
    expect(response.statusCode()).toBe(200);
    expect(response.requestUrl()).toBe(API_URL);
  });

  it.each([
    { method: 'HEAD', status: 200 },
    { method: 'GET', status: 204 },
    { method: 'GET', status: 304 },
  ])('keeps the empty body of a $method answered $status despite content-encoding', async ({ method, status }) => {
    const transport = new FakeTransport(() => rawResponse(status, '', { 'content-encoding': 'gzip' }));
    const spec = newRequest().setMethod(method).setUrl(API_URL).build();

    const { response, error } = await materialize(transport, spec, decoding, new AbortController().signal);

    expect(error).toBeUndefined();
    expect(response.statusCode()).toBe(status);
    expect(response.bytes()).toHaveLength(0);
    expect(response.header('content-encoding')).toBe('gzip');
  });

  it('turns a failed release into an error carrying the complete response', async () => {
    const transport = new FakeTransport(() => ({ statusCode: 200, headers: {}, body: unreleasableBody('kept') }));

    const { response, error } = await materialize(transport, request(), decoding, new AbortController().signal);

    expect(error).toBeInstanceOf(MaterializationError);
    expect(error?.message).toBe('failed to release response body: release failed');
    expect(response.text()).toBe('kept');
  });

  it('keeps the read error and only logs a failed release after it', async () => {
    const warnings: string[] = [];
    setLogger((message) => warnings.push(message));
    const transport = new FakeTransport(() => ({
      statusCode: 200,
      headers: {},
      body: unreleasableBody('partial', new Error('socket hang up')),
    }));

    const { response, error } = await materialize(transport, request(), passthrough, new AbortController().signal);

    expect(error).toBeInstanceOf(MaterializationError);
    expect(error?.message).toBe('failed to read response bytes: socket hang up');
    expect(response.text()).toBe('partial');
    expect(warnings).toEqual([`WARN: releasing response body of GET ${API_URL} failed: release failed`]);
  });
});

describe('selectCompression', () => {
  it('prefers the accept header over content-encoding', () => {
    expect(selectCompression({ accept: ['application/zlib'] }, { 'content-encoding': ['gzip'] })).toBe('deflate');
  });

  it('matches content-encoding tokens case-insensitively', () => {
    expect(selectCompression({}, { 'content-encoding': ['X-GZIP'] })).toBe('gzip');
  });

  it('selects nothing for unknown values', () => {
    expect(selectCompression({ accept: ['application/json'] }, { 'content-encoding': ['br'] })).toBe('');
  });
});
