import { PassThrough, pipeline, type Readable } from 'node:stream';
import { finished } from 'node:stream/promises';
import { createGunzip, createInflate } from 'node:zlib';
import { extract } from 'tar-stream';
import {
  ACCEPT_COMPRESSION,
  COMPRESSION,
  CONTENT_ENCODING_COMPRESSION,
  type Compression,
} from '../constants/encoding.js';
import type { HeaderMap } from '../types/http.js';
import { debugHttp } from '../utils/debug.js';
import { headerTokens } from '../utils/headers.js';

/** A readable view of a response body plus the resources it owns. */
export interface DecodedBody {
  readonly stream: Readable;
  readonly compression: Compression;
  /** Release decoder resources; the source body is released by its owner. */
  release(): void;
}

/**
 * Pick a decoder: the request's `Accept` media types win over the response's
 * `Content-Encoding`. Unknown values select no decoding.
 */
export function selectCompression(requestHeaders: HeaderMap, responseHeaders: HeaderMap): Compression {
  for (const mediaType of headerTokens(requestHeaders, 'accept')) {
    const compression = ACCEPT_COMPRESSION[mediaType];
    if (compression) return compression;
  }

  for (const encoding of headerTokens(responseHeaders, 'content-encoding')) {
    const compression = CONTENT_ENCODING_COMPRESSION[encoding];
    if (compression) return compression;
  }

  return COMPRESSION.none;
}

function reportPipeline(compression: Compression) {
  return (err: NodeJS.ErrnoException | null) => {
    if (err) debugHttp('%s decoder pipeline closed with error: %s', compression, err.message);
  };
}

function inflate(source: Readable, compression: Compression): DecodedBody {
  const decoder = compression === COMPRESSION.gzip ? createGunzip() : createInflate();
  pipeline(source, decoder, reportPipeline(compression));
  return {
    stream: decoder,
    compression,
    release: () => {
      if (!decoder.destroyed) decoder.destroy();
    },
  };
}

/** Concatenated contents of every regular file in a tar archive. */
function untar(source: Readable): DecodedBody {
  const archive = extract();
  const output = new PassThrough();

  archive.on('entry', (header, entry, next) => {
    entry.on('end', () => next());
    if (header.type === 'file') {
      entry.on('data', (chunk: unknown) => {
        if (Buffer.isBuffer(chunk)) output.write(chunk);
      });
    } else {
      entry.resume();
    }
  });
  archive.on('finish', () => output.end());
  archive.on('error', (err: Error) => {
    reportPipeline(COMPRESSION.tar)(err);
    output.destroy(err);
  });
  source.on('error', (err) => archive.destroy(err));
  source.pipe(archive);

  return {
    stream: output,
    compression: COMPRESSION.tar,
    release: () => {
      if (!archive.destroyed) archive.destroy();
      if (!output.destroyed) output.destroy();
    },
  };
}

export function decodeBody(source: Readable, compression: Compression): DecodedBody {
  switch (compression) {
    case COMPRESSION.gzip:
    case COMPRESSION.deflate:
      return inflate(source, compression);
    case COMPRESSION.tar:
      return untar(source);
    case COMPRESSION.none:
      return { stream: source, compression, release: () => undefined };
  }
}

/**
 * Read a stream to its end, keeping every chunk read so far in `chunks`.
 * The stream is left open; releasing it is up to its owner.
 */
export async function drainInto(stream: Readable, chunks: Buffer[]): Promise<void> {
  stream.on('data', (chunk: Uint8Array | string) => {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : Buffer.from(chunk));
  });
  await finished(stream);
}
