/**
 * Compression formats understood by the response materializer and the
 * header values that select them.
 */

export const COMPRESSION = {
  gzip: 'gzip',
  deflate: 'deflate',
  tar: 'tar',
  none: '',
} as const;

export type Compression = (typeof COMPRESSION)[keyof typeof COMPRESSION];

/** `Accept` media types that announce a compressed payload. */
export const ACCEPT_COMPRESSION: Readonly<Record<string, Compression>> = {
  'application/gzip': COMPRESSION.gzip,
  'application/x-gzip': COMPRESSION.gzip,
  'application/zlib': COMPRESSION.deflate,
  'application/x-tar': COMPRESSION.tar,
};

/** `Content-Encoding` tokens the materializer can decode. */
export const CONTENT_ENCODING_COMPRESSION: Readonly<Record<string, Compression>> = {
  gzip: COMPRESSION.gzip,
  'x-gzip': COMPRESSION.gzip,
  deflate: COMPRESSION.deflate,
  tar: COMPRESSION.tar,
};

export const DEFAULT_ACCEPT_ENCODING = 'gzip, deflate';
