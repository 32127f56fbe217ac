import type { Readable } from 'node:stream';
import { COMPRESSION, DEFAULT_ACCEPT_ENCODING } from '../constants/encoding.js';
import { MaterializationError, TransportError } from '../errors/http-client-errors.js';
import type { RequestSpec } from '../request/request-spec.js';
import { HttpResponse } from '../response/response.js';
import { debugHttp } from '../utils/debug.js';
import { hasHeader, normalizeHeaders } from '../utils/headers.js';
import { buildUserAgent } from '../utils/user-agent.js';
import { logWarn } from '../../logger.js';
import { decodeBody, drainInto, selectCompression, type DecodedBody } from './decompress.js';
import { roundTrip, type RoundTripOptions, type RoundTripResult } from './round-trip.js';
import type { Transport, TransportRequest } from './transport.js';

/** Outcome of one attempt: always a response (possibly empty), plus the failure if there was one. */
export interface AttemptResult {
  readonly response: HttpResponse;
  readonly error?: Error;
}

export interface MaterializeOptions extends RoundTripOptions {
  decompress: boolean;
}

function toTransportRequest(request: RequestSpec, decompress: boolean, signal: AbortSignal): TransportRequest {
  const headers: Record<string, readonly string[]> = { ...request.headers };
  if (!hasHeader(headers, 'user-agent')) {
    headers['user-agent'] = [buildUserAgent()];
  }
  if (decompress && !hasHeader(headers, 'accept-encoding')) {
    headers['accept-encoding'] = [DEFAULT_ACCEPT_ENCODING];
  }
  return { method: request.method, url: request.url, headers, body: request.body, signal };
}

/** Run every release step; report the first failure instead of throwing. */
function release(steps: Array<() => void>): unknown {
  let failure: unknown;
  for (const step of steps) {
    try {
      step();
    } catch (error) {
      failure ??= error;
    }
  }
  return failure;
}

/** HEAD answers and 204/304 statuses carry no body, whatever their `Content-Encoding` says. */
function isBodiless(method: string, statusCode: number): boolean {
  return method === 'HEAD' || statusCode === 204 || statusCode === 304;
}

function destroyBody(body: Readable): void {
  if (!body.destroyed) body.destroy();
}

/**
 * Perform one network attempt: send, optionally decompress, buffer.
 *
 * Never rejects. A transport failure yields an empty response with a
 * {@link TransportError}; a failure while reading or decoding the body yields
 * the partial response with a {@link MaterializationError}. The raw body is
 * released on every path.
 */
export async function materialize(
  transport: Transport,
  request: RequestSpec,
  options: MaterializeOptions,
  signal: AbortSignal,
): Promise<AttemptResult> {
  const outgoing = toTransportRequest(request, options.decompress, signal);

  let trip: RoundTripResult;
  try {
    trip = await roundTrip(transport, outgoing, options);
  } catch (error) {
    debugHttp(
      '%s %s transport failure: %s',
      request.method,
      request.url,
      error instanceof Error ? error.message : String(error),
    );
    return { response: HttpResponse.empty(), error: TransportError.fromCause(request.method, request.url, error) };
  }

  const { raw, url } = trip;
  const headers = normalizeHeaders(raw.headers);
  const chunks: Buffer[] = [];
  const snapshot = () => new HttpResponse({ statusCode: raw.statusCode, headers, body: Buffer.concat(chunks), url });
  const compression =
    options.decompress && !isBodiless(request.method, raw.statusCode)
      ? selectCompression(outgoing.headers, headers)
      : COMPRESSION.none;

  let decoded: DecodedBody | undefined;
  let failure: MaterializationError | undefined;
  try {
    decoded = decodeBody(raw.body, compression);
    await drainInto(decoded.stream, chunks);
  } catch (error) {
    failure =
      compression === COMPRESSION.none
        ? MaterializationError.read(snapshot(), error)
        : MaterializationError.decode(compression, snapshot(), error);
  }

  const cleanupFailure = release([() => decoded?.release(), () => destroyBody(raw.body)]);

  if (failure) {
    if (cleanupFailure !== undefined) {
      logWarn(
        `releasing response body of ${request.method} ${url} failed: ${
          cleanupFailure instanceof Error ? cleanupFailure.message : String(cleanupFailure)
        }`,
      );
    }
    return { response: failure.response, error: failure };
  }

  const response = snapshot();
  debugHttp(
    '%s %s materialized status=%d bytes=%d compression=%s',
    request.method,
    url,
    raw.statusCode,
    response.bytes().length,
    compression || 'none',
  );

  if (cleanupFailure !== undefined) {
    return { response, error: MaterializationError.cleanup(response, cleanupFailure) };
  }
  return { response };
}
