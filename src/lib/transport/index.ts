/**
 * Transport layer
 *
 * - Undici-based transport with optional pooled dispatcher
 * - Basic and bearer authentication wrappers
 * - Redirect following and cookie jar handling
 * - gzip / deflate / tar response decoding and buffering
 */

export {
  UndiciTransport,
  defaultTransport,
  type Transport,
  type TransportRequest,
  type RawResponse,
} from './transport.js';
export {
  BasicAuthTransport,
  BearerAuthTransport,
  basicAuthTransport,
  bearerAuthTransport,
} from './auth-transport.js';
export type { CookieJar } from './cookie-jar.js';
export {
  roundTrip,
  redirectRequest,
  defaultRedirectPolicy,
  USE_LAST_RESPONSE,
  type RedirectPolicy,
  type RedirectDecision,
  type RoundTripOptions,
  type RoundTripResult,
} from './round-trip.js';
export { selectCompression, decodeBody, drainInto, type DecodedBody } from './decompress.js';
export { materialize, type AttemptResult, type MaterializeOptions } from './materialize.js';
