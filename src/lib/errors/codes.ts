/**
 * Error codes carried in the `code` field of every {@link HttpClientError}.
 *
 * Codes are stable strings so callers can branch on them without
 * `instanceof` checks across package copies.
 */
export const HTTP_CLIENT_ERROR = {
  /** The request descriptor could not be built (bad URL, malformed query). */
  requestBuild: 'REQUEST_BUILD_ERROR',
  /** The transport failed before a response arrived (connect, DNS, TLS, abort). */
  transport: 'TRANSPORT_ERROR',
  /** A response arrived but reading, decoding or releasing its body failed. */
  materialization: 'MATERIALIZATION_ERROR',
  /** Every permitted attempt failed. */
  retriesExhausted: 'RETRIES_EXHAUSTED',
  /** The caller canceled the call. */
  canceled: 'REQUEST_CANCELED',
  /** The call's deadline expired. */
  deadlineExceeded: 'DEADLINE_EXCEEDED',
  /** Opt-in status error raised by callers from a response. */
  response: 'RESPONSE_ERROR',
} as const;

export type HttpClientErrorCode = (typeof HTTP_CLIENT_ERROR)[keyof typeof HTTP_CLIENT_ERROR];
