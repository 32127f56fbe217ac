/**
 * retryhttp library - core exports
 */

// Client and execution engine
export { HttpClient, createClient, defaultClient, type CallInit } from './client/http-client.js';
export {
  defaultSettings,
  buildSettings,
  withRateLimiter,
  withRetryCount,
  withRetryDelay,
  withRetryDelayDelta,
  withRetryCondition,
  withTimeout,
  withTransport,
  withCookieJar,
  withDecompression,
  withCheckRedirect,
  withPreRequestHook,
  withPostRequestHook,
  type ClientSettings,
  type Option,
} from './client/settings.js';
export {
  LinearBackoff,
  alwaysRetry,
  neverRetry,
  retryOnError,
  retryOnStatus,
  type RetryCondition,
} from './client/retry.js';
export {
  UnlimitedLimiter,
  IntervalLimiter,
  type Limiter,
  type IntervalLimiterOptions,
} from './client/rate-limiter.js';
export {
  randomDelay,
  noopPreRequestHook,
  noopPostRequestHook,
  type PreRequestHook,
  type PostRequestHook,
} from './client/hooks.js';
export { CallScope, cancellationError } from './client/call-scope.js';

// Requests and responses
export { RequestBuilder, newRequest, type BodyInput, type RequestCookie } from './request/request-builder.js';
export { RequestSpec, type RequestBody, type RequestSpecInit } from './request/request-spec.js';
export { HttpResponse, type HttpResponseInit } from './response/response.js';
export type { HeaderMap, IncomingHeaders, BasicAuthCredentials } from './types/http.js';

// Error handling
export {
  HttpClientError,
  RequestBuildError,
  TransportError,
  MaterializationError,
  RetriesExhaustedError,
  CancellationError,
  RequestCanceledError,
  DeadlineExceededError,
  isCancellationError,
} from './errors/http-client-errors.js';
export { ResponseError, isResponseError } from './errors/response-error.js';
export { HTTP_CLIENT_ERROR, type HttpClientErrorCode } from './errors/codes.js';

// Constants
export { COMPRESSION, ACCEPT_COMPRESSION, CONTENT_ENCODING_COMPRESSION, type Compression } from './constants/encoding.js';
export { REDIRECT_STATUS, isRedirect, is2xx, is4xx, is5xx } from './constants/status.js';
export * from './constants/defaults.js';

// Transport layer
export * from './transport/index.js';

// Utils
export * from './utils/index.js';
