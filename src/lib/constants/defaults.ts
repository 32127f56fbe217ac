/**
 * Default configuration constants for retryhttp
 *
 * Used by defaultSettings() and the transport factories when no explicit
 * option is provided.
 */

// Retry defaults (a retry count of 0 still makes one attempt)
export const DEFAULT_RETRY_COUNT = 0;
export const DEFAULT_RETRY_DELAY_MS = 0;
export const DEFAULT_RETRY_DELAY_DELTA_MS = 0;

// 0 disables the per-call deadline
export const DEFAULT_REQUEST_TIMEOUT_MS = 0;

// Redirects followed before the default policy gives up
export const DEFAULT_MAX_REDIRECTS = 10;

// Pooled transport defaults
export const DEFAULT_CONNECTIONS_PER_ORIGIN = 100;
export const DEFAULT_CONNECT_TIMEOUT_MS = 60_000;
