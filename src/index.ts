/**
 * retryhttp - HTTP client execution layer
 *
 * Rate limiting, request hooks, linear retry backoff, response decompression
 * and buffering on top of undici.
 */

export * from './lib/index.js';
export { setLogger, logWarn, type WarnLogger } from './logger.js';
