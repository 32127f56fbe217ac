/**
 * Example: branching on typed client errors
 *
 * Run against any endpoint that sometimes answers 503.
 */

import {
  DeadlineExceededError,
  RequestCanceledError,
  ResponseError,
  RetriesExhaustedError,
  createClient,
  is2xx,
  isResponseError,
  randomDelay,
  retryOnStatus,
  withPostRequestHook,
  withPreRequestHook,
  withRetryCondition,
  withRetryCount,
  withRetryDelay,
  withRetryDelayDelta,
  withTimeout,
} from '../src/index.js';

export async function fetchReport(url: string): Promise<string | undefined> {
  const client = createClient(
    withRetryCount(4),
    withRetryDelay(250),
    withRetryDelayDelta(250),
    withTimeout(10_000),
    withRetryCondition(retryOnStatus(429, 502, 503)),
    withPreRequestHook(randomDelay(0.5)),
    withPostRequestHook((request, response, error) => {
      console.log(`${request.method} ${request.url} -> ${error ? error.message : response.statusCode()}`);
    }),
  );

  try {
    const response = await client.get(url, { headers: { accept: 'application/json' } });
    if (!is2xx(response.statusCode())) {
      throw ResponseError.fromResponse(response, `report endpoint answered ${response.statusCode()}`);
    }
    return response.text();
  } catch (error) {
    if (error instanceof DeadlineExceededError) {
      console.error('Gave up after 10 seconds');
    } else if (error instanceof RequestCanceledError) {
      console.error('Canceled');
    } else if (error instanceof RetriesExhaustedError) {
      console.error(`All ${error.attempts} attempts failed`, error.cause);
    } else if (isResponseError(error, 503)) {
      console.error('Still unavailable:', error.detail);
    } else {
      throw error;
    }
    return undefined;
  }
}
