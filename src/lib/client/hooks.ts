import type { RequestSpec } from '../request/request-spec.js';
import type { HttpResponse } from '../response/response.js';
import { sleep } from '../utils/sleep.js';

/**
 * Runs once per call, before the first attempt. Throwing (or rejecting)
 * vetoes the call: no attempt is made and the error reaches the caller as-is.
 */
export type PreRequestHook = (request: RequestSpec) => void | Promise<void>;

/**
 * Observes every attempt. Failures are logged as warnings and never fail
 * the call.
 */
export type PostRequestHook = (
  request: RequestSpec,
  response: HttpResponse,
  error: Error | undefined,
) => void | Promise<void>;

export const noopPreRequestHook: PreRequestHook = () => undefined;

export const noopPostRequestHook: PostRequestHook = () => undefined;

/** Pre-request hook sleeping a random duration below `maxSeconds`. */
export function randomDelay(maxSeconds: number, random: () => number = Math.random): PreRequestHook {
  return async (request) => {
    const delayMs = Math.floor(random() * maxSeconds * 1000);
    await sleep(delayMs, request.signal);
  };
}
