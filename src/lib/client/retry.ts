import type { HttpResponse } from '../response/response.js';
import { sleep } from '../utils/sleep.js';
import { cancellationError } from './call-scope.js';

/**
 * Decides after each attempt whether another one should be made.
 *
 * Returning `false` ends the call with the current attempt's outcome. The
 * configured retry count caps the attempts whatever the condition says.
 */
export type RetryCondition = (response: HttpResponse, error: Error | undefined) => boolean;

/** Default condition: keep going until the attempt budget runs out. */
export const alwaysRetry: RetryCondition = () => true;

export const neverRetry: RetryCondition = () => false;

/** Retry only attempts that failed with an error. */
export const retryOnError: RetryCondition = (_response, error) => error !== undefined;

/** Retry failed attempts and responses with one of the given status codes. */
export function retryOnStatus(...statusCodes: number[]): RetryCondition {
  const codes = new Set(statusCodes);
  return (response, error) => error !== undefined || codes.has(response.statusCode());
}

/**
 * Linear backoff between attempts
 *
 * Starts at the base delay and grows by `deltaMs` after every completed wait.
 * A delta of 0 gives a constant delay.
 */
export class LinearBackoff {
  private current: number;

  constructor(
    baseDelayMs: number,
    private readonly deltaMs: number,
  ) {
    this.current = Math.max(0, baseDelayMs);
  }

  get delayMs(): number {
    return this.current;
  }

  /**
   * Wait out the current delay.
   *
   * @throws CancellationError when the signal aborts before or during the wait
   */
  async wait(signal: AbortSignal): Promise<void> {
    try {
      await sleep(this.current, signal);
    } catch (reason) {
      throw cancellationError(reason);
    }
    // an abort that lands together with the timer still wins
    if (signal.aborted) throw cancellationError(signal.reason);

    this.current = Math.max(0, this.current + this.deltaMs);
  }
}
