import {
  CancellationError,
  DeadlineExceededError,
  RequestCanceledError,
} from '../errors/http-client-errors.js';

/** Classify an abort reason as caller cancellation or deadline expiry. */
export function cancellationError(reason: unknown): CancellationError {
  if (reason instanceof CancellationError) return reason;
  if (reason instanceof Error && reason.name === 'TimeoutError') {
    return DeadlineExceededError.fromReason(reason);
  }
  return RequestCanceledError.fromReason(reason);
}

/**
 * Cancellation scope of one `do()` call
 *
 * Links the request's own signal with the call deadline. `close()` must run
 * when the call settles so no timer or listener outlives it.
 */
export class CallScope {
  private readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout | undefined;
  private readonly unlink: () => void;

  constructor(parent: AbortSignal | undefined, timeoutMs: number) {
    if (parent?.aborted) {
      this.controller.abort(parent.reason);
      this.unlink = () => undefined;
    } else if (parent) {
      const onAbort = () => this.controller.abort(parent.reason);
      parent.addEventListener('abort', onAbort, { once: true });
      this.unlink = () => parent.removeEventListener('abort', onAbort);
    } else {
      this.unlink = () => undefined;
    }

    if (timeoutMs > 0 && !this.controller.signal.aborted) {
      this.timer = setTimeout(() => this.controller.abort(DeadlineExceededError.after(timeoutMs)), timeoutMs);
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get aborted(): boolean {
    return this.controller.signal.aborted;
  }

  toError(): CancellationError {
    return cancellationError(this.controller.signal.reason);
  }

  close(): void {
    if (this.timer) clearTimeout(this.timer);
    this.unlink();
  }
}
