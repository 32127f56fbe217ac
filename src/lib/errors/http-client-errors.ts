/**
 * Client-side errors raised by the execution engine
 *
 * Each class carries a stable `code`, a coarse `type` and a context record
 * describing the request that failed. Errors that wrap a lower-level failure
 * keep it in the standard `cause` property.
 */

import type { HttpResponse } from '../response/response.js';
import { HTTP_CLIENT_ERROR, type HttpClientErrorCode } from './codes.js';

/**
 * Base class for all retryhttp errors
 */
export abstract class HttpClientError extends Error {
  abstract readonly code: HttpClientErrorCode;
  abstract readonly type: string;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Errors recorded while building a request descriptor
 */
export class RequestBuildError extends HttpClientError {
  readonly code = HTTP_CLIENT_ERROR.requestBuild;
  readonly type = 'construction';

  static invalidUrl(url: string): RequestBuildError {
    return new RequestBuildError(`invalid URL '${url}'`, { url });
  }

  static malformedQuery(query: string, cause?: unknown): RequestBuildError {
    return new RequestBuildError(
      `malformed query '${query}'${cause === undefined ? '' : `: ${describeCause(cause)}`}`,
      { query },
      { cause },
    );
  }

  static missingUrl(): RequestBuildError {
    return new RequestBuildError('request url is not set');
  }
}

/**
 * The transport failed before any response was received
 */
export class TransportError extends HttpClientError {
  readonly code = HTTP_CLIENT_ERROR.transport;
  readonly type = 'transport';

  static fromCause(method: string, url: string, cause: unknown): TransportError {
    return new TransportError(`${method} ${url} failed: ${describeCause(cause)}`, { method, url }, { cause });
  }

  static tooManyRedirects(url: string, redirects: number): TransportError {
    return new TransportError(`stopped after ${redirects} redirects`, { url, redirects });
  }

  static bodyConsumed(method: string, url: string, attempts: number, cause: unknown): TransportError {
    return new TransportError(
      `${method} ${url}: stream body was consumed by attempt ${attempts} and cannot be resent: ${describeCause(cause)}`,
      { method, url, attempts },
      { cause },
    );
  }
}

/**
 * A response arrived but its body could not be turned into bytes
 *
 * Carries whatever was materialized before the failure.
 */
export class MaterializationError extends HttpClientError {
  readonly code = HTTP_CLIENT_ERROR.materialization;
  readonly type = 'materialization';

  constructor(
    message: string,
    public readonly response: HttpResponse,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, context, options);
  }

  static decode(encoding: string, response: HttpResponse, cause: unknown): MaterializationError {
    return new MaterializationError(
      `unable to decode '${encoding}' response body: ${describeCause(cause)}`,
      response,
      { encoding, url: response.requestUrl() },
      { cause },
    );
  }

  static read(response: HttpResponse, cause: unknown): MaterializationError {
    return new MaterializationError(
      `failed to read response bytes: ${describeCause(cause)}`,
      response,
      { url: response.requestUrl() },
      { cause },
    );
  }

  static cleanup(response: HttpResponse, cause: unknown): MaterializationError {
    return new MaterializationError(
      `failed to release response body: ${describeCause(cause)}`,
      response,
      { url: response.requestUrl() },
      { cause },
    );
  }
}

/**
 * Every attempt permitted by the retry count failed
 */
export class RetriesExhaustedError extends HttpClientError {
  readonly code = HTTP_CLIENT_ERROR.retriesExhausted;
  readonly type = 'retry';

  constructor(
    public readonly attempts: number,
    cause: unknown,
    public readonly response: HttpResponse,
  ) {
    super(`failed to send request after ${attempts} attempt(s): ${describeCause(cause)}`, { attempts }, { cause });
  }
}

/**
 * Base class for the errors raised when a call's signal fires
 */
export abstract class CancellationError extends HttpClientError {
  readonly type = 'cancellation';
}

export class RequestCanceledError extends CancellationError {
  readonly code = HTTP_CLIENT_ERROR.canceled;

  static fromReason(reason: unknown): RequestCanceledError {
    return new RequestCanceledError('request canceled', undefined, { cause: reason });
  }
}

export class DeadlineExceededError extends CancellationError {
  readonly code = HTTP_CLIENT_ERROR.deadlineExceeded;

  static after(timeoutMs: number): DeadlineExceededError {
    return new DeadlineExceededError(`deadline of ${timeoutMs}ms exceeded`, { timeoutMs });
  }

  static fromReason(reason: unknown): DeadlineExceededError {
    return new DeadlineExceededError('deadline exceeded', undefined, { cause: reason });
  }
}

export function isCancellationError(error: unknown): error is CancellationError {
  return error instanceof CancellationError;
}
