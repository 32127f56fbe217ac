import type { HttpResponse } from '../response/response.js';
import { HTTP_CLIENT_ERROR } from './codes.js';
import { HttpClientError } from './http-client-errors.js';

/**
 * HTTP status error
 *
 * The engine never raises this on its own: a 4xx/5xx response is a normal
 * result. Callers raise it from their own predicates or after `do()` resolves
 * when they want status-keyed error handling. Two response errors are the
 * same error when their status codes match, whatever their messages say.
 */
export class ResponseError extends HttpClientError {
  readonly code = HTTP_CLIENT_ERROR.response;
  readonly type = 'response';

  constructor(
    public readonly statusCode: number,
    public readonly detail: string,
  ) {
    super(`got HTTP error code '${statusCode}': ${detail}`, { statusCode });
  }

  static fromResponse(response: HttpResponse, detail = 'got http response error code'): ResponseError {
    return new ResponseError(response.statusCode(), detail);
  }

  /** Status-code equality. */
  is(other: unknown): boolean {
    return other instanceof ResponseError && other.statusCode === this.statusCode;
  }
}

export function isResponseError(error: unknown, statusCode?: number): error is ResponseError {
  if (!(error instanceof ResponseError)) return false;
  return statusCode === undefined || error.statusCode === statusCode;
}
