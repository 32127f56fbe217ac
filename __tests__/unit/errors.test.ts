import { describe, it, expect } from '@jest/globals';
import {
  CallScope,
  CancellationError,
  DeadlineExceededError,
  HTTP_CLIENT_ERROR,
  HttpClientError,
  HttpResponse,
  RequestCanceledError,
  ResponseError,
  RetriesExhaustedError,
  TransportError,
  cancellationError,
  isCancellationError,
  isResponseError,
} from '../../src/index.js';

describe('ResponseError', () => {
  it('formats the status code into the message', () => {
    const error = new ResponseError(503, 'maintenance window');

    expect(error.message).toBe("got HTTP error code '503': maintenance window");
    expect(error.code).toBe(HTTP_CLIENT_ERROR.response);
    expect(error.name).toBe('ResponseError');
    expect(error).toBeInstanceOf(HttpClientError);
  });

  it('compares by status code only', () => {
    const error = new ResponseError(404, 'user not found');

    expect(error.is(new ResponseError(404, 'order not found'))).toBe(true);
    expect(error.is(new ResponseError(410, 'user not found'))).toBe(false);
    expect(error.is(new Error('user not found'))).toBe(false);
  });

  it('builds from a response', () => {
    const error = ResponseError.fromResponse(new HttpResponse({ statusCode: 429 }));

    expect(error.statusCode).toBe(429);
    expect(error.message).toBe("got HTTP error code '429': got http response error code");
  });

  it('narrows with isResponseError', () => {
    const error: unknown = new ResponseError(500, 'boom');

    expect(isResponseError(error)).toBe(true);
    expect(isResponseError(error, 500)).toBe(true);
    expect(isResponseError(error, 502)).toBe(false);
    expect(isResponseError(new Error('boom'))).toBe(false);
  });
});

describe('RetriesExhaustedError', () => {
  it('keeps the attempts, the last cause and the last response', () => {
    const cause = TransportError.fromCause('GET', 'https://api.example.com/a', new Error('reset'));
    const response = new HttpResponse({ statusCode: 502 });
    const error = new RetriesExhaustedError(4, cause, response);

    expect(error.message).toBe('failed to send request after 4 attempt(s): GET https://api.example.com/a failed: reset');
    expect(error.cause).toBe(cause);
    expect(error.response).toBe(response);
    expect(error.context).toEqual({ attempts: 4 });
  });
});

describe('cancellation', () => {
  it('classifies abort reasons', () => {
    const deadline = DeadlineExceededError.after(250);
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';

    expect(cancellationError(deadline)).toBe(deadline);
    expect(cancellationError(timeout)).toBeInstanceOf(DeadlineExceededError);
    expect(cancellationError('shutdown')).toBeInstanceOf(RequestCanceledError);
    expect(cancellationError('shutdown').cause).toBe('shutdown');
    expect(isCancellationError(cancellationError(undefined))).toBe(true);
  });

  it('aborts the call scope with the parent signal', () => {
    const controller = new AbortController();
    const scope = new CallScope(controller.signal, 0);

    expect(scope.aborted).toBe(false);
    controller.abort('user left');

    expect(scope.aborted).toBe(true);
    expect(scope.toError()).toBeInstanceOf(RequestCanceledError);
    expect(scope.toError().cause).toBe('user left');
    scope.close();
  });

  it('stops listening to the parent once closed', () => {
    const controller = new AbortController();
    const scope = new CallScope(controller.signal, 0);

    scope.close();
    controller.abort();

    expect(scope.aborted).toBe(false);
  });

  it('aborts with a deadline error when the timeout fires', async () => {
    const scope = new CallScope(undefined, 10);

    await new Promise((resolve) => setTimeout(resolve, 40));

    expect(scope.aborted).toBe(true);
    const error: CancellationError = scope.toError();
    expect(error).toBeInstanceOf(DeadlineExceededError);
    expect(error.message).toBe('deadline of 10ms exceeded');
    expect(error.type).toBe('cancellation');
    scope.close();
  });
});
