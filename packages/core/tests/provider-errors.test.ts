import { describe, it, expect } from 'vitest';
import {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIUserAbortError,
  AuthenticationError,
  BadRequestError,
  InternalServerError,
  NotFoundError,
  RateLimitError,
  UnprocessableEntityError,
} from 'openai';
import {
  classifyProviderError,
  retryableKindsPredicate,
  DEFAULT_RETRYABLE_KINDS,
} from '../src/llm/provider-errors';

describe('classifyProviderError', () => {
  it.each([
    [new APIConnectionTimeoutError({ message: 'timed out' }), 'request_timeout'],
    [new APIUserAbortError(), 'aborted'],
    [new APIConnectionError({ message: 'socket hang up' }), 'connection'],
    [new InternalServerError(503, undefined, 'unavailable', undefined), 'server_error'],
    [new RateLimitError(429, undefined, 'slow down', undefined), 'rate_limited'],
    [new UnprocessableEntityError(422, undefined, 'unprocessable', undefined), 'unprocessable_request'],
    [new BadRequestError(400, undefined, 'bad', undefined), 'bad_request'],
    [new AuthenticationError(401, undefined, 'who', undefined), 'authentication'],
    [new NotFoundError(404, undefined, 'where', undefined), 'not_found'],
  ])('maps %s to %s', (error, kind) => {
    expect(classifyProviderError(error)).toBe(kind);
  });

  it('returns undefined for errors the SDK did not raise', () => {
    expect(classifyProviderError(new Error('plain'))).toBeUndefined();
    expect(classifyProviderError('string failure')).toBeUndefined();
  });
});

describe('retryableKindsPredicate', () => {
  it('accepts timeouts, 5xx, 429, 422 and 400 by default', () => {
    const isRetryable = retryableKindsPredicate();

    expect(DEFAULT_RETRYABLE_KINDS).toEqual([
      'request_timeout',
      'server_error',
      'rate_limited',
      'unprocessable_request',
      'bad_request',
    ]);
    expect(isRetryable(new RateLimitError(429, undefined, 'slow down', undefined))).toBe(true);
    expect(isRetryable(new BadRequestError(400, undefined, 'bad', undefined))).toBe(true);
    expect(isRetryable(new APIConnectionTimeoutError())).toBe(true);
  });

  it('rejects authentication, connection and unknown errors by default', () => {
    const isRetryable = retryableKindsPredicate();

    expect(isRetryable(new AuthenticationError(401, undefined, 'who', undefined))).toBe(false);
    expect(isRetryable(new APIConnectionError({ message: 'reset' }))).toBe(false);
    expect(isRetryable(new TypeError('boom'))).toBe(false);
  });

  it('honours a custom kind list', () => {
    const isRetryable = retryableKindsPredicate(['rate_limited']);

    expect(isRetryable(new RateLimitError(429, undefined, 'slow down', undefined))).toBe(true);
    expect(isRetryable(new BadRequestError(400, undefined, 'bad', undefined))).toBe(false);
  });
});
