/**
 * Provider Error Classification
 *
 * Maps OpenAI SDK error classes onto a small set of kinds the retry policy
 * can reason about. Order matters: the SDK's timeout error is a subclass of
 * its connection error, and every HTTP error is a subclass of APIError.
 */

import {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIUserAbortError,
  AuthenticationError,
  BadRequestError,
  ConflictError,
  InternalServerError,
  NotFoundError,
  PermissionDeniedError,
  RateLimitError,
  UnprocessableEntityError,
} from 'openai';

export const PROVIDER_ERROR_KINDS = [
  'request_timeout',
  'server_error',
  'rate_limited',
  'unprocessable_request',
  'bad_request',
  'authentication',
  'permission_denied',
  'not_found',
  'conflict',
  'connection',
  'aborted',
] as const;

export type ProviderErrorKind = (typeof PROVIDER_ERROR_KINDS)[number];

/**
 * Kinds retried by default.
 *
 * `bad_request` is kept for compatibility with existing deployments even though
 * a malformed request will not succeed on retry; drop it through
 * `retry.retryableKinds` to fail fast on 400s.
 */
export const DEFAULT_RETRYABLE_KINDS: readonly ProviderErrorKind[] = [
  'request_timeout',
  'server_error',
  'rate_limited',
  'unprocessable_request',
  'bad_request',
];

const CLASSIFIERS: Array<[new (...args: never[]) => Error, ProviderErrorKind]> = [
  [APIConnectionTimeoutError, 'request_timeout'],
  [APIUserAbortError, 'aborted'],
  [APIConnectionError, 'connection'],
  [InternalServerError, 'server_error'],
  [RateLimitError, 'rate_limited'],
  [UnprocessableEntityError, 'unprocessable_request'],
  [BadRequestError, 'bad_request'],
  [AuthenticationError, 'authentication'],
  [PermissionDeniedError, 'permission_denied'],
  [NotFoundError, 'not_found'],
  [ConflictError, 'conflict'],
];

/**
 * Classify an error thrown by the SDK.
 *
 * @returns the kind, or undefined for anything the SDK did not raise
 */
export function classifyProviderError(error: unknown): ProviderErrorKind | undefined {
  for (const [errorClass, kind] of CLASSIFIERS) {
    if (error instanceof errorClass) {
      return kind;
    }
  }
  return undefined;
}

/**
 * Build a retry predicate accepting the given kinds only
 */
export function retryableKindsPredicate(
  kinds: readonly ProviderErrorKind[] = DEFAULT_RETRYABLE_KINDS
): (error: unknown) => boolean {
  const allowed = new Set(kinds);
  return error => {
    const kind = classifyProviderError(error);
    return kind !== undefined && allowed.has(kind);
  };
}
