/**
 * Model Client Types
 *
 * Defines the provider-agnostic contract every model client implements:
 * - Swappable implementations (OpenAI, Mock)
 * - Easy testing with mock clients and injected SDK handles
 */

import type { ModelInput, ModelType } from '../types';
import type { ProviderErrorKind } from '../provider-errors';
import type { JitterMode } from '../../utils/retry';

/**
 * Model Client Interface
 *
 * @typeParam TModelKwargs - caller options such as model name or temperature
 * @typeParam TApiKwargs - provider request produced by `buildRequest`
 * @typeParam TResponse - native provider response, returned unmodified
 */
export interface IAPIClient<TModelKwargs, TApiKwargs, TResponse> {
  /** Provider name, e.g. "openai" */
  readonly provider: string;

  /**
   * Convert the standard input and model kwargs into the provider's request.
   * Returns a new object; `modelKwargs` is never mutated.
   */
  buildRequest(input: ModelInput, modelKwargs: TModelKwargs, modelType: ModelType): TApiKwargs;

  /**
   * Send a request on the primary handle, retrying transient failures
   */
  call(apiKwargs: TApiKwargs, modelType: ModelType): Promise<TResponse>;

  /**
   * Send a request on the secondary handle, created on first use
   */
  callAsync(apiKwargs: TApiKwargs, modelType: ModelType): Promise<TResponse>;

  /**
   * Release SDK handles
   */
  destroy(): void;
}

/**
 * Client provider type
 */
export type ClientProvider = 'openai' | 'mock';

/**
 * Retry settings accepted in configuration
 */
export interface RetrySettings {
  maxTimeMs?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitter?: JitterMode;
  retryableKinds?: ProviderErrorKind[];
}

/**
 * Client configuration
 */
export interface APIClientConfig {
  /** Provider type */
  provider?: ClientProvider;

  /** API key; falls back to OPENAI_API_KEY */
  apiKey?: string;

  /** Override for the API base URL (Azure, proxies) */
  baseURL?: string;

  /** OpenAI organization id */
  organization?: string;

  /** Per-request timeout in milliseconds, enforced by the SDK */
  timeout?: number;

  /** Retry policy overrides */
  retry?: RetrySettings;
}
