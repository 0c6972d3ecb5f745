/**
 * Model Client Module
 *
 * Provides a provider-agnostic client contract with swappable backends.
 *
 * Supported providers:
 * - openai: OpenAI SDK (default)
 * - mock: offline client for tests and dry runs
 *
 * Usage:
 *   import { APIClientFactory, ModelType } from '@modelbridge/core';
 *
 *   const client = APIClientFactory.create();
 *   const request = client.buildRequest('Hello', { model: 'text-embedding-3-small' }, ModelType.EMBEDDER);
 *   const response = await client.call(request, ModelType.EMBEDDER);
 */

// Types
export type {
  IAPIClient,
  APIClientConfig,
  ClientProvider,
  RetrySettings,
} from './types';

// Factory
export {
  APIClientFactory,
  isClientProvider,
  type ClientFactoryConfig,
  type OpenAICompatibleClient,
} from './ClientFactory';

// Clients (for direct instantiation if needed)
export {
  OpenAIClient,
  OPENAI_API_KEY_ENV,
  type OpenAIClientConfig,
  type OpenAIHandle,
  type OpenAIHandleFactory,
  type OpenAIHandleOptions,
} from './OpenAIClient';
export { MockClient, type MockClientConfig, type MockCall } from './MockClient';
