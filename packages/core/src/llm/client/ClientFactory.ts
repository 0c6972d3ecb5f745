/**
 * Model Client Factory
 *
 * Creates model client instances based on configuration and environment variables.
 *
 * Environment Variables:
 * - LLM_PROVIDER: 'openai' | 'mock' (default: 'openai')
 * - OPENAI_API_KEY: required by the openai provider
 *
 * Usage:
 *   // Default (OpenAI)
 *   const client = APIClientFactory.create();
 *
 *   // For testing or offline runs
 *   const mockClient = APIClientFactory.create({ provider: 'mock' });
 */

import type { IAPIClient, APIClientConfig, ClientProvider } from './types';
import type { OpenAIApiKwargs, OpenAIModelKwargs, OpenAIResponse } from '../types';
import { OpenAIClient, type OpenAIClientConfig } from './OpenAIClient';
import { MockClient } from './MockClient';
import { ConfigurationError } from '../errors';
import { Logger } from '../../utils/logger';

/**
 * Any client accepting OpenAI-format requests
 */
export type OpenAICompatibleClient = IAPIClient<OpenAIModelKwargs, OpenAIApiKwargs, OpenAIResponse>;

export type ClientFactoryConfig = APIClientConfig & Pick<OpenAIClientConfig, 'createHandle' | 'maxRetries'>;

const PROVIDERS: readonly ClientProvider[] = ['openai', 'mock'];

export function isClientProvider(value: string): value is ClientProvider {
  return PROVIDERS.some(provider => provider === value);
}

/**
 * Factory for creating model client instances
 */
export class APIClientFactory {
  /**
   * Create a model client based on configuration and environment variables
   *
   * Priority:
   * 1. Config parameter (if provided)
   * 2. LLM_PROVIDER environment variable
   * 3. Default (openai)
   */
  static create(config: ClientFactoryConfig = {}): OpenAICompatibleClient {
    const provider = this.resolveProvider(config.provider);

    Logger.debug(`[APIClientFactory] Creating client: provider=${provider}`);

    switch (provider) {
      case 'openai':
        return new OpenAIClient(config);

      case 'mock':
        return new MockClient();

      default:
        throw new ConfigurationError(`[APIClientFactory] Unknown provider: ${String(provider)}`);
    }
  }

  /**
   * Resolve provider from config or environment
   */
  static resolveProvider(configProvider?: ClientProvider): ClientProvider {
    if (configProvider) {
      return configProvider;
    }

    const envProvider = process.env.LLM_PROVIDER?.toLowerCase();
    if (envProvider) {
      if (isClientProvider(envProvider)) {
        return envProvider;
      }
      Logger.warn(`[APIClientFactory] Invalid LLM_PROVIDER="${envProvider}", using default "openai"`);
    }

    return 'openai';
  }
}
