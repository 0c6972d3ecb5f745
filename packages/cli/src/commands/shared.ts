import chalk from 'chalk';
import {
  APIClientFactory,
  ConfigLoader,
  ConfigurationError,
  isClientProvider,
  type OpenAICompatibleClient,
  type ResolvedClientConfig,
} from '@modelbridge/core';

export const DEFAULT_CHAT_MODEL = 'gpt-4o-mini';
export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';

export interface ClientCommandOptions {
  provider?: string;
  config?: string;
}

export interface CommandSetup {
  client: OpenAICompatibleClient;
  config: ResolvedClientConfig;
}

/**
 * Resolve configuration and build the client a command runs against
 */
export function setupClient(options: ClientCommandOptions): CommandSetup {
  const provider = options.provider;
  if (provider !== undefined && !isClientProvider(provider)) {
    throw new ConfigurationError(`Unknown provider "${provider}" (expected openai or mock)`);
  }

  const config = ConfigLoader.resolve({ configPath: options.config, provider });

  return { client: APIClientFactory.create(config.client), config };
}

export function parseNumberOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`--${name} must be a number, got "${value}"`);
  }
  return parsed;
}

export function reportFailure(error: unknown): void {
  console.error(chalk.red(`\nError: ${error instanceof Error ? error.message : String(error)}`));
  process.exitCode = 1;
}
