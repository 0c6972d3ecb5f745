import * as fs from 'fs';
import { Logger } from './logger';
import { ConfigurationError } from '../llm/errors';
import type { ClientProvider } from '../llm/client/types';
import type { ClientFactoryConfig } from '../llm/client/ClientFactory';
import type { ClientConfigFile, ClientEnv, EmbedderDefaults, LLMDefaults } from '../schemas/config-schema';
import {
  formatValidationErrors,
  validateClientConfigFile,
  validateClientEnv,
} from '../schemas/schema-validator';

/**
 * Everything needed to build a client and its requests
 */
export interface ResolvedClientConfig {
  client: ClientFactoryConfig;
  embedder?: EmbedderDefaults;
  llm?: LLMDefaults;
}

export interface ResolveOptions {
  /** Optional YAML file with defaults */
  configPath?: string;
  /** Takes precedence over the file and LLM_PROVIDER */
  provider?: ClientProvider;
  env?: NodeJS.ProcessEnv;
}

export class ConfigLoader {
  /**
   * Load and validate a YAML client configuration file
   */
  static load(configPath: string): ClientConfigFile {
    if (!fs.existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }

    Logger.debug(`[ConfigLoader] Validating ${configPath} with Zod schema`);
    const result = validateClientConfigFile(configPath);

    if (!result.valid) {
      throw new ConfigurationError(
        `Config validation failed for ${configPath}:\n${formatValidationErrors(result.errors)}`
      );
    }

    Logger.debug(`[ConfigLoader] ✓ Config validated successfully`);
    return result.data;
  }

  /**
   * Validate the environment variables read by the clients
   */
  static loadEnv(env: NodeJS.ProcessEnv = process.env): ClientEnv {
    const result = validateClientEnv(env);

    if (!result.valid) {
      throw new ConfigurationError(
        `Environment validation failed:\n${formatValidationErrors(result.errors)}`
      );
    }

    const rawProvider = env.LLM_PROVIDER?.trim();
    if (rawProvider && result.data.LLM_PROVIDER === undefined) {
      Logger.warn(`[ConfigLoader] Invalid LLM_PROVIDER="${rawProvider}", using default "openai"`);
    }

    return result.data;
  }

  /**
   * Merge explicit options, the config file and the environment.
   *
   * Priority: options > config file > environment.
   */
  static resolve(options: ResolveOptions = {}): ResolvedClientConfig {
    const file: ClientConfigFile = options.configPath ? this.load(options.configPath) : {};
    const baseEnv = options.env ?? process.env;
    const provider = options.provider ?? file.provider;
    const env = this.loadEnv(provider ? { ...baseEnv, LLM_PROVIDER: provider } : baseEnv);

    return {
      client: {
        provider: provider ?? env.LLM_PROVIDER ?? 'openai',
        apiKey: env.OPENAI_API_KEY,
        baseURL: file.baseURL ?? env.OPENAI_BASE_URL,
        organization: file.organization ?? env.OPENAI_ORG_ID,
        timeout: file.timeout ?? env.OPENAI_TIMEOUT_MS,
        retry: file.retry,
      },
      embedder: file.embedder,
      llm: file.llm,
    };
  }
}
