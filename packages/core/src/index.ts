/**
 * @modelbridge/core
 *
 * Provider-agnostic model client contract and its OpenAI implementation.
 * Provides the clients, retry policy, configuration loading and utilities.
 */

// ============================================================================
// Model Clients
// ============================================================================
export * from './llm';

// ============================================================================
// Schemas & Validation
// ============================================================================
export {
  ClientConfigFileSchema,
  ClientEnvSchema,
  type ClientConfigFile,
  type ClientEnv,
  type EmbedderDefaults,
  type LLMDefaults,
} from './schemas/config-schema';
export {
  validateClientConfigFile,
  validateClientEnv,
  formatValidationErrors,
  type ValidationResult,
  type ValidationError,
} from './schemas/schema-validator';

// ============================================================================
// Utilities
// ============================================================================
export { Logger, LogLevel } from './utils/logger';
export { ConfigLoader, type ResolvedClientConfig, type ResolveOptions } from './utils/ConfigLoader';
export { EnvLoader } from './utils/env-loader';
export {
  retryWithBackoff,
  backoffDelay,
  DEFAULT_RETRY_OPTIONS,
  type RetryOptions,
  type JitterMode,
} from './utils/retry';
