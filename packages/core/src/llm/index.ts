/**
 * LLM Module
 *
 * Provides single source of truth for:
 * - Model types and OpenAI request/response shapes
 * - Request building
 * - Error classes and provider error classification
 * - Client abstraction (OpenAI, Mock)
 */

// Core utilities
export * from './types';
export * from './errors';
export {
  buildOpenAIRequest,
  isChatRequest,
  isEmbeddingInput,
  isEmbeddingRequest,
  isMessageList,
} from './request-builder';
export {
  classifyProviderError,
  retryableKindsPredicate,
  DEFAULT_RETRYABLE_KINDS,
  PROVIDER_ERROR_KINDS,
  type ProviderErrorKind,
} from './provider-errors';

// Client abstraction
export * from './client';
