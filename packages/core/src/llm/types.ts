/**
 * LLM Module Types
 *
 * Shared types for every model client in the package.
 * Single source of truth for model types and the OpenAI request/response shapes.
 */

import type {
  CreateEmbeddingResponse,
  EmbeddingCreateParams,
} from 'openai/resources/embeddings';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';

/**
 * Kind of model a call is addressed to
 */
export enum ModelType {
  EMBEDDER = 'embedder',
  LLM = 'llm',
  UNDEFINED = 'undefined',
}

/**
 * Standard input of a model call: one text, or an ordered sequence
 * (texts / token arrays for embedders, message objects for chat models)
 */
export type ModelInput = string | readonly unknown[];

/**
 * Chat message format (OpenAI-compatible)
 */
export type ChatMessage = ChatCompletionMessageParam;

/**
 * Embedding input accepted by the embeddings endpoint once normalised to a sequence
 */
export type EmbeddingInput = string[] | number[] | number[][];

/** Caller options for an embedding call, everything except the input itself */
export type EmbedderModelKwargs = Omit<EmbeddingCreateParams, 'input'>;

/** Caller options for a chat completion, everything except the messages */
export type LLMModelKwargs = Omit<ChatCompletionCreateParamsNonStreaming, 'messages'>;

export type OpenAIModelKwargs = EmbedderModelKwargs | LLMModelKwargs;

export type EmbeddingRequest = EmbeddingCreateParams;
export type ChatRequest = ChatCompletionCreateParamsNonStreaming;

/**
 * Provider request built from the standard input and model kwargs
 */
export type OpenAIApiKwargs = EmbeddingRequest | ChatRequest;

export type EmbeddingResponse = CreateEmbeddingResponse;
export type ChatResponse = ChatCompletion;

/**
 * Native provider response, returned to callers unmodified
 */
export type OpenAIResponse = EmbeddingResponse | ChatResponse;
