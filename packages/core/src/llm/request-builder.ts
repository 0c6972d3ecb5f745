/**
 * Request Builder
 *
 * Converts the standard (input, model kwargs, model type) triple into an
 * OpenAI request. Shared by every client speaking the OpenAI request format.
 */

import { InvalidInputError, UnsupportedModelTypeError } from './errors';
import {
  ModelType,
  type ChatMessage,
  type ChatRequest,
  type EmbeddingInput,
  type EmbeddingRequest,
  type ModelInput,
  type OpenAIApiKwargs,
  type OpenAIModelKwargs,
} from './types';

function isSequence(value: unknown): value is readonly unknown[] {
  return Array.isArray(value);
}

function isTokenArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(item => typeof item === 'number');
}

/**
 * Sequences the embeddings endpoint accepts: texts, one token array, or token arrays
 */
export function isEmbeddingInput(value: readonly unknown[]): value is EmbeddingInput {
  return (
    value.every(item => typeof item === 'string') ||
    isTokenArray(value) ||
    value.every(item => isTokenArray(item))
  );
}

function isChatMessage(value: unknown): value is ChatMessage {
  return (
    typeof value === 'object' &&
    value !== null &&
    'role' in value &&
    typeof value.role === 'string'
  );
}

export function isMessageList(value: readonly unknown[]): value is ChatMessage[] {
  return value.every(isChatMessage);
}

export function isEmbeddingRequest(apiKwargs: OpenAIApiKwargs): apiKwargs is EmbeddingRequest {
  return 'input' in apiKwargs;
}

export function isChatRequest(apiKwargs: OpenAIApiKwargs): apiKwargs is ChatRequest {
  return 'messages' in apiKwargs;
}

/**
 * Build the provider request.
 *
 * EMBEDDER: a single text is wrapped into a one-element sequence and stored under `input`.
 * LLM: the message sequence is stored as-is under `messages`.
 *
 * @throws InvalidInputError if the input shape does not fit the model type
 * @throws UnsupportedModelTypeError for any other model type
 */
export function buildOpenAIRequest(
  input: ModelInput,
  modelKwargs: OpenAIModelKwargs,
  modelType: ModelType
): OpenAIApiKwargs {
  switch (modelType) {
    case ModelType.EMBEDDER: {
      const sequence: unknown = typeof input === 'string' ? [input] : input;
      if (!isSequence(sequence) || !isEmbeddingInput(sequence)) {
        throw new InvalidInputError('input must be a sequence of text', modelType);
      }
      const request: EmbeddingRequest = { ...modelKwargs, input: sequence };
      return request;
    }

    case ModelType.LLM: {
      const messages: unknown = input;
      if (!isSequence(messages) || !isMessageList(messages)) {
        throw new InvalidInputError('input must be a sequence of messages', modelType);
      }
      const request: ChatRequest = { ...modelKwargs, messages };
      return request;
    }

    default:
      throw new UnsupportedModelTypeError(modelType);
  }
}
