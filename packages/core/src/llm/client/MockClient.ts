/**
 * Mock Client
 *
 * Offline implementation of IAPIClient speaking the OpenAI request format.
 * Allows setting canned replies, queuing failures and inspecting call history.
 */

import type { IAPIClient } from './types';
import {
  ModelType,
  type ChatResponse,
  type EmbeddingRequest,
  type EmbeddingResponse,
  type ModelInput,
  type OpenAIApiKwargs,
  type OpenAIModelKwargs,
  type OpenAIResponse,
} from '../types';
import { InvalidInputError, UnsupportedModelTypeError } from '../errors';
import { buildOpenAIRequest, isChatRequest, isEmbeddingRequest } from '../request-builder';
import { Logger } from '../../utils/logger';

export interface MockClientConfig {
  /** Length of generated embedding vectors */
  dimensions?: number;
}

export interface MockCall {
  apiKwargs: OpenAIApiKwargs;
  modelType: ModelType;
  async: boolean;
}

const DEFAULT_REPLY = 'This is a mock response.';

/**
 * Mock client implementing IAPIClient
 *
 * Features:
 * - Canned chat replies per model or default
 * - Deterministic embedding vectors derived from the input text
 * - Queued failures to exercise caller error paths
 * - Call history for assertions
 */
export class MockClient
  implements IAPIClient<OpenAIModelKwargs, OpenAIApiKwargs, OpenAIResponse>
{
  readonly provider = 'mock';

  private replies: Map<string, string> = new Map();
  private failures: unknown[] = [];
  private callHistory: MockCall[] = [];
  private readonly dimensions: number;

  constructor(config: MockClientConfig = {}) {
    this.dimensions = config.dimensions ?? 8;
    Logger.debug('[MockClient] Initialized');
  }

  /**
   * Set a canned chat reply for a specific model
   */
  setReply(model: string, content: string): void {
    this.replies.set(model, content);
  }

  /**
   * Set the chat reply used when no model-specific reply exists
   */
  setDefaultReply(content: string): void {
    this.replies.set('*', content);
  }

  /**
   * Make the next call reject with `error`; queued failures are consumed in order
   */
  failNext(error: unknown): void {
    this.failures.push(error);
  }

  getCalls(): MockCall[] {
    return [...this.callHistory];
  }

  getLastCall(): MockCall | undefined {
    return this.callHistory[this.callHistory.length - 1];
  }

  /**
   * Reset replies, queued failures and call history
   */
  reset(): void {
    this.replies.clear();
    this.failures = [];
    this.callHistory = [];
  }

  buildRequest(
    input: ModelInput,
    modelKwargs: OpenAIModelKwargs,
    modelType: ModelType
  ): OpenAIApiKwargs {
    return buildOpenAIRequest(input, modelKwargs, modelType);
  }

  async call(apiKwargs: OpenAIApiKwargs, modelType: ModelType): Promise<OpenAIResponse> {
    return this.respond(apiKwargs, modelType, false);
  }

  async callAsync(apiKwargs: OpenAIApiKwargs, modelType: ModelType): Promise<OpenAIResponse> {
    return this.respond(apiKwargs, modelType, true);
  }

  private respond(
    apiKwargs: OpenAIApiKwargs,
    modelType: ModelType,
    async: boolean
  ): OpenAIResponse {
    this.callHistory.push({ apiKwargs, modelType, async });

    const failure = this.failures.shift();
    if (failure !== undefined) {
      throw failure;
    }

    switch (modelType) {
      case ModelType.EMBEDDER:
        if (!isEmbeddingRequest(apiKwargs)) {
          throw new InvalidInputError('embedding request requires an "input" field', modelType);
        }
        return this.embed(apiKwargs.model, apiKwargs.input);

      case ModelType.LLM:
        if (!isChatRequest(apiKwargs)) {
          throw new InvalidInputError('chat request requires a "messages" field', modelType);
        }
        return this.complete(apiKwargs.model, apiKwargs.messages.length);

      default:
        throw new UnsupportedModelTypeError(modelType);
    }
  }

  private embed(model: string, input: EmbeddingRequest['input']): EmbeddingResponse {
    const items: readonly unknown[] = typeof input === 'string' ? [input] : input;
    const texts = items.map(item => (typeof item === 'string' ? item : JSON.stringify(item)));
    const promptTokens = texts.reduce((sum, text) => sum + Math.ceil(text.length / 4), 0);

    Logger.debug(`[MockClient] Returned ${texts.length} mock embeddings for model: ${model}`);

    return {
      object: 'list',
      model,
      data: texts.map((text, index) => ({
        object: 'embedding',
        index,
        embedding: this.vectorFor(text),
      })),
      usage: { prompt_tokens: promptTokens, total_tokens: promptTokens },
    };
  }

  /**
   * Deterministic vector: character codes folded into `dimensions` buckets, scaled to [0, 1)
   */
  private vectorFor(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (let i = 0; i < text.length; i++) {
      vector[i % this.dimensions] += text.charCodeAt(i);
    }
    return vector.map(value => (value % 1000) / 1000);
  }

  private complete(model: string, messageCount: number): ChatResponse {
    const content = this.replies.get(model) ?? this.replies.get('*') ?? DEFAULT_REPLY;
    const completionTokens = Math.ceil(content.length / 4);

    Logger.debug(`[MockClient] Returned mock completion for model: ${model}`);

    return {
      id: `mock-${this.callHistory.length}`,
      object: 'chat.completion',
      created: 0,
      model,
      choices: [
        {
          index: 0,
          finish_reason: 'stop',
          logprobs: null,
          message: { role: 'assistant', content, refusal: null },
        },
      ],
      usage: {
        prompt_tokens: messageCount,
        completion_tokens: completionTokens,
        total_tokens: messageCount + completionTokens,
      },
    };
  }

  destroy(): void {
    Logger.debug('[MockClient] Destroyed');
  }
}
