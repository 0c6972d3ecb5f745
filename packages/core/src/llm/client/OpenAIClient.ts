/**
 * OpenAI Client
 *
 * OpenAI implementation of IAPIClient.
 * Wraps the official SDK: embeddings go to `embeddings.create`, chat models to
 * `chat.completions.create`. Transient SDK errors are retried with an expiring
 * exponential backoff.
 */

import OpenAI from 'openai';
import type { IAPIClient, APIClientConfig } from './types';
import {
  ModelType,
  type ChatRequest,
  type ChatResponse,
  type EmbeddingRequest,
  type EmbeddingResponse,
  type ModelInput,
  type OpenAIApiKwargs,
  type OpenAIModelKwargs,
  type OpenAIResponse,
} from '../types';
import {
  ConfigurationError,
  InvalidInputError,
  ModelBridgeError,
  UnsupportedModelTypeError,
} from '../errors';
import { buildOpenAIRequest, isChatRequest, isEmbeddingRequest } from '../request-builder';
import { retryableKindsPredicate } from '../provider-errors';
import { DEFAULT_RETRY_OPTIONS, retryWithBackoff, type RetryOptions } from '../../utils/retry';
import { Logger } from '../../utils/logger';

export const OPENAI_API_KEY_ENV = 'OPENAI_API_KEY';

/**
 * The slice of the SDK client this adapter talks to
 */
export interface OpenAIHandle {
  embeddings: {
    create(body: EmbeddingRequest): PromiseLike<EmbeddingResponse>;
  };
  chat: {
    completions: {
      create(body: ChatRequest): PromiseLike<ChatResponse>;
    };
  };
}

/**
 * Options passed to the SDK constructor
 */
export interface OpenAIHandleOptions {
  apiKey: string;
  baseURL?: string;
  organization?: string;
  timeout?: number;
  maxRetries: number;
}

export type OpenAIHandleFactory = (options: OpenAIHandleOptions) => OpenAIHandle;

export interface OpenAIClientConfig extends Omit<APIClientConfig, 'provider'> {
  /**
   * Retries done by the SDK itself, below this client's retry policy
   * @default 0
   */
  maxRetries?: number;

  /** Builds SDK handles; tests inject fakes here */
  createHandle?: OpenAIHandleFactory;
}

const createSdkHandle: OpenAIHandleFactory = options => new OpenAI(options);

function destroyedError(): ModelBridgeError {
  return new ModelBridgeError('[OpenAIClient] Client has been destroyed');
}

/**
 * OpenAI client implementing IAPIClient
 *
 * The primary handle is built in the constructor so a missing credential fails
 * fast. The secondary handle used by `callAsync` is only built on first use.
 */
export class OpenAIClient
  implements IAPIClient<OpenAIModelKwargs, OpenAIApiKwargs, OpenAIResponse>
{
  readonly provider = 'openai';

  private readonly config: OpenAIClientConfig;
  private readonly createHandle: OpenAIHandleFactory;
  private readonly retryOptions: Partial<RetryOptions> & Pick<RetryOptions, 'isRetryable'>;
  private syncHandle: OpenAIHandle | undefined;
  private asyncHandle: OpenAIHandle | undefined;
  private destroyed = false;

  constructor(config: OpenAIClientConfig = {}) {
    this.config = config;
    this.createHandle = config.createHandle ?? createSdkHandle;

    const retry = config.retry ?? {};
    this.retryOptions = {
      isRetryable: retryableKindsPredicate(retry.retryableKinds),
      maxTimeMs: retry.maxTimeMs ?? DEFAULT_RETRY_OPTIONS.maxTimeMs,
      baseDelayMs: retry.baseDelayMs ?? DEFAULT_RETRY_OPTIONS.baseDelayMs,
      maxDelayMs: retry.maxDelayMs ?? DEFAULT_RETRY_OPTIONS.maxDelayMs,
      jitter: retry.jitter ?? DEFAULT_RETRY_OPTIONS.jitter,
    };

    this.syncHandle = this.initHandle('sync');
  }

  private resolveApiKey(): string {
    const apiKey = this.config.apiKey || process.env[OPENAI_API_KEY_ENV];
    if (!apiKey) {
      throw new ConfigurationError(`Environment variable ${OPENAI_API_KEY_ENV} must be set`);
    }
    return apiKey;
  }

  private initHandle(kind: 'sync' | 'async'): OpenAIHandle {
    const handle = this.createHandle({
      apiKey: this.resolveApiKey(),
      baseURL: this.config.baseURL,
      organization: this.config.organization,
      timeout: this.config.timeout,
      maxRetries: this.config.maxRetries ?? 0,
    });
    Logger.debug(`[OpenAIClient] Initialized ${kind} handle`);
    return handle;
  }

  /**
   * Returns the secondary handle, building it on first use.
   *
   * The check-and-set runs before any await, so concurrent first callers all
   * see the same instance.
   */
  private getAsyncHandle(): OpenAIHandle {
    this.assertNotDestroyed();
    if (!this.asyncHandle) {
      this.asyncHandle = this.initHandle('async');
    }
    return this.asyncHandle;
  }

  /**
   * Returns the primary handle built in the constructor; it is only ever cleared by `destroy`
   */
  private getSyncHandle(): OpenAIHandle {
    if (this.destroyed || !this.syncHandle) {
      throw destroyedError();
    }
    return this.syncHandle;
  }

  private assertNotDestroyed(): void {
    if (this.destroyed) {
      throw destroyedError();
    }
  }

  buildRequest(
    input: ModelInput,
    modelKwargs: OpenAIModelKwargs,
    modelType: ModelType
  ): OpenAIApiKwargs {
    return buildOpenAIRequest(input, modelKwargs, modelType);
  }

  async call(apiKwargs: OpenAIApiKwargs, modelType: ModelType): Promise<OpenAIResponse> {
    const handle = this.getSyncHandle();
    return retryWithBackoff(() => this.dispatch(handle, apiKwargs, modelType), {
      ...this.retryOptions,
      context: 'OpenAIClient.call',
    });
  }

  async callAsync(apiKwargs: OpenAIApiKwargs, modelType: ModelType): Promise<OpenAIResponse> {
    const handle = this.getAsyncHandle();
    return retryWithBackoff(() => this.dispatch(handle, apiKwargs, modelType), {
      ...this.retryOptions,
      context: 'OpenAIClient.callAsync',
    });
  }

  private async dispatch(
    handle: OpenAIHandle,
    apiKwargs: OpenAIApiKwargs,
    modelType: ModelType
  ): Promise<OpenAIResponse> {
    switch (modelType) {
      case ModelType.EMBEDDER:
        if (!isEmbeddingRequest(apiKwargs)) {
          throw new InvalidInputError('embedding request requires an "input" field', modelType);
        }
        return handle.embeddings.create(apiKwargs);

      case ModelType.LLM:
        if (!isChatRequest(apiKwargs)) {
          throw new InvalidInputError('chat request requires a "messages" field', modelType);
        }
        return handle.chat.completions.create(apiKwargs);

      default:
        throw new UnsupportedModelTypeError(modelType);
    }
  }

  /**
   * Drop both SDK handles
   */
  destroy(): void {
    this.destroyed = true;
    this.syncHandle = undefined;
    this.asyncHandle = undefined;
    Logger.debug('[OpenAIClient] Handles released');
  }
}
