/**
 * Error hierarchy for model clients.
 *
 * Errors raised by the provider SDK are not wrapped: they reach the caller as
 * the SDK's own classes. The classes below cover failures this package
 * detects itself.
 */

import { ModelType } from './types';

/** Base error for every failure raised by this package. */
export class ModelBridgeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'ModelBridgeError';
  }
}

/** Missing credential or invalid configuration. Never retried. */
export class ConfigurationError extends ModelBridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/** Model type tag outside the kinds a client can dispatch. Never retried. */
export class UnsupportedModelTypeError extends ModelBridgeError {
  readonly modelType: string;

  constructor(modelType: ModelType | string) {
    super(`model_type ${modelType} is not supported`);
    this.name = 'UnsupportedModelTypeError';
    this.modelType = modelType;
  }
}

/** Input shape does not match the selected model type. Never retried. */
export class InvalidInputError extends ModelBridgeError {
  readonly modelType: ModelType;

  constructor(message: string, modelType: ModelType) {
    super(message);
    this.name = 'InvalidInputError';
    this.modelType = modelType;
  }
}
