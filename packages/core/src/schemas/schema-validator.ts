/**
 * Schema Validator Utility
 *
 * Validation functions for the client configuration file and environment
 */

import { z, ZodError } from 'zod';
import * as yaml from 'js-yaml';
import * as fs from 'fs';
import { ClientConfigFileSchema, ClientEnvSchema, type ClientConfigFile, type ClientEnv } from './config-schema';

/**
 * Validation result for a single source
 */
export type ValidationResult<T> =
  | { valid: true; source: string; data: T }
  | { valid: false; source: string; errors: ValidationError[] };

/**
 * Validation error details
 */
export interface ValidationError {
  path: string;
  message: string;
}

/**
 * Formats Zod validation errors into user-friendly format
 */
export function formatZodErrors(error: ZodError): ValidationError[] {
  return error.errors.map(err => ({
    path: err.path.join('.') || 'root',
    message: err.message,
  }));
}

/**
 * Render validation errors one per line
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors.map(err => `  [${err.path}]: ${err.message}`).join('\n');
}

function validateWithSchema<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  source: string
): ValidationResult<z.infer<S>> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { valid: true, source, data: result.data };
  }
  return { valid: false, source, errors: formatZodErrors(result.error) };
}

/**
 * Validate a YAML client configuration file
 */
export function validateClientConfigFile(filePath: string): ValidationResult<ClientConfigFile> {
  let data: unknown;
  try {
    data = yaml.load(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      valid: false,
      source: filePath,
      errors: [{ path: 'root', message: `Failed to load YAML file: ${message}` }],
    };
  }

  // An empty file parses to undefined and means "no overrides"
  return validateWithSchema(ClientConfigFileSchema, data ?? {}, filePath);
}

/**
 * Validate environment variables used by the clients
 */
export function validateClientEnv(env: NodeJS.ProcessEnv): ValidationResult<ClientEnv> {
  return validateWithSchema(ClientEnvSchema, env, 'environment');
}
