import { z } from 'zod';
import { PROVIDER_ERROR_KINDS } from '../llm/provider-errors';

const ProviderSchema = z.enum(['openai', 'mock']);

const RetrySchema = z.object({
  maxTimeMs: z.number().int().nonnegative('maxTimeMs must be zero or positive').optional(),
  baseDelayMs: z.number().positive('baseDelayMs must be positive').optional(),
  maxDelayMs: z.number().positive('maxDelayMs must be positive').optional(),
  jitter: z.enum(['full', 'none']).optional(),
  retryableKinds: z.array(z.enum(PROVIDER_ERROR_KINDS)).optional(),
});

// Defaults merged into every embedding request
const EmbedderDefaultsSchema = z.object({
  model: z.string().min(1, 'embedder model is required'),
  dimensions: z.number().int().positive('dimensions must be a positive integer').optional(),
  encoding_format: z.enum(['float', 'base64']).optional(),
  user: z.string().optional(),
});

// Defaults merged into every chat completion request
const LLMDefaultsSchema = z.object({
  model: z.string().min(1, 'llm model is required'),
  temperature: z.number().min(0).max(2, 'temperature must be between 0 and 2').optional(),
  top_p: z.number().min(0).max(1, 'top_p must be between 0 and 1').optional(),
  max_tokens: z.number().int().positive('max_tokens must be a positive integer').optional(),
  frequency_penalty: z.number().min(-2).max(2).optional(),
  presence_penalty: z.number().min(-2).max(2).optional(),
  seed: z.number().int().optional(),
  user: z.string().optional(),
});

export const ClientConfigFileSchema = z.object({
  provider: ProviderSchema.optional(),
  baseURL: z.string().url('baseURL must be a valid URL').optional(),
  organization: z.string().min(1).optional(),
  timeout: z.number().int().positive('timeout must be a positive integer').optional(),
  embedder: EmbedderDefaultsSchema.optional(),
  llm: LLMDefaultsSchema.optional(),
  retry: RetrySchema.optional(),
});

// Environment values set to an empty string count as unset
const blankAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const providerName = (value: unknown) => {
  const present = blankAsUndefined(value);
  return typeof present === 'string' ? present.trim().toLowerCase() : present;
};

export const ClientEnvSchema = z
  .object({
    OPENAI_API_KEY: z.preprocess(blankAsUndefined, z.string().optional()),
    OPENAI_BASE_URL: z.preprocess(
      blankAsUndefined,
      z.string().url('OPENAI_BASE_URL must be a valid URL').optional()
    ),
    OPENAI_ORG_ID: z.preprocess(blankAsUndefined, z.string().optional()),
    OPENAI_TIMEOUT_MS: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().optional()),
    // Unknown providers are dropped; the default provider applies, as in APIClientFactory
    LLM_PROVIDER: z.preprocess(providerName, ProviderSchema.optional().catch(undefined)),
    LOG_VERBOSITY: z.preprocess(blankAsUndefined, z.coerce.number().int().min(0).max(3).optional()),
  })
  .superRefine((env, ctx) => {
    if ((env.LLM_PROVIDER ?? 'openai') === 'openai' && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message: 'OPENAI_API_KEY must be set when LLM_PROVIDER is openai',
      });
    }
  });

export type ClientConfigFile = z.infer<typeof ClientConfigFileSchema>;
export type ClientEnv = z.infer<typeof ClientEnvSchema>;
export type EmbedderDefaults = z.infer<typeof EmbedderDefaultsSchema>;
export type LLMDefaults = z.infer<typeof LLMDefaultsSchema>;
