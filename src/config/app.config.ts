/**
 * Application configuration.
 *
 * The only place environment variables are read. Everything below the
 * composition root receives these values through constructors.
 */

import { z } from 'zod';
import { SAFETY_LEVELS, type SafetyLevel } from '../types/safety.types';
import type { GenerationParams, ModelEndpointConfig, RetryPolicy } from '../types/gateway.types';

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((v) => (v === undefined ? fallback : v === 'true' || v === '1'));

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  LLM_PROVIDER: z.string().min(1).default('openai-compatible'),
  MODEL_ENDPOINT_URL: z.string().url(),
  MODEL_API_KEY: z.string().min(1),
  MODEL_NAME: z.string().min(1).default('default'),
  CURRICULUM_MODEL_NAME: z.string().min(1).optional(),
  MODEL_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.4),
  MODEL_MAX_TOKENS: z.coerce.number().int().positive().default(2048),
  MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  STREAM_CHUNK_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  AI_RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  AI_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
  AI_RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(10000),
  AI_RETRY_JITTER: flag(true),
  MODEL_MAX_CONCURRENCY: z.coerce.number().int().positive().default(8),
  MODEL_MAX_QUEUED: z.coerce.number().int().min(0).default(32),
  SAFETY_LEVEL: z.enum(SAFETY_LEVELS).default('standard'),
  SAFETY_MODEL_REVIEW: flag(false),
  SAFETY_INCLUDE_VIOLATION_DETAILS: flag(false),
  SCHEMA_REPAIR_STRATEGY: z.enum(['extract', 'reprompt']).default('extract'),
  CORS_ORIGINS: z.string().optional(),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(60),
});

export type RepairStrategyName = 'extract' | 'reprompt';

export interface AppConfig {
  environment: string;
  port: number;
  model: ModelEndpointConfig;
  curriculumModel: ModelEndpointConfig;
  generation: GenerationParams;
  retry: RetryPolicy;
  streamChunkTimeoutMs: number;
  pool: { maxConcurrent: number; maxQueued: number };
  safetyLevel: SafetyLevel;
  /** Adds the model review layer to every non-streamed screening and to the end of each stream. */
  safetyModelReview: boolean;
  safetyIncludeViolationDetails: boolean;
  repairStrategy: RepairStrategyName;
  corsOrigins: string[];
  /** Per-client budget on the model-backed routes. */
  rateLimit: { windowMs: number; max: number };
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const missing = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${missing}`);
  }
  const e = parsed.data;

  const model: ModelEndpointConfig = {
    provider: e.LLM_PROVIDER,
    endpointUrl: e.MODEL_ENDPOINT_URL,
    apiKey: e.MODEL_API_KEY,
    model: e.MODEL_NAME,
    timeoutMs: e.MODEL_TIMEOUT_MS,
  };

  return {
    environment: e.NODE_ENV,
    port: e.PORT,
    model,
    curriculumModel: { ...model, model: e.CURRICULUM_MODEL_NAME ?? e.MODEL_NAME },
    generation: { temperature: e.MODEL_TEMPERATURE, maxTokens: e.MODEL_MAX_TOKENS },
    retry: {
      maxAttempts: e.AI_RETRY_MAX_ATTEMPTS,
      baseDelayMs: e.AI_RETRY_BACKOFF_MS,
      maxDelayMs: Math.max(e.AI_RETRY_MAX_DELAY_MS, e.AI_RETRY_BACKOFF_MS),
      jitter: e.AI_RETRY_JITTER,
    },
    streamChunkTimeoutMs: e.STREAM_CHUNK_TIMEOUT_MS,
    pool: { maxConcurrent: e.MODEL_MAX_CONCURRENCY, maxQueued: e.MODEL_MAX_QUEUED },
    safetyLevel: e.SAFETY_LEVEL,
    safetyModelReview: e.SAFETY_MODEL_REVIEW,
    safetyIncludeViolationDetails: e.SAFETY_INCLUDE_VIOLATION_DETAILS,
    repairStrategy: e.SCHEMA_REPAIR_STRATEGY,
    corsOrigins: (e.CORS_ORIGINS ?? '').split(',').map((o) => o.trim()).filter(Boolean),
    rateLimit: { windowMs: e.RATE_LIMIT_WINDOW_MS, max: e.RATE_LIMIT_MAX },
  };
}
