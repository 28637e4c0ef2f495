import path from 'node:path';

import { ConfigError } from '@fxlake/core';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

export const DEFAULT_EXCHANGE_API_BASE_URL = 'https://v6.exchangerate-api.com/v6';
export const DEFAULT_PIPELINE_VERSION = '1.0.0';

const envSchema = z.object({
  EXCHANGE_API_BASE_URL: z.string().url().default(DEFAULT_EXCHANGE_API_BASE_URL),
  EXCHANGE_API_KEY: z.string().trim().min(1).optional(),
  FXLAKE_DATA_DIR: z.string().trim().min(1).optional(),
  FXLAKE_PIPELINE_VERSION: z.string().trim().min(1).default(DEFAULT_PIPELINE_VERSION),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type ValidatedEnv = z.infer<typeof envSchema>;

let validatedEnv: ValidatedEnv | undefined;

/**
 * Validates environment variables on first access.
 * Caches the result for subsequent calls.
 * @throws ConfigError if validation fails
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
      const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
      throw new ConfigError(`Environment validation failed:\n${errors}`);
    }
    validatedEnv = result.data;
  }
  return validatedEnv;
}

/**
 * Drop the cached environment so the next access re-reads process.env
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}

/**
 * Root of the lake (raw / silver / gold).
 *
 * Priority:
 * 1. FXLAKE_DATA_DIR environment variable (if set)
 * 2. process.cwd() + '/data' (default)
 */
export function getDataDirectory(): string {
  const env = validateEnv();
  return env.FXLAKE_DATA_DIR ?? path.join(process.cwd(), 'data');
}

export function getPipelineVersion(): string {
  return validateEnv().FXLAKE_PIPELINE_VERSION;
}

export interface ExchangeApiConfig {
  apiKey: string;
  baseUrl: string;
}

/**
 * Credentials for the rates provider. Only ingestion needs them, so their absence
 * is reported here rather than at startup.
 */
export function getExchangeApiConfig(): Result<ExchangeApiConfig, ConfigError> {
  const env = validateEnv();
  if (!env.EXCHANGE_API_KEY) {
    return err(new ConfigError('EXCHANGE_API_KEY is not set. Add it to your .env file or environment'));
  }
  return ok({ apiKey: env.EXCHANGE_API_KEY, baseUrl: env.EXCHANGE_API_BASE_URL });
}
