/**
 * LLM endpoint configuration, read from the environment.
 *
 * `.env.local` is loaded before `.env`; neither overrides variables that are
 * already set in the shell.
 */

import { existsSync } from 'fs';
import { resolve } from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import {
  ErrorMessage,
  ProviderSchema,
  type Provider,
  DEFAULT_BASE_URL,
  DEFAULT_MODEL,
  DEFAULT_TEMPERATURE,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_RETRIES,
  DEFAULT_RETRY_WAIT_MS,
  DEFAULT_BATCH_SIZE,
} from './constants.js';
import { ConfigError } from './errors.js';

export function loadEnv(cwd: string = process.cwd()): void {
  const localPath = resolve(cwd, '.env.local');
  if (existsSync(localPath)) dotenv.config({ path: localPath });
  dotenv.config({ path: resolve(cwd, '.env') });
}

const EnvSchema = z.object({
  LLM_PROVIDER: ProviderSchema,
  LLM_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  LLM_API_KEY: z.string().min(1).optional(),
  NCHC_API_KEY: z.string().min(1).optional(),
  LLM_MODEL: z.string().min(1).default(DEFAULT_MODEL),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(DEFAULT_TEMPERATURE),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  LLM_RETRIES: z.coerce.number().int().min(1).default(DEFAULT_RETRIES),
  LLM_RETRY_WAIT_MS: z.coerce.number().int().min(0).default(DEFAULT_RETRY_WAIT_MS),
  BATCH_SIZE: z.coerce.number().int().positive().default(DEFAULT_BATCH_SIZE),
});

export type LLMConfig = {
  provider: Provider;
  baseURL: string;
  /** Empty only when the caller did not require a key (dry runs). */
  apiKey: string;
  model: string;
  temperature: number;
  timeoutMs: number;
  retries: number;
  retryWaitMs: number;
  batchSize: number;
};

/** The subset of configuration a batch run needs. */
export type RunSettings = Pick<LLMConfig, 'batchSize' | 'retries' | 'retryWaitMs' | 'temperature'>;

/** Drop empty strings so `FOO=` in a .env file falls back to the default. */
function nonEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value.trim();
  }
  return out;
}

export function loadLLMConfig(
  env: NodeJS.ProcessEnv = process.env,
  options: { requireApiKey?: boolean } = {},
): LLMConfig {
  const parsed = EnvSchema.safeParse(nonEmpty(env));
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid configuration',
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const e = parsed.data;
  const apiKey = e.LLM_API_KEY ?? e.NCHC_API_KEY ?? '';
  if (options.requireApiKey !== false && !apiKey) {
    throw new ConfigError(ErrorMessage.MissingApiKey);
  }

  return {
    provider: e.LLM_PROVIDER,
    baseURL: e.LLM_BASE_URL.replace(/\/+$/, ''),
    apiKey,
    model: e.LLM_MODEL,
    temperature: e.LLM_TEMPERATURE,
    timeoutMs: e.LLM_TIMEOUT_MS,
    retries: e.LLM_RETRIES,
    retryWaitMs: e.LLM_RETRY_WAIT_MS,
    batchSize: e.BATCH_SIZE,
  };
}
