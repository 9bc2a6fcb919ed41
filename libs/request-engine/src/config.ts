import { z } from 'zod';
import { ConfigError } from './errors';
import { DEFAULT_MAX_RETRIES } from './retryExecutor';
import type { RequestEngineConfig } from './types';

const contentModeSchema = z.enum(['json', 'xml', 'raw']);

const engineOptionsSchema = z.object({
  clientName: z.string().min(1).default('request-engine'),
  contentMode: contentModeSchema.default('json'),
  baseUrl: z.string().url().optional(),
  maxRetries: z.number().int().nonnegative().default(DEFAULT_MAX_RETRIES),
  diagnostics: z.boolean().default(false),
});

export type EngineOptions = z.infer<typeof engineOptionsSchema>;

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

/**
 * Validates the scalar engine options and fills in their defaults.
 */
export function parseEngineOptions(config: RequestEngineConfig): EngineOptions {
  const result = engineOptionsSchema.safeParse({
    clientName: config.clientName,
    contentMode: config.contentMode,
    baseUrl: config.baseUrl,
    maxRetries: config.maxRetries,
    diagnostics: config.diagnostics,
  });
  if (!result.success) {
    throw new ConfigError(`Invalid request engine options: ${formatIssues(result.error)}`);
  }
  return result.data;
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  REQUEST_ENGINE_CONTENT_MODE: contentModeSchema.optional(),
  REQUEST_ENGINE_BASE_URL: z.string().url().optional(),
  REQUEST_ENGINE_MAX_RETRIES: z.coerce.number().int().nonnegative().optional(),
  REQUEST_ENGINE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  REQUEST_ENGINE_DEBUG: booleanFlag.optional(),
});

export interface RequestEngineEnv {
  contentMode?: z.infer<typeof contentModeSchema>;
  baseUrl?: string;
  maxRetries?: number;
  timeoutMs?: number;
  diagnostics?: boolean;
}

/**
 * Reads `REQUEST_ENGINE_*` variables:
 *
 * - `REQUEST_ENGINE_CONTENT_MODE` - json | xml | raw
 * - `REQUEST_ENGINE_BASE_URL`
 * - `REQUEST_ENGINE_MAX_RETRIES`
 * - `REQUEST_ENGINE_TIMEOUT_MS` - per-attempt transport timeout
 * - `REQUEST_ENGINE_DEBUG` - true | false | 1 | 0
 */
export function loadRequestEngineEnv(env: NodeJS.ProcessEnv = process.env): RequestEngineEnv {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(`Invalid request engine environment: ${formatIssues(result.error)}`);
  }
  const parsed = result.data;
  return {
    contentMode: parsed.REQUEST_ENGINE_CONTENT_MODE,
    baseUrl: parsed.REQUEST_ENGINE_BASE_URL,
    maxRetries: parsed.REQUEST_ENGINE_MAX_RETRIES,
    timeoutMs: parsed.REQUEST_ENGINE_TIMEOUT_MS,
    diagnostics: parsed.REQUEST_ENGINE_DEBUG,
  };
}
