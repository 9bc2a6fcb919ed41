import { loadRequestEngineEnv } from './config';
import { ConsoleLogger } from './logger';
import { RequestEngine } from './RequestEngine';
import { createFetchTransport, fetchTransport } from './transport/fetchTransport';
import type { RequestEngineConfig } from './types';

/**
 * Creates a RequestEngine with defaults suitable for most use cases.
 *
 * Defaults applied:
 * - Transport: fetch-based (via fetchTransport)
 * - Content mode: json
 * - Retries: 5, on 500/503 and timeouts
 * - Logger: console logger
 *
 * @example
 * ```typescript
 * const engine = createDefaultRequestEngine({
 *   clientName: 'billing-api',
 *   baseUrl: 'https://api.example.com',
 * });
 *
 * const res = await engine.request({ method: 'GET', url: '/invoices/42' });
 * ```
 */
export function createDefaultRequestEngine(config: RequestEngineConfig = {}): RequestEngine {
  return new RequestEngine({
    ...config,
    transport: config.transport ?? fetchTransport,
    logger: config.logger ?? new ConsoleLogger(),
  });
}

/**
 * Creates a RequestEngine from `REQUEST_ENGINE_*` environment variables.
 * Explicit overrides win over the environment.
 *
 * @throws {ConfigError} When a variable is malformed
 */
export function createRequestEngineFromEnv(
  overrides: RequestEngineConfig = {},
  env: NodeJS.ProcessEnv = process.env,
): RequestEngine {
  const fromEnv = loadRequestEngineEnv(env);
  const transport =
    overrides.transport ??
    (fromEnv.timeoutMs !== undefined ? createFetchTransport({ timeoutMs: fromEnv.timeoutMs }) : undefined);

  return new RequestEngine({
    ...overrides,
    contentMode: overrides.contentMode ?? fromEnv.contentMode,
    baseUrl: overrides.baseUrl ?? fromEnv.baseUrl,
    maxRetries: overrides.maxRetries ?? fromEnv.maxRetries,
    diagnostics: overrides.diagnostics ?? fromEnv.diagnostics,
    transport,
  });
}
