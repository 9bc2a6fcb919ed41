import { codecFor, type ContentCodec } from './codec';
import { parseEngineOptions } from './config';
import { BuildError, EngineError, StatusError, TransportError } from './errors';
import { ConsoleLogger } from './logger';
import type { ReplayableBody } from './replayableBody';
import { buildRequest, type BuiltRequest } from './requestBuilder';
import { decodeFailure, decodeSuccess } from './responseDecoder';
import { RetryExecutor, type ExecutionResult } from './retryExecutor';
import { fetchTransport } from './transport/fetchTransport';
import type {
  ContentMode,
  EngineResponse,
  HttpMethod,
  Logger,
  MetricsRequestInfo,
  RequestEngineConfig,
  RequestOutcome,
  RequestSpec,
} from './types';

const textDecoder = new TextDecoder();

interface CallContext {
  operation?: string;
  method: HttpMethod;
  url: string;
  startedAt: number;
}

/**
 * Executes RequestSpecs: build, send with retries, classify, decode.
 *
 * One instance is shared by many calls. The content mode is fixed at construction;
 * the only state that changes between calls is the request counter.
 *
 * @example
 * ```typescript
 * const engine = new RequestEngine({ baseUrl: 'https://api.example.com', logger });
 * const orders = ModelSink.of(orderListSchema);
 *
 * await engine.request({
 *   method: 'GET',
 *   url: '/orders',
 *   query: { status: 'open' },
 *   responseModel: orders,
 * });
 * ```
 */
export class RequestEngine {
  readonly contentMode: ContentMode;
  private readonly clientName: string;
  private readonly baseUrl?: string;
  private readonly maxRetries: number;
  private readonly diagnostics: boolean;
  private readonly codec: ContentCodec;
  private readonly logger?: Logger;
  private readonly executor: RetryExecutor;
  private count = 0;

  constructor(private readonly config: RequestEngineConfig = {}) {
    const options = parseEngineOptions(config);
    this.clientName = options.clientName;
    this.contentMode = options.contentMode;
    this.baseUrl = options.baseUrl;
    this.maxRetries = options.maxRetries;
    this.diagnostics = options.diagnostics;
    this.codec = codecFor(this.contentMode);
    this.logger = config.logger ?? (this.diagnostics ? new ConsoleLogger() : undefined);
    this.executor = new RetryExecutor(config.transport ?? fetchTransport, {
      shouldRetry: config.shouldRetry,
      logger: this.logger,
      sleep: config.sleep,
      random: config.random,
    });
  }

  /** Logical calls sent since construction or the last reset. Retries are not counted. */
  requestCount(): number {
    return this.count;
  }

  resetRequestCount(): void {
    this.count = 0;
  }

  async request<TResponse = unknown, TError = unknown>(
    spec: RequestSpec<TResponse, TError>,
  ): Promise<EngineResponse<TResponse>> {
    const call: CallContext = {
      operation: spec.operation,
      method: spec.method,
      url: spec.url,
      startedAt: Date.now(),
    };
    spec.responseModel?.clear();
    spec.errorModel?.clear();

    let built: BuiltRequest;
    try {
      built = await this.build(spec);
    } catch (error) {
      throw await this.fail(call, error, 0);
    }
    call.url = built.request.url;

    this.count += 1;
    this.traceRequest(spec, built);

    const maxRetries = spec.maxRetries ?? this.maxRetries;
    const result = await this.executor.execute(built.request, built.body, maxRetries);
    if (!result) {
      const error = new TransportError('Request was not sent: no transport available', 'unknown');
      throw await this.fail(call, error, 0);
    }
    this.traceResponse(result);

    const { outcome, classification, attempts } = result;
    const response = outcome.response;

    if (classification.verdict !== 'success' || !response) {
      const error = outcome.error ?? new StatusError(outcome.status, classification.message);
      error.setRequest(outcome.request).setResponse(response);
      const errorModel = decodeFailure(this.codec, response, spec.errorModel, error);
      if (error instanceof StatusError && spec.errorModel?.filled) {
        error.errorModel = errorModel;
      }
      throw await this.fail(call, error, attempts);
    }

    let model: TResponse | undefined;
    try {
      model = decodeSuccess(this.codec, response, outcome.request, spec.responseModel);
    } catch (error) {
      throw await this.fail(call, error, attempts, response.status);
    }

    const finishedAt = Date.now();
    await this.recordMetrics(call, {
      ok: true,
      status: response.status,
      attempts,
      startedAt: new Date(call.startedAt),
      finishedAt: new Date(finishedAt),
      durationMs: finishedAt - call.startedAt,
    });
    this.logger?.info('http.request.success', {
      ...this.baseLogMeta(call),
      status: response.status,
      attempts,
      durationMs: finishedAt - call.startedAt,
    });

    return {
      status: response.status,
      headers: response.headers,
      body: response.body,
      model,
      attempts,
      request: outcome.request,
    };
  }

  private async build(spec: RequestSpec): Promise<BuiltRequest> {
    if (spec.maxRetries !== undefined && (!Number.isInteger(spec.maxRetries) || spec.maxRetries < 0)) {
      throw new BuildError(`maxRetries must be a non-negative integer (got ${spec.maxRetries})`);
    }
    return buildRequest(spec, { mode: this.contentMode, baseUrl: this.baseUrl });
  }

  /**
   * Records and logs a failed call, then hands the error back for the caller to throw.
   */
  private async fail(call: CallContext, error: unknown, attempts: number, status?: number): Promise<unknown> {
    const finishedAt = Date.now();
    const engineError = error instanceof EngineError ? error : undefined;
    const message = error instanceof Error ? error.message : String(error);
    const resolvedStatus = status ?? engineError?.response?.status;

    await this.recordMetrics(call, {
      ok: false,
      status: resolvedStatus,
      attempts,
      startedAt: new Date(call.startedAt),
      finishedAt: new Date(finishedAt),
      durationMs: finishedAt - call.startedAt,
      errorKind: engineError?.kind,
      errorMessage: message,
    });
    this.logger?.error('http.request.failed', {
      ...this.baseLogMeta(call),
      status: resolvedStatus,
      attempts,
      errorKind: engineError?.kind,
      error: message,
    });
    return error;
  }

  private baseLogMeta(call: CallContext) {
    return {
      client: this.clientName,
      operation: call.operation,
      method: call.method,
      url: call.url,
    };
  }

  private async recordMetrics(call: CallContext, outcome: RequestOutcome): Promise<void> {
    const info: MetricsRequestInfo = {
      client: this.clientName,
      operation: call.operation,
      method: call.method,
      url: call.url,
      outcome,
    };
    try {
      await this.config.metrics?.recordRequest?.(info);
    } catch (error) {
      this.logger?.warn('http.metrics.error', {
        client: this.clientName,
        operation: call.operation,
        error: error instanceof Error ? error.message : error,
      });
    }
  }

  private traceRequest(spec: RequestSpec, built: BuiltRequest): void {
    if (!this.diagnostics) return;
    this.logger?.debug('http.diagnostics.request', {
      client: this.clientName,
      method: built.request.method,
      url: built.request.url,
      headers: built.request.headers,
      encoding: built.encoding,
      body: this.describeBody(built.encoding, built.body),
      responseModel: spec.responseModel !== undefined,
      errorModel: spec.errorModel !== undefined,
    });
  }

  private traceResponse({ outcome, classification, attempts }: ExecutionResult): void {
    if (!this.diagnostics) return;
    this.logger?.debug('http.diagnostics.response', {
      client: this.clientName,
      url: outcome.request.url,
      attempts,
      verdict: classification.verdict,
      status: outcome.status,
      headers: outcome.response?.headers,
      body: outcome.response ? textDecoder.decode(outcome.response.body) : undefined,
      error: outcome.error?.message,
    });
  }

  private describeBody(encoding: BuiltRequest['encoding'], body: ReplayableBody): string | { length: number } | undefined {
    if (body.isEmpty) return undefined;
    // raw payloads may be binary
    if (encoding === 'raw') return { length: body.length };
    return body.text();
  }
}
