import type { TransportError } from './errors';
import type { ModelSink } from './modelSink';

export type HttpMethod = 'GET' | 'HEAD' | 'OPTIONS' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string>;

export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * Caller header overrides. Each named header replaces every same-named default;
 * an empty list removes the header.
 */
export type HeaderOverlay = Record<string, string | readonly string[]>;

/**
 * Serialization format negotiated once per engine instance and applied to both
 * request encoding and response decoding.
 */
export type ContentMode = 'json' | 'xml' | 'raw';

export type RawBodySource = Uint8Array | string | AsyncIterable<Uint8Array | string>;

/**
 * Request payload. A model is handed to the content codec; raw data is sent verbatim.
 * Leave `body` unset for requests without a payload.
 */
export type RequestBody =
  | { kind: 'model'; model: unknown }
  | { kind: 'raw'; data: RawBodySource };

export interface RequestSpec<TResponse = unknown, TError = unknown> {
  method: HttpMethod;
  /** Absolute URL, or a path resolved against the engine's baseUrl. */
  url: string;
  query?: QueryParams;
  body?: RequestBody;
  /** Filled with the decoded response body on success. */
  responseModel?: ModelSink<TResponse>;
  /** Filled with the decoded response body on a terminal failure. */
  errorModel?: ModelSink<TError>;
  headers?: HeaderOverlay;
  /** Send a model body as application/x-www-form-urlencoded instead of the negotiated codec. */
  formEncoded?: boolean;
  maxRetries?: number;
  /** Label used in logs and metrics. */
  operation?: string;
}

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  /** Fresh copy of the captured body for this attempt. */
  body?: Uint8Array;
  /** 1-based attempt number. */
  attempt: number;
}

export interface RawHttpResponse {
  status: number;
  headers: HttpHeaders;
  body: Uint8Array;
}

/**
 * Executes one prepared request. Rejects when no response was obtained
 * (connection refused, TLS failure, timeout).
 */
export interface HttpTransport {
  (req: TransportRequest): Promise<RawHttpResponse>;
}

export interface AttemptOutcome {
  attempt: number;
  request: TransportRequest;
  /** 0 when no response was obtained. */
  status: number;
  response?: RawHttpResponse;
  error?: TransportError;
}

export type RetryPredicate = (status: number) => boolean;

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

export type ErrorKind = 'build' | 'transport' | 'status' | 'decode';

/**
 * Summary of one logical call, across all of its attempts.
 */
export interface RequestOutcome {
  ok: boolean;
  status?: number;
  attempts: number;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  errorKind?: ErrorKind;
  errorMessage?: string;
}

export interface MetricsRequestInfo {
  client: string;
  operation?: string;
  method: HttpMethod;
  url: string;
  outcome: RequestOutcome;
}

export interface MetricsSink {
  recordRequest?(info: MetricsRequestInfo): void | Promise<void>;
}

export interface RequestEngineConfig {
  clientName?: string;
  contentMode?: ContentMode;
  transport?: HttpTransport;
  baseUrl?: string;
  /** Default retry budget; a RequestSpec may override it. Default: 5. */
  maxRetries?: number;
  /** Statuses to retry in addition to 500 and 503. */
  shouldRetry?: RetryPredicate;
  /** Emit debug traces of URL, headers, body and response. */
  diagnostics?: boolean;
  logger?: Logger;
  metrics?: MetricsSink;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface EngineResponse<TResponse = unknown> {
  status: number;
  headers: HttpHeaders;
  /** Buffered response body. */
  body: Uint8Array;
  /** Decoded response model, when the RequestSpec carried a responseModel sink. */
  model?: TResponse;
  attempts: number;
  request: TransportRequest;
}
