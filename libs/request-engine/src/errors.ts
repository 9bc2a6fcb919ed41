import type { ErrorKind, RawHttpResponse, TransportRequest } from './types';

/**
 * Base error for every failed engine call. Carries the last attempt's request and
 * response plus free-form context, populated through the setters.
 */
export abstract class EngineError extends Error {
  abstract readonly kind: ErrorKind;
  request?: TransportRequest;
  response?: RawHttpResponse;
  readonly extra: Record<string, unknown> = {};

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  setRequest(request: TransportRequest | undefined): this {
    this.request = request;
    return this;
  }

  setResponse(response: RawHttpResponse | undefined): this {
    this.response = response;
    return this;
  }

  setMessage(message: string | Error): this {
    this.message = typeof message === 'string' ? message : message.message;
    return this;
  }

  setExtra(key: string, value: unknown): this {
    this.extra[key] = value;
    return this;
  }
}

export class BuildError extends EngineError {
  readonly kind = 'build';
}

/**
 * `connect_timeout`: no connection or TLS session was established in time, so the
 * request never reached the server. `timeout`: the deadline expired after the
 * request may have been delivered (headers, body or the caller's abort signal).
 */
export type TransportErrorKind = 'connect_timeout' | 'timeout' | 'connection' | 'tls' | 'aborted' | 'unknown';

export class TransportError extends EngineError {
  readonly kind = 'transport';

  constructor(
    message: string,
    readonly transportKind: TransportErrorKind,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class StatusError extends EngineError {
  readonly kind = 'status';
  /** Decoded error payload, when the RequestSpec carried an errorModel sink and it decoded. */
  errorModel?: unknown;

  constructor(readonly status: number, message = `Server returned statuscode ${status}`) {
    super(message);
  }
}

export class DecodeError extends EngineError {
  readonly kind = 'decode';
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const CONNECT_TIMEOUT_CODES = new Set(['UND_ERR_CONNECT_TIMEOUT', 'ERR_TLS_HANDSHAKE_TIMEOUT']);

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ECONNABORTED', 'ESOCKETTIMEDOUT', 'UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT']);

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_SOCKET',
]);

const readString = (value: unknown, key: string): string | undefined => {
  if (typeof value !== 'object' || value === null) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' ? field : undefined;
};

const kindOf = (error: unknown): TransportErrorKind | undefined => {
  const name = readString(error, 'name');
  const code = readString(error, 'code');
  if (code && CONNECT_TIMEOUT_CODES.has(code)) return 'connect_timeout';
  if (code === 'ETIMEDOUT' && readString(error, 'syscall') === 'connect') return 'connect_timeout';
  if (name === 'TimeoutError' || (code && TIMEOUT_CODES.has(code))) return 'timeout';
  if (code && CONNECTION_CODES.has(code)) return 'connection';
  if (code && (code.startsWith('ERR_TLS') || code.startsWith('CERT_') || code === 'EPROTO')) return 'tls';
  if (name === 'AbortError' || code === 'ERR_CANCELED') return 'aborted';
  return undefined;
};

/**
 * Maps whatever a transport rejected with onto a typed TransportError.
 * fetch wraps the socket error in `cause`, so one level of cause is inspected.
 */
export function toTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) return error;
  const cause: unknown = typeof error === 'object' && error !== null ? Reflect.get(error, 'cause') : undefined;
  const kind = kindOf(error) ?? kindOf(cause) ?? 'unknown';
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(message, kind, { cause: error });
}
