export * from './types';
export { RequestEngine } from './RequestEngine';
export { createDefaultRequestEngine, createRequestEngineFromEnv } from './factories';
export {
  EngineError,
  BuildError,
  TransportError,
  StatusError,
  DecodeError,
  ConfigError,
  toTransportError,
  type TransportErrorKind,
} from './errors';
export { ModelSink } from './modelSink';
export { ReplayableBody } from './replayableBody';
export {
  JSON_MEDIA_TYPE,
  XML_MEDIA_TYPE,
  FORM_MEDIA_TYPE,
  jsonCodec,
  xmlCodec,
  rawCodec,
  codecFor,
  encodeForm,
  type ContentCodec,
} from './codec';
export { buildRequest, resolveUrl, withQueryParameter, type BuildContext, type BuiltRequest } from './requestBuilder';
export { classifyAttempt, RETRYABLE_STATUSES, statusMessage, type Classification, type Verdict } from './responseClassifier';
export {
  RetryExecutor,
  DEFAULT_MAX_RETRIES,
  computeBackoffMs,
  type ExecutionResult,
  type RetryExecutorOptions,
} from './retryExecutor';
export { ConsoleLogger } from './logger';
export { loadRequestEngineEnv, parseEngineOptions, type EngineOptions, type RequestEngineEnv } from './config';
export * from './transport/fetchTransport';
export * from './transport/axiosTransport';
