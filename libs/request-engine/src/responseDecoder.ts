import type { ContentCodec } from './codec';
import { DecodeError, type EngineError } from './errors';
import type { ModelSink } from './modelSink';
import type { RawHttpResponse, TransportRequest } from './types';

const decoder = new TextDecoder();

const messageOf = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Decodes a successful response into the caller's sink. A body that does not decode
 * (or does not match the sink's schema) turns the call into a DecodeError.
 */
export function decodeSuccess<T>(
  codec: ContentCodec,
  response: RawHttpResponse,
  request: TransportRequest,
  sink: ModelSink<T> | undefined,
): T | undefined {
  if (!sink) return undefined;
  sink.clear();
  try {
    return sink.fill(codec.decode(response.body));
  } catch (error) {
    throw new DecodeError(`Failed to decode response body: ${messageOf(error)}`, { cause: error })
      .setRequest(request)
      .setResponse(response)
      .setExtra('response_message', decoder.decode(response.body));
  }
}

/**
 * Decodes a failed response into the caller's error sink. When the error body does
 * not decode, its text is kept on the error as `response_message` instead.
 *
 * @returns the decoded error model, if any
 */
export function decodeFailure<E>(
  codec: ContentCodec,
  response: RawHttpResponse | undefined,
  sink: ModelSink<E> | undefined,
  error: EngineError,
): E | undefined {
  sink?.clear();
  if (!sink || !response) return undefined;
  try {
    return sink.fill(codec.decode(response.body));
  } catch {
    error.setExtra('response_message', decoder.decode(response.body));
    return undefined;
  }
}
