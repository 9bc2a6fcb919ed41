import { FORM_MEDIA_TYPE, codecFor, encodeForm } from './codec';
import { BuildError } from './errors';
import { ReplayableBody } from './replayableBody';
import type { ContentMode, HeaderOverlay, HttpHeaders, QueryParams, RequestSpec, TransportRequest } from './types';

export interface BuildContext {
  mode: ContentMode;
  baseUrl?: string;
}

export interface BuiltRequest {
  /** Request without its body; the executor attaches a fresh body per attempt. */
  request: Omit<TransportRequest, 'body' | 'attempt'>;
  body: ReplayableBody;
  /** How the body was produced, for diagnostics. */
  encoding: 'none' | 'raw' | 'form' | ContentMode;
}

const normalizeBaseUrl = (value?: string): string | undefined => {
  const trimmed = value?.trim();
  if (!trimmed) return undefined;
  return trimmed.replace(/\/+$/, '') || trimmed;
};

const isAbsoluteUrl = (value: string): boolean => {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
};

const applyQuery = (url: URL, query?: QueryParams) => {
  if (!query) return;
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    url.searchParams.set(key, String(value));
  }
};

/**
 * Full URL the engine will call for this spec, query parameters included.
 * Throws when the URL is malformed or relative without a baseUrl.
 */
export function resolveUrl(spec: Pick<RequestSpec, 'url' | 'query'>, baseUrl?: string): string {
  let url: URL;
  if (isAbsoluteUrl(spec.url)) {
    url = new URL(spec.url);
  } else {
    const base = normalizeBaseUrl(baseUrl);
    if (!base) {
      throw new Error(`No baseUrl provided and request url is not absolute: ${spec.url}`);
    }
    const path = spec.url.startsWith('/') ? spec.url.slice(1) : spec.url;
    url = new URL(path, `${base}/`);
  }
  applyQuery(url, spec.query);
  return url.toString();
}

/**
 * Returns a copy of the RequestSpec with one query parameter set. Setting a key twice keeps
 * the last value.
 */
export function withQueryParameter<TResponse, TError>(
  spec: RequestSpec<TResponse, TError>,
  key: string,
  value: string | number | boolean,
): RequestSpec<TResponse, TError> {
  return { ...spec, query: { ...spec.query, [key]: value } };
}

const defaultHeaders = (mode: ContentMode, contentType: string | undefined): Headers => {
  const headers = new Headers();
  const mediaType = codecFor(mode).mediaType;
  if (mediaType) {
    headers.set('Accept', mediaType);
  }
  if (contentType) {
    headers.set('Content-Type', contentType);
  }
  return headers;
};

const applyOverlay = (headers: Headers, overlay?: HeaderOverlay) => {
  if (!overlay) return;
  for (const [name, value] of Object.entries(overlay)) {
    headers.delete(name);
    const values = typeof value === 'string' ? [value] : value;
    for (const entry of values) {
      headers.append(name, entry);
    }
  }
};

const headersToPlainObject = (headers: Headers): HttpHeaders => {
  const result: HttpHeaders = {};
  headers.forEach((value, key) => {
    result[key] = value;
  });
  return result;
};

const messageOf = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Turns a RequestSpec into a transport request plus its replayable body.
 *
 * Raw data is sent verbatim; a model is form-encoded when `formEncoded` is set and
 * otherwise encoded with the negotiated codec. Default Accept/Content-Type headers
 * come first and the caller's overlay replaces them header by header.
 */
export async function buildRequest(spec: RequestSpec, ctx: BuildContext): Promise<BuiltRequest> {
  let url: string;
  try {
    url = resolveUrl(spec, ctx.baseUrl);
  } catch (error) {
    throw new BuildError(`Invalid request URL: ${messageOf(error)}`, { cause: error });
  }

  let body: ReplayableBody;
  let contentType: string | undefined;
  let encoding: BuiltRequest['encoding'];
  const payload = spec.body;
  try {
    if (!payload) {
      body = ReplayableBody.empty();
      encoding = 'none';
    } else if (payload.kind === 'raw') {
      body = await ReplayableBody.capture(payload.data);
      encoding = 'raw';
    } else if (spec.formEncoded) {
      body = ReplayableBody.fromBytes(encodeForm(payload.model));
      contentType = FORM_MEDIA_TYPE;
      encoding = 'form';
    } else {
      const codec = codecFor(ctx.mode);
      body = ReplayableBody.fromBytes(codec.encode(payload.model));
      contentType = codec.mediaType;
      encoding = ctx.mode;
    }
  } catch (error) {
    throw new BuildError(`Failed to encode request body: ${messageOf(error)}`, { cause: error });
  }

  const headers = defaultHeaders(ctx.mode, contentType);
  try {
    applyOverlay(headers, spec.headers);
  } catch (error) {
    throw new BuildError(`Invalid request header: ${messageOf(error)}`, { cause: error });
  }

  return {
    request: {
      method: spec.method,
      url,
      headers: headersToPlainObject(headers),
    },
    body,
    encoding,
  };
}
