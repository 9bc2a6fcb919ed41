import type { HttpHeaders, HttpTransport, RawHttpResponse, TransportRequest } from '../types';

export interface FetchTransportOptions {
  /** Per-attempt timeout; an expired attempt rejects with a TimeoutError. */
  timeoutMs?: number;
  fetch?: typeof fetch;
}

/**
 * fetch-based HTTP transport. The response body is read into memory once.
 */
export const createFetchTransport = (opts: FetchTransportOptions = {}): HttpTransport => {
  const doFetch = opts.fetch ?? ((input: string, init?: RequestInit) => fetch(input, init));

  return async (req: TransportRequest): Promise<RawHttpResponse> => {
    const init: RequestInit = {
      method: req.method,
      headers: req.headers,
      body: req.body,
      signal: opts.timeoutMs !== undefined ? AbortSignal.timeout(opts.timeoutMs) : undefined,
    };

    const response = await doFetch(req.url, init);
    const body = new Uint8Array(await response.arrayBuffer());

    const headers: HttpHeaders = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });

    return {
      status: response.status,
      headers,
      body,
    };
  };
};

export const fetchTransport: HttpTransport = createFetchTransport();
