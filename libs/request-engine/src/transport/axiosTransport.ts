import type { HttpHeaders, HttpTransport, RawHttpResponse, TransportRequest } from '../types';

export interface AxiosInstanceLike {
  request(config: {
    url?: string;
    method?: string;
    headers?: Record<string, string>;
    data?: unknown;
    responseType?: 'arraybuffer';
    validateStatus?: (status: number) => boolean;
  }): Promise<{
    status: number;
    headers: Record<string, unknown>;
    data: unknown;
  }>;
}

const encoder = new TextEncoder();

const headerValue = (value: unknown): string =>
  Array.isArray(value) ? value.map(String).join(', ') : String(value);

// axios hands back a Buffer under Node and an ArrayBuffer in browsers
const toBytes = (data: unknown): Uint8Array => {
  if (data instanceof Uint8Array) return data;
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  if (data === undefined || data === null) return new Uint8Array();
  return encoder.encode(typeof data === 'string' ? data : JSON.stringify(data));
};

/**
 * axios-based HTTP transport. Every status resolves so the engine can classify it;
 * only failures without a response reject.
 */
export const createAxiosTransport = (axiosInstance: AxiosInstanceLike): HttpTransport => {
  return async (req: TransportRequest): Promise<RawHttpResponse> => {
    const response = await axiosInstance.request({
      url: req.url,
      method: req.method,
      headers: req.headers,
      data: req.body,
      responseType: 'arraybuffer',
      validateStatus: () => true,
    });

    const headers: HttpHeaders = {};
    for (const [key, value] of Object.entries(response.headers ?? {})) {
      if (value === undefined || value === null) continue;
      headers[key.toLowerCase()] = headerValue(value);
    }

    return {
      status: response.status,
      headers,
      body: toBytes(response.data),
    };
  };
};
