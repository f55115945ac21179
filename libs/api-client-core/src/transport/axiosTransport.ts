import type { HttpHeaders, HttpTransport, RawHttpResponse, TransportRequest } from '../types';

export interface AxiosProxyConfig {
  protocol?: string;
  host: string;
  port: number;
  auth?: { username: string; password: string };
}

export interface AxiosRequestConfigLike {
  url: string;
  method: string;
  headers: Record<string, string>;
  data?: unknown;
  timeout?: number;
  maxRedirects?: number;
  proxy?: AxiosProxyConfig | false;
  responseType: 'arraybuffer' | 'stream';
  validateStatus: (status: number) => boolean;
}

export interface AxiosInstanceLike {
  request(config: AxiosRequestConfigLike): Promise<{
    status: number;
    statusText?: string;
    headers: Record<string, unknown>;
    data: unknown;
    request?: { res?: { responseUrl?: string } };
  }>;
}

export interface AxiosTransportOptions {
  /**
   * Instance used when TLS verification is off, typically
   * `axios.create({ httpsAgent: new https.Agent({ rejectUnauthorized: false }) })`.
   */
  insecureInstance?: AxiosInstanceLike;
}

function toProxyConfig(proxyUrl: string): AxiosProxyConfig {
  const url = new URL(proxyUrl);
  return {
    protocol: url.protocol.replace(/:$/, ''),
    host: url.hostname,
    port: url.port ? Number(url.port) : url.protocol === 'https:' ? 443 : 80,
    auth: url.username
      ? { username: decodeURIComponent(url.username), password: decodeURIComponent(url.password) }
      : undefined,
  };
}

function isAsyncIterable(value: unknown): value is AsyncIterable<unknown> {
  return typeof value === 'object' && value !== null && Symbol.asyncIterator in value;
}

function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) return chunk;
  if (chunk instanceof ArrayBuffer) return new Uint8Array(chunk);
  if (typeof chunk === 'string') return Buffer.from(chunk);
  if (chunk === undefined || chunk === null) return new Uint8Array(0);
  return Buffer.from(JSON.stringify(chunk));
}

async function* byteStream(source: AsyncIterable<unknown>): AsyncIterable<Uint8Array> {
  for await (const chunk of source) {
    yield toBytes(chunk);
  }
}

function normalizeHeaders(source: Record<string, unknown>): HttpHeaders {
  const headers: HttpHeaders = {};
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined || value === null) continue;
    headers[key.toLowerCase()] = Array.isArray(value) ? value.map(String).join(', ') : String(value);
  }
  return headers;
}

/**
 * Transport over an axios instance. Every status resolves (the client does
 * its own status checks); TLS verification can only be disabled through
 * `insecureInstance`.
 */
export const createAxiosTransport = (
  axiosInstance: AxiosInstanceLike,
  options: AxiosTransportOptions = {},
): HttpTransport => {
  return async (req: TransportRequest): Promise<RawHttpResponse> => {
    let instance = axiosInstance;
    if (!req.tlsVerify) {
      if (!options.insecureInstance) {
        throw new Error('TLS verification can only be disabled with an insecureInstance');
      }
      instance = options.insecureInstance;
    }

    const startedAt = performance.now();
    const response = await instance.request({
      url: req.url,
      method: req.method,
      headers: req.headers,
      data: req.body,
      timeout: req.timeoutSeconds !== undefined ? req.timeoutSeconds * 1000 : undefined,
      maxRedirects: req.allowRedirects ? undefined : 0,
      proxy: req.proxyUrl ? toProxyConfig(req.proxyUrl) : undefined,
      responseType: req.responseType === 'stream' ? 'stream' : 'arraybuffer',
      validateStatus: () => true,
    });
    const elapsedSeconds = (performance.now() - startedAt) / 1000;

    const base = {
      status: response.status,
      statusText: response.statusText ?? '',
      headers: normalizeHeaders(response.headers),
      url: response.request?.res?.responseUrl ?? req.url,
      elapsedSeconds,
    };

    if (req.responseType === 'stream' && isAsyncIterable(response.data)) {
      return { ...base, stream: byteStream(response.data) };
    }
    return { ...base, body: toBytes(response.data) };
  };
};
