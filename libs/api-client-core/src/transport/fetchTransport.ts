import { Agent, ProxyAgent, fetch, type Dispatcher } from 'undici';
import type { HttpHeaders, HttpTransport, RawHttpResponse, TransportRequest } from '../types';

export interface FetchTransportOptions {
  /** Replaces undici's `fetch`, e.g. with a fake in tests. */
  fetch?: typeof fetch;
}

export interface FetchTransport extends HttpTransport {
  /** Closes the cached dispatchers. Later requests open new ones. */
  close(): Promise<void>;
}

/**
 * Transport on undici's `fetch`. Proxy and disabled TLS verification are
 * served by one dispatcher per combination, created on first use and kept
 * until `close()`.
 */
export const createFetchTransport = (options: FetchTransportOptions = {}): FetchTransport => {
  const fetchImpl = options.fetch ?? fetch;
  const dispatchers = new Map<string, Dispatcher>();

  const dispatcherFor = (req: TransportRequest): Dispatcher | undefined => {
    if (!req.proxyUrl && req.tlsVerify) return undefined;
    const key = `${req.proxyUrl ?? ''}|${req.tlsVerify}`;
    let dispatcher = dispatchers.get(key);
    if (!dispatcher) {
      const tls = req.tlsVerify ? undefined : { rejectUnauthorized: false };
      dispatcher = req.proxyUrl ? new ProxyAgent({ uri: req.proxyUrl, requestTls: tls }) : new Agent({ connect: tls });
      dispatchers.set(key, dispatcher);
    }
    return dispatcher;
  };

  const close = async (): Promise<void> => {
    const open = [...dispatchers.values()];
    dispatchers.clear();
    await Promise.all(open.map((dispatcher) => dispatcher.close()));
  };

  const send = async (req: TransportRequest): Promise<RawHttpResponse> => {
    const startedAt = performance.now();
    const response = await fetchImpl(req.url, {
      method: req.method,
      headers: req.headers,
      body: req.body,
      redirect: req.allowRedirects ? 'follow' : 'manual',
      signal: req.timeoutSeconds !== undefined ? AbortSignal.timeout(req.timeoutSeconds * 1000) : undefined,
      dispatcher: dispatcherFor(req),
    });
    // Time to response headers; the body is read afterwards.
    const elapsedSeconds = (performance.now() - startedAt) / 1000;

    const headers: HttpHeaders = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });

    const base = {
      status: response.status,
      statusText: response.statusText,
      headers,
      url: response.url || req.url,
      elapsedSeconds,
    };

    if (req.responseType === 'stream') {
      return { ...base, stream: response.body ?? undefined };
    }
    return { ...base, body: new Uint8Array(await response.arrayBuffer()) };
  };

  return Object.assign(send, { close });
};
