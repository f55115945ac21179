export type HttpMethod = 'GET' | 'HEAD' | 'OPTIONS' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string>;

export type QueryValue = string | number | boolean;

export type QueryParams = Record<string, QueryValue | readonly QueryValue[] | undefined>;

export type RequestBody = string | Uint8Array | URLSearchParams;

export type LoggerMeta = Record<string, unknown> & {
  entity?: string;
};

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

/**
 * Suspension primitive used for every wait the library performs.
 * Swap it for a cooperative implementation (or a fake clock in tests);
 * the core never sleeps by any other means.
 */
export interface Scheduler {
  now(): Date;
  sleep(seconds: number): Promise<void>;
}

/**
 * Exact status code, a "hundred" wildcard below 10 (`2` matches 200-299),
 * or the string form of that wildcard (`'2xx'`).
 */
export type StatusSpec = number | `${1 | 2 | 3 | 4 | 5}xx`;

/** Falsy values skip the status check altogether. */
export type ExpectedStatus = StatusSpec | readonly StatusSpec[] | null | undefined | false;

/**
 * Per-call hook run against every error raised while sending a request.
 * Returning an error replaces the original one (it is thrown instead);
 * returning `undefined` leaves the error untouched for the next processor.
 */
export type ErrorProcessor = (error: unknown) => Error | undefined;

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/** Serialisable client state persisted through a {@link StateStorage}. */
export type ClientState = Record<string, JsonValue | undefined>;

export interface StateStorage {
  get(key: string): Promise<ClientState | undefined>;
  set(key: string, state: ClientState): Promise<void>;
}

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: RequestBody;
  timeoutSeconds?: number;
  proxyUrl?: string;
  tlsVerify: boolean;
  allowRedirects: boolean;
  responseType?: 'buffer' | 'stream';
}

/**
 * Raw transport result. `body` is filled for buffered requests,
 * `stream` when the request asked for `responseType: 'stream'`.
 */
export interface RawHttpResponse {
  status: number;
  statusText: string;
  headers: HttpHeaders;
  url: string;
  elapsedSeconds: number;
  body?: Uint8Array;
  stream?: AsyncIterable<Uint8Array>;
}

export interface HttpTransport {
  (request: TransportRequest): Promise<RawHttpResponse>;
}

export interface SendRequestOptions {
  method: HttpMethod;
  url: string;
  params?: QueryParams;
  headers?: HttpHeaders;
  body?: RequestBody;
  /** Serialised as JSON; sets `Content-Type` unless one is given. */
  json?: unknown;
  /** Defaults to 200. */
  expectedStatus?: ExpectedStatus;
  /** Decode the payload as JSON regardless of the response content type. */
  decode?: boolean;
  allowRedirects?: boolean;
  errorProcessors?: readonly ErrorProcessor[];
}

export type RequestOptions = SendRequestOptions;

export type MethodRequestOptions = Omit<RequestOptions, 'method' | 'url'>;

export interface BaseClientConfig {
  baseUrl?: string;
  authIdent?: string;
  /** 1-5, higher values log more. */
  debugLevel?: number;
  /** `null` disables the timeout. */
  timeoutSeconds?: number | null;
  requestWaitSeconds?: number;
  requestWaitWithResponseTime?: boolean;
  requestWarnElapsedSeconds?: number;
  ratelimitRetries?: number;
  ratelimitWaitSeconds?: number;
  transientErrorRetries?: number;
  transientErrorWaitSeconds?: number;
  proxyUrl?: string;
  tlsVerify?: boolean;
  allowRedirects?: boolean;
  autoAuthenticate?: boolean;
  decodeContentTypes?: readonly string[];
  defaultHeaders?: HttpHeaders;
  errorProcessors?: readonly ErrorProcessor[];
  /** `null` runs the client without persistence. */
  stateStorage?: StateStorage | null;
  transport?: HttpTransport;
  scheduler?: Scheduler;
  logger?: Logger;
}
