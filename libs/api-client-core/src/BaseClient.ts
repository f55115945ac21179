import { createWriteStream } from 'fs';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { runAuthenticated, type AuthenticatableClient } from './authGate';
import { ClientResponse } from './ClientResponse';
import { DEFAULT_CLIENT_SETTINGS } from './config';
import { runErrorProcessors } from './errorRules';
import { DecodeError, HttpStatusError, type AuthRequiredError } from './errors';
import { withLogEntity } from './logger';
import { decodeResponse, type ResponseDecoder, type SchemaApplyingClient } from './responseSchema';
import { attemptOutcome, executeWithRetryPolicy, type RetryEvent, type RetryPolicy } from './retryPolicy';
import { elapsedSeconds, systemScheduler } from './scheduler';
import { matchesStatus } from './statusMatch';
import { createFetchTransport } from './transport/fetchTransport';
import type {
  BaseClientConfig,
  ClientState,
  ErrorProcessor,
  HttpHeaders,
  HttpMethod,
  HttpTransport,
  Logger,
  MethodRequestOptions,
  QueryParams,
  RawHttpResponse,
  RequestBody,
  RequestOptions,
  Scheduler,
  SendRequestOptions,
  StateStorage,
} from './types';

const ABSOLUTE_URL = /^[a-z][a-z0-9+.-]*:/i;
const DEFAULT_EXPECTED_STATUS = 200;

type JsonDecodeResult = { ok: true; value: unknown } | { ok: false; error: unknown };

function decodeJson(response: ClientResponse): JsonDecodeResult {
  try {
    return { ok: true, value: JSON.parse(response.text()) };
  } catch (error) {
    return { ok: false, error };
  }
}

function lowerCaseHeaders(headers: HttpHeaders): HttpHeaders {
  const result: HttpHeaders = {};
  for (const [key, value] of Object.entries(headers)) {
    result[key.toLowerCase()] = value;
  }
  return result;
}

function hasHeader(headers: HttpHeaders, name: string): boolean {
  const lowered = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === lowered);
}

function appendQuery(url: string, params?: QueryParams): string {
  if (!params) return url;
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const entry of value) search.append(key, String(entry));
    } else {
      search.append(key, String(value));
    }
  }
  const query = search.toString();
  if (!query) return url;
  return `${url}${url.includes('?') ? '&' : '?'}${query}`;
}

async function readStream(stream: AsyncIterable<Uint8Array> | undefined): Promise<Uint8Array> {
  if (!stream) return new Uint8Array(0);
  const chunks: Uint8Array[] = [];
  for await (const chunk of stream) chunks.push(chunk);
  return Buffer.concat(chunks);
}

export interface InitializeOptions {
  /** `true` loads from the state store, an object is applied as is, `false` skips loading. */
  loadState?: boolean | ClientState;
}

/**
 * Base class for API clients.
 *
 * Subclasses implement their endpoints on top of {@link BaseClient.request}
 * (or the `get`/`post`/... shorthands) and may override
 * {@link BaseClient.performRequest} to add per-API error translation,
 * {@link BaseClient.authenticate} / {@link BaseClient.recoverAuth} for login,
 * and {@link BaseClient.getState} / {@link BaseClient.applyState} to persist
 * extra session data.
 */
export class BaseClient implements AuthenticatableClient, SchemaApplyingClient {
  readonly baseUrl?: string;
  readonly debugLevel: number;
  readonly timeoutSeconds: number | null;
  readonly requestWaitSeconds: number;
  readonly requestWaitWithResponseTime: boolean;
  readonly requestWarnElapsedSeconds: number;
  readonly ratelimitRetries: number;
  readonly ratelimitWaitSeconds: number;
  readonly transientErrorRetries: number;
  readonly transientErrorWaitSeconds: number;
  readonly proxyUrl?: string;
  readonly tlsVerify: boolean;
  readonly allowRedirects: boolean;
  readonly autoAuthenticate: boolean;
  readonly decodeContentTypes: readonly string[];
  readonly defaultHeaders: HttpHeaders;
  readonly stateStorage: StateStorage | null;

  protected readonly transport: HttpTransport;
  protected readonly scheduler: Scheduler;
  protected readonly errorProcessors: readonly ErrorProcessor[];
  private readonly baseLogger?: Logger;

  callsCount = 0;
  callsElapsedSeconds = 0;
  firstCallTime?: Date;
  lastCallTime?: Date;
  /** Most recent response; kept for debugging only. */
  lastResponse?: ClientResponse;

  isAuthenticated = false;
  authIdent?: string;

  constructor(config: BaseClientConfig = {}) {
    this.baseUrl = config.baseUrl;
    this.authIdent = config.authIdent;
    this.debugLevel = config.debugLevel ?? DEFAULT_CLIENT_SETTINGS.debugLevel;
    this.timeoutSeconds = config.timeoutSeconds === undefined ? DEFAULT_CLIENT_SETTINGS.timeoutSeconds : config.timeoutSeconds;
    this.requestWaitSeconds = config.requestWaitSeconds ?? DEFAULT_CLIENT_SETTINGS.requestWaitSeconds;
    this.requestWaitWithResponseTime =
      config.requestWaitWithResponseTime ?? DEFAULT_CLIENT_SETTINGS.requestWaitWithResponseTime;
    this.requestWarnElapsedSeconds = config.requestWarnElapsedSeconds ?? DEFAULT_CLIENT_SETTINGS.requestWarnElapsedSeconds;
    this.ratelimitRetries = config.ratelimitRetries ?? DEFAULT_CLIENT_SETTINGS.ratelimitRetries;
    this.ratelimitWaitSeconds = config.ratelimitWaitSeconds ?? DEFAULT_CLIENT_SETTINGS.ratelimitWaitSeconds;
    this.transientErrorRetries = config.transientErrorRetries ?? DEFAULT_CLIENT_SETTINGS.transientErrorRetries;
    this.transientErrorWaitSeconds = config.transientErrorWaitSeconds ?? DEFAULT_CLIENT_SETTINGS.transientErrorWaitSeconds;
    this.proxyUrl = config.proxyUrl;
    this.tlsVerify = config.tlsVerify ?? DEFAULT_CLIENT_SETTINGS.tlsVerify;
    this.allowRedirects = config.allowRedirects ?? DEFAULT_CLIENT_SETTINGS.allowRedirects;
    this.autoAuthenticate = config.autoAuthenticate ?? DEFAULT_CLIENT_SETTINGS.autoAuthenticate;
    this.decodeContentTypes = (config.decodeContentTypes ?? DEFAULT_CLIENT_SETTINGS.decodeContentTypes).map((type) =>
      type.toLowerCase(),
    );
    this.defaultHeaders = { ...config.defaultHeaders };
    this.errorProcessors = config.errorProcessors ?? [];
    this.stateStorage = config.stateStorage ?? null;
    this.transport = config.transport ?? createFetchTransport();
    this.scheduler = config.scheduler ?? systemScheduler;
    this.baseLogger = config.logger;

    if (this.debugLevel >= 4) {
      this.logger?.debug('client.initialized', {
        client: new.target.name,
        baseUrl: this.baseUrl,
        ratelimitRetries: this.ratelimitRetries,
        transientErrorRetries: this.transientErrorRetries,
        stateStorage: this.stateStorage?.constructor.name ?? null,
      });
    }
  }

  /** Logger tagged with the account this client acts for. */
  protected get logger(): Logger | undefined {
    return this.baseLogger && withLogEntity(this.baseLogger, this.authName ?? this.authIdent);
  }

  /** Display name of the authenticated identity; defaults to `authIdent`. */
  get authName(): string | undefined {
    return this.authIdent;
  }

  get authRepr(): string {
    const name = this.authName;
    if (name && name !== this.authIdent) {
      return `${this.authIdent} ${name}`;
    }
    return String(this.authIdent);
  }

  protected get retryPolicy(): RetryPolicy {
    return {
      ratelimitRetries: this.ratelimitRetries,
      ratelimitWaitSeconds: this.ratelimitWaitSeconds,
      transientErrorRetries: this.transientErrorRetries,
      transientErrorWaitSeconds: this.transientErrorWaitSeconds,
    };
  }

  // ---------------------------------------------------------------------------
  // Request pipeline
  // ---------------------------------------------------------------------------

  /**
   * Runs {@link performRequest} under the retry policy. Every failure passes
   * through {@link processError} first, which may translate it into a
   * rate-limit or transient error.
   */
  async request(options: RequestOptions): Promise<ClientResponse> {
    return executeWithRetryPolicy(
      () =>
        attemptOutcome(async () => {
          try {
            return await this.performRequest(options);
          } catch (error) {
            this.processError(error);
            throw error;
          }
        }),
      this.retryPolicy,
      {
        sleep: (seconds, reason) => this.sleep(seconds, reason),
        onRetry: (event) => this.logRetry(event),
      },
    );
  }

  get(url: string, options: MethodRequestOptions = {}): Promise<ClientResponse> {
    return this.request({ ...options, method: 'GET', url });
  }

  post(url: string, options: MethodRequestOptions = {}): Promise<ClientResponse> {
    return this.request({ ...options, method: 'POST', url });
  }

  put(url: string, options: MethodRequestOptions = {}): Promise<ClientResponse> {
    return this.request({ ...options, method: 'PUT', url });
  }

  patch(url: string, options: MethodRequestOptions = {}): Promise<ClientResponse> {
    return this.request({ ...options, method: 'PATCH', url });
  }

  delete(url: string, options: MethodRequestOptions = {}): Promise<ClientResponse> {
    return this.request({ ...options, method: 'DELETE', url });
  }

  /** One attempt of {@link request}; override to wrap or translate per API. */
  protected performRequest(options: RequestOptions): Promise<ClientResponse> {
    return this.sendRequest(options);
  }

  /** Client-wide error hook; throws the first replacement produced by the configured processors. */
  protected processError(error: unknown): void {
    runErrorProcessors(error, this.errorProcessors);
  }

  /**
   * Sends a single request: waits out `requestWaitSeconds`, updates the call
   * counters, checks the status and decodes JSON payloads.
   *
   * @throws HttpStatusError when the status does not match `expectedStatus`
   * @throws DecodeError when a payload that has to be decoded is not JSON
   */
  async sendRequest(options: SendRequestOptions): Promise<ClientResponse> {
    await this.waitBeforeSend();

    const method = options.method;
    const url = appendQuery(this.resolveUrl(options.url), options.params);
    const headers: HttpHeaders = { ...this.defaultHeaders, ...options.headers };
    let body: RequestBody | undefined = options.body;
    if (options.json !== undefined) {
      body = JSON.stringify(options.json);
      if (!hasHeader(headers, 'content-type')) {
        headers['content-type'] = 'application/json';
      }
    }

    if (this.debugLevel >= 5) {
      this.logger?.debug('client.request', { method, url, headers, body: typeof body === 'string' ? body : undefined });
    }

    let raw: RawHttpResponse;
    try {
      raw = await this.transport({
        method,
        url,
        headers,
        body,
        timeoutSeconds: this.timeoutSeconds ?? undefined,
        proxyUrl: this.proxyUrl,
        tlsVerify: this.tlsVerify,
        allowRedirects: options.allowRedirects ?? this.allowRedirects,
      });
    } catch (error) {
      runErrorProcessors(error, options.errorProcessors);
      throw error;
    } finally {
      if (this.requestWaitWithResponseTime) {
        this.lastCallTime = this.scheduler.now();
      }
    }

    const response = this.toClientResponse(method, url, raw, raw.body ?? new Uint8Array(0));
    if (this.debugLevel >= 5) {
      this.logger?.debug('client.response', { method, status: response.status, url: response.url, body: response.text() });
    }

    if (response.elapsedSeconds > this.requestWarnElapsedSeconds) {
      this.logger?.warn('client.request.slow', {
        method,
        url: response.url,
        elapsedSeconds: response.elapsedSeconds,
        ...this.callStats(),
      });
    }
    this.callsElapsedSeconds += response.elapsedSeconds;
    this.callsCount += 1;
    this.lastResponse = response;

    const expectedStatus = options.expectedStatus === undefined ? DEFAULT_EXPECTED_STATUS : options.expectedStatus;
    const shouldDecode = options.decode === true || this.decodesContentType(response.contentType);

    if (!matchesStatus(response.status, expectedStatus)) {
      let diagnostic = response;
      if (shouldDecode) {
        const decoded = decodeJson(response);
        if (decoded.ok) {
          diagnostic = response.withPayload({ kind: 'raw', value: decoded.value });
          this.lastResponse = diagnostic;
        }
      }
      const error = new HttpStatusError(diagnostic, expectedStatus);
      runErrorProcessors(error, options.errorProcessors);
      throw error;
    }

    if (!shouldDecode) {
      return response;
    }

    const decoded = decodeJson(response);
    if (!decoded.ok) {
      const error = new DecodeError(response, decoded.error);
      runErrorProcessors(error, options.errorProcessors);
      throw error;
    }
    const result = response.withPayload({ kind: 'raw', value: decoded.value });
    this.lastResponse = result;
    return result;
  }

  /**
   * Streams a `200` response into `outputPath` (the last URL segment by
   * default) and returns the path written.
   */
  async download(url: string, outputPath?: string): Promise<string> {
    const target = outputPath ?? (url.split('?')[0].split('/').pop() || 'download');
    const resolved = this.resolveUrl(url);
    const raw = await this.transport({
      method: 'GET',
      url: resolved,
      headers: { ...this.defaultHeaders },
      timeoutSeconds: this.timeoutSeconds ?? undefined,
      proxyUrl: this.proxyUrl,
      tlsVerify: this.tlsVerify,
      allowRedirects: true,
      responseType: 'stream',
    });

    if (raw.status !== 200) {
      const response = this.toClientResponse('GET', resolved, raw, raw.body ?? (await readStream(raw.stream)));
      throw new HttpStatusError(response, 200);
    }

    const source = raw.stream ?? (raw.body ? [raw.body] : []);
    await pipeline(Readable.from(source), createWriteStream(target));
    return target;
  }

  /** Waits through the injected scheduler; zero is a no-op and negative durations are rejected. */
  async sleep(seconds: number, reason?: string): Promise<void> {
    if (seconds < 0) {
      throw new RangeError(`Can't sleep in backward time: ${seconds}`);
    }
    if (seconds === 0) {
      return;
    }
    if (this.debugLevel >= 4) {
      this.logger?.debug('client.sleep', { seconds, reason });
    }
    await this.scheduler.sleep(seconds);
  }

  applyResponseSchema<T>(
    response: ClientResponse,
    decoder: ResponseDecoder<T>,
    options: { dataPath?: string } = {},
  ): ClientResponse<T> {
    return decodeResponse(
      response,
      decoder,
      { debugLevel: this.debugLevel, logger: this.logger, client: this, rawResponse: response },
      options.dataPath ?? decoder.dataPath,
    );
  }

  private async waitBeforeSend(): Promise<void> {
    const now = this.scheduler.now();
    if (this.lastCallTime) {
      if (this.requestWaitSeconds > 0) {
        const delta = elapsedSeconds(this.lastCallTime, now);
        if (delta < this.requestWaitSeconds) {
          await this.sleep(this.requestWaitSeconds - delta, 'request wait');
        }
      }
    } else {
      this.firstCallTime = now;
    }
    this.lastCallTime = this.scheduler.now();
  }

  private resolveUrl(url: string): string {
    return ABSOLUTE_URL.test(url) ? url : `${this.baseUrl ?? ''}${url}`;
  }

  private decodesContentType(contentType: string | undefined): boolean {
    return contentType !== undefined && this.decodeContentTypes.includes(contentType);
  }

  private toClientResponse(method: HttpMethod, url: string, raw: RawHttpResponse, body: Uint8Array): ClientResponse {
    return new ClientResponse({
      method,
      url: raw.url || url,
      status: raw.status,
      statusText: raw.statusText,
      headers: lowerCaseHeaders(raw.headers),
      body,
      elapsedSeconds: raw.elapsedSeconds,
    });
  }

  private callStats() {
    return {
      callsCount: this.callsCount,
      callsElapsedSeconds: this.callsElapsedSeconds,
      firstCallTime: this.firstCallTime?.toISOString(),
    };
  }

  private logRetry(event: RetryEvent): void {
    const meta = {
      kind: event.kind,
      attempt: event.attempt,
      retryIdent: event.retryIdent,
      error: event.error.message,
      ...this.callStats(),
    };
    if (event.kind === 'transient') {
      this.logger?.debug('client.request.retry', meta);
    } else {
      this.logger?.warn('client.request.retry', meta);
    }
  }

  // ---------------------------------------------------------------------------
  // Authentication and persisted state
  // ---------------------------------------------------------------------------

  async authenticate(): Promise<void> {
    throw new Error(`${this.constructor.name} does not implement authenticate()`);
  }

  /** Tries to restore the session after an {@link AuthRequiredError}; `false` gives up. */
  async recoverAuth(_error: AuthRequiredError): Promise<boolean> {
    return false;
  }

  /** Runs `operation` behind the authentication gate of this client. */
  protected withAuth<R>(operation: () => Promise<R>): Promise<R> {
    return runAuthenticated(this, operation);
  }

  protected async setAuthenticated(authIdent: string, mode: string, data?: unknown): Promise<void> {
    this.authIdent = authIdent;
    this.isAuthenticated = true;
    this.logger?.info('client.authenticated', { authIdent, mode, data });
    if (this.stateStorage) {
      await this.saveState();
    }
  }

  /** State persisted under `authIdent`; subclasses extend it. */
  getState(): ClientState {
    return {
      isAuthenticated: this.isAuthenticated,
      authIdent: this.authIdent,
    };
  }

  applyState(state: ClientState): void {
    if (typeof state.isAuthenticated === 'boolean') {
      this.isAuthenticated = state.isAuthenticated;
    }
    if (typeof state.authIdent === 'string') {
      this.authIdent = state.authIdent;
    }
  }

  initState(): void {
    this.isAuthenticated = false;
  }

  /**
   * Applies `state`, or the state stored for `authIdent`. Resolves `false`
   * when there is nothing to load. States written before `isAuthenticated`
   * was persisted load as authenticated.
   */
  async loadState(state?: ClientState): Promise<boolean> {
    let loaded = state;
    if (!loaded || Object.keys(loaded).length === 0) {
      loaded = undefined;
      if (this.authIdent) {
        if (!this.stateStorage) {
          throw new Error(`No state or stateStorage to load: ${this.authRepr}`);
        }
        loaded = await this.stateStorage.get(this.authIdent);
      }
      if (!loaded || Object.keys(loaded).length === 0) {
        if (this.debugLevel >= 2) {
          this.logger?.debug('client.state.not_found', { authRepr: this.authRepr });
        }
        return false;
      }
    }

    this.applyState(loaded);
    if (!('isAuthenticated' in loaded)) {
      this.isAuthenticated = true;
    }
    this.logger?.debug('client.state.loaded', { authRepr: this.authRepr, authenticated: this.isAuthenticated });
    return true;
  }

  async saveState(): Promise<void> {
    if (!this.authIdent) {
      throw new Error('Could not save state without authIdent');
    }
    if (!this.stateStorage) {
      throw new Error(`State not saved: no stateStorage: ${this.authRepr}`);
    }
    await this.stateStorage.set(this.authIdent, this.getState());
    this.logger?.info('client.state.saved', { authRepr: this.authRepr });
  }

  /**
   * Startup hook: loads persisted state (by default whenever a state store is
   * configured) and falls back to {@link initState} when nothing was found.
   */
  async initialize(options: InitializeOptions = {}): Promise<this> {
    const load = options.loadState ?? this.stateStorage !== null;
    if (load === false || !(await this.loadState(load === true ? undefined : load))) {
      this.initState();
    }
    return this;
  }
}
