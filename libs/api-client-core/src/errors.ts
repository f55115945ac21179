import { ClientResponse, reprResponse } from './ClientResponse';
import { resolvePathOr } from './objectPath';
import { formatExpectedStatus } from './statusMatch';
import type { ExpectedStatus } from './types';

const ERRORS_REPR_LIMIT = 64;

export type ClientErrorKind =
  | 'client'
  | 'explicit_retry'
  | 'rate_limit'
  | 'transient'
  | 'http_status'
  | 'decode'
  | 'auth'
  | 'auth_required'
  | 'response_validation'
  | 'retry_exceeded'
  | 'entity_not_found'
  | 'entity_forbidden';

export type FieldErrors = Record<string, string[]>;

function responseOf(source: ClientResponse | ClientError | undefined): ClientResponse | undefined {
  return source instanceof ClientError ? source.response : source;
}

/**
 * Base of every failure raised by the request pipeline.
 *
 * `message` always ends with a truncated representation of the response
 * (or `[no response]`) so logs and stack traces stay readable; use
 * {@link ClientError.describe} with `full = true` for the whole body.
 */
export class ClientError extends Error {
  readonly kind: ClientErrorKind = 'client';
  readonly response?: ClientResponse;
  readonly reason?: string;

  constructor(
    source?: ClientResponse | ClientError,
    reason?: string,
    options?: { cause?: unknown },
  ) {
    const response = responseOf(source);
    super(ClientError.compose(reason, response, false), options);
    this.name = new.target.name;
    this.response = response;
    this.reason = reason;
  }

  private static compose(reason: string | undefined, response: ClientResponse | undefined, full: boolean): string {
    const repr = response ? reprResponse(response, full) : '[no response]';
    return reason ? `${reason}: ${repr}` : repr;
  }

  /** Human-readable reason; subclasses expand it in full mode. */
  protected getReason(_full: boolean): string | undefined {
    return this.reason;
  }

  describe(full = false): string {
    return ClientError.compose(this.getReason(full), this.response, full);
  }

  get data(): unknown {
    return this.response?.data;
  }

  getData(path: string): unknown {
    const data = this.data;
    if (data === undefined || data === null) return undefined;
    return resolvePathOr(data, path, undefined);
  }
}

export interface ExplicitRetryOptions {
  retryIdent?: string;
  retryCount?: number;
  waitSeconds?: number;
}

/**
 * Thrown by an operation to ask the pipeline to run it again.
 * Attempts are counted per `retryIdent` within one `request()` call.
 */
export class ExplicitRetry extends ClientError {
  override readonly kind = 'explicit_retry' as const;
  readonly result: unknown;
  readonly retryIdent: string;
  readonly retryCount: number;
  readonly waitSeconds: number;

  constructor(result: unknown, options: ExplicitRetryOptions = {}) {
    const retryIdent = options.retryIdent ?? 'default';
    super(
      result instanceof ClientResponse || result instanceof ClientError ? result : undefined,
      `Retry requested on "${retryIdent}"`,
    );
    this.result = result;
    this.retryIdent = retryIdent;
    this.retryCount = options.retryCount ?? 1;
    this.waitSeconds = options.waitSeconds ?? 0;
  }
}

export interface TemporaryErrorOptions {
  waitSeconds?: number;
  originalError?: unknown;
}

export abstract class TemporaryClientError extends ClientError {
  readonly waitSeconds?: number;
  readonly originalError?: unknown;

  constructor(
    source: ClientResponse | ClientError | undefined,
    reason: string,
    options: TemporaryErrorOptions = {},
  ) {
    const original = options.originalError;
    super(source ?? (original instanceof ClientError ? original : undefined), reason, { cause: original });
    this.waitSeconds = options.waitSeconds;
    this.originalError = original;
  }
}

/** The remote side enforced a rate limit. */
export class RateLimitError extends TemporaryClientError {
  override readonly kind = 'rate_limit' as const;

  constructor(source?: ClientResponse | ClientError, reason = 'Rate limit', options?: TemporaryErrorOptions) {
    super(source, reason, options);
  }
}

/** Recoverable server-side or transport condition. */
export class TransientError extends TemporaryClientError {
  override readonly kind = 'transient' as const;

  constructor(source?: ClientResponse | ClientError, reason = 'Temporary error', options?: TemporaryErrorOptions) {
    super(source, reason, options);
  }
}

export class HttpStatusError extends ClientError {
  override readonly kind = 'http_status' as const;
  readonly status: number;
  readonly expectedStatus: ExpectedStatus;

  constructor(response: ClientResponse, expectedStatus: ExpectedStatus, reason?: string) {
    const statusLine = `${response.status} ${response.statusText} (!=${formatExpectedStatus(expectedStatus)})`;
    super(response, reason ? `${statusLine}: ${reason}` : statusLine);
    this.status = response.status;
    this.expectedStatus = expectedStatus;
  }
}

export class DecodeError extends ClientError {
  override readonly kind = 'decode' as const;

  constructor(response: ClientResponse, cause: unknown) {
    const detail = cause instanceof Error ? `${cause.name}: ${cause.message}` : String(cause);
    super(response, `JSON decode error: ${detail}`, { cause });
  }
}

/** Authentication failure for the identity `ident`; fatal for the client. */
export class AuthError extends ClientError {
  override readonly kind: ClientErrorKind = 'auth';
  readonly ident?: string;

  constructor(source: ClientResponse | ClientError | undefined, reason?: string, ident?: string) {
    super(source, `${ident ?? '?'}: ${reason ?? 'authentication failed'}`);
    this.ident = ident;
  }
}

export class AuthRequiredError extends AuthError {
  override readonly kind = 'auth_required' as const;

  constructor(source: ClientResponse | ClientError | undefined, reason = 'authentication required', ident?: string) {
    super(source, reason, ident);
  }
}

function truncateErrors(errors: FieldErrors, full: boolean): string {
  const text = JSON.stringify(errors);
  if (!full && text.length > ERRORS_REPR_LIMIT) {
    return `${text.slice(0, ERRORS_REPR_LIMIT)}..${text.length}b`;
  }
  return text;
}

export class ResponseValidationError<TDecoder = unknown> extends ClientError {
  override readonly kind = 'response_validation' as const;
  readonly decoder?: TDecoder;
  readonly errors: FieldErrors;
  private readonly prefix?: string;

  constructor(response: ClientResponse, options: { decoder?: TDecoder; errors: FieldErrors; message?: string }) {
    const errorsText = truncateErrors(options.errors, false);
    super(response, options.message ? `${options.message}: ${errorsText}` : errorsText);
    this.decoder = options.decoder;
    this.errors = options.errors;
    this.prefix = options.message;
  }

  protected override getReason(full: boolean): string {
    const errorsText = truncateErrors(this.errors, full);
    return this.prefix ? `${this.prefix}: ${errorsText}` : errorsText;
  }
}

export interface RetryExceededOptions {
  retryIdent?: string;
  retryCount?: number;
  reason?: string;
}

/** Terminal error once a retry budget is spent; wraps the last failure. */
export class RetryExceededError extends ClientError {
  override readonly kind = 'retry_exceeded' as const;
  readonly result: unknown;
  readonly retryIdent?: string;
  readonly retryCount?: number;
  /** Retry ident when it is not `default`, otherwise the wrapped error class. */
  readonly retryReason: string;

  constructor(result: unknown, options: RetryExceededOptions = {}) {
    let source: ClientResponse | ClientError | undefined;
    let detail = options.reason;
    let resultLabel: string | undefined;
    if (result instanceof ClientError) {
      source = result;
      detail = detail ?? result.reason;
      resultLabel = result.name;
    } else if (result instanceof ClientResponse) {
      source = result;
    } else if (result !== undefined) {
      resultLabel = String(result);
    }

    const retryReason =
      (options.retryIdent !== undefined && options.retryIdent !== 'default' ? options.retryIdent : undefined) ??
      resultLabel ??
      'default';
    const summary = `Retries(${options.retryCount ?? '?'}) on "${retryReason}" exceeded`;

    super(source, detail ? `${summary}: ${detail}` : summary, { cause: result });
    this.result = result;
    this.retryIdent = options.retryIdent;
    this.retryCount = options.retryCount;
    this.retryReason = retryReason;
  }
}

export abstract class EntityError extends ClientError {
  readonly entityType: string;
  readonly entityId: string;

  constructor(
    response: ClientResponse | undefined,
    verb: string,
    entityType: string | (abstract new (...args: never[]) => unknown),
    entityId: string | number,
    reason?: string,
  ) {
    const typeName = typeof entityType === 'string' ? entityType : entityType.name;
    const summary = `${typeName}(${entityId}) ${verb}`;
    super(response, reason ? `${summary}: ${reason}` : summary);
    this.entityType = typeName;
    this.entityId = String(entityId);
  }
}

export class EntityNotFoundError extends EntityError {
  override readonly kind = 'entity_not_found' as const;

  constructor(
    response: ClientResponse | undefined,
    entityType: string | (abstract new (...args: never[]) => unknown),
    entityId: string | number,
    reason?: string,
  ) {
    super(response, 'not found', entityType, entityId, reason);
  }
}

export class EntityForbiddenError extends EntityError {
  override readonly kind = 'entity_forbidden' as const;

  constructor(
    response: ClientResponse | undefined,
    entityType: string | (abstract new (...args: never[]) => unknown),
    entityId: string | number,
    reason?: string,
  ) {
    super(response, 'forbidden', entityType, entityId, reason);
  }
}
