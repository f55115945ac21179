import type { HttpHeaders, HttpMethod } from './types';

const REPR_BODY_LIMIT = 128;

/**
 * Decoded payload attached to a response: nothing, the raw parsed JSON,
 * or a domain value produced by a response decoder.
 */
export type ResponsePayload<T = unknown> =
  | { kind: 'none' }
  | { kind: 'raw'; value: unknown }
  | { kind: 'validated'; value: T };

export interface ClientResponseInit {
  method: HttpMethod;
  url: string;
  status: number;
  statusText: string;
  headers: HttpHeaders;
  body: Uint8Array;
  elapsedSeconds: number;
}

const textDecoder = new TextDecoder();

export class ClientResponse<T = unknown> {
  readonly method: HttpMethod;
  readonly url: string;
  readonly status: number;
  readonly statusText: string;
  readonly headers: HttpHeaders;
  readonly body: Uint8Array;
  readonly elapsedSeconds: number;

  constructor(
    init: ClientResponseInit,
    readonly payload: ResponsePayload<T> = { kind: 'none' },
  ) {
    this.method = init.method;
    this.url = init.url;
    this.status = init.status;
    this.statusText = init.statusText;
    this.headers = init.headers;
    this.body = init.body;
    this.elapsedSeconds = init.elapsedSeconds;
  }

  get ok(): boolean {
    return this.status >= 200 && this.status < 300;
  }

  /** Media type without parameters, lower-cased. */
  get contentType(): string | undefined {
    const raw = this.headers['content-type'];
    if (!raw) return undefined;
    return raw.split(';')[0].trim().toLowerCase();
  }

  get data(): unknown {
    return this.payload.kind === 'none' ? undefined : this.payload.value;
  }

  /** Value produced by a response decoder. */
  validatedData(): T {
    if (this.payload.kind !== 'validated') {
      throw new TypeError(`${this.method} ${this.url}: response has no validated payload`);
    }
    return this.payload.value;
  }

  text(): string {
    return textDecoder.decode(this.body);
  }

  withPayload<U>(payload: ResponsePayload<U>): ClientResponse<U> {
    return new ClientResponse<U>(this, payload);
  }
}

/**
 * One-line description of a response: `METHOD STATUS URL: BODY`.
 * Bodies longer than 128 bytes are cut unless `full` is set.
 */
export function reprResponse(response: ClientResponse, full = false): string {
  let content: string;
  if (!full && response.body.byteLength > REPR_BODY_LIMIT) {
    content = `${textDecoder.decode(response.body.subarray(0, REPR_BODY_LIMIT))}...${response.body.byteLength}b`;
  } else {
    content = response.text();
  }

  let url = response.url;
  if (response.status === 301 || response.status === 302) {
    url += ` -> ${response.headers['location'] ?? ''}`;
  }

  return `${response.method} ${response.status} ${url}: ${content}`;
}
