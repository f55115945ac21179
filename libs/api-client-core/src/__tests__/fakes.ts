import { vi } from 'vitest';
import { ClientResponse, type ResponsePayload } from '../ClientResponse';
import type { HttpMethod, Logger, RawHttpResponse, Scheduler, TransportRequest } from '../types';

const STATUS_TEXT: Record<number, string> = {
  200: 'OK',
  201: 'Created',
  301: 'Moved Permanently',
  400: 'Bad Request',
  401: 'Unauthorized',
  404: 'Not Found',
  409: 'Conflict',
  429: 'Too Many Requests',
  500: 'Internal Server Error',
  502: 'Bad Gateway',
  503: 'Service Unavailable',
};

const encoder = new TextEncoder();

export interface FakeReply {
  status?: number;
  headers?: Record<string, string>;
  body?: string;
  json?: unknown;
  elapsedSeconds?: number;
  url?: string;
}

export const reply = (init: FakeReply = {}): RawHttpResponse => {
  const status = init.status ?? 200;
  const headers = { ...init.headers };
  let text = init.body ?? '';
  if (init.json !== undefined) {
    text = JSON.stringify(init.json);
    headers['Content-Type'] ??= 'application/json';
  }
  return {
    status,
    statusText: STATUS_TEXT[status] ?? '',
    headers,
    url: init.url ?? '',
    elapsedSeconds: init.elapsedSeconds ?? 0.01,
    body: encoder.encode(text),
  };
};

/** Transport answering from `replies` in order; the last reply repeats. */
export const scriptedTransport = (...replies: Array<RawHttpResponse | Error>) =>
  vi.fn(async (_request: TransportRequest): Promise<RawHttpResponse> => {
    const next = replies.length > 1 ? replies.shift() : replies[0];
    if (next === undefined) {
      throw new Error('scripted transport has no replies');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  });

/** Virtual clock: sleeping only records the duration and moves time forward. */
export class FakeScheduler implements Scheduler {
  readonly sleeps: number[] = [];
  private current: number;

  constructor(start = new Date('2024-03-01T12:00:00Z')) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  async sleep(seconds: number): Promise<void> {
    this.sleeps.push(seconds);
    this.advance(seconds);
  }

  advance(seconds: number): void {
    this.current += seconds * 1000;
  }
}

export const createLogger = () => ({
  debug: vi.fn<Logger['debug']>(),
  info: vi.fn<Logger['info']>(),
  warn: vi.fn<Logger['warn']>(),
  error: vi.fn<Logger['error']>(),
});

export interface ResponseFixture {
  method?: HttpMethod;
  url?: string;
  status?: number;
  headers?: Record<string, string>;
  body?: string;
  data?: unknown;
}

export const makeResponse = (fixture: ResponseFixture = {}): ClientResponse => {
  const status = fixture.status ?? 200;
  const payload: ResponsePayload = fixture.data === undefined ? { kind: 'none' } : { kind: 'raw', value: fixture.data };
  return new ClientResponse(
    {
      method: fixture.method ?? 'GET',
      url: fixture.url ?? 'https://api.test/items',
      status,
      statusText: STATUS_TEXT[status] ?? '',
      headers: fixture.headers ?? {},
      body: encoder.encode(fixture.body ?? ''),
      elapsedSeconds: 0.01,
    },
    payload,
  );
};
