import { systemScheduler, type Logger, type Scheduler } from '@apikit/api-client-core';

/** Raised when the cursor reports more data but pages keep coming back empty. */
export class CursorFetchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CursorFetchError';
  }
}

/**
 * Loads the next page. It reads and updates `iterator.cursor` (and
 * optionally `iterator.hasMore`) and returns the page items; `undefined`
 * leaves the buffer as it is.
 */
export type CursorFetchCallback<T, C> = (
  iterator: CursorFetchIterator<T, C>,
) => Promise<readonly T[] | undefined> | readonly T[] | undefined;

export interface CursorFetchIteratorOptions<T, C> {
  fetch?: CursorFetchCallback<T, C>;
  cursor?: C | null;
  /** Overrides the cursor-based inference for as long as it is set. */
  hasMore?: boolean;
  /** Yield each page back to front. */
  reverse?: boolean;
  initial?: readonly T[];
  maxCount?: number;
  /** Stops fetching (but keeps yielding buffered items) once this many were yielded. */
  maxCountToStopFetch?: number;
  maxFetchCount?: number;
  /** Pause between fetches; the first fetch never waits. */
  fetchWaitSeconds?: number;
  emptyFetchRetries?: number;
  emptyFetchWaitSeconds?: number;
  scheduler?: Scheduler;
  logger?: Logger;
}

export type CursorIteratorState = 'buffered' | 'needs_fetch' | 'exhausted';

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

/**
 * Async iterator over a cursor-paginated collection.
 *
 * Items are served from a buffer that each fetch replaces. When a fetch
 * returns nothing while `hasMore` is still true the fetch is retried
 * `emptyFetchRetries` times before a {@link CursorFetchError} is thrown.
 * Once the iterator reports `done` it stays done.
 */
export class CursorFetchIterator<T, C = string> implements AsyncIterableIterator<T> {
  cursor: C | null | undefined;
  count = 0;
  fetchCount = 0;

  readonly reverse: boolean;
  readonly maxCount: number;
  readonly maxCountToStopFetch: number;
  readonly maxFetchCount: number;
  readonly fetchWaitSeconds: number;
  readonly emptyFetchRetries: number;
  readonly emptyFetchWaitSeconds: number;

  private explicitHasMore?: boolean;
  private buffer: T[];
  private stopLatched = false;
  private terminated = false;
  private readonly fetchCallback?: CursorFetchCallback<T, C>;
  private readonly scheduler: Scheduler;
  private readonly logger?: Logger;

  constructor(options: CursorFetchIteratorOptions<T, C> = {}) {
    this.fetchCallback = options.fetch;
    this.cursor = options.cursor;
    this.explicitHasMore = options.hasMore;
    this.reverse = options.reverse ?? false;
    this.buffer = this.toBuffer(options.initial ?? []);
    this.maxCount = options.maxCount ?? Infinity;
    this.maxCountToStopFetch = options.maxCountToStopFetch ?? Infinity;
    this.maxFetchCount = options.maxFetchCount ?? Infinity;
    this.fetchWaitSeconds = options.fetchWaitSeconds ?? 0;
    this.emptyFetchRetries = options.emptyFetchRetries ?? 0;
    this.emptyFetchWaitSeconds = options.emptyFetchWaitSeconds ?? 0;
    this.scheduler = options.scheduler ?? systemScheduler;
    this.logger = options.logger;
  }

  /** Explicit value if set, otherwise unknown before the first fetch and `Boolean(cursor)` after it. */
  get hasMore(): boolean | undefined {
    if (this.explicitHasMore !== undefined) return this.explicitHasMore;
    return this.fetchCount === 0 ? undefined : Boolean(this.cursor);
  }

  set hasMore(value: boolean | undefined) {
    this.explicitHasMore = value;
  }

  get state(): CursorIteratorState {
    if (this.terminated) return 'exhausted';
    return this.buffer.length > 0 ? 'buffered' : 'needs_fetch';
  }

  get stopsOnNextFetch(): boolean {
    return this.stopLatched;
  }

  /** Refuses every further fetch; buffered items are still yielded. */
  stopOnNextFetch(): void {
    this.stopLatched = true;
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  async next(): Promise<IteratorResult<T, undefined>> {
    if (this.terminated || this.count >= this.maxCount) {
      return this.finish();
    }
    if (this.buffer.length > 0) {
      return this.take();
    }

    if (!(await this.fetchNext())) {
      return this.finish();
    }

    if (this.buffer.length === 0 && this.hasMore) {
      for (let attempt = 1; attempt <= this.emptyFetchRetries; attempt += 1) {
        this.logger?.debug('cursor.fetch.retry', { attempt, fetchCount: this.fetchCount });
        if (this.emptyFetchWaitSeconds > 0) {
          await this.scheduler.sleep(this.emptyFetchWaitSeconds);
        }
        if (!(await this.fetchNext())) {
          return this.finish();
        }
        if (this.buffer.length > 0) break;
      }
      if (this.buffer.length === 0) {
        this.terminated = true;
        let message = 'Cursor has more, but empty list returned';
        if (this.emptyFetchRetries > 0) {
          message += ` (after ${this.emptyFetchRetries} retries with ${this.emptyFetchWaitSeconds}s sleep)`;
        }
        throw new CursorFetchError(message);
      }
    }

    if (this.buffer.length === 0) {
      return this.finish();
    }
    return this.take();
  }

  private take(): IteratorResult<T, undefined> {
    this.count += 1;
    if (this.count === this.maxCount || this.count >= this.maxCountToStopFetch) {
      this.stopLatched = true;
    }
    // length checked by the callers
    const [item] = this.buffer.splice(this.buffer.length - 1, 1);
    return { done: false, value: item };
  }

  private finish(): IteratorReturnResult<undefined> {
    this.terminated = true;
    return DONE;
  }

  /** Resolves `false` when the fetch is refused. */
  private async fetchNext(): Promise<boolean> {
    if (
      !this.fetchCallback ||
      this.maxFetchCount === 0 ||
      this.stopLatched ||
      this.hasMore === false
    ) {
      return false;
    }

    if (this.fetchCount > 0 && this.fetchWaitSeconds > 0) {
      await this.scheduler.sleep(this.fetchWaitSeconds);
    }
    this.fetchCount += 1;
    if (this.fetchCount >= this.maxFetchCount) {
      this.stopLatched = true;
    }

    const items = await this.fetchCallback(this);
    if (items !== undefined) {
      this.buffer = this.toBuffer(items);
    }
    this.logger?.debug('cursor.fetch', { items: this.buffer.length, count: this.count, fetchCount: this.fetchCount });
    return true;
  }

  // Stored back to front so items are taken from the end.
  private toBuffer(items: readonly T[]): T[] {
    return this.reverse ? [...items] : [...items].reverse();
  }
}
