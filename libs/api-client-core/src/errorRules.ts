import { isDeepStrictEqual } from 'util';
import { RateLimitError, TransientError, type TemporaryErrorOptions } from './errors';
import { resolvePathOr } from './objectPath';
import type { ErrorProcessor } from './types';

export type ErrorClass<E> = abstract new (...args: never[]) => E;

/** Dotted path (resolved against the error) → expected value. */
export type ErrorAttributeMatch = Record<string, unknown>;

export interface ErrorRuleOptions<E> {
  callback?: (error: E) => boolean;
  /** Fixed wait for the replacement error; the client default applies otherwise. */
  waitSeconds?: number;
}

const MISSING = Symbol('missing');

function attributeEquals(actual: unknown, expected: unknown): boolean {
  if (typeof expected === 'object' && expected !== null) {
    return isDeepStrictEqual(actual, expected);
  }
  return actual === expected;
}

/** Primitives compare with `===`, arrays and objects by structure. */
export function matchesErrorAttributes(error: unknown, attrs: ErrorAttributeMatch): boolean {
  return Object.entries(attrs).every(([path, expected]) => {
    const actual = resolvePathOr(error, path, MISSING);
    return actual !== MISSING && attributeEquals(actual, expected);
  });
}

type TemporaryErrorFactory = (options: TemporaryErrorOptions) => Error;

function temporaryErrorRule<E>(
  create: TemporaryErrorFactory,
  errorClass: ErrorClass<E>,
  attrs: ErrorAttributeMatch,
  options: ErrorRuleOptions<E>,
): ErrorProcessor {
  return (error) => {
    if (!(error instanceof errorClass)) return undefined;
    if (!matchesErrorAttributes(error, attrs)) return undefined;
    if (options.callback && !options.callback(error)) return undefined;
    return create({ waitSeconds: options.waitSeconds, originalError: error });
  };
}

/**
 * Error processor that turns a matching `errorClass` failure into a
 * {@link RateLimitError}, so the retry engine applies the rate-limit budget.
 *
 * @example
 * ```ts
 * await client.get('items', {
 *   errorProcessors: [ratelimitError(HttpStatusError, { status: 400, 'response.data.code': 'throttled' })],
 * });
 * ```
 */
export function ratelimitError<E>(
  errorClass: ErrorClass<E>,
  attrs: ErrorAttributeMatch = {},
  options: ErrorRuleOptions<E> = {},
): ErrorProcessor {
  return temporaryErrorRule((opts) => new RateLimitError(undefined, undefined, opts), errorClass, attrs, options);
}

/** Same as {@link ratelimitError}, producing a {@link TransientError}. */
export function temporaryError<E>(
  errorClass: ErrorClass<E>,
  attrs: ErrorAttributeMatch = {},
  options: ErrorRuleOptions<E> = {},
): ErrorProcessor {
  return temporaryErrorRule((opts) => new TransientError(undefined, undefined, opts), errorClass, attrs, options);
}

/**
 * Runs processors in registration order; the first replacement is thrown.
 * Returns normally when none of them matched.
 */
export function runErrorProcessors(error: unknown, processors: readonly ErrorProcessor[] | undefined): void {
  if (!processors) return;
  for (const processor of processors) {
    const replacement = processor(error);
    if (replacement) {
      throw replacement;
    }
  }
}

export interface ReraiseRule<E, A extends unknown[]> {
  errorClass: ErrorClass<E>;
  attrs?: ErrorAttributeMatch;
  /** Returns the error to throw instead, or `undefined` to keep the original. */
  translate: (error: E, ...args: A) => Error | undefined;
}

/** Wraps `operation` so that matching failures are translated before they propagate. */
export function reraise<A extends unknown[], R, E>(
  operation: (...args: A) => Promise<R>,
  rule: ReraiseRule<E, A>,
): (...args: A) => Promise<R> {
  return async (...args: A) => {
    try {
      return await operation(...args);
    } catch (error) {
      if (error instanceof rule.errorClass && matchesErrorAttributes(error, rule.attrs ?? {})) {
        const replacement = rule.translate(error, ...args);
        if (replacement) throw replacement;
      }
      throw error;
    }
  };
}
