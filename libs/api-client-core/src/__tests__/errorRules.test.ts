import { describe, expect, it } from 'vitest';
import { matchesErrorAttributes, ratelimitError, reraise, runErrorProcessors, temporaryError } from '../errorRules';
import { EntityNotFoundError, HttpStatusError, RateLimitError, TransientError } from '../errors';
import { makeResponse } from './fakes';

const throttled = () => new HttpStatusError(makeResponse({ status: 400, data: { code: 'throttled' } }), 200);

describe('matchesErrorAttributes', () => {
  it('compares primitive values with strict equality', () => {
    const error = throttled();
    expect(matchesErrorAttributes(error, { status: 400, 'response.data.code': 'throttled' })).toBe(true);
    expect(matchesErrorAttributes(error, { status: '400' })).toBe(false);
    expect(matchesErrorAttributes(error, { 'response.data.detail': undefined })).toBe(false);
    expect(matchesErrorAttributes(error, {})).toBe(true);
  });

  it('compares list and object values by structure', () => {
    const error = new HttpStatusError(
      makeResponse({ status: 400, data: { errors: ['throttled'], detail: { retry: true, after: 5 } } }),
      200,
    );
    expect(matchesErrorAttributes(error, { 'response.data.errors': ['throttled'] })).toBe(true);
    expect(matchesErrorAttributes(error, { 'response.data.detail': { retry: true, after: 5 } })).toBe(true);
    expect(matchesErrorAttributes(error, { 'response.data.errors': ['other'] })).toBe(false);
    expect(matchesErrorAttributes(error, { 'response.data.errors': ['throttled', 'busy'] })).toBe(false);
    expect(matchesErrorAttributes(error, { 'response.data.detail': { retry: true } })).toBe(false);
    expect(matchesErrorAttributes(error, { 'response.data.detail': { retry: true, after: '5' } })).toBe(false);
  });
});

describe('ratelimitError', () => {
  it('replaces a matching failure with a rate-limit error', () => {
    const original = throttled();
    const processor = ratelimitError(HttpStatusError, { status: 400, 'response.data.code': 'throttled' });

    const replacement = processor(original);

    expect(replacement).toBeInstanceOf(RateLimitError);
    expect(replacement).toMatchObject({ originalError: original, response: original.response, waitSeconds: undefined });
  });

  it('ignores other classes and attribute values', () => {
    const processor = ratelimitError(HttpStatusError, { 'response.data.code': 'throttled' });
    expect(processor(new Error('boom'))).toBeUndefined();
    expect(processor(new HttpStatusError(makeResponse({ status: 400, data: { code: 'invalid' } }), 200))).toBeUndefined();
  });

  it('applies the callback and the fixed wait', () => {
    const never = ratelimitError(HttpStatusError, {}, { callback: (error) => error.status === 429 });
    expect(never(throttled())).toBeUndefined();

    const waiting = ratelimitError(HttpStatusError, {}, { waitSeconds: 3 });
    expect(waiting(throttled())).toMatchObject({ waitSeconds: 3 });
  });
});

describe('temporaryError', () => {
  it('produces transient errors for any matching error class', () => {
    const original = new TypeError('fetch failed');
    const replacement = temporaryError(TypeError)(original);
    expect(replacement).toBeInstanceOf(TransientError);
    expect(replacement?.message).toBe('Temporary error: [no response]');
  });
});

describe('runErrorProcessors', () => {
  it('throws the first replacement in registration order', () => {
    const first = new Error('first');
    const second = new Error('second');
    expect(() =>
      runErrorProcessors(new Error('original'), [() => undefined, () => first, () => second]),
    ).toThrow(first);
  });

  it('returns normally when nothing matches', () => {
    expect(() => runErrorProcessors(new Error('original'), [() => undefined])).not.toThrow();
    expect(() => runErrorProcessors(new Error('original'), undefined)).not.toThrow();
  });
});

describe('reraise', () => {
  const notFound = (status: number) => async (_id: number): Promise<string> => {
    throw new HttpStatusError(makeResponse({ status, url: 'https://api.test/products/7' }), 200);
  };

  it('translates matching failures', async () => {
    const fetchProduct = reraise(notFound(404), {
      errorClass: HttpStatusError,
      attrs: { status: 404 },
      translate: (error, id) => new EntityNotFoundError(error.response, 'Product', id),
    });

    await expect(fetchProduct(7)).rejects.toThrow('Product(7) not found: GET 404 https://api.test/products/7: ');
  });

  it('re-throws the original when the rule does not apply', async () => {
    const translate = (error: HttpStatusError, id: number) => new EntityNotFoundError(error.response, 'Product', id);
    const serverError = reraise(notFound(500), { errorClass: HttpStatusError, attrs: { status: 404 }, translate });
    await expect(serverError(7)).rejects.toBeInstanceOf(HttpStatusError);

    const keep = reraise(notFound(404), { errorClass: HttpStatusError, translate: () => undefined });
    await expect(keep(7)).rejects.toBeInstanceOf(HttpStatusError);
  });

  it('matches object-valued attributes by structure', async () => {
    const fetchProduct = async (_id: number): Promise<string> => {
      throw new HttpStatusError(
        makeResponse({ status: 404, data: { error: { kind: 'missing', scope: ['product'] } } }),
        200,
      );
    };
    const translate = (error: HttpStatusError, id: number) => new EntityNotFoundError(error.response, 'Product', id);

    const matching = reraise(fetchProduct, {
      errorClass: HttpStatusError,
      attrs: { 'response.data.error': { kind: 'missing', scope: ['product'] } },
      translate,
    });
    await expect(matching(7)).rejects.toBeInstanceOf(EntityNotFoundError);

    const other = reraise(fetchProduct, {
      errorClass: HttpStatusError,
      attrs: { 'response.data.error': { kind: 'missing', scope: ['order'] } },
      translate,
    });
    await expect(other(7)).rejects.toBeInstanceOf(HttpStatusError);
  });
});
