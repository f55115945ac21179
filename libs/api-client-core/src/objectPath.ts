export class PathResolutionError extends Error {
  constructor(
    readonly path: string,
    readonly segment: string,
  ) {
    super(`Could not resolve "${segment}" of "${path}"`);
    this.name = 'PathResolutionError';
  }
}

const NUMERIC_SEGMENT = /^\d+$/;

type Lookup = { found: true; value: unknown } | { found: false };

const MISSING: Lookup = { found: false };

// Decoded JSON: inherited members such as `constructor` or `toString` are not data.
function isPlainObject(target: unknown): target is object {
  if (typeof target !== 'object' || target === null) return false;
  const proto: unknown = Object.getPrototypeOf(target);
  return proto === Object.prototype || proto === null;
}

function lookupKey(target: unknown, key: string): Lookup {
  if (target === null || target === undefined) {
    return MISSING;
  }
  if (target instanceof Map) {
    return target.has(key) ? { found: true, value: target.get(key) } : MISSING;
  }
  if (isPlainObject(target)) {
    return Object.prototype.hasOwnProperty.call(target, key) ? { found: true, value: Reflect.get(target, key) } : MISSING;
  }
  if (typeof target === 'object' || typeof target === 'function') {
    return key in target ? { found: true, value: Reflect.get(target, key) } : MISSING;
  }
  return MISSING;
}

function lookupIndex(target: unknown, index: number): Lookup {
  if (Array.isArray(target)) {
    return index < target.length ? { found: true, value: target[index] } : MISSING;
  }
  if (target instanceof Map && target.has(index)) {
    return { found: true, value: target.get(index) };
  }
  return MISSING;
}

function lookupSegment(target: unknown, segment: string): Lookup {
  if (NUMERIC_SEGMENT.test(segment)) {
    const byIndex = lookupIndex(target, Number(segment));
    if (byIndex.found) return byIndex;
  }
  return lookupKey(target, segment);
}

/**
 * Resolves a dotted path such as `response.data.code` against `obj`.
 *
 * Numeric segments try index access first (arrays, numeric Map keys) and
 * fall back to key access; other segments use key access. Plain objects
 * only expose their own keys; class instances also expose inherited
 * getters. Map string keys are looked up with `get`.
 *
 * @throws PathResolutionError when a segment cannot be resolved
 */
export function resolvePath(obj: unknown, path: string): unknown {
  let current = obj;
  for (const segment of path.split('.')) {
    const result = lookupSegment(current, segment);
    if (!result.found) {
      throw new PathResolutionError(path, segment);
    }
    current = result.value;
  }
  return current;
}

export function resolvePathOr<T>(obj: unknown, path: string, fallback: T): unknown {
  let current = obj;
  for (const segment of path.split('.')) {
    const result = lookupSegment(current, segment);
    if (!result.found) {
      return fallback;
    }
    current = result.value;
  }
  return current;
}

export function hasPath(obj: unknown, path: string): boolean {
  const missing = Symbol('missing');
  return resolvePathOr(obj, path, missing) !== missing;
}
