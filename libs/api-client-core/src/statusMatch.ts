import type { ExpectedStatus, StatusSpec } from './types';

const WILDCARD_PATTERN = /^([1-5])xx$/;

function isSpecList(expected: StatusSpec | readonly StatusSpec[]): expected is readonly StatusSpec[] {
  return Array.isArray(expected);
}

function matchesSpec(status: number, spec: StatusSpec): boolean {
  if (typeof spec === 'string') {
    const match = WILDCARD_PATTERN.exec(spec);
    return match !== null && Math.floor(status / 100) === Number(match[1]);
  }
  if (spec < 10) {
    return Math.floor(status / 100) === spec;
  }
  return status === spec;
}

/**
 * Status-compatibility predicate used by the request pipeline.
 *
 * - falsy `expected` always matches (no check)
 * - an integer below 10 matches its whole hundred (`2` → 200-299)
 * - `'2xx'` is the same wildcard in string form
 * - a collection matches when any element does
 */
export function matchesStatus(status: number, expected: ExpectedStatus): boolean {
  if (!expected) {
    return true;
  }
  if (isSpecList(expected)) {
    return expected.some((spec) => matchesSpec(status, spec));
  }
  return matchesSpec(status, expected);
}

export function formatExpectedStatus(expected: ExpectedStatus): string {
  if (!expected) return 'any';
  if (isSpecList(expected)) {
    return `[${expected.map((spec) => String(spec)).join(', ')}]`;
  }
  return String(expected);
}
