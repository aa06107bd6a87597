/**
 * Tolerant result comparison.
 *
 * Engines disagree on numeric representation (64-bit integers may come back
 * as strings, floats differ in the last digits), so numbers are compared
 * with a relative tolerance and everything else structurally.
 */

import { isDeepStrictEqual } from 'node:util';
import type { Row } from '../db/types.js';
import type { RowOrder } from './types.js';

export const EPSILON = 1e-9;
export const RELATIVE_TOLERANCE = 1e-4;

// Plain decimals only: hex, exponent and Infinity spellings stay strings.
const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

function asNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return DECIMAL.test(trimmed) ? Number(trimmed) : undefined;
  }
  return undefined;
}

export function valuesEqual(a: unknown, b: unknown): boolean {
  const an = asNumber(a);
  const bn = asNumber(b);
  if (an !== undefined && bn !== undefined) {
    if (an === bn) return true;
    const avg = Math.abs((an + bn) / 2);
    return Math.abs(an - bn) / Math.max(avg, EPSILON) < RELATIVE_TOLERANCE;
  }
  return isDeepStrictEqual(a, b);
}

/**
 * Single-column rows compare by value alone, since the generated query may
 * alias the column differently (`SUM(price)` vs `total`). Wider rows must
 * agree on every key.
 */
export function rowsEqual(a: Row, b: Row): boolean {
  const aKeys = Object.keys(a);
  const bKeys = Object.keys(b);
  if (aKeys.length === 1 && bKeys.length === 1) {
    return valuesEqual(a[aKeys[0] ?? ''], b[bKeys[0] ?? '']);
  }
  if (aKeys.length !== bKeys.length) return false;
  return aKeys.every((key) => Object.hasOwn(b, key) && valuesEqual(a[key], b[key]));
}

export function dataEqual(expected: readonly Row[], actual: readonly Row[], order: RowOrder): boolean {
  if (expected.length !== actual.length) return false;

  if (order === 'positional') {
    return expected.every((row, i) => {
      const other = actual[i];
      return other !== undefined && rowsEqual(row, other);
    });
  }

  return perfectMatching(expected, actual);
}

/**
 * Tolerant equality is not transitive, so one actual row may fit several
 * expected rows. Augmenting paths (Kuhn) find a one-to-one pairing whenever
 * one exists.
 */
function perfectMatching(expected: readonly Row[], actual: readonly Row[]): boolean {
  const candidates = expected.map((row) =>
    actual.flatMap((other, j) => (rowsEqual(row, other) ? [j] : [])),
  );
  // matchedTo[j] is the expected row currently paired with actual row j
  const matchedTo = new Array<number>(actual.length).fill(-1);

  const augment = (i: number, seen: boolean[]): boolean => {
    for (const j of candidates[i] ?? []) {
      if (seen[j]) continue;
      seen[j] = true;
      const owner = matchedTo[j] ?? -1;
      if (owner === -1 || augment(owner, seen)) {
        matchedTo[j] = i;
        return true;
      }
    }
    return false;
  };

  for (let i = 0; i < expected.length; i++) {
    if (!augment(i, new Array<boolean>(actual.length).fill(false))) return false;
  }
  return true;
}
