/**
 * @bitfloat/core — comparison and total order
 *
 * Two different orderings live here.
 *
 * The comparison predicates follow IEEE 754 §5.11: -0 equals +0, and a NaN
 * operand makes every relation false except notEqual and unordered.
 *
 * totalOrder follows §5.10 and ranks every bit pattern:
 *
 *   -qNaN < -sNaN < -inf < -finite < -0 < +0 < +finite < +inf < +sNaN < +qNaN
 *
 * with NaNs of one sign ordered by payload, larger payloads further out.
 *
 * Both reduce to comparing bigint keys built from the pattern. Below the sign
 * bit the pattern is monotonic in magnitude, so a signed magnitude is enough.
 */

import { assertSameFormat } from './bits';
import type { BinaryFloat } from './bits';
import { isNaN, isSignaling } from './classify';
import type { FloatContext } from './context';
import type { Relation } from './types';

// ─── Keys ─────────────────────────────────────────────────────────────────────

export function magnitudeOf(value: BinaryFloat): bigint {
  return value.bits & ~value.format.signMask;
}

/** Numeric order for non-NaN values; both zeros map to 0n. */
function valueKey(value: BinaryFloat): bigint {
  const mag = magnitudeOf(value);
  return value.signBit === 1 ? -mag : mag;
}

/** Injective: -0 lands on -1n, one below +0. */
export function totalKey(value: BinaryFloat): bigint {
  const mag = magnitudeOf(value);
  return value.signBit === 1 ? -mag - 1n : mag;
}

// ─── Quiet predicates ─────────────────────────────────────────────────────────

type Ordering = 'less' | 'equal' | 'greater' | 'unordered';

function order(op: string, a: BinaryFloat, b: BinaryFloat): Ordering {
  assertSameFormat(op, a, b);
  if (isNaN(a) || isNaN(b)) return 'unordered';
  const ka = valueKey(a);
  const kb = valueKey(b);
  if (ka < kb) return 'less';
  if (ka > kb) return 'greater';
  return 'equal';
}

function holds(relation: Relation, ordering: Ordering): boolean {
  switch (relation) {
    case 'equal':        return ordering === 'equal';
    case 'notEqual':     return ordering !== 'equal';
    case 'less':         return ordering === 'less';
    case 'lessEqual':    return ordering === 'less' || ordering === 'equal';
    case 'greater':      return ordering === 'greater';
    case 'greaterEqual': return ordering === 'greater' || ordering === 'equal';
    case 'unordered':    return ordering === 'unordered';
    case 'ordered':      return ordering !== 'unordered';
  }
}

export function isEqual(a: BinaryFloat, b: BinaryFloat): boolean {
  return holds('equal', order('isEqual', a, b));
}

export function isNotEqual(a: BinaryFloat, b: BinaryFloat): boolean {
  return holds('notEqual', order('isNotEqual', a, b));
}

export function isLess(a: BinaryFloat, b: BinaryFloat): boolean {
  return holds('less', order('isLess', a, b));
}

export function isLessEqual(a: BinaryFloat, b: BinaryFloat): boolean {
  return holds('lessEqual', order('isLessEqual', a, b));
}

export function isGreater(a: BinaryFloat, b: BinaryFloat): boolean {
  return holds('greater', order('isGreater', a, b));
}

export function isGreaterEqual(a: BinaryFloat, b: BinaryFloat): boolean {
  return holds('greaterEqual', order('isGreaterEqual', a, b));
}

export function isUnordered(a: BinaryFloat, b: BinaryFloat): boolean {
  return holds('unordered', order('isUnordered', a, b));
}

export function isOrdered(a: BinaryFloat, b: BinaryFloat): boolean {
  return holds('ordered', order('isOrdered', a, b));
}

// ─── Flag-raising comparisons ─────────────────────────────────────────────────

/** Quiet comparison: raises invalid only for a signaling NaN operand. */
export function compareQuiet(
  relation: Relation,
  a:        BinaryFloat,
  b:        BinaryFloat,
  context?: FloatContext,
): boolean {
  const ordering = order('compareQuiet', a, b);
  if (isSignaling(a) || isSignaling(b)) context?.flags.raise('invalid');
  return holds(relation, ordering);
}

/** Signaling comparison: raises invalid for any NaN operand. */
export function compareSignaling(
  relation: Relation,
  a:        BinaryFloat,
  b:        BinaryFloat,
  context?: FloatContext,
): boolean {
  const ordering = order('compareSignaling', a, b);
  if (ordering === 'unordered') context?.flags.raise('invalid');
  return holds(relation, ordering);
}

// ─── Total order ──────────────────────────────────────────────────────────────

/** True when `a` ranks at or before `b`. */
export function totalOrder(a: BinaryFloat, b: BinaryFloat): boolean {
  assertSameFormat('totalOrder', a, b);
  return totalKey(a) <= totalKey(b);
}

/** totalOrder(abs(a), abs(b)). */
export function totalOrderMag(a: BinaryFloat, b: BinaryFloat): boolean {
  assertSameFormat('totalOrderMag', a, b);
  return magnitudeOf(a) <= magnitudeOf(b);
}

/** Three-way totalOrder, for Array.prototype.sort. 0 only for identical patterns. */
export function compareTotal(a: BinaryFloat, b: BinaryFloat): -1 | 0 | 1 {
  assertSameFormat('compareTotal', a, b);
  const ka = totalKey(a);
  const kb = totalKey(b);
  return ka < kb ? -1 : ka > kb ? 1 : 0;
}
