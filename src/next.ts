/**
 * @bitfloat/core — neighbouring values
 *
 * Below the sign bit, patterns increase with magnitude, so stepping to a
 * neighbour is +1 or -1 on the pattern. The edges: ±0 step up to the
 * smallest positive subnormal, +inf stays put, and -inf steps to -maxFinite.
 */

import { BinaryFloat, assertSameFormat } from './bits';
import { isNaN, isSignaling } from './classify';
import { isEqual, isLess } from './compare';
import type { FloatContext } from './context';
import { infinityBits, quietBits } from './pack';
import { negate } from './sign';

function quietNaN(value: BinaryFloat, context?: FloatContext): BinaryFloat {
  if (isSignaling(value)) context?.flags.raise('invalid');
  return BinaryFloat.fromBits(value.format, quietBits(value.format, value.bits));
}

/** Least value that compares greater than `value`. */
export function nextUp(value: BinaryFloat, context?: FloatContext): BinaryFloat {
  const { format, bits } = value;
  if (isNaN(value)) return quietNaN(value, context);
  if (bits === infinityBits(format, 0)) return value;

  const magnitude = bits & ~format.signMask;
  if (magnitude === 0n) return BinaryFloat.fromBits(format, 1n);
  return BinaryFloat.fromBits(format, value.signBit === 1 ? bits - 1n : bits + 1n);
}

/** Greatest value that compares less than `value`. */
export function nextDown(value: BinaryFloat, context?: FloatContext): BinaryFloat {
  return negate(nextUp(negate(value), context));
}

/**
 * Step from `value` one place toward `toward`. Returns `toward` itself when
 * the two compare equal, so nextAfter(+0, -0) is -0.
 */
export function nextAfter(value: BinaryFloat, toward: BinaryFloat, context?: FloatContext): BinaryFloat {
  assertSameFormat('nextAfter', value, toward);
  if (isNaN(value) || isNaN(toward)) {
    if (isSignaling(value) || isSignaling(toward)) context?.flags.raise('invalid');
    return quietNaN(isNaN(value) ? value : toward);
  }
  if (isEqual(value, toward)) return toward;
  return isLess(value, toward) ? nextUp(value, context) : nextDown(value, context);
}
