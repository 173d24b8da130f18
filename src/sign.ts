/**
 * @bitfloat/core — sign operations
 *
 * Quiet-computational: only the sign bit moves. Exponent, fraction and any
 * NaN payload pass through untouched, and no flag is raised.
 */

import { BinaryFloat, assertSameFormat } from './bits';

export function negate(value: BinaryFloat): BinaryFloat {
  return BinaryFloat.fromBits(value.format, value.bits ^ value.format.signMask);
}

export function abs(value: BinaryFloat): BinaryFloat {
  return BinaryFloat.fromBits(value.format, value.bits & ~value.format.signMask);
}

/** `magnitude` with the sign bit of `sign`. */
export function copySign(magnitude: BinaryFloat, sign: BinaryFloat): BinaryFloat {
  assertSameFormat('copySign', magnitude, sign);
  const { signMask } = magnitude.format;
  return BinaryFloat.fromBits(
    magnitude.format,
    (magnitude.bits & ~signMask) | (sign.bits & signMask),
  );
}
