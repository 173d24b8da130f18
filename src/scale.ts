/**
 * @bitfloat/core — scaleB and logB
 */

import { BinaryFloat } from './bits';
import { roundingEnv } from './context';
import type { FloatContext } from './context';
import { bitLength, decompose, quietBits, roundPack } from './pack';

/**
 * value × 2^n, rounded under the context's mode.
 * NaN comes back quiet; infinities and zeros come back unchanged.
 * Throws RangeError when n is not an integer.
 */
export function scaleB(value: BinaryFloat, n: number, context?: FloatContext): BinaryFloat {
  if (!Number.isSafeInteger(n)) {
    throw new RangeError(`scaleB: exponent must be a safe integer; got ${n}.`);
  }

  const { format } = value;
  const d = decompose(format, value.bits);
  switch (d.kind) {
    case 'nan':
      if (!d.quiet) context?.flags.raise('invalid');
      return BinaryFloat.fromBits(format, quietBits(format, value.bits));
    case 'infinity':
    case 'zero':
      return value;
    case 'finite':
      return BinaryFloat.fromBits(
        format,
        roundPack(format, d.sign, d.significand, d.quantum + n, roundingEnv(context)),
      );
  }
}

/**
 * Exponent of the leading bit of |value|, subnormals included.
 *
 *   NaN   NaN (invalid if signaling)
 *   ±inf  +Infinity
 *   ±0    -Infinity, raising divisionByZero
 */
export function logB(value: BinaryFloat, context?: FloatContext): number {
  const d = decompose(value.format, value.bits);
  switch (d.kind) {
    case 'nan':
      if (!d.quiet) context?.flags.raise('invalid');
      return Number.NaN;
    case 'infinity':
      return Number.POSITIVE_INFINITY;
    case 'zero':
      context?.flags.raise('divisionByZero');
      return Number.NEGATIVE_INFINITY;
    case 'finite':
      return d.quantum + bitLength(d.significand) - 1;
  }
}
