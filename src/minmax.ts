/**
 * @bitfloat/core — min / max (IEEE 754-2019 §9.6)
 *
 * One engine, selected by a MinMaxOperation record:
 *
 *   select  min | max
 *   basis   value | magnitude      magnitude ties fall back to value
 *   nan     propagate | preferNumber
 *
 * Among non-NaN values, -0 ranks below +0, so minimum(-0, +0) is -0 and
 * maximum(-0, +0) is +0. A NaN result is always quiet: the first NaN operand
 * with its quiet bit set. A signaling NaN operand raises invalid.
 */

import { BinaryFloat, assertSameFormat } from './bits';
import { isNaN, isSignaling } from './classify';
import { magnitudeOf, totalKey } from './compare';
import type { FloatContext } from './context';
import { quietBits } from './pack';
import type { MinMaxOperation } from './types';

// ─── Operations ───────────────────────────────────────────────────────────────

export const MINIMUM:                  MinMaxOperation = { select: 'min', basis: 'value',     nan: 'propagate' };
export const MAXIMUM:                  MinMaxOperation = { select: 'max', basis: 'value',     nan: 'propagate' };
export const MINIMUM_NUMBER:           MinMaxOperation = { select: 'min', basis: 'value',     nan: 'preferNumber' };
export const MAXIMUM_NUMBER:           MinMaxOperation = { select: 'max', basis: 'value',     nan: 'preferNumber' };
export const MINIMUM_MAGNITUDE:        MinMaxOperation = { select: 'min', basis: 'magnitude', nan: 'propagate' };
export const MAXIMUM_MAGNITUDE:        MinMaxOperation = { select: 'max', basis: 'magnitude', nan: 'propagate' };
export const MINIMUM_MAGNITUDE_NUMBER: MinMaxOperation = { select: 'min', basis: 'magnitude', nan: 'preferNumber' };
export const MAXIMUM_MAGNITUDE_NUMBER: MinMaxOperation = { select: 'max', basis: 'magnitude', nan: 'preferNumber' };

// ─── Engine ───────────────────────────────────────────────────────────────────

function quieted(value: BinaryFloat): BinaryFloat {
  return BinaryFloat.fromBits(value.format, quietBits(value.format, value.bits));
}

/** Pick x or y by comparing keys; equal keys return x. */
function pick(select: 'min' | 'max', x: BinaryFloat, y: BinaryFloat, kx: bigint, ky: bigint): BinaryFloat {
  if (select === 'min') return ky < kx ? y : x;
  return ky > kx ? y : x;
}

export function minMax(
  op:       MinMaxOperation,
  x:        BinaryFloat,
  y:        BinaryFloat,
  context?: FloatContext,
): BinaryFloat {
  assertSameFormat('minMax', x, y);
  if (isSignaling(x) || isSignaling(y)) context?.flags.raise('invalid');

  const xNaN = isNaN(x);
  const yNaN = isNaN(y);
  if (xNaN || yNaN) {
    if (op.nan === 'preferNumber') {
      if (!xNaN) return x;
      if (!yNaN) return y;
    }
    return quieted(xNaN ? x : y);
  }

  if (op.basis === 'magnitude') {
    const mx = magnitudeOf(x);
    const my = magnitudeOf(y);
    if (mx !== my) return pick(op.select, x, y, mx, my);
  }
  return pick(op.select, x, y, totalKey(x), totalKey(y));
}

// ─── Named variants ───────────────────────────────────────────────────────────

export function minimum(x: BinaryFloat, y: BinaryFloat, context?: FloatContext): BinaryFloat {
  return minMax(MINIMUM, x, y, context);
}

export function maximum(x: BinaryFloat, y: BinaryFloat, context?: FloatContext): BinaryFloat {
  return minMax(MAXIMUM, x, y, context);
}

export function minimumNumber(x: BinaryFloat, y: BinaryFloat, context?: FloatContext): BinaryFloat {
  return minMax(MINIMUM_NUMBER, x, y, context);
}

export function maximumNumber(x: BinaryFloat, y: BinaryFloat, context?: FloatContext): BinaryFloat {
  return minMax(MAXIMUM_NUMBER, x, y, context);
}

export function minimumMagnitude(x: BinaryFloat, y: BinaryFloat, context?: FloatContext): BinaryFloat {
  return minMax(MINIMUM_MAGNITUDE, x, y, context);
}

export function maximumMagnitude(x: BinaryFloat, y: BinaryFloat, context?: FloatContext): BinaryFloat {
  return minMax(MAXIMUM_MAGNITUDE, x, y, context);
}

export function minimumMagnitudeNumber(x: BinaryFloat, y: BinaryFloat, context?: FloatContext): BinaryFloat {
  return minMax(MINIMUM_MAGNITUDE_NUMBER, x, y, context);
}

export function maximumMagnitudeNumber(x: BinaryFloat, y: BinaryFloat, context?: FloatContext): BinaryFloat {
  return minMax(MAXIMUM_MAGNITUDE_NUMBER, x, y, context);
}
