/**
 * @bitfloat/core — format conversion and integral rounding
 */

import { BinaryFloat } from './bits';
import { resolveFormat } from './constants';
import { roundingEnv } from './context';
import type { FloatContext } from './context';
import {
  NEAREST_EVEN,
  convertBits,
  decompose,
  quietBits,
  roundPack,
  shiftRound,
  zeroBits,
} from './pack';
import type { Sign } from './pack';
import type { BinaryFormat, FormatName, RoundingDirection } from './types';

// ─── Directions ───────────────────────────────────────────────────────────────

export const TO_NEAREST_TIES_TO_EVEN: RoundingDirection = { kind: 'toNearest', ties: 'toEven' };
export const TO_NEAREST_TIES_AWAY:    RoundingDirection = { kind: 'toNearest', ties: 'awayFromZero' };
export const TOWARD_POSITIVE:         RoundingDirection = { kind: 'towardInfinity', sign: 'positive' };
export const TOWARD_NEGATIVE:         RoundingDirection = { kind: 'towardInfinity', sign: 'negative' };
export const TOWARD_ZERO:             RoundingDirection = { kind: 'towardZero' };

// ─── Format conversion ────────────────────────────────────────────────────────

/**
 * Convert `value` to `target`, rounding under the context's mode.
 * Widening is always exact. A signaling NaN comes out quiet and raises
 * invalid; overflow, underflow and inexact are raised as they occur.
 */
export function convertFormat(
  value:    BinaryFloat,
  target:   FormatName | BinaryFormat,
  context?: FloatContext,
): BinaryFloat {
  const fmt = resolveFormat(target);
  return BinaryFloat.fromBits(fmt, convertBits(value.bits, value.format, fmt, roundingEnv(context)));
}

// ─── Integral rounding ────────────────────────────────────────────────────────

function roundIntegral(
  value:     BinaryFloat,
  direction: RoundingDirection,
  exact:     boolean,
  context?:  FloatContext,
): BinaryFloat {
  const { format } = value;
  const d = decompose(format, value.bits);

  switch (d.kind) {
    case 'nan':
      if (!d.quiet) context?.flags.raise('invalid');
      return BinaryFloat.fromBits(format, quietBits(format, value.bits));
    case 'infinity':
    case 'zero':
      return value;
    case 'finite': {
      if (d.quantum >= 0) return value;
      const { kept, inexact } = shiftRound(direction, d.sign, d.significand, -d.quantum);
      if (inexact && exact) context?.flags.raise('inexact');
      // An integer no larger than the rounded value always fits.
      const bits = kept === 0n ? zeroBits(format, d.sign) : roundPack(format, d.sign, kept, 0, NEAREST_EVEN);
      return BinaryFloat.fromBits(format, bits);
    }
  }
}

/** Round to an integral value in the same format. Signed zero is kept: ceil(-0.5) is -0. */
export function roundToIntegral(
  value:     BinaryFloat,
  direction: RoundingDirection = TO_NEAREST_TIES_TO_EVEN,
  context?:  FloatContext,
): BinaryFloat {
  return roundIntegral(value, direction, false, context);
}

/** As roundToIntegral(), and raises inexact when the result differs from `value`. */
export function roundToIntegralExact(
  value:     BinaryFloat,
  direction: RoundingDirection = TO_NEAREST_TIES_TO_EVEN,
  context?:  FloatContext,
): BinaryFloat {
  return roundIntegral(value, direction, true, context);
}

export function floor(value: BinaryFloat, context?: FloatContext): BinaryFloat {
  return roundIntegral(value, TOWARD_NEGATIVE, false, context);
}

export function ceil(value: BinaryFloat, context?: FloatContext): BinaryFloat {
  return roundIntegral(value, TOWARD_POSITIVE, false, context);
}

/** Nearest integer, ties to even. */
export function round(value: BinaryFloat, context?: FloatContext): BinaryFloat {
  return roundIntegral(value, TO_NEAREST_TIES_TO_EVEN, false, context);
}

export function trunc(value: BinaryFloat, context?: FloatContext): BinaryFloat {
  return roundIntegral(value, TOWARD_ZERO, false, context);
}

/** Nearest integer, ties away from zero. */
export function roundAwayFromZero(value: BinaryFloat, context?: FloatContext): BinaryFloat {
  return roundIntegral(value, TO_NEAREST_TIES_AWAY, false, context);
}

// ─── Integer conversion ───────────────────────────────────────────────────────

/**
 * Round `value` to an integer. Returns null for NaN and infinity, which have
 * no integer value.
 */
export function convertToInteger(
  value:     BinaryFloat,
  direction: RoundingDirection = TO_NEAREST_TIES_TO_EVEN,
): bigint | null {
  const d = decompose(value.format, value.bits);
  switch (d.kind) {
    case 'nan':
    case 'infinity':
      return null;
    case 'zero':
      return 0n;
    case 'finite': {
      const magnitude = d.quantum >= 0
        ? d.significand << BigInt(d.quantum)
        : shiftRound(direction, d.sign, d.significand, -d.quantum).kept;
      return d.sign === 1 ? -magnitude : magnitude;
    }
  }
}

/**
 * Nearest value of `format` to the integer `n`, rounded under the context's
 * mode. Zero converts to +0. Raises inexact, and overflow for magnitudes past
 * the format's range.
 */
export function convertFromInt(
  format:   FormatName | BinaryFormat,
  n:        bigint,
  context?: FloatContext,
): BinaryFloat {
  const fmt = resolveFormat(format);
  if (n === 0n) return BinaryFloat.fromBits(fmt, zeroBits(fmt, 0));

  const sign: Sign = n < 0n ? 1 : 0;
  const magnitude  = sign === 1 ? -n : n;
  return BinaryFloat.fromBits(fmt, roundPack(fmt, sign, magnitude, 0, roundingEnv(context)));
}
