/**
 * @bitfloat/core — field decomposition and rounding
 *
 * Every operation that produces a new finite value funnels through
 * roundPack(): conversions between formats, scaleB, the integral roundings
 * and the binary16/128/256 side of the number bit-cast.
 *
 * A finite non-zero value is handled in the integer form
 *
 *   value = (-1)^sign × significand × 2^quantum
 *
 * where significand is a positive bigint of any length. roundPack() picks the
 * quantum the target format allows for that magnitude, shifts the
 * significand to it, rounds away the dropped bits, and assembles the fields.
 *
 * This module works on raw bigint patterns only, so the value type in
 * bits.ts can depend on it without a cycle.
 */

import type { ExceptionFlags } from './exceptions';
import type {
  BinaryFormat,
  RoundingDirection,
  TininessDetection,
} from './types';

// ─── Rounding environment ─────────────────────────────────────────────────────

/**
 * What roundPack() needs from its caller. `flags` is optional: without it
 * exceptions are still handled by their default results, just not recorded.
 */
export interface RoundingEnv {
  readonly direction: RoundingDirection;
  readonly tininess:  TininessDetection;
  readonly flags?:    ExceptionFlags;
}

export const NEAREST_EVEN: RoundingEnv = {
  direction: { kind: 'toNearest', ties: 'toEven' },
  tininess:  'afterRounding',
};

// ─── Decomposition ────────────────────────────────────────────────────────────

export type Sign = 0 | 1;

export type Decomposed =
  | { readonly kind: 'nan';      readonly sign: Sign; readonly quiet: boolean; readonly fraction: bigint }
  | { readonly kind: 'infinity'; readonly sign: Sign }
  | { readonly kind: 'zero';     readonly sign: Sign }
  | { readonly kind: 'finite';   readonly sign: Sign; readonly significand: bigint; readonly quantum: number };

export function signOf(format: BinaryFormat, bits: bigint): Sign {
  return (bits & format.signMask) === 0n ? 0 : 1;
}

export function biasedExponentOf(format: BinaryFormat, bits: bigint): number {
  return Number((bits & format.exponentMask) >> BigInt(format.significandBits));
}

/** Split a bit pattern into sign, kind, and (for finite values) integer significand and quantum. */
export function decompose(format: BinaryFormat, bits: bigint): Decomposed {
  const sign     = signOf(format, bits);
  const biased   = biasedExponentOf(format, bits);
  const fraction = bits & format.fractionMask;

  if (biased === format.maxBiasedExponent) {
    if (fraction === 0n) return { kind: 'infinity', sign };
    return { kind: 'nan', sign, quiet: (fraction & format.quietBit) !== 0n, fraction };
  }

  if (biased === 0) {
    if (fraction === 0n) return { kind: 'zero', sign };
    // Subnormal: no hidden bit, exponent pinned at emin.
    return {
      kind: 'finite',
      sign,
      significand: fraction,
      quantum:     format.emin - format.significandBits,
    };
  }

  return {
    kind: 'finite',
    sign,
    significand: fraction | (1n << BigInt(format.significandBits)),
    quantum:     biased - format.exponentBias - format.significandBits,
  };
}

/** Number of significant bits in a positive bigint. */
export function bitLength(n: bigint): number {
  return n === 0n ? 0 : n.toString(2).length;
}

// ─── Assembly ─────────────────────────────────────────────────────────────────

function assemble(format: BinaryFormat, sign: Sign, biased: number, fraction: bigint): bigint {
  const signBits = sign === 1 ? format.signMask : 0n;
  return signBits | (BigInt(biased) << BigInt(format.significandBits)) | (fraction & format.fractionMask);
}

export function zeroBits(format: BinaryFormat, sign: Sign): bigint {
  return sign === 1 ? format.signMask : 0n;
}

export function infinityBits(format: BinaryFormat, sign: Sign): bigint {
  return zeroBits(format, sign) | format.exponentMask;
}

export function maxFiniteBits(format: BinaryFormat, sign: Sign): bigint {
  return assemble(format, sign, format.maxBiasedExponent - 1, format.fractionMask);
}

/** Set the quiet bit. Sign, exponent and payload are left as they are. */
export function quietBits(format: BinaryFormat, bits: bigint): bigint {
  return bits | format.quietBit;
}

// ─── Rounding ─────────────────────────────────────────────────────────────────

/**
 * Decide whether dropping `remainder` (out of a unit of 2 × half) from `kept`
 * rounds the magnitude up by one unit in the last place.
 */
export function roundsUp(
  direction: RoundingDirection,
  sign:      Sign,
  kept:      bigint,
  remainder: bigint,
  half:      bigint,
): boolean {
  if (remainder === 0n) return false;
  switch (direction.kind) {
    case 'toNearest':
      if (remainder !== half) return remainder > half;
      return direction.ties === 'awayFromZero' || (kept & 1n) === 1n;
    case 'towardZero':
      return false;
    case 'towardInfinity':
      return direction.sign === 'positive' ? sign === 0 : sign === 1;
  }
}

/** Shift `significand` right by `shift` bits and round the dropped part. */
export function shiftRound(
  direction:   RoundingDirection,
  sign:        Sign,
  significand: bigint,
  shift:       number,
): { kept: bigint; inexact: boolean } {
  if (shift <= 0) return { kept: significand << BigInt(-shift), inexact: false };
  // Past bitLength + 2 every bit is dropped and the remainder is below half;
  // the cap keeps `half` small for huge shifts.
  const s         = BigInt(Math.min(shift, bitLength(significand) + 2));
  let   kept      = significand >> s;
  const remainder = significand & ((1n << s) - 1n);
  if (roundsUp(direction, sign, kept, remainder, 1n << (s - 1n))) kept += 1n;
  return { kept, inexact: remainder !== 0n };
}

function overflowBits(format: BinaryFormat, sign: Sign, direction: RoundingDirection): bigint {
  switch (direction.kind) {
    case 'toNearest':
      return infinityBits(format, sign);
    case 'towardZero':
      return maxFiniteBits(format, sign);
    case 'towardInfinity': {
      const towardSign: Sign = direction.sign === 'positive' ? 0 : 1;
      return sign === towardSign ? infinityBits(format, sign) : maxFiniteBits(format, sign);
    }
  }
}

function isTiny(
  format:      BinaryFormat,
  env:         RoundingEnv,
  sign:        Sign,
  significand: bigint,
  exponent:    number,
): boolean {
  if (exponent >= format.emin) return false;
  if (env.tininess === 'beforeRounding') return true;

  // Round to full precision as if the exponent range were unbounded.
  const len = bitLength(significand);
  const { kept } = shiftRound(env.direction, sign, significand, len - format.precision);
  const carried  = bitLength(kept) > format.precision ? 1 : 0;
  return exponent + carried < format.emin;
}

/**
 * Round (-1)^sign × significand × 2^quantum into `format` and return its bit
 * pattern. significand must be positive.
 *
 * Raises, on env.flags:
 *   inexact    whenever bits were dropped or the result overflowed
 *   overflow   when the rounded exponent exceeds emax
 *   underflow  when the result is tiny (per env.tininess) and inexact
 */
export function roundPack(
  format:      BinaryFormat,
  sign:        Sign,
  significand: bigint,
  quantum:     number,
  env:         RoundingEnv,
): bigint {
  const f        = format.significandBits;
  const exponent = quantum + bitLength(significand) - 1;

  // Normal results keep `precision` bits; tiny ones are pinned to the subnormal quantum.
  let target = Math.max(exponent - f, format.emin - f);
  let { kept, inexact } = shiftRound(env.direction, sign, significand, target - quantum);

  if (bitLength(kept) > format.precision) {
    // Rounding carried into a new leading bit; the dropped bit is zero.
    kept  >>= 1n;
    target += 1;
  }

  if (inexact && isTiny(format, env, sign, significand, exponent)) {
    env.flags?.raise('underflow');
  }
  if (inexact) env.flags?.raise('inexact');

  if (kept === 0n) return zeroBits(format, sign);

  const resultExponent = target + bitLength(kept) - 1;
  if (resultExponent > format.emax) {
    env.flags?.raise('overflow');
    env.flags?.raise('inexact');
    return overflowBits(format, sign, env.direction);
  }

  const hidden = 1n << BigInt(f);
  const biased = kept < hidden ? 0 : resultExponent + format.exponentBias;
  return assemble(format, sign, biased, kept);
}

// ─── Format conversion ────────────────────────────────────────────────────────

/**
 * Convert a bit pattern of `from` into the nearest pattern of `to`.
 *
 * Widening is exact. NaN keeps its sign and the most significant bits of its
 * fraction; the result is always quiet, and a signaling input raises invalid.
 */
export function convertBits(
  bits: bigint,
  from: BinaryFormat,
  to:   BinaryFormat,
  env:  RoundingEnv,
): bigint {
  const d = decompose(from, bits);
  switch (d.kind) {
    case 'nan': {
      if (!d.quiet) env.flags?.raise('invalid');
      const delta    = to.significandBits - from.significandBits;
      const fraction = delta >= 0 ? d.fraction << BigInt(delta) : d.fraction >> BigInt(-delta);
      return infinityBits(to, d.sign) | to.quietBit | (fraction & to.fractionMask);
    }
    case 'infinity':
      return infinityBits(to, d.sign);
    case 'zero':
      return zeroBits(to, d.sign);
    case 'finite':
      return roundPack(to, d.sign, d.significand, d.quantum, env);
  }
}
