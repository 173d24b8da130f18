/**
 * @bitfloat/core — classification
 *
 * Decision order matters: an all-ones exponent is NaN or infinity, and NaN
 * must be tested first; an all-zero exponent is zero or subnormal, told
 * apart by the fraction.
 */

import type { BinaryFloat } from './bits';
import type { ClassName, NumberClass } from './types';

export function numberClass(value: BinaryFloat): NumberClass {
  const { format } = value;
  const biased   = value.biasedExponent;
  const fraction = value.fraction;

  if (biased === format.maxBiasedExponent && fraction !== 0n) {
    return { kind: 'nan', nan: (fraction & format.quietBit) !== 0n ? 'quiet' : 'signaling' };
  }

  const kind = value.signBit === 1 ? 'negative' : 'positive';
  if (biased === format.maxBiasedExponent) return { kind, value: 'infinity' };
  if (biased === 0) return { kind, value: fraction === 0n ? 'zero' : 'subnormal' };
  return { kind, value: 'normal' };
}

/** IEEE 754 §5.7.2 `class` name for a NumberClass. */
export function className(cls: NumberClass): ClassName {
  if (cls.kind === 'nan') return cls.nan === 'quiet' ? 'quietNaN' : 'signalingNaN';
  switch (cls.value) {
    case 'infinity':  return cls.kind === 'negative' ? 'negativeInfinity'  : 'positiveInfinity';
    case 'normal':    return cls.kind === 'negative' ? 'negativeNormal'    : 'positiveNormal';
    case 'subnormal': return cls.kind === 'negative' ? 'negativeSubnormal' : 'positiveSubnormal';
    case 'zero':      return cls.kind === 'negative' ? 'negativeZero'      : 'positiveZero';
  }
}

// ─── Predicates ───────────────────────────────────────────────────────────────

/** Sign bit set. True for -0 and for NaNs with the sign bit set. */
export function isSignMinus(value: BinaryFloat): boolean {
  return value.signBit === 1;
}

export function isNaN(value: BinaryFloat): boolean {
  return value.biasedExponent === value.format.maxBiasedExponent && value.fraction !== 0n;
}

export function isSignaling(value: BinaryFloat): boolean {
  return isNaN(value) && (value.fraction & value.format.quietBit) === 0n;
}

export function isInfinite(value: BinaryFloat): boolean {
  return value.biasedExponent === value.format.maxBiasedExponent && value.fraction === 0n;
}

/** Zero, subnormal or normal. */
export function isFinite(value: BinaryFloat): boolean {
  return value.biasedExponent !== value.format.maxBiasedExponent;
}

export function isNormal(value: BinaryFloat): boolean {
  const biased = value.biasedExponent;
  return biased !== 0 && biased !== value.format.maxBiasedExponent;
}

export function isSubnormal(value: BinaryFloat): boolean {
  return value.biasedExponent === 0 && value.fraction !== 0n;
}

export function isZero(value: BinaryFloat): boolean {
  return value.biasedExponent === 0 && value.fraction === 0n;
}

/** Binary interchange encodings have no non-canonical patterns. */
export function isCanonical(_value: BinaryFloat): boolean {
  return true;
}

export function radix(_value: BinaryFloat): 2 {
  return 2;
}
