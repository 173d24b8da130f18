/**
 * @bitfloat/core — type definitions
 *
 * The bit pattern IS the value; these types describe how to read it.
 */

// ─── Formats ──────────────────────────────────────────────────────────────────

/**
 * IEEE 754-2019 binary interchange formats known to this library.
 *
 * binary16 / binary32 / binary64 round-trip through a JS `number`.
 * binary128 / binary256 have no native host type: they are carried as bit
 * patterns only and narrow to binary64 when converted with toNumber().
 */
export type FormatName =
  | 'binary16'
  | 'binary32'
  | 'binary64'
  | 'binary128'
  | 'binary256';

/**
 * Field layout of one binary format.
 *
 * Widths and exponent limits are plain numbers. The masks are bigints over the
 * whole bit pattern (bit 0 = least significant fraction bit), so a single
 * code path serves every width.
 */
export interface BinaryFormat {
  readonly name:              FormatName;
  readonly byteWidth:         number;
  readonly bitWidth:          number;
  readonly signBits:          1;
  readonly exponentBits:      number;
  /** Stored fraction bits, excluding the implicit leading bit. */
  readonly significandBits:   number;
  readonly exponentBias:      number;
  /** All-ones exponent field value; marks infinity and NaN. */
  readonly maxBiasedExponent: number;
  /** significandBits + 1 */
  readonly precision:         number;
  readonly emin:              number;
  readonly emax:              number;
  /** Distance from 1.0 to the next larger value, 2^-significandBits. */
  readonly epsilon:           number;
  /** Decimal digits that always survive a round trip, floor(precision × log10 2). */
  readonly decimalPrecision:  number;

  readonly signMask:     bigint;
  readonly exponentMask: bigint;
  readonly fractionMask: bigint;
  /** Most significant fraction bit: 1 = quiet NaN, 0 = signaling NaN. */
  readonly quietBit:     bigint;
  /** Fraction bits below the quiet bit. */
  readonly payloadMask:  bigint;
  /** All bitWidth bits set. */
  readonly bitMask:      bigint;
}

// ─── Byte order ───────────────────────────────────────────────────────────────

/** Byte order of an encoded value. Every codec entry point defaults to 'little'. */
export type Endianness = 'little' | 'big';

// ─── Classification ───────────────────────────────────────────────────────────

export type NaNKind    = 'signaling' | 'quiet';
export type FiniteKind = 'infinity' | 'normal' | 'subnormal' | 'zero';

/**
 * The ten IEEE 754 number classes.
 *
 * NaN carries no sign here: IEEE treats the sign of a NaN as meaningless for
 * classification. Read it with isSignMinus() when it matters.
 */
export type NumberClass =
  | { readonly kind: 'nan'; readonly nan: NaNKind }
  | { readonly kind: 'positive' | 'negative'; readonly value: FiniteKind };

/** The names IEEE 754 §5.7.2 gives the results of the `class` operation. */
export type ClassName =
  | 'signalingNaN'
  | 'quietNaN'
  | 'negativeInfinity'
  | 'negativeNormal'
  | 'negativeSubnormal'
  | 'negativeZero'
  | 'positiveZero'
  | 'positiveSubnormal'
  | 'positiveNormal'
  | 'positiveInfinity';

// ─── NaN payloads ─────────────────────────────────────────────────────────────

export type NaNPayload =
  | { readonly kind: 'quiet';     readonly payload: bigint }
  | { readonly kind: 'signaling'; readonly payload: bigint };

// ─── Rounding ─────────────────────────────────────────────────────────────────

/**
 * Dynamic rounding-direction attribute held by a FloatContext.
 * Applies to every operation that has to round: conversions, scaleB.
 */
export type RoundingMode =
  | 'toNearestTiesToEven'
  | 'towardNegative'
  | 'towardPositive'
  | 'towardZero';

/**
 * Explicit rounding direction for roundToIntegral and friends.
 *
 * Unlike RoundingMode this includes ties-away-from-zero, which IEEE only
 * requires for the integral-rounding operations of binary formats.
 */
export type RoundingDirection =
  | { readonly kind: 'toNearest';      readonly ties: 'toEven' | 'awayFromZero' }
  | { readonly kind: 'towardInfinity'; readonly sign: 'positive' | 'negative' }
  | { readonly kind: 'towardZero' };

/**
 * When a tiny result is recognised for the underflow flag.
 *
 * afterRounding   tiny if the result, rounded as though the exponent range
 *                 were unbounded, lies strictly inside ±2^emin.
 * beforeRounding  tiny if the exact result lies strictly inside ±2^emin.
 */
export type TininessDetection = 'afterRounding' | 'beforeRounding';

// ─── Exceptions ───────────────────────────────────────────────────────────────

export type ExceptionFlag =
  | 'invalid'
  | 'divisionByZero'
  | 'overflow'
  | 'underflow'
  | 'inexact';

// ─── Comparison ───────────────────────────────────────────────────────────────

/** Relations accepted by compareQuiet() and compareSignaling(). */
export type Relation =
  | 'equal'
  | 'notEqual'
  | 'less'
  | 'lessEqual'
  | 'greater'
  | 'greaterEqual'
  | 'unordered'
  | 'ordered';

// ─── Min / Max ────────────────────────────────────────────────────────────────

/**
 * Selector for the IEEE 754 §9.6 min/max family.
 *
 * select  which end of the ordering to return.
 * basis   compare signed values, or magnitudes (ties fall back to values).
 * nan     propagate a NaN operand, or prefer the operand that is a number.
 */
export interface MinMaxOperation {
  readonly select: 'min' | 'max';
  readonly basis:  'value' | 'magnitude';
  readonly nan:    'propagate' | 'preferNumber';
}
