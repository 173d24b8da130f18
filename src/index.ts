// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  FormatName,
  BinaryFormat,
  Endianness,
  NaNKind,
  FiniteKind,
  NumberClass,
  ClassName,
  NaNPayload,
  RoundingMode,
  RoundingDirection,
  TininessDetection,
  ExceptionFlag,
  Relation,
  MinMaxOperation,
} from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  BINARY16,
  BINARY32,
  BINARY64,
  BINARY128,
  BINARY256,
  FORMATS,
  resolveFormat,
  DEFAULT_ENDIANNESS,
  DEFAULT_ROUNDING_MODE,
  DEFAULT_TININESS,
} from './constants';

// ─── Values ───────────────────────────────────────────────────────────────────
export {
  BinaryFloat,
  binary16,
  binary32,
  binary64,
  specialValues,
} from './bits';
export type { SpecialValues } from './bits';

// ─── Environment ──────────────────────────────────────────────────────────────
export {
  ExceptionFlags,
  EXCEPTION_FLAGS,
  FLAG_INVALID,
  FLAG_DIVISION_BY_ZERO,
  FLAG_OVERFLOW,
  FLAG_UNDERFLOW,
  FLAG_INEXACT,
} from './exceptions';
export type { FlagSnapshot } from './exceptions';

export {
  FloatContext,
  RoundingModeError,
  ROUNDING_MODES,
  directionOf,
} from './context';
export type { FloatContextOptions } from './context';

// ─── Codec ────────────────────────────────────────────────────────────────────
export {
  encode,
  decode,
  encodeNumber,
  decodeNumber,
} from './codec';

export {
  encodeArray,
  decodeArray,
  encodeFloat64Array,
  decodeFloat64Array,
  encodeFloat32Array,
  decodeFloat32Array,
  writeFloat,
  readFloat,
} from './array';

// ─── Classification ───────────────────────────────────────────────────────────
export {
  numberClass,
  className,
  isSignMinus,
  isNaN,
  isSignaling,
  isInfinite,
  isFinite,
  isNormal,
  isSubnormal,
  isZero,
  isCanonical,
  radix,
} from './classify';

// ─── Sign ─────────────────────────────────────────────────────────────────────
export { negate, abs, copySign } from './sign';

// ─── NaN payloads ─────────────────────────────────────────────────────────────
export {
  encodeQuietNaN,
  encodeSignalingNaN,
  encodeNaN,
  extractPayload,
  decodeNaN,
  isQuietNaN,
  isSignalingNaN,
} from './payload';

// ─── Comparison ───────────────────────────────────────────────────────────────
export {
  isEqual,
  isNotEqual,
  isLess,
  isLessEqual,
  isGreater,
  isGreaterEqual,
  isUnordered,
  isOrdered,
  compareQuiet,
  compareSignaling,
  totalOrder,
  totalOrderMag,
  compareTotal,
} from './compare';

// ─── Min / Max ────────────────────────────────────────────────────────────────
export {
  minMax,
  minimum,
  maximum,
  minimumNumber,
  maximumNumber,
  minimumMagnitude,
  maximumMagnitude,
  minimumMagnitudeNumber,
  maximumMagnitudeNumber,
  MINIMUM,
  MAXIMUM,
  MINIMUM_NUMBER,
  MAXIMUM_NUMBER,
  MINIMUM_MAGNITUDE,
  MAXIMUM_MAGNITUDE,
  MINIMUM_MAGNITUDE_NUMBER,
  MAXIMUM_MAGNITUDE_NUMBER,
} from './minmax';

// ─── Conversion and rounding ──────────────────────────────────────────────────
export {
  convertFormat,
  roundToIntegral,
  roundToIntegralExact,
  floor,
  ceil,
  round,
  trunc,
  roundAwayFromZero,
  convertFromInt,
  convertToInteger,
  TO_NEAREST_TIES_TO_EVEN,
  TO_NEAREST_TIES_AWAY,
  TOWARD_POSITIVE,
  TOWARD_NEGATIVE,
  TOWARD_ZERO,
} from './convert';

// ─── Neighbours and scaling ───────────────────────────────────────────────────
export { nextUp, nextDown, nextAfter } from './next';
export { scaleB, logB } from './scale';
