/**
 * @bitfloat/core — layout constants
 *
 * These constants define the binary contract of every supported format.
 * They are the IEEE 754-2019 Table 3.5 parameters; changing any of them
 * changes the meaning of every encoded byte.
 *
 * Field layout (most significant bit first):
 *
 *   [sign: 1][exponent: exponentBits][fraction: significandBits]
 *
 *   format      bytes  exponent  fraction  bias
 *   binary16        2         5        10      15
 *   binary32        4         8        23     127
 *   binary64        8        11        52    1023
 *   binary128      16        15       112   16383
 *   binary256      32        19       236  262143
 */

import type { BinaryFormat, FormatName } from './types';

// ─── Format Builder ───────────────────────────────────────────────────────────

function defineFormat(
  name:             FormatName,
  bitWidth:         number,
  exponentBits:     number,
  decimalPrecision: number,
): BinaryFormat {
  const significandBits   = bitWidth - 1 - exponentBits;
  const exponentBias      = 2 ** (exponentBits - 1) - 1;
  const maxBiasedExponent = 2 ** exponentBits - 1;

  const f            = BigInt(significandBits);
  const fractionMask = (1n << f) - 1n;
  const quietBit     = 1n << (f - 1n);

  return Object.freeze({
    name,
    byteWidth:  bitWidth / 8,
    bitWidth,
    signBits:   1,
    exponentBits,
    significandBits,
    exponentBias,
    maxBiasedExponent,
    precision:  significandBits + 1,
    emin:       1 - exponentBias,
    emax:       exponentBias,
    epsilon:    2 ** -significandBits,
    decimalPrecision,

    signMask:     1n << BigInt(bitWidth - 1),
    exponentMask: BigInt(maxBiasedExponent) << f,
    fractionMask,
    quietBit,
    payloadMask:  quietBit - 1n,
    bitMask:      (1n << BigInt(bitWidth)) - 1n,
  });
}

// ─── Formats ──────────────────────────────────────────────────────────────────

export const BINARY16:  BinaryFormat = defineFormat('binary16',   16,  5,  3);
export const BINARY32:  BinaryFormat = defineFormat('binary32',   32,  8,  7);
export const BINARY64:  BinaryFormat = defineFormat('binary64',   64, 11, 15);
export const BINARY128: BinaryFormat = defineFormat('binary128', 128, 15, 34);
export const BINARY256: BinaryFormat = defineFormat('binary256', 256, 19, 71);

export const FORMATS: Readonly<Record<FormatName, BinaryFormat>> = {
  binary16:  BINARY16,
  binary32:  BINARY32,
  binary64:  BINARY64,
  binary128: BINARY128,
  binary256: BINARY256,
};

const FORMAT_FIELDS: readonly (keyof BinaryFormat)[] = [
  'byteWidth', 'bitWidth', 'signBits', 'exponentBits', 'significandBits',
  'exponentBias', 'maxBiasedExponent', 'precision', 'emin', 'emax', 'epsilon',
  'decimalPrecision', 'signMask', 'exponentMask', 'fractionMask', 'quietBit',
  'payloadMask', 'bitMask',
];

function lookupFormat(name: FormatName): BinaryFormat {
  const resolved = Object.prototype.hasOwnProperty.call(FORMATS, name)
    ? FORMATS[name]
    : undefined;
  if (resolved === undefined) {
    throw new TypeError(
      `Unknown binary format '${String(name)}'. ` +
      `Expected one of: ${Object.keys(FORMATS).join(', ')}.`,
    );
  }
  return resolved;
}

/**
 * Accept either a format name or a format record, and return the shared
 * record from FORMATS. Values are tagged with that record, so a copy of a
 * format resolves to the same operand format as the original.
 *
 * Throws TypeError for an unknown name, or for a record whose fields differ
 * from the format it names.
 */
export function resolveFormat(format: FormatName | BinaryFormat): BinaryFormat {
  if (typeof format === 'string') return lookupFormat(format);

  const record    = format;
  const canonical = lookupFormat(record.name);
  if (record === canonical) return canonical;

  const mismatch = FORMAT_FIELDS.find(field => record[field] !== canonical[field]);
  if (mismatch !== undefined) {
    throw new TypeError(
      `Format record '${record.name}' does not match the ${canonical.name} layout ` +
      `(field '${mismatch}' is ${String(record[mismatch])}, expected ${String(canonical[mismatch])}).`,
    );
  }
  return canonical;
}

// ─── Defaults ─────────────────────────────────────────────────────────────────

/** Byte order used when a codec call does not name one. */
export const DEFAULT_ENDIANNESS = 'little' as const;

/** The IEEE default rounding-direction attribute for binary formats. */
export const DEFAULT_ROUNDING_MODE = 'toNearestTiesToEven' as const;

export const DEFAULT_TININESS = 'afterRounding' as const;
