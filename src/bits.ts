/**
 * @bitfloat/core — value type and bit-cast primitive
 *
 * A BinaryFloat is a format plus the exact bit pattern of one value in it.
 * Nothing about the pattern is normalised: signaling NaNs, payloads and
 * signed zeros are all kept as given.
 *
 * The only place a JS number meets a bit pattern is toBits64 / fromBits64
 * (and their binary32 twins) below. Everything else works on bigints.
 */

import { BINARY32, BINARY64, resolveFormat } from './constants';
import {
  NEAREST_EVEN,
  biasedExponentOf,
  convertBits,
  infinityBits,
  maxFiniteBits,
  signOf,
  zeroBits,
} from './pack';
import type { Sign } from './pack';
import type { BinaryFormat, FormatName } from './types';

// ─── Bit-cast primitive ───────────────────────────────────────────────────────

// Shared scratch slot. Calls are synchronous, so one buffer is enough.
const scratch = new DataView(new ArrayBuffer(8));

function toBits64(n: number): bigint {
  scratch.setFloat64(0, n, true);
  return scratch.getBigUint64(0, true);
}

function fromBits64(bits: bigint): number {
  scratch.setBigUint64(0, bits, true);
  return scratch.getFloat64(0, true);
}

function toBits32(n: number): bigint {
  scratch.setFloat32(0, n, true);
  return BigInt(scratch.getUint32(0, true));
}

function fromBits32(bits: bigint): number {
  scratch.setUint32(0, Number(bits), true);
  return scratch.getFloat32(0, true);
}

// ─── BinaryFloat ──────────────────────────────────────────────────────────────

export class BinaryFloat {
  private constructor(
    readonly format: BinaryFormat,
    readonly bits:   bigint,
  ) {}

  /**
   * Wrap a raw bit pattern. Every pattern in [0, 2^bitWidth) is a value of
   * the format; anything else throws RangeError.
   */
  static fromBits(format: FormatName | BinaryFormat, bits: bigint): BinaryFloat {
    const fmt = resolveFormat(format);
    if (bits < 0n || bits > fmt.bitMask) {
      throw new RangeError(
        `BinaryFloat.fromBits: 0x${bits.toString(16)} does not fit in ${fmt.bitWidth} bits ` +
        `(${fmt.name}).`,
      );
    }
    return new BinaryFloat(fmt, bits);
  }

  /**
   * Nearest value of `format` to `n`, ties to even.
   * binary64 is exact; the others narrow (or, for binary128/256, widen) the
   * binary64 pattern of `n`.
   */
  static fromNumber(format: FormatName | BinaryFormat, n: number): BinaryFloat {
    const fmt = resolveFormat(format);
    if (fmt.name === 'binary64') return new BinaryFloat(fmt, toBits64(n));
    if (fmt.name === 'binary32') return new BinaryFloat(fmt, toBits32(n));
    return new BinaryFloat(fmt, convertBits(toBits64(n), BINARY64, fmt, NEAREST_EVEN));
  }

  /** Exact for binary16/32/64; binary128/256 round to nearest even. */
  toNumber(): number {
    if (this.format.name === 'binary64') return fromBits64(this.bits);
    if (this.format.name === 'binary32') return fromBits32(this.bits);
    return fromBits64(convertBits(this.bits, this.format, BINARY64, NEAREST_EVEN));
  }

  get signBit(): Sign {
    return signOf(this.format, this.bits);
  }

  get biasedExponent(): number {
    return biasedExponentOf(this.format, this.bits);
  }

  /** Stored fraction field, without the implicit leading bit. */
  get fraction(): bigint {
    return this.bits & this.format.fractionMask;
  }

  /** Bit identity: same format, same pattern. Not IEEE equality. */
  equals(other: BinaryFloat): boolean {
    return this.format === other.format && this.bits === other.bits;
  }

  /** Zero-padded upper-case hex of the whole pattern, e.g. `0x3C00`. */
  toHex(): string {
    const digits = this.format.bitWidth / 4;
    return '0x' + this.bits.toString(16).toUpperCase().padStart(digits, '0');
  }

  toString(): string {
    return `${this.format.name}:${this.toHex()}`;
  }
}

// ─── Shorthands ───────────────────────────────────────────────────────────────

export function binary16(n: number): BinaryFloat {
  return BinaryFloat.fromNumber('binary16', n);
}

export function binary32(n: number): BinaryFloat {
  return BinaryFloat.fromNumber(BINARY32, n);
}

export function binary64(n: number): BinaryFloat {
  return BinaryFloat.fromNumber(BINARY64, n);
}

// ─── Special values ───────────────────────────────────────────────────────────

export type SpecialValues = {
  readonly positiveZero:     BinaryFloat;
  readonly negativeZero:     BinaryFloat;
  readonly positiveInfinity: BinaryFloat;
  readonly negativeInfinity: BinaryFloat;
  /** Positive quiet NaN with an empty payload. */
  readonly quietNaN:         BinaryFloat;
  /** Positive signaling NaN with payload 1. */
  readonly signalingNaN:     BinaryFloat;
  readonly minSubnormal:     BinaryFloat;
  readonly minNormal:        BinaryFloat;
  readonly maxFinite:        BinaryFloat;
};

const specialCache = new Map<FormatName, SpecialValues>();

export function specialValues(format: FormatName | BinaryFormat): SpecialValues {
  const fmt    = resolveFormat(format);
  const cached = specialCache.get(fmt.name);
  if (cached !== undefined) return cached;

  const of = (bits: bigint): BinaryFloat => BinaryFloat.fromBits(fmt, bits);
  const values: SpecialValues = Object.freeze({
    positiveZero:     of(zeroBits(fmt, 0)),
    negativeZero:     of(zeroBits(fmt, 1)),
    positiveInfinity: of(infinityBits(fmt, 0)),
    negativeInfinity: of(infinityBits(fmt, 1)),
    quietNaN:         of(fmt.exponentMask | fmt.quietBit),
    signalingNaN:     of(fmt.exponentMask | 1n),
    minSubnormal:     of(1n),
    minNormal:        of(1n << BigInt(fmt.significandBits)),
    maxFinite:        of(maxFiniteBits(fmt, 0)),
  });
  specialCache.set(fmt.name, values);
  return values;
}

// ─── Operand checks ───────────────────────────────────────────────────────────

/** Throws TypeError when two operands of a binary operation differ in format. */
export function assertSameFormat(op: string, a: BinaryFloat, b: BinaryFloat): void {
  if (a.format !== b.format) {
    throw new TypeError(
      `${op}: operands must share a format; got ${a.format.name} and ${b.format.name}. ` +
      `Convert one with convertFormat() first.`,
    );
  }
}
