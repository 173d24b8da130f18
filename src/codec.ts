/**
 * @bitfloat/core — binary codec
 *
 * Fixed-width interchange encoding of a single value: the bit pattern,
 * written verbatim, in the requested byte order. No framing, no length
 * prefix, no validation of NaN or subnormal fields.
 *
 * Little-endian output is always the exact reversal of big-endian output.
 */

import { BinaryFloat } from './bits';
import { DEFAULT_ENDIANNESS, resolveFormat } from './constants';
import type { BinaryFormat, Endianness, FormatName } from './types';

const WORD_MASK = 0xFFFFFFFFFFFFFFFFn;

// ─── DataView access ──────────────────────────────────────────────────────────

/**
 * Write `bits` into `view` at `offset` as one `format`-wide slot.
 * The caller guarantees the slot fits.
 */
export function writeBits(
  view:   DataView,
  offset: number,
  format: BinaryFormat,
  bits:   bigint,
  le:     boolean,
): void {
  switch (format.byteWidth) {
    case 2: view.setUint16(offset, Number(bits), le); return;
    case 4: view.setUint32(offset, Number(bits), le); return;
    case 8: view.setBigUint64(offset, bits, le);      return;
  }

  // binary128 / binary256: 64-bit words, least significant word first.
  const words = format.byteWidth / 8;
  for (let k = 0; k < words; k++) {
    const word = (bits >> BigInt(64 * k)) & WORD_MASK;
    const at   = le ? offset + 8 * k : offset + format.byteWidth - 8 * (k + 1);
    view.setBigUint64(at, word, le);
  }
}

/** Inverse of writeBits(). */
export function readBits(
  view:   DataView,
  offset: number,
  format: BinaryFormat,
  le:     boolean,
): bigint {
  switch (format.byteWidth) {
    case 2: return BigInt(view.getUint16(offset, le));
    case 4: return BigInt(view.getUint32(offset, le));
    case 8: return view.getBigUint64(offset, le);
  }

  const words = format.byteWidth / 8;
  let bits = 0n;
  for (let k = 0; k < words; k++) {
    const at = le ? offset + 8 * k : offset + format.byteWidth - 8 * (k + 1);
    bits |= view.getBigUint64(at, le) << BigInt(64 * k);
  }
  return bits;
}

// ─── Single value ─────────────────────────────────────────────────────────────

/** Encode `value` into a fresh buffer of exactly format.byteWidth bytes. */
export function encode(value: BinaryFloat, endianness: Endianness = DEFAULT_ENDIANNESS): Uint8Array {
  const out  = new Uint8Array(value.format.byteWidth);
  const view = new DataView(out.buffer);
  writeBits(view, 0, value.format, value.bits, endianness === 'little');
  return out;
}

/**
 * Decode one value of `format` from `bytes`.
 * Returns null when bytes.length is not the format's byte width; any
 * correctly sized input decodes.
 */
export function decode(
  format:     FormatName | BinaryFormat,
  bytes:      Uint8Array,
  endianness: Endianness = DEFAULT_ENDIANNESS,
): BinaryFloat | null {
  const fmt = resolveFormat(format);
  if (bytes.length !== fmt.byteWidth) return null;
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return BinaryFloat.fromBits(fmt, readBits(view, 0, fmt, endianness === 'little'));
}

// ─── Native numbers ───────────────────────────────────────────────────────────

/** encode(BinaryFloat.fromNumber(format, n)). */
export function encodeNumber(
  n:          number,
  format:     FormatName | BinaryFormat = 'binary64',
  endianness: Endianness = DEFAULT_ENDIANNESS,
): Uint8Array {
  return encode(BinaryFloat.fromNumber(format, n), endianness);
}

export function decodeNumber(
  bytes:      Uint8Array,
  format:     FormatName | BinaryFormat = 'binary64',
  endianness: Endianness = DEFAULT_ENDIANNESS,
): number | null {
  const value = decode(format, bytes, endianness);
  return value === null ? null : value.toNumber();
}
