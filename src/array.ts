/**
 * @bitfloat/core — array codec
 *
 * Batched encode/decode over one contiguous buffer. Elements sit back to
 * back at multiples of byteWidth, each in the same byte order.
 */

import { BinaryFloat } from './bits';
import { DEFAULT_ENDIANNESS, resolveFormat } from './constants';
import { readBits, writeBits } from './codec';
import type { BinaryFormat, Endianness, FormatName } from './types';

function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

// ─── BinaryFloat arrays ───────────────────────────────────────────────────────

/**
 * Concatenate the encodings of `values`.
 *
 * All elements must share one format. `format` is only needed to say which
 * format an empty input belongs to; when given, every element must match it.
 */
export function encodeArray(
  values:     readonly BinaryFloat[],
  endianness: Endianness = DEFAULT_ENDIANNESS,
  format?:    FormatName | BinaryFormat,
): Uint8Array {
  const first = values[0];
  if (first === undefined) return new Uint8Array(0);

  const fmt = format === undefined ? first.format : resolveFormat(format);
  const out  = new Uint8Array(values.length * fmt.byteWidth);
  const view = viewOf(out);
  const le   = endianness === 'little';

  values.forEach((value, i) => {
    if (value.format !== fmt) {
      throw new TypeError(
        `encodeArray: element ${i} is ${value.format.name}, expected ${fmt.name}. ` +
        `All elements of one buffer must share a format.`,
      );
    }
    writeBits(view, i * fmt.byteWidth, fmt, value.bits, le);
  });
  return out;
}

/**
 * Split `bytes` into consecutive values of `format`.
 * Returns null when bytes.length is not a multiple of the byte width.
 */
export function decodeArray(
  format:     FormatName | BinaryFormat,
  bytes:      Uint8Array,
  endianness: Endianness = DEFAULT_ENDIANNESS,
): BinaryFloat[] | null {
  const fmt = resolveFormat(format);
  if (bytes.length % fmt.byteWidth !== 0) return null;

  const view  = viewOf(bytes);
  const le    = endianness === 'little';
  const count = bytes.length / fmt.byteWidth;
  const out: BinaryFloat[] = [];
  for (let i = 0; i < count; i++) {
    out.push(BinaryFloat.fromBits(fmt, readBits(view, i * fmt.byteWidth, fmt, le)));
  }
  return out;
}

// ─── Typed-array fast paths ───────────────────────────────────────────────────
// DataView float accessors; no BinaryFloat per element.

export function encodeFloat64Array(
  values:     Float64Array | readonly number[],
  endianness: Endianness = DEFAULT_ENDIANNESS,
): Uint8Array {
  const out  = new Uint8Array(values.length * 8);
  const view = viewOf(out);
  const le   = endianness === 'little';
  for (let i = 0; i < values.length; i++) view.setFloat64(i * 8, values[i] ?? 0, le);
  return out;
}

export function decodeFloat64Array(
  bytes:      Uint8Array,
  endianness: Endianness = DEFAULT_ENDIANNESS,
): Float64Array | null {
  if (bytes.length % 8 !== 0) return null;
  const view = viewOf(bytes);
  const le   = endianness === 'little';
  const out  = new Float64Array(bytes.length / 8);
  for (let i = 0; i < out.length; i++) out[i] = view.getFloat64(i * 8, le);
  return out;
}

/** Each element is narrowed to binary32, ties to even. */
export function encodeFloat32Array(
  values:     Float32Array | readonly number[],
  endianness: Endianness = DEFAULT_ENDIANNESS,
): Uint8Array {
  const out  = new Uint8Array(values.length * 4);
  const view = viewOf(out);
  const le   = endianness === 'little';
  for (let i = 0; i < values.length; i++) view.setFloat32(i * 4, values[i] ?? 0, le);
  return out;
}

export function decodeFloat32Array(
  bytes:      Uint8Array,
  endianness: Endianness = DEFAULT_ENDIANNESS,
): Float32Array | null {
  if (bytes.length % 4 !== 0) return null;
  const view = viewOf(bytes);
  const le   = endianness === 'little';
  const out  = new Float32Array(bytes.length / 4);
  for (let i = 0; i < out.length; i++) out[i] = view.getFloat32(i * 4, le);
  return out;
}

// ─── In-place slots ───────────────────────────────────────────────────────────

function checkSlot(op: string, buffer: Uint8Array, offset: number, format: BinaryFormat): void {
  if (!Number.isInteger(offset) || offset < 0 || offset + format.byteWidth > buffer.length) {
    throw new RangeError(
      `${op}: a ${format.name} slot at offset ${offset} needs ${format.byteWidth} bytes, ` +
      `but the buffer is ${buffer.length} bytes long.`,
    );
  }
}

/** Write `value` into `target` at byte `offset`. */
export function writeFloat(
  target:     Uint8Array,
  offset:     number,
  value:      BinaryFloat,
  endianness: Endianness = DEFAULT_ENDIANNESS,
): void {
  checkSlot('writeFloat', target, offset, value.format);
  writeBits(viewOf(target), offset, value.format, value.bits, endianness === 'little');
}

export function readFloat(
  format:     FormatName | BinaryFormat,
  source:     Uint8Array,
  offset:     number,
  endianness: Endianness = DEFAULT_ENDIANNESS,
): BinaryFloat {
  const fmt = resolveFormat(format);
  checkSlot('readFloat', source, offset, fmt);
  return BinaryFloat.fromBits(fmt, readBits(viewOf(source), offset, fmt, endianness === 'little'));
}
