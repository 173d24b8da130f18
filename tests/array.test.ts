/**
 * @bitfloat/core — array codec
 *
 * Elements are packed back to back with no padding or length prefix, so a
 * buffer of n values is exactly n × byteWidth bytes.
 */

import { describe, it, expect } from 'vitest';
import {
  BinaryFloat,
  binary32,
  binary64,
  decodeArray,
  decodeFloat32Array,
  decodeFloat64Array,
  encodeArray,
  encodeFloat32Array,
  encodeFloat64Array,
  readFloat,
  writeFloat,
} from '../src/index';

// ─── BinaryFloat arrays ────────────────────────────────────────────────────────

describe('encodeArray / decodeArray', () => {
  it('lays elements back to back', () => {
    const out = encodeArray([binary64(1), binary64(-2)]);
    expect(out).toEqual(new Uint8Array([
      0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0xF0, 0x3F,
      0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0xC0,
    ]));
  });

  it('decodes what it encoded, in either byte order', () => {
    const values = [binary32(1.5), binary32(-0), binary32(Infinity), binary32(0.1)];
    for (const order of ['little', 'big'] as const) {
      const decoded = decodeArray('binary32', encodeArray(values, order), order);
      expect(decoded?.map(v => v.bits)).toEqual(values.map(v => v.bits));
    }
  });

  it('handles the wide formats', () => {
    const values = [
      BinaryFloat.fromNumber('binary128', 1),
      BinaryFloat.fromNumber('binary128', -0),
      BinaryFloat.fromBits('binary128', 0x7FFF8000000000000000000000000001n),
    ];
    const decoded = decodeArray('binary128', encodeArray(values, 'big'), 'big');
    expect(decoded?.map(v => v.bits)).toEqual(values.map(v => v.bits));
  });

  it('returns an empty buffer for no values', () => {
    expect(encodeArray([]).length).toBe(0);
    expect(encodeArray([], 'little', 'binary16').length).toBe(0);
    expect(decodeArray('binary64', new Uint8Array(0))).toEqual([]);
  });

  it('returns null for a ragged byte count', () => {
    expect(decodeArray('binary64', new Uint8Array(12))).toBeNull();
    expect(decodeArray('binary16', new Uint8Array(3))).toBeNull();
  });

  it('rejects mixed formats', () => {
    expect(() => encodeArray([binary64(1), binary32(1)])).toThrow(TypeError);
    expect(() => encodeArray([binary64(1)], 'little', 'binary32')).toThrow(/element 0 is binary64/);
  });
});

// ─── Typed arrays ──────────────────────────────────────────────────────────────

describe('typed-array codecs', () => {
  it('encodes a Float64Array big-endian', () => {
    const out = encodeFloat64Array(new Float64Array([1.5, -0]), 'big');
    expect(out).toEqual(new Uint8Array([
      0x3F, 0xF8, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00,
      0x80, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00,
    ]));
    const back = decodeFloat64Array(out, 'big');
    expect(back?.[0]).toBe(1.5);
    expect(Object.is(back?.[1], -0)).toBe(true);
  });

  it('agrees with encodeArray for binary64', () => {
    const xs = [0.1, -7, 1e-310];
    expect(encodeFloat64Array(xs)).toEqual(encodeArray(xs.map(binary64)));
  });

  it('narrows to binary32', () => {
    expect(encodeFloat32Array([1])).toEqual(new Uint8Array([0x00, 0x00, 0x80, 0x3F]));
    const back = decodeFloat32Array(encodeFloat32Array([0.1, 2]));
    expect(back === null ? null : Array.from(back)).toEqual([Math.fround(0.1), 2]);
  });

  it('returns null for a ragged byte count', () => {
    expect(decodeFloat64Array(new Uint8Array(9))).toBeNull();
    expect(decodeFloat32Array(new Uint8Array(5))).toBeNull();
  });
});

// ─── In-place slots ────────────────────────────────────────────────────────────

describe('writeFloat / readFloat', () => {
  it('writes at an offset and leaves the rest alone', () => {
    const buf = new Uint8Array(10);
    writeFloat(buf, 2, binary32(1), 'big');
    expect(buf).toEqual(new Uint8Array([0, 0, 0x3F, 0x80, 0, 0, 0, 0, 0, 0]));
    expect(readFloat('binary32', buf, 2, 'big').bits).toBe(0x3F800000n);
  });

  it('throws RangeError when the slot does not fit', () => {
    const buf = new Uint8Array(10);
    expect(() => writeFloat(buf, 8, binary32(1))).toThrow(RangeError);
    expect(() => readFloat('binary64', buf, 3)).toThrow(RangeError);
    expect(() => readFloat('binary16', buf, -1)).toThrow(RangeError);
    expect(() => readFloat('binary16', buf, 1.5)).toThrow(RangeError);
  });

  it('accepts a slot that ends exactly at the buffer end', () => {
    const buf = new Uint8Array(10);
    writeFloat(buf, 6, binary32(-2));
    expect(readFloat('binary32', buf, 6).toNumber()).toBe(-2);
  });
});
