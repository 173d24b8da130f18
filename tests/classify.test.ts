/**
 * @bitfloat/core — classification
 *
 * Class edges are checked with hand-built patterns: the extreme fractions
 * of each exponent field value.
 */

import { describe, it, expect } from 'vitest';
import {
  BinaryFloat,
  binary16,
  binary64,
  className,
  isCanonical,
  isFinite,
  isInfinite,
  isNaN,
  isNormal,
  isSignMinus,
  isSignaling,
  isSubnormal,
  isZero,
  numberClass,
  radix,
  specialValues,
} from '../src/index';

const b64 = (bits: bigint): BinaryFloat => BinaryFloat.fromBits('binary64', bits);

describe('numberClass', () => {
  it('reads exponent 2047 with an empty fraction as infinity', () => {
    expect(numberClass(b64(0x7FF0000000000000n))).toEqual({ kind: 'positive', value: 'infinity' });
    expect(numberClass(b64(0xFFF0000000000000n))).toEqual({ kind: 'negative', value: 'infinity' });
  });

  it('tests NaN before infinity', () => {
    expect(numberClass(b64(0x7FF8000000000000n))).toEqual({ kind: 'nan', nan: 'quiet' });
    expect(numberClass(b64(0x7FF0000000000001n))).toEqual({ kind: 'nan', nan: 'signaling' });
  });

  it('drops the sign of a NaN', () => {
    expect(numberClass(b64(0xFFF8000000000000n))).toEqual({ kind: 'nan', nan: 'quiet' });
    expect(isSignMinus(b64(0xFFF8000000000000n))).toBe(true);
  });

  it('tells zero from subnormal by the fraction', () => {
    expect(numberClass(binary64(0))).toEqual({ kind: 'positive', value: 'zero' });
    expect(numberClass(binary64(-0))).toEqual({ kind: 'negative', value: 'zero' });
    expect(numberClass(b64(1n))).toEqual({ kind: 'positive', value: 'subnormal' });
    expect(numberClass(binary64(-1e-310))).toEqual({ kind: 'negative', value: 'subnormal' });
  });

  it('classifies the normal range edges as normal', () => {
    const { minNormal, maxFinite } = specialValues('binary64');
    expect(numberClass(minNormal)).toEqual({ kind: 'positive', value: 'normal' });
    expect(numberClass(maxFinite)).toEqual({ kind: 'positive', value: 'normal' });
    expect(numberClass(binary64(-1))).toEqual({ kind: 'negative', value: 'normal' });
  });

  it('works on binary16', () => {
    expect(numberClass(binary16(65504))).toEqual({ kind: 'positive', value: 'normal' });
    expect(numberClass(binary16(2 ** -24))).toEqual({ kind: 'positive', value: 'subnormal' });
    expect(numberClass(BinaryFloat.fromBits('binary16', 0x7E00n))).toEqual({ kind: 'nan', nan: 'quiet' });
  });
});

describe('className', () => {
  it('names all ten classes', () => {
    const s = specialValues('binary64');
    const names = [
      s.signalingNaN,
      s.quietNaN,
      s.negativeInfinity,
      binary64(-1),
      binary64(-1e-310),
      s.negativeZero,
      s.positiveZero,
      s.minSubnormal,
      binary64(1),
      s.positiveInfinity,
    ].map(v => className(numberClass(v)));

    expect(names).toEqual([
      'signalingNaN',
      'quietNaN',
      'negativeInfinity',
      'negativeNormal',
      'negativeSubnormal',
      'negativeZero',
      'positiveZero',
      'positiveSubnormal',
      'positiveNormal',
      'positiveInfinity',
    ]);
  });
});

describe('predicates', () => {
  const s = specialValues('binary32');

  it('isNaN / isSignaling', () => {
    expect(isNaN(s.quietNaN)).toBe(true);
    expect(isNaN(s.signalingNaN)).toBe(true);
    expect(isSignaling(s.signalingNaN)).toBe(true);
    expect(isSignaling(s.quietNaN)).toBe(false);
    expect(isNaN(s.positiveInfinity)).toBe(false);
  });

  it('isInfinite / isFinite', () => {
    expect(isInfinite(s.negativeInfinity)).toBe(true);
    expect(isFinite(s.negativeInfinity)).toBe(false);
    expect(isFinite(s.quietNaN)).toBe(false);
    expect(isFinite(s.maxFinite)).toBe(true);
    expect(isFinite(s.negativeZero)).toBe(true);
  });

  it('isNormal / isSubnormal / isZero', () => {
    expect(isNormal(s.minNormal)).toBe(true);
    expect(isNormal(s.minSubnormal)).toBe(false);
    expect(isSubnormal(s.minSubnormal)).toBe(true);
    expect(isSubnormal(s.positiveZero)).toBe(false);
    expect(isZero(s.negativeZero)).toBe(true);
    expect(isZero(s.minSubnormal)).toBe(false);
    expect(isNormal(s.quietNaN)).toBe(false);
  });

  it('isSignMinus reads only the sign bit', () => {
    expect(isSignMinus(s.negativeZero)).toBe(true);
    expect(isSignMinus(s.positiveZero)).toBe(false);
    expect(isSignMinus(s.negativeInfinity)).toBe(true);
  });

  it('isCanonical and radix are constant for binary formats', () => {
    expect(isCanonical(s.signalingNaN)).toBe(true);
    expect(radix(s.maxFinite)).toBe(2);
  });
});
