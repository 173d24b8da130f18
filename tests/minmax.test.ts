/**
 * @bitfloat/core — min / max
 *
 * The four operation pairs differ only in how they treat NaN operands and
 * whether they compare magnitudes.
 */

import { describe, it, expect } from 'vitest';
import {
  BinaryFloat,
  FloatContext,
  MAXIMUM_MAGNITUDE_NUMBER,
  binary32,
  binary64,
  isNaN,
  maximum,
  maximumMagnitude,
  maximumMagnitudeNumber,
  maximumNumber,
  minMax,
  minimum,
  minimumMagnitude,
  minimumMagnitudeNumber,
  minimumNumber,
  specialValues,
} from '../src/index';

const b64 = (bits: bigint): BinaryFloat => BinaryFloat.fromBits('binary64', bits);

const QNAN = specialValues('binary64').quietNaN;
const SNAN = b64(0x7FF0000000000001n);

describe('minimum / maximum', () => {
  it('propagate NaN', () => {
    expect(isNaN(minimum(QNAN, binary64(3.14)))).toBe(true);
    expect(isNaN(maximum(binary64(3.14), QNAN))).toBe(true);
  });

  it('return the first NaN operand, quieted', () => {
    const a = b64(0x7FF8000000000007n);
    const b = b64(0x7FF8000000000009n);
    expect(minimum(a, b).bits).toBe(0x7FF8000000000007n);
    expect(maximum(binary64(1), b).bits).toBe(0x7FF8000000000009n);
    expect(minimum(SNAN, binary64(1)).bits).toBe(0x7FF8000000000001n);
  });

  it('order -0 below +0', () => {
    expect(minimum(binary64(-0), binary64(0)).bits).toBe(0x8000000000000000n);
    expect(minimum(binary64(0), binary64(-0)).bits).toBe(0x8000000000000000n);
    expect(maximum(binary64(-0), binary64(0)).bits).toBe(0n);
    expect(maximum(binary64(0), binary64(-0)).bits).toBe(0n);
  });

  it('pick by value', () => {
    expect(minimum(binary64(2), binary64(3)).toNumber()).toBe(2);
    expect(maximum(binary64(2), binary64(3)).toNumber()).toBe(3);
    expect(minimum(specialValues('binary64').negativeInfinity, binary64(1)).toNumber()).toBe(-Infinity);
    expect(maximum(binary64(-5), binary64(-7)).toNumber()).toBe(-5);
  });

  it('raise invalid for a signaling NaN', () => {
    const ctx = new FloatContext();
    minimum(binary64(1), QNAN, ctx);
    expect(ctx.flags.test('invalid')).toBe(false);
    minimum(binary64(1), SNAN, ctx);
    expect(ctx.flags.test('invalid')).toBe(true);
  });
});

describe('minimumNumber / maximumNumber', () => {
  it('prefer the operand that is a number', () => {
    expect(minimumNumber(QNAN, binary64(3.14)).toNumber()).toBe(3.14);
    expect(maximumNumber(binary64(3.14), QNAN).toNumber()).toBe(3.14);
  });

  it('return NaN when both operands are NaN', () => {
    expect(isNaN(minimumNumber(QNAN, QNAN))).toBe(true);
    expect(maximumNumber(SNAN, QNAN).bits).toBe(0x7FF8000000000001n);
  });

  it('still prefer the number over a signaling NaN, raising invalid', () => {
    const ctx = new FloatContext();
    expect(maximumNumber(binary64(1), SNAN, ctx).toNumber()).toBe(1);
    expect(ctx.flags.raisedFlags()).toEqual(['invalid']);
  });

  it('keep the zero ordering', () => {
    expect(minimumNumber(binary64(0), binary64(-0)).bits).toBe(0x8000000000000000n);
    expect(maximumNumber(binary64(-0), binary64(0)).bits).toBe(0n);
  });
});

describe('magnitude variants', () => {
  it('compare absolute values', () => {
    expect(minimumMagnitude(binary64(-2), binary64(1)).toNumber()).toBe(1);
    expect(maximumMagnitude(binary64(-2), binary64(1)).toNumber()).toBe(-2);
  });

  it('fall back to signed order on equal magnitudes', () => {
    expect(minimumMagnitude(binary64(1), binary64(-1)).toNumber()).toBe(-1);
    expect(maximumMagnitude(binary64(-1), binary64(1)).toNumber()).toBe(1);
    expect(minimumMagnitude(binary64(0), binary64(-0)).bits).toBe(0x8000000000000000n);
  });

  it('propagate NaN', () => {
    expect(isNaN(minimumMagnitude(binary64(1), QNAN))).toBe(true);
    expect(isNaN(maximumMagnitude(QNAN, binary64(1)))).toBe(true);
  });

  it('number variants prefer the number', () => {
    expect(minimumMagnitudeNumber(QNAN, binary64(-5)).toNumber()).toBe(-5);
    expect(maximumMagnitudeNumber(binary64(-5), QNAN).toNumber()).toBe(-5);
    expect(maximumMagnitudeNumber(binary64(-5), binary64(4)).toNumber()).toBe(-5);
    expect(isNaN(minimumMagnitudeNumber(QNAN, QNAN))).toBe(true);
  });
});

describe('minMax', () => {
  it('takes an operation record', () => {
    expect(minMax(MAXIMUM_MAGNITUDE_NUMBER, binary64(3), binary64(-4)).toNumber()).toBe(-4);
    expect(minMax({ select: 'min', basis: 'value', nan: 'propagate' }, binary64(3), binary64(-4)).toNumber())
      .toBe(-4);
  });

  it('works on binary32', () => {
    expect(minimum(binary32(1.5), binary32(-2.5)).toNumber()).toBe(-2.5);
  });

  it('rejects operands of different formats', () => {
    expect(() => minimum(binary64(1), binary32(1))).toThrow(TypeError);
  });
});
