/**
 * @bitfloat/core — NaN payloads
 *
 * NaN fraction layout:
 *
 *   [quiet: 1][payload: significandBits - 1]
 *
 * extractPayload() reports the whole fraction, quiet bit included. A quiet
 * NaN built from payload p therefore extracts as quietBit | p, and a
 * signaling NaN extracts as p. encodeNaN() accepts either form back.
 */

import { BinaryFloat } from './bits';
import { isNaN } from './classify';
import { resolveFormat } from './constants';
import type { BinaryFormat, FormatName, NaNPayload } from './types';

// ─── Encode ───────────────────────────────────────────────────────────────────

/** Positive quiet NaN carrying `payload & payloadMask`. */
export function encodeQuietNaN(format: FormatName | BinaryFormat, payload = 0n): BinaryFloat {
  const fmt = resolveFormat(format);
  return BinaryFloat.fromBits(fmt, fmt.exponentMask | fmt.quietBit | (payload & fmt.payloadMask));
}

/**
 * Positive signaling NaN carrying `payload & payloadMask`.
 * An all-zero fraction would be infinity, so a masked payload of 0 becomes 1.
 */
export function encodeSignalingNaN(format: FormatName | BinaryFormat, payload = 1n): BinaryFloat {
  const fmt    = resolveFormat(format);
  const masked = payload & fmt.payloadMask;
  return BinaryFloat.fromBits(fmt, fmt.exponentMask | (masked === 0n ? 1n : masked));
}

export function encodeNaN(format: FormatName | BinaryFormat, nan: NaNPayload): BinaryFloat {
  return nan.kind === 'quiet'
    ? encodeQuietNaN(format, nan.payload)
    : encodeSignalingNaN(format, nan.payload);
}

// ─── Decode ───────────────────────────────────────────────────────────────────

/** Fraction field of a NaN, or null when `value` is not NaN. */
export function extractPayload(value: BinaryFloat): bigint | null {
  return isNaN(value) ? value.fraction : null;
}

export function decodeNaN(value: BinaryFloat): NaNPayload | null {
  const payload = extractPayload(value);
  if (payload === null) return null;
  return (payload & value.format.quietBit) !== 0n
    ? { kind: 'quiet', payload }
    : { kind: 'signaling', payload };
}

export function isQuietNaN(value: BinaryFloat): boolean {
  return isNaN(value) && (value.fraction & value.format.quietBit) !== 0n;
}

export function isSignalingNaN(value: BinaryFloat): boolean {
  return isNaN(value) && (value.fraction & value.format.quietBit) === 0n;
}
