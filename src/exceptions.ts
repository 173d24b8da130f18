/**
 * @bitfloat/core — exception flag store
 *
 * IEEE 754 §7 default exception handling: an operation that hits an
 * exceptional case delivers its default result and raises a status flag.
 * Flags are sticky. They stay raised until a caller clears them.
 *
 * The store is an explicit object rather than a process-wide singleton. Each
 * FloatContext owns one; operations raise into the context they were given
 * and nothing else.
 */

import type { ExceptionFlag } from './types';

// ─── Flag Bits ────────────────────────────────────────────────────────────────

export const FLAG_INVALID          = 0b00001;
export const FLAG_DIVISION_BY_ZERO = 0b00010;
export const FLAG_OVERFLOW         = 0b00100;
export const FLAG_UNDERFLOW        = 0b01000;
export const FLAG_INEXACT          = 0b10000;

const FLAG_BITS: Readonly<Record<ExceptionFlag, number>> = {
  invalid:        FLAG_INVALID,
  divisionByZero: FLAG_DIVISION_BY_ZERO,
  overflow:       FLAG_OVERFLOW,
  underflow:      FLAG_UNDERFLOW,
  inexact:        FLAG_INEXACT,
};

/** Every flag, in IEEE 754 §7 order. */
export const EXCEPTION_FLAGS: readonly ExceptionFlag[] = [
  'invalid',
  'divisionByZero',
  'overflow',
  'underflow',
  'inexact',
];

/** Opaque result of ExceptionFlags.save(); pass it back to restore(). */
export interface FlagSnapshot {
  readonly bits: number;
}

// ─── ExceptionFlags ───────────────────────────────────────────────────────────

export class ExceptionFlags {
  private _bits = 0;

  raise(flag: ExceptionFlag): void {
    this._bits |= FLAG_BITS[flag];
  }

  test(flag: ExceptionFlag): boolean {
    return (this._bits & FLAG_BITS[flag]) !== 0;
  }

  clear(flag: ExceptionFlag): void {
    this._bits &= ~FLAG_BITS[flag];
  }

  clearAll(): void {
    this._bits = 0;
  }

  anyRaised(): boolean {
    return this._bits !== 0;
  }

  /** Raised flags in EXCEPTION_FLAGS order. */
  raisedFlags(): ExceptionFlag[] {
    return EXCEPTION_FLAGS.filter(f => this.test(f));
  }

  /** IEEE saveAllFlags. */
  save(): FlagSnapshot {
    return { bits: this._bits };
  }

  /** IEEE restoreFlags: replaces the whole flag set with the snapshot's. */
  restore(snapshot: FlagSnapshot): void {
    this._bits = snapshot.bits & 0b11111;
  }
}
