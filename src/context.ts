/**
 * @bitfloat/core — floating-point environment
 *
 * FloatContext bundles the two pieces of mutable state IEEE 754 attaches to
 * computation: the dynamic rounding-direction attribute and the exception
 * flags. Operations that round or signal take an optional context; without
 * one they round to nearest-even and their flags go nowhere.
 *
 * A context is owned by whoever created it. JavaScript never runs two
 * operations on one context at the same time, so no locking is involved;
 * separate Workers get separate contexts.
 */

import {
  DEFAULT_ROUNDING_MODE,
  DEFAULT_TININESS,
} from './constants';
import { ExceptionFlags } from './exceptions';
import { NEAREST_EVEN } from './pack';
import type { RoundingEnv } from './pack';
import type {
  RoundingDirection,
  RoundingMode,
  TininessDetection,
} from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

/** Thrown when asked to switch to a rounding mode this library does not implement. */
export class RoundingModeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RoundingModeError';
  }
}

// ─── Mode tables ──────────────────────────────────────────────────────────────

const MODE_DIRECTIONS: Readonly<Record<RoundingMode, RoundingDirection>> = {
  toNearestTiesToEven: { kind: 'toNearest',      ties: 'toEven' },
  towardNegative:      { kind: 'towardInfinity', sign: 'negative' },
  towardPositive:      { kind: 'towardInfinity', sign: 'positive' },
  towardZero:          { kind: 'towardZero' },
};

export const ROUNDING_MODES: readonly RoundingMode[] = [
  'toNearestTiesToEven',
  'towardNegative',
  'towardPositive',
  'towardZero',
];

function isRoundingMode(mode: string): mode is RoundingMode {
  return (ROUNDING_MODES as readonly string[]).includes(mode);
}

/** The explicit direction a dynamic rounding mode stands for. */
export function directionOf(mode: RoundingMode): RoundingDirection {
  return MODE_DIRECTIONS[mode];
}

// ─── FloatContext ─────────────────────────────────────────────────────────────

export interface FloatContextOptions {
  readonly roundingMode?: RoundingMode;
  readonly tininess?:     TininessDetection;
}

export class FloatContext {
  readonly flags = new ExceptionFlags();
  readonly tininess: TininessDetection;

  private _mode: RoundingMode = DEFAULT_ROUNDING_MODE;

  constructor(options: FloatContextOptions = {}) {
    const tininess = options.tininess ?? DEFAULT_TININESS;
    if (tininess !== 'afterRounding' && tininess !== 'beforeRounding') {
      throw new TypeError(
        `FloatContext: tininess must be 'afterRounding' or 'beforeRounding'; ` +
        `got '${String(tininess)}'.`,
      );
    }
    this.tininess = tininess;

    if (options.roundingMode !== undefined) this.setRoundingMode(options.roundingMode);
  }

  getRoundingMode(): RoundingMode {
    return this._mode;
  }

  /**
   * Switch the dynamic rounding mode.
   * Throws RoundingModeError for anything outside ROUNDING_MODES; the current
   * mode is left unchanged in that case.
   */
  setRoundingMode(mode: RoundingMode): void {
    if (!isRoundingMode(mode)) {
      throw new RoundingModeError(
        `Unsupported rounding mode '${String(mode)}'. ` +
        `Supported modes: ${ROUNDING_MODES.join(', ')}.`,
      );
    }
    this._mode = mode;
  }

  /** Run `body` under `mode`, then restore the previous mode even if it throws. */
  withRoundingMode<T>(mode: RoundingMode, body: () => T): T {
    const previous = this._mode;
    this.setRoundingMode(mode);
    try {
      return body();
    } finally {
      this._mode = previous;
    }
  }

  /** Direction used by operations that round under this context. */
  get direction(): RoundingDirection {
    return MODE_DIRECTIONS[this._mode];
  }
}

/** Rounding environment for an operation given an optional context. */
export function roundingEnv(context?: FloatContext): RoundingEnv {
  if (context === undefined) return NEAREST_EVEN;
  return { direction: context.direction, tininess: context.tininess, flags: context.flags };
}
