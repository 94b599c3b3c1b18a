/**
 * Variable bounds
 *
 * An interval of finite values. An infinite endpoint means "unbounded on
 * that side"; it is never a value the variable can take.
 */

import { InvalidArgumentError } from "../errors";
import { hashCombine, hashNumber } from "./hash";

/**
 * Largest finite double. Reserved: a bound equal to it would be mistaken for
 * "unbounded" by engines that encode infinity that way.
 */
export const HUGE = Number.MAX_VALUE;

export class Bounds {
  /** (−∞, +∞): every finite value. */
  static readonly ALL_FINITE = new Bounds(-Infinity, Infinity);
  /** [0, +∞) */
  static readonly NON_NEGATIVE = new Bounds(0, Infinity);
  /** [0, 1] */
  static readonly ZERO_ONE = new Bounds(0, 1);

  readonly lower: number;
  readonly upper: number;

  private constructor(lower: number, upper: number) {
    this.lower = lower;
    this.upper = upper;
  }

  /**
   * @param lower a finite number or -Infinity
   * @param upper a finite number or +Infinity, not below `lower`
   */
  static of(lower: number, upper: number): Bounds {
    if (Number.isNaN(lower) || Number.isNaN(upper)) {
      throw new InvalidArgumentError(`Bounds must not be NaN, got [${lower}, ${upper}].`);
    }
    if (lower === Infinity || upper === -Infinity) {
      throw new InvalidArgumentError(`Bounds [${lower}, ${upper}] contain no finite value.`);
    }
    if (Math.abs(lower) === HUGE || Math.abs(upper) === HUGE) {
      throw new InvalidArgumentError(
        `Bound equal to ±${HUGE} is reserved for the unbounded representation; use ±Infinity.`
      );
    }
    if (lower > upper) {
      throw new InvalidArgumentError(`Lower bound ${lower} is greater than upper bound ${upper}.`);
    }
    if (lower === -Infinity && upper === Infinity) return Bounds.ALL_FINITE;
    if (lower === 0 && upper === Infinity) return Bounds.NON_NEGATIVE;
    if (lower === 0 && upper === 1) return Bounds.ZERO_ONE;
    return new Bounds(lower, upper);
  }

  static atLeast(lower: number): Bounds {
    if (!Number.isFinite(lower)) {
      throw new InvalidArgumentError(`Expected a finite lower bound, got ${lower}.`);
    }
    return Bounds.of(lower, Infinity);
  }

  static atMost(upper: number): Bounds {
    if (!Number.isFinite(upper)) {
      throw new InvalidArgumentError(`Expected a finite upper bound, got ${upper}.`);
    }
    return Bounds.of(-Infinity, upper);
  }

  static closed(lower: number, upper: number): Bounds {
    if (!Number.isFinite(lower) || !Number.isFinite(upper)) {
      throw new InvalidArgumentError(`Expected finite bounds, got [${lower}, ${upper}].`);
    }
    return Bounds.of(lower, upper);
  }

  hasLower(): boolean {
    return Number.isFinite(this.lower);
  }

  hasUpper(): boolean {
    return Number.isFinite(this.upper);
  }

  contains(value: number): boolean {
    return Number.isFinite(value) && value >= this.lower && value <= this.upper;
  }

  /** Smallest and largest integers inside; the pair is reversed when there is none. */
  integerRange(): { lower: number; upper: number } {
    return { lower: Math.ceil(this.lower), upper: Math.floor(this.upper) };
  }

  equals(other: Bounds): boolean {
    return this.lower === other.lower && this.upper === other.upper;
  }

  hashCode(): number {
    return hashCombine(hashNumber(this.lower), hashNumber(this.upper));
  }

  /** E.g. `[0..1]`, `(−∞..+∞)`, `[2..+∞)`. */
  toString(): string {
    const start = this.hasLower() ? `[${this.lower}` : "(−∞";
    const end = this.hasUpper() ? `${this.upper}]` : "+∞)";
    return `${start}..${end}`;
  }
}
