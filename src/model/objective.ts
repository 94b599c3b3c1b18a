/**
 * Objectives
 *
 * A function to optimize and a sense. An empty function means "no objective":
 * its sense is normalized to MAX, so there is one zero objective.
 */

import { hashCombine, hashString } from "./hash";
import { SumTerms } from "./sum-terms";

export type Sense = "MAX" | "MIN";

export class Objective {
  /** The zero objective: empty function, MAX. */
  static readonly ZERO = new Objective(SumTerms.EMPTY, "MAX");

  readonly function: SumTerms;
  readonly sense: Sense;

  private constructor(fn: SumTerms, sense: Sense) {
    this.function = fn;
    this.sense = sense;
  }

  static of(fn: SumTerms, sense: Sense): Objective {
    if (fn.isEmpty()) {
      return Objective.ZERO;
    }
    return new Objective(fn, sense);
  }

  static max(fn: SumTerms): Objective {
    return Objective.of(fn, "MAX");
  }

  static min(fn: SumTerms): Objective {
    return Objective.of(fn, "MIN");
  }

  isZero(): boolean {
    return this.function.isEmpty();
  }

  /** Has both a function and a sense to optimize it in. */
  isComplete(): boolean {
    return !this.isZero();
  }

  equals(other: Objective): boolean {
    return this === other || (this.sense === other.sense && this.function.equals(other.function));
  }

  hashCode(): number {
    return hashCombine(this.function.hashCode(), hashString(this.sense));
  }

  toString(): string {
    if (this.isZero()) {
      return "ZERO";
    }
    return `${this.sense.toLowerCase()} ${this.function.toString()}`;
  }
}
