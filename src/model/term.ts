/**
 * A coefficient times a variable.
 */

import { InvalidArgumentError } from "../errors";
import { hashCombine, hashNumber } from "./hash";
import type { Variable } from "./variable";

export class Term {
  readonly coefficient: number;
  readonly variable: Variable;

  private constructor(coefficient: number, variable: Variable) {
    this.coefficient = coefficient;
    this.variable = variable;
  }

  static of(coefficient: number, variable: Variable): Term {
    if (!Number.isFinite(coefficient)) {
      throw new InvalidArgumentError(
        `Coefficient of ${variable.description} must be finite, got ${coefficient}.`
      );
    }
    return new Term(coefficient, variable);
  }

  equals(other: Term): boolean {
    return this.coefficient === other.coefficient && this.variable.equals(other.variable);
  }

  hashCode(): number {
    return hashCombine(hashNumber(this.coefficient), this.variable.hashCode());
  }

  toString(): string {
    if (this.coefficient === 1) {
      return this.variable.toString();
    }
    if (this.coefficient === -1) {
      return `−${this.variable.toString()}`;
    }
    return `${this.coefficient}×${this.variable.toString()}`;
  }
}
