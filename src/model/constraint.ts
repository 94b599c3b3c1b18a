/**
 * Linear constraints: `description: lhs operator rhs`.
 *
 * The description takes part in equality, so two identical inequalities
 * with different labels are two constraints. Keep descriptions unique within
 * a program to be able to look constraints up by label.
 */

import { InvalidArgumentError } from "../errors";
import { hashCombine, hashNumber, hashString } from "./hash";
import { operatorSymbol } from "./operator";
import type { ComparisonOperator } from "./operator";
import type { SumTerms } from "./sum-terms";

export class Constraint {
  readonly description: string;
  readonly lhs: SumTerms;
  readonly operator: ComparisonOperator;
  readonly rhs: number;

  private constructor(description: string, lhs: SumTerms, operator: ComparisonOperator, rhs: number) {
    this.description = description;
    this.lhs = lhs;
    this.operator = operator;
    this.rhs = rhs;
  }

  static of(description: string, lhs: SumTerms, operator: ComparisonOperator, rhs: number): Constraint {
    if (lhs.isEmpty()) {
      throw new InvalidArgumentError(`Constraint '${description}' has an empty left-hand side.`);
    }
    if (!Number.isFinite(rhs)) {
      throw new InvalidArgumentError(
        `Right-hand side of constraint '${description}' must be finite, got ${rhs}.`
      );
    }
    return new Constraint(description, lhs, operator, rhs);
  }

  equals(other: Constraint): boolean {
    return (
      this === other ||
      (this.description === other.description &&
        this.operator === other.operator &&
        this.rhs === other.rhs &&
        this.lhs.equals(other.lhs))
    );
  }

  hashCode(): number {
    return hashCombine(
      hashString(this.description),
      this.lhs.hashCode(),
      hashString(this.operator),
      hashNumber(this.rhs)
    );
  }

  toString(): string {
    return `${this.description}: ${this.lhs.toString()} ${operatorSymbol(this.operator)} ${this.rhs}`;
  }
}
