/**
 * Linear expressions
 *
 * An ordered sum of terms. Two terms on the same variable are kept apart:
 * the sum is stored as written, and equality is order-sensitive.
 */

import { InvalidArgumentError } from "../errors";
import { hashCombine } from "./hash";
import { Term } from "./term";
import { Variable } from "./variable";

export class SumTerms implements Iterable<Term> {
  static readonly EMPTY = new SumTerms([]);

  readonly terms: readonly Term[];

  private constructor(terms: readonly Term[]) {
    this.terms = Object.freeze([...terms]);
  }

  static fromTerms(terms: Iterable<Term>): SumTerms {
    const list = [...terms];
    return list.length === 0 ? SumTerms.EMPTY : new SumTerms(list);
  }

  /**
   * Builds a sum from alternating coefficients and variables:
   * `SumTerms.of(143, x, 60, y)` is 143×x + 60×y.
   */
  static of(...coefficientsAndVariables: Array<number | Variable>): SumTerms {
    if (coefficientsAndVariables.length % 2 !== 0) {
      throw new InvalidArgumentError(
        `Expected coefficient and variable pairs, got ${coefficientsAndVariables.length} arguments.`
      );
    }
    const terms: Term[] = [];
    for (let i = 0; i < coefficientsAndVariables.length; i += 2) {
      const coefficient = coefficientsAndVariables[i];
      const variable = coefficientsAndVariables[i + 1];
      if (typeof coefficient !== "number" || !(variable instanceof Variable)) {
        throw new InvalidArgumentError(
          `Argument pair ${i / 2} is not a coefficient followed by a variable.`
        );
      }
      terms.push(Term.of(coefficient, variable));
    }
    return SumTerms.fromTerms(terms);
  }

  get size(): number {
    return this.terms.length;
  }

  isEmpty(): boolean {
    return this.terms.length === 0;
  }

  [Symbol.iterator](): Iterator<Term> {
    return this.terms[Symbol.iterator]();
  }

  /** Term variables in term order, repeated when a variable has several terms. */
  getVariables(): Variable[] {
    return this.terms.map((term) => term.variable);
  }

  /** A new sum with `term` appended. */
  plus(term: Term): SumTerms {
    return new SumTerms([...this.terms, term]);
  }

  /** Σ coefficient × value. */
  evaluate(valueOf: (variable: Variable) => number): number {
    let total = 0;
    for (const term of this.terms) {
      total += term.coefficient * valueOf(term.variable);
    }
    return total;
  }

  equals(other: SumTerms): boolean {
    if (this.terms.length !== other.terms.length) {
      return false;
    }
    return this.terms.every((term, i) => term.equals(other.terms[i]));
  }

  hashCode(): number {
    return hashCombine(...this.terms.map((term) => term.hashCode()));
  }

  toString(): string {
    return this.terms.map((term) => term.toString()).join(" + ");
  }
}
