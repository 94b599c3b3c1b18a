/**
 * Variables and their kinds
 */

import { InvalidArgumentError } from "../errors";
import { Bounds } from "./bounds";
import { hashCombine, hashString } from "./hash";

/** Declared domain of a variable. */
export type VariableDomain = "INTEGER" | "REAL";

/**
 * Effective kind, derived from the domain and the bounds. Engines use it to
 * pick their native variable type.
 */
export type VariableKind = "BOOL" | "INT" | "REAL";

/**
 * The kind is gated by the domain first: a REAL variable on [0, 1] is REAL.
 * Only within the INTEGER domain do the bounds matter, and only [0, 1]
 * exactly makes a BOOL.
 */
export function kindOf(domain: VariableDomain, bounds: Bounds): VariableKind {
  if (domain === "REAL") {
    return "REAL";
  }
  return bounds.lower === 0 && bounds.upper === 1 ? "BOOL" : "INT";
}

/** Opaque values that, with the name, identify a variable. */
export type Reference = string | number | boolean | bigint;

export class Variable {
  readonly name: string;
  readonly references: readonly Reference[];
  readonly domain: VariableDomain;
  readonly bounds: Bounds;
  /** Identity of the variable, unique within a program. */
  readonly description: string;

  private constructor(
    name: string,
    domain: VariableDomain,
    bounds: Bounds,
    references: readonly Reference[]
  ) {
    this.name = name;
    this.domain = domain;
    this.bounds = bounds;
    this.references = Object.freeze([...references]);
    this.description =
      references.length === 0 ? name : [name, ...references.map(String)].join("_");
  }

  /**
   * Creates a variable whose description is the name followed by the
   * references, joined with "_".
   */
  static of(
    name: string,
    domain: VariableDomain,
    bounds: Bounds,
    references: readonly Reference[] = []
  ): Variable {
    if (name.length === 0) {
      throw new InvalidArgumentError("A variable needs a non-empty name.");
    }
    if (domain === "INTEGER") {
      const range = bounds.integerRange();
      if (range.lower > range.upper) {
        throw new InvalidArgumentError(
          `Integer variable '${name}' has bounds ${bounds.toString()} containing no integer.`
        );
      }
    }
    return new Variable(name, domain, bounds, references);
  }

  static bool(name: string, ...references: Reference[]): Variable {
    return Variable.of(name, "INTEGER", Bounds.ZERO_ONE, references);
  }

  /** An integer variable with no bounds. */
  static integer(name: string, ...references: Reference[]): Variable {
    return Variable.of(name, "INTEGER", Bounds.ALL_FINITE, references);
  }

  /** A real variable with no bounds. */
  static real(name: string, ...references: Reference[]): Variable {
    return Variable.of(name, "REAL", Bounds.ALL_FINITE, references);
  }

  get kind(): VariableKind {
    return kindOf(this.domain, this.bounds);
  }

  equals(other: Variable): boolean {
    return (
      this === other ||
      (this.description === other.description &&
        this.kind === other.kind &&
        this.bounds.equals(other.bounds))
    );
  }

  hashCode(): number {
    return hashCombine(hashString(this.description), hashString(this.kind), this.bounds.hashCode());
  }

  toString(): string {
    return this.description;
  }
}
