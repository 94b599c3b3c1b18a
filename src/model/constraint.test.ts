/**
 * Tests for terms, sums, constraints and objectives.
 */

import { describe, it, expect } from "vitest";
import { Constraint } from "./constraint";
import { Objective } from "./objective";
import { satisfies } from "./operator";
import { SumTerms } from "./sum-terms";
import { Term } from "./term";
import { Variable } from "./variable";
import { InvalidArgumentError } from "../errors";

const x = Variable.integer("x");
const y = Variable.integer("y");

describe("Term", () => {
  it("rejects non-finite coefficients", () => {
    expect(() => Term.of(Number.NaN, x)).toThrow(InvalidArgumentError);
    expect(() => Term.of(Infinity, x)).toThrow(InvalidArgumentError);
  });

  it("prints unit coefficients without a factor", () => {
    expect(Term.of(1, x).toString()).toBe("x");
    expect(Term.of(-1, x).toString()).toBe("−x");
    expect(Term.of(2.5, x).toString()).toBe("2.5×x");
  });
});

describe("SumTerms", () => {
  it("pairs coefficients with variables", () => {
    const sum = SumTerms.of(143, x, 60, y);
    expect(sum.size).toBe(2);
    expect(sum.toString()).toBe("143×x + 60×y");
  });

  it("rejects odd or misplaced arguments", () => {
    expect(() => SumTerms.of(1, x, 2)).toThrow(InvalidArgumentError);
    expect(() => SumTerms.of(x, 1)).toThrow(InvalidArgumentError);
  });

  it("keeps duplicate variables as separate terms", () => {
    const sum = SumTerms.of(1, x, 2, y, 3, x);
    expect(sum.size).toBe(3);
    expect(sum.getVariables().map((v) => v.description)).toEqual(["x", "y", "x"]);
    expect(sum.evaluate((v) => (v === x ? 10 : 1))).toBe(42);
  });

  it("compares in order", () => {
    expect(SumTerms.of(1, x, 2, y).equals(SumTerms.of(1, x, 2, y))).toBe(true);
    expect(SumTerms.of(1, x, 2, y).equals(SumTerms.of(2, y, 1, x))).toBe(false);
    expect(SumTerms.fromTerms([]).equals(SumTerms.EMPTY)).toBe(true);
  });
});

describe("Constraint", () => {
  it("rejects an empty left-hand side and a non-finite right-hand side", () => {
    expect(() => Constraint.of("c", SumTerms.EMPTY, "LE", 1)).toThrow(InvalidArgumentError);
    expect(() => Constraint.of("c", SumTerms.of(1, x), "GE", Number.NaN)).toThrow(InvalidArgumentError);
  });

  it("is equal to an independently built copy", () => {
    const a = Constraint.of("c1", SumTerms.of(120, x, 210, y), "LE", 15000);
    const b = Constraint.of("c1", SumTerms.of(120, x, 210, y), "LE", 15000);
    expect(a.equals(b)).toBe(true);
    expect(b.equals(a)).toBe(true);
    expect(a.hashCode()).toBe(b.hashCode());
  });

  it("distinguishes identical inequalities with different descriptions", () => {
    const a = Constraint.of("c1", SumTerms.of(1, x), "LE", 3);
    const b = Constraint.of("c2", SumTerms.of(1, x), "LE", 3);
    expect(a.equals(b)).toBe(false);
  });

  it("prints description, sum, operator and right-hand side", () => {
    expect(Constraint.of("c3", SumTerms.of(1, x, 1, y), "LE", 75).toString()).toBe("c3: x + y ≤ 75");
    expect(Constraint.of("d", SumTerms.of(-1, x), "GE", -2).toString()).toBe("d: −x ≥ -2");
  });
});

describe("Objective", () => {
  it("has a single zero objective whatever the sense", () => {
    const min = Objective.of(SumTerms.EMPTY, "MIN");
    const max = Objective.of(SumTerms.EMPTY, "MAX");
    expect(min.equals(max)).toBe(true);
    expect(min.equals(Objective.ZERO)).toBe(true);
    expect(min.sense).toBe("MAX");
    expect(min.hashCode()).toBe(Objective.ZERO.hashCode());
    expect(min.isZero()).toBe(true);
    expect(min.isComplete()).toBe(false);
  });

  it("distinguishes senses when there is a function", () => {
    const fn = SumTerms.of(143, x, 60, y);
    expect(Objective.max(fn).equals(Objective.min(fn))).toBe(false);
    expect(Objective.max(fn).toString()).toBe("max 143×x + 60×y");
    expect(Objective.ZERO.toString()).toBe("ZERO");
  });
});

describe("satisfies", () => {
  it("compares up to a tolerance", () => {
    expect(satisfies(75, "LE", 75)).toBe(true);
    expect(satisfies(75.5, "LE", 75)).toBe(false);
    expect(satisfies(75.5, "LE", 75, 1)).toBe(true);
    expect(satisfies(2, "GE", 3)).toBe(false);
    expect(satisfies(1e-9, "EQ", 0, 1e-6)).toBe(true);
  });
});
