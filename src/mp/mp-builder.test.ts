/**
 * Tests for the program builder.
 *
 * These tests verify that:
 * 1. Variables used by constraints and the objective are always registered
 * 2. The dimension follows every change
 * 3. Conflicting variable definitions are refused
 */

import { describe, it, expect } from "vitest";
import { MPBuilder } from "./mp-builder";
import { oneFourThree } from "./examples";
import type { MP } from "./types";
import { Bounds, Constraint, Objective, SumTerms, Variable } from "../model";
import { InvalidArgumentError, UnknownEntityError } from "../errors";

/**
 * Check the referential integrity and dimension invariants of a program
 */
function checkInvariants(mp: MP): void {
  const referenced = [
    ...mp.getObjective().function.getVariables(),
    ...mp.getConstraints().flatMap((c) => c.lhs.getVariables()),
  ];
  for (const variable of referenced) {
    expect(mp.containsVariable(variable.description)).toBe(true);
    expect(mp.getVariable(variable.description).equals(variable)).toBe(true);
  }
  expect(mp.getDimension().getVariables()).toBe(mp.getVariables().length);
  expect(mp.getDimension().getConstraints()).toBe(mp.getConstraints().length);
}

const b = Variable.bool("b");
const n = Variable.of("n", "INTEGER", Bounds.closed(0, 10));
const r = Variable.real("r");

describe("MPBuilder", () => {
  it("starts empty with the zero objective", () => {
    const mp = new MPBuilder();
    expect(mp.getName()).toBe("");
    expect(mp.getVariables()).toEqual([]);
    expect(mp.getObjective()).toBe(Objective.ZERO);
    expect(mp.getDimension().getVariables()).toBe(0);
  });

  it("adds variables idempotently", () => {
    const mp = new MPBuilder();
    expect(mp.addVariable(b)).toBe(true);
    expect(mp.addVariable(Variable.bool("b"))).toBe(false);
    expect(mp.getVariables()).toHaveLength(1);
    checkInvariants(mp);
  });

  it("refuses a different variable under a taken description", () => {
    const mp = new MPBuilder();
    mp.addVariable(Variable.integer("x"));
    expect(() => mp.addVariable(Variable.real("x"))).toThrow(InvalidArgumentError);
    expect(() => mp.add(Constraint.of("c", SumTerms.of(1, Variable.real("x")), "LE", 1))).toThrow(
      InvalidArgumentError
    );
    expect(mp.getConstraints()).toHaveLength(0);
    expect(mp.getVariable("x").kind).toBe("INT");
  });

  it("registers variables used by a constraint, leaving none behind on refusal", () => {
    const mp = new MPBuilder();
    mp.addVariable(Variable.integer("x"));
    const bad = SumTerms.of(1, r, 1, Variable.real("x"));
    expect(() => mp.add(Constraint.of("bad", bad, "LE", 1))).toThrow(InvalidArgumentError);
    expect(mp.containsVariable("r")).toBe(false);

    expect(mp.add(Constraint.of("ok", SumTerms.of(1, r, 2, n), "GE", 3))).toBe(true);
    expect(mp.getVariables().map((v) => v.description)).toEqual(["x", "r", "n"]);
    checkInvariants(mp);
  });

  it("reports whether a constraint was new", () => {
    const mp = new MPBuilder();
    const c = Constraint.of("c", SumTerms.of(1, b), "LE", 1);
    expect(mp.add(c)).toBe(true);
    expect(mp.add(Constraint.of("c", SumTerms.of(1, b), "LE", 1))).toBe(false);
    expect(mp.getConstraints()).toHaveLength(1);
  });

  it("registers objective variables and reports changes", () => {
    const mp = new MPBuilder();
    expect(mp.setObjective(SumTerms.of(2, b, 3, n), "MIN")).toBe(true);
    expect(mp.setObjective(Objective.min(SumTerms.of(2, b, 3, n)))).toBe(false);
    expect(mp.setObjective(SumTerms.of(2, b, 3, n), "MAX")).toBe(true);
    expect(mp.getDimension().binaries).toBe(1);
    expect(mp.getDimension().integersNotBool).toBe(1);
    checkInvariants(mp);
  });

  it("keeps the dimension in step through a sequence of changes", () => {
    const mp = new MPBuilder();
    const steps: Array<() => unknown> = [
      () => mp.addVariable(b),
      () => mp.add(Constraint.of("c1", SumTerms.of(1, b, 1, r), "LE", 4)),
      () => mp.setObjective(SumTerms.of(1, n), "MAX"),
      () => mp.add(Constraint.of("c2", SumTerms.of(1, n, -1, b), "EQ", 0)),
      () => mp.removeConstraint(Constraint.of("c1", SumTerms.of(1, b, 1, r), "LE", 4)),
      () => mp.removeVariable(r),
    ];
    for (const step of steps) {
      step();
      checkInvariants(mp);
    }
    expect(mp.getDimension().toString()).toBe("1 bool, 1 int, 0 real; 1 constraints");
  });

  it("refuses to remove a variable still in use", () => {
    const mp = oneFourThree();
    const x = mp.getVariable("x");
    expect(() => mp.removeVariable(x)).toThrow(InvalidArgumentError);
    expect(mp.removeVariable(Variable.real("absent"))).toBe(false);
  });

  it("normalizes null setters to defaults", () => {
    const mp = new MPBuilder({ name: "p" });
    expect(mp.setName(null)).toBe(true);
    expect(mp.getName()).toBe("");
    const namer = (v: Variable) => `var_${v.description}`;
    expect(mp.setVariablesNamer(namer)).toBe(true);
    expect(mp.setVariablesNamer(namer)).toBe(false);
    expect(mp.setVariablesNamer(null)).toBe(true);
    expect(mp.getVariablesNamer()(b)).toBe("b");
  });

  it("clears back to a fresh program", () => {
    const mp = oneFourThree();
    mp.setConstraintsNamer(() => "named");
    mp.clear();
    expect(mp.equals(new MPBuilder())).toBe(true);
    expect(mp.getName()).toBe("");
    expect(mp.getDimension().getVariables()).toBe(0);
    expect(mp.getConstraintsNamer()(Constraint.of("c", SumTerms.of(1, b), "LE", 1))).toBe("c: b ≤ 1");
  });

  it("throws UnknownEntityError for lookups of missing variables", () => {
    const mp = oneFourThree();
    expect(() => mp.getVariable("z")).toThrow(UnknownEntityError);
    expect(() => mp.getVariableKind(Variable.real("x"))).toThrow(UnknownEntityError);
    expect(mp.getVariableBounds(mp.getVariable("y"))).toBe(Bounds.ALL_FINITE);
  });

  it("compares programs by content, ignoring names and order", () => {
    const a = oneFourThree();
    const copy = MPBuilder.copyOf(a);
    copy.setName("other");
    expect(a.equals(copy)).toBe(true);
    expect(copy.equals(a)).toBe(true);
    expect(a.hashCode()).toBe(copy.hashCode());

    const reordered = new MPBuilder();
    for (const constraint of [...a.getConstraints()].reverse()) {
      reordered.add(constraint);
    }
    reordered.setObjective(a.getObjective());
    expect(reordered.equals(a)).toBe(true);
    expect(reordered.hashCode()).toBe(a.hashCode());

    copy.add(Constraint.of("extra", SumTerms.of(1, copy.getVariable("x")), "GE", 0));
    expect(a.equals(copy)).toBe(false);
  });
});
