/**
 * Tests for solutions and results.
 */

import { describe, it, expect } from "vitest";
import { Solution } from "./solution";
import { Result } from "./result";
import { ComputationTime, SolverDuration } from "./duration";
import { Constraint, SumTerms, Variable } from "../model";
import { MPBuilder, oneFourThree, oneFourThreeLowX } from "../mp";
import { SolverParameters } from "../parameters";
import { InvalidArgumentError, UnknownEntityError } from "../errors";

const x = Variable.integer("x");
const y = Variable.integer("y");

function optimum(): Solution {
  return Solution.of(oneFourThree(), {
    objectiveValue: 6266,
    values: [
      [x, 22],
      [y, 52],
    ],
  });
}

describe("Solution", () => {
  it("computes the objective from the values", () => {
    const solution = optimum();
    expect(solution.getObjectiveValue()).toBe(6266);
    expect(solution.getComputedObjectiveValue()).toBe(6266);
    expect(solution.getValue(x)).toBe(22);
  });

  it("derives the objective value when none is given", () => {
    const solution = Solution.of(oneFourThreeLowX(), {
      values: [
        [x, 16],
        [y, 59],
      ],
    });
    expect(solution.getObjectiveValue()).toBe(5828);
  });

  it("requires values for exactly the program's variables", () => {
    expect(() => Solution.of(oneFourThree(), { values: [[x, 1]] })).toThrow(
      "Solution misses values for y."
    );
    expect(() =>
      Solution.of(oneFourThree(), {
        values: [
          [x, 1],
          [y, 1],
          [Variable.real("z"), 0],
        ],
      })
    ).toThrow(UnknownEntityError);
    expect(() =>
      Solution.of(oneFourThree(), {
        values: [
          [x, Number.NaN],
          [y, 1],
        ],
      })
    ).toThrow(InvalidArgumentError);
  });

  it("stays bound to the program as it was", () => {
    const mp = oneFourThree();
    const solution = Solution.of(mp, {
      values: [
        [x, 22],
        [y, 52],
      ],
    });
    mp.add(Constraint.of("extra", SumTerms.of(1, x), "GE", 0));
    mp.addVariable(Variable.real("z"));
    expect(solution.getProblem().getConstraints()).toHaveLength(3);
    expect(() => solution.getValue(Variable.real("z"))).toThrow(UnknownEntityError);
    expect(() => solution.getValue(Variable.real("x"))).toThrow(UnknownEntityError);
  });

  it("reads boolean values within tolerance", () => {
    const mp = new MPBuilder();
    const a = Variable.bool("a");
    const b = Variable.bool("b");
    const c = Variable.bool("c");
    mp.add(Constraint.of("pick", SumTerms.of(1, a, 1, b, 1, c), "EQ", 1));
    const solution = Solution.of(mp, {
      values: [
        [a, 1 - 1e-9],
        [b, 1e-9],
        [c, 0.5],
      ],
    });
    expect(solution.getBooleanValue(a)).toBe(true);
    expect(solution.getBooleanValue(b)).toBe(false);
    expect(() => solution.getBooleanValue(c)).toThrow(InvalidArgumentError);
    expect(() => optimum().getBooleanValue(x)).toThrow("x is INT, not BOOL.");
  });

  it("keeps dual values per constraint", () => {
    const mp = oneFourThree();
    const c1 = Constraint.of("c1", SumTerms.of(120, x, 210, y), "LE", 15000);
    const c2 = Constraint.of("c2", SumTerms.of(110, x, 30, y), "LE", 4000);
    const solution = Solution.of(mp, {
      values: [
        [x, 22],
        [y, 52],
      ],
      duals: [[c1, 0.25]],
    });
    expect(solution.hasDuals()).toBe(true);
    expect(solution.getDualValue(c1)).toBe(0.25);
    expect(solution.getDualValue(c2)).toBeNull();
    expect(() => solution.getDualValue(Constraint.of("c9", SumTerms.of(1, x), "LE", 1))).toThrow(
      UnknownEntityError
    );
  });

  it("lists values in program order", () => {
    const values = optimum().getVariableValues();
    expect([...values].map(([v, value]) => `${v.description}=${value}`)).toEqual(["x=22", "y=52"]);
  });

  it("is equal to a solution with the same values", () => {
    expect(optimum().equals(optimum())).toBe(true);
  });
});

describe("Result", () => {
  const duration = ComputationTime.of(12, 10, SolverDuration.of(8, 6));

  it("requires a solution exactly for feasible statuses", () => {
    const parameters = new SolverParameters();
    expect(() => Result.of("OPTIMAL", duration, parameters, null)).toThrow("Status OPTIMAL requires a solution.");
    expect(() => Result.of("INFEASIBLE", duration, parameters, optimum())).toThrow(
      "Status INFEASIBLE does not admit a solution."
    );
    const result = Result.of("OPTIMAL", duration, parameters, optimum());
    expect(result.foundFeasible()).toBe(true);
    expect(result.getObjectiveValue()).toBe(6266);
    expect(result.toString()).toBe("OPTIMAL (objective 6266)");
  });

  it("freezes the parameters it was given", () => {
    const parameters = new SolverParameters();
    parameters.setValue("MAX_THREADS", 2);
    const result = Result.of("INFEASIBLE", duration, parameters, null);
    parameters.setValue("MAX_THREADS", 8);
    expect(result.parameters.getValue("MAX_THREADS")).toBe(2);
    expect(result.getObjectiveValue()).toBeNull();
  });
});

describe("durations", () => {
  it("prefer solver CPU, then solver wall, then overall wall time", () => {
    expect(ComputationTime.of(12, 10, SolverDuration.of(8, 6)).getDuration()).toBe(6);
    expect(ComputationTime.of(12, 10, SolverDuration.of(8)).getDuration()).toBe(8);
    expect(ComputationTime.of(12).getDuration()).toBe(12);
  });

  it("reject negative durations", () => {
    expect(() => SolverDuration.of(-1)).toThrow(InvalidArgumentError);
  });
});
