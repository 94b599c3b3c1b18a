/**
 * MiniSat-based Engine Implementation
 *
 * Uses the logic-solver npm package which contains MiniSat
 * compiled to JavaScript via Emscripten.
 *
 * Only pure 0-1 programs with integral coefficients fit: each constraint
 * becomes a pseudo-boolean comparison between a weighted sum of literals and
 * a constant, and the objective is optimized by logic-solver's
 * weighted-sum minimization.
 */

import Logic from "logic-solver";
import { UnsupportedFeatureError } from "../errors";
import type { ComparisonOperator, SumTerms, Variable } from "../model";
import type { ReadableMP } from "../mp";
import { Stopwatch, SolverDuration } from "../result";
import type { EngineVerdict, StatusTable } from "../result";
import { isMemoryError } from "./engine-errors";
import type { Engine, EngineResult, EngineSettings } from "./types";

export type MiniSatCode = "sat" | "unsat" | "out-of-memory" | "time-limit";

export const MINISAT_STATUS_TABLE: StatusTable<MiniSatCode> = new Map<MiniSatCode, EngineVerdict>([
  ["sat", "OPTIMAL"],
  ["unsat", "INFEASIBLE"],
  ["out-of-memory", "MEMORY_LIMIT"],
  ["time-limit", "TIME_LIMIT"],
]);

/**
 * A sum of terms over literals with positive whole weights, plus a constant.
 * Negative coefficients are rewritten as c·x = c + |c|·¬x.
 */
export interface PseudoBooleanSum {
  literals: string[];
  weights: number[];
  constant: number;
}

/**
 * Implementation of Engine using logic-solver (MiniSat)
 */
export class MiniSatEngine implements Engine<MiniSatCode, Logic.Solver> {
  readonly name = "minisat";
  readonly statusTable = MINISAT_STATUS_TABLE;
  readonly supportsCpuTiming = true;
  private solver: Logic.Solver | null = null;

  getHandle(): Logic.Solver | null {
    return this.solver;
  }

  solve(mp: ReadableMP, settings: EngineSettings): EngineResult<MiniSatCode> {
    checkPureBoolean(mp);
    const stopwatch = Stopwatch.start();
    const solver = new Logic.Solver();
    this.solver = solver;

    const varNames = new Map<string, string>();
    mp.getVariables().forEach((variable, i) => {
      const varName = `x${i + 1}`;
      varNames.set(variable.description, varName);
      // Force the variable to exist in the solver
      solver.getVarNum(varName);
    });

    let solution: Logic.Solution | null;
    try {
      for (const constraint of mp.getConstraints()) {
        const sum = toPseudoBoolean(constraint.lhs, varNames);
        requireComparison(solver, sum, constraint.operator, constraint.rhs);
      }
      solution = solver.solve();
      const objective = mp.getObjective();
      if (solution !== null && objective.isComplete()) {
        const sum = toPseudoBoolean(objective.function, varNames);
        if (sum.literals.length > 0) {
          solution =
            objective.sense === "MIN"
              ? solver.minimizeWeightedSum(solution, sum.literals, sum.weights)
              : solver.maximizeWeightedSum(solution, sum.literals, sum.weights);
        }
      }
    } catch (error) {
      if (isMemoryError(error)) {
        return { code: "out-of-memory", solved: false, duration: toDuration(stopwatch) };
      }
      throw error;
    }

    const duration = toDuration(stopwatch);
    if (solution === null) {
      return { code: "unsat", solved: false, duration };
    }
    const overTime = isOverTime(duration, settings);
    const trueVars = new Set(solution.getTrueVars());
    const values: Array<[Variable, number]> = mp
      .getVariables()
      .map((variable): [Variable, number] => [variable, trueVars.has(nameOf(varNames, variable)) ? 1 : 0]);
    return { code: overTime ? "time-limit" : "sat", solved: true, values, duration };
  }
}

function checkPureBoolean(mp: ReadableMP): void {
  const nonBoolean = mp.getVariables().filter((variable) => mp.getVariableKind(variable) !== "BOOL");
  if (nonBoolean.length > 0) {
    throw new UnsupportedFeatureError(
      "non-boolean variables",
      `MiniSat only handles BOOL variables; got ${nonBoolean.map((v) => v.description).join(", ")}.`
    );
  }
  const sums: SumTerms[] = [mp.getObjective().function, ...mp.getConstraints().map((c) => c.lhs)];
  for (const sum of sums) {
    for (const term of sum) {
      if (!Number.isInteger(term.coefficient)) {
        throw new UnsupportedFeatureError(
          "fractional coefficients",
          `MiniSat only handles integral coefficients; got ${term.toString()}.`
        );
      }
    }
  }
}

function nameOf(varNames: ReadonlyMap<string, string>, variable: Variable): string {
  const varName = varNames.get(variable.description);
  if (varName === undefined) {
    throw new Error(`Unknown variable: ${variable.description}`);
  }
  return varName;
}

/**
 * Merges terms on the same variable, then moves negative weights onto the
 * negated literal.
 */
export function toPseudoBoolean(sum: SumTerms, varNames: ReadonlyMap<string, string>): PseudoBooleanSum {
  const merged = new Map<string, number>();
  for (const term of sum) {
    const varName = nameOf(varNames, term.variable);
    merged.set(varName, (merged.get(varName) ?? 0) + term.coefficient);
  }
  const result: PseudoBooleanSum = { literals: [], weights: [], constant: 0 };
  for (const [varName, coefficient] of merged) {
    if (coefficient > 0) {
      result.literals.push(varName);
      result.weights.push(coefficient);
    } else if (coefficient < 0) {
      result.literals.push(`-${varName}`);
      result.weights.push(-coefficient);
      result.constant += coefficient;
    }
  }
  return result;
}

/** Requires `sum operator rhs`, where the weighted part ranges over [0, Σ weights]. */
function requireComparison(
  solver: Logic.Solver,
  sum: PseudoBooleanSum,
  operator: ComparisonOperator,
  rhs: number
): void {
  const bound = rhs - sum.constant;
  const max = sum.weights.reduce((total, weight) => total + weight, 0);
  switch (operator) {
    case "LE": {
      const limit = Math.floor(bound);
      if (limit < 0) {
        solver.require(Logic.FALSE);
      } else if (limit < max) {
        solver.require(
          Logic.lessThanOrEqual(Logic.weightedSum(sum.literals, sum.weights), Logic.constantBits(limit))
        );
      }
      return;
    }
    case "GE": {
      const limit = Math.ceil(bound);
      if (limit > max) {
        solver.require(Logic.FALSE);
      } else if (limit > 0) {
        solver.require(
          Logic.greaterThanOrEqual(Logic.weightedSum(sum.literals, sum.weights), Logic.constantBits(limit))
        );
      }
      return;
    }
    case "EQ": {
      if (!Number.isInteger(bound) || bound < 0 || bound > max) {
        solver.require(Logic.FALSE);
      } else if (sum.literals.length > 0) {
        solver.require(Logic.equalBits(Logic.weightedSum(sum.literals, sum.weights), Logic.constantBits(bound)));
      }
      return;
    }
  }
}

function toDuration(stopwatch: Stopwatch): SolverDuration {
  const elapsed = stopwatch.elapsed();
  return SolverDuration.of(elapsed.wallMs, elapsed.cpuMs);
}

/** MiniSat cannot be interrupted; a limit is only checked afterwards. */
function isOverTime(duration: SolverDuration, settings: EngineSettings): boolean {
  if (settings.maxSeconds === null) {
    return false;
  }
  const spentMs = settings.timing === "CPU" ? duration.cpuMs ?? duration.wallMs : duration.wallMs;
  return spentMs > settings.maxSeconds * 1000;
}
