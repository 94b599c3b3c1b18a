/**
 * MILP Engine Implementation
 *
 * Uses the javascript-lp-solver npm package (simplex with branch and bound).
 * Its variables are non-negative, so each program variable is rewritten:
 * a finite lower bound is shifted to zero, a free variable becomes the
 * difference of two non-negative columns, and finite upper bounds become
 * rows of their own.
 */

import solver from "javascript-lp-solver";
import type { Model, SolverResult } from "javascript-lp-solver";
import type { Variable } from "../model";
import type { ReadableMP } from "../mp";
import { withTransformedBools } from "../mp";
import { Stopwatch, SolverDuration } from "../result";
import type { EngineVerdict, StatusTable } from "../result";
import type { Engine, EngineResult, EngineSettings } from "./types";

export type LpSolverCode = "optimal" | "infeasible" | "unbounded" | "timeout";

export const LP_SOLVER_STATUS_TABLE: StatusTable<LpSolverCode> = new Map<LpSolverCode, EngineVerdict>([
  ["optimal", "OPTIMAL"],
  ["infeasible", "INFEASIBLE"],
  ["unbounded", "UNBOUNDED"],
  ["timeout", "TIME_LIMIT"],
]);

/** Distance under which a value of an integer variable is snapped to the integer. */
const INTEGRALITY_TOLERANCE = 1e-6;

const OBJECTIVE = "objective";

/**
 * How a program variable maps to engine columns:
 * value = offset + positive column - negative column (when split).
 */
interface ColumnMapping {
  variable: Variable;
  integral: boolean;
  offset: number;
  positive: string;
  negative: string | null;
}

/**
 * Implementation of Engine using javascript-lp-solver
 */
export class LpSolverEngine implements Engine<LpSolverCode, Model> {
  readonly name = "javascript-lp-solver";
  readonly statusTable = LP_SOLVER_STATUS_TABLE;
  readonly supportsCpuTiming = false;
  private model: Model | null = null;

  getHandle(): Model | null {
    return this.model;
  }

  solve(mp: ReadableMP, settings: EngineSettings): EngineResult<LpSolverCode> {
    const { model, columns } = buildModel(mp, settings);
    this.model = model;

    const stopwatch = Stopwatch.start();
    const result = solver.Solve(model);
    const elapsed = stopwatch.elapsed();
    const duration = SolverDuration.of(elapsed.wallMs);
    const timedOut = settings.maxSeconds !== null && elapsed.wallMs >= settings.maxSeconds * 1000;

    if (result.bounded === false) {
      return { code: "unbounded", solved: false, duration };
    }
    if (!result.feasible) {
      return { code: timedOut ? "timeout" : "infeasible", solved: false, duration };
    }
    const values = columns.map((column): [Variable, number] => [column.variable, readValue(result, column)]);
    return { code: timedOut ? "timeout" : "optimal", solved: true, values, duration };
  }
}

/**
 * Builds the engine model. BOOL variables are read through the
 * bool-transformed view, so they go to `ints` with a [0, 1] range like any
 * other bounded integer.
 */
export function buildModel(
  mp: ReadableMP,
  settings: EngineSettings
): { model: Model; columns: ColumnMapping[] } {
  const view = withTransformedBools(mp);
  const model: Model = {
    optimize: OBJECTIVE,
    opType: view.getObjective().sense === "MIN" ? "min" : "max",
    constraints: {},
    variables: {},
    ints: {},
  };
  if (settings.maxSeconds !== null) {
    model.options = { timeout: settings.maxSeconds * 1000 };
  }

  const columns: ColumnMapping[] = [];
  const byDescription = new Map<string, ColumnMapping>();
  view.getVariables().forEach((variable, i) => {
    const integral = view.getVariableKind(variable) !== "REAL";
    const bounds = view.getVariableBounds(variable);
    const lower = integral ? Math.ceil(bounds.lower) : bounds.lower;
    const upper = integral ? Math.floor(bounds.upper) : bounds.upper;
    const split = !Number.isFinite(lower);
    const column: ColumnMapping = {
      variable,
      integral,
      offset: split ? 0 : lower,
      positive: split ? `v${i}p` : `v${i}`,
      negative: split ? `v${i}n` : null,
    };
    columns.push(column);
    byDescription.set(variable.description, column);

    for (const name of [column.positive, column.negative]) {
      if (name === null) continue;
      model.variables[name] = { [OBJECTIVE]: 0 };
      if (integral && model.ints !== undefined) {
        model.ints[name] = 1;
      }
    }
    if (Number.isFinite(upper)) {
      const row = `ub${i}`;
      model.constraints[row] = { max: upper - column.offset };
      addCoefficient(model, column, row, 1);
    }
  });

  const columnOf = (variable: Variable): ColumnMapping => {
    const column = byDescription.get(variable.description);
    if (column === undefined) {
      throw new Error(`Unknown variable: ${variable.description}`);
    }
    return column;
  };

  for (const term of view.getObjective().function) {
    addCoefficient(model, columnOf(term.variable), OBJECTIVE, term.coefficient);
  }

  view.getConstraints().forEach((constraint, i) => {
    const row = `c${i}`;
    let shift = 0;
    for (const term of constraint.lhs) {
      const column = columnOf(term.variable);
      addCoefficient(model, column, row, term.coefficient);
      shift += term.coefficient * column.offset;
    }
    const rhs = constraint.rhs - shift;
    switch (constraint.operator) {
      case "LE":
        model.constraints[row] = { max: rhs };
        break;
      case "GE":
        model.constraints[row] = { min: rhs };
        break;
      case "EQ":
        model.constraints[row] = { equal: rhs };
        break;
    }
  });

  return { model, columns };
}

/** Repeated terms on one variable add up. */
function addCoefficient(model: Model, column: ColumnMapping, attribute: string, coefficient: number): void {
  const positive = model.variables[column.positive];
  positive[attribute] = (positive[attribute] ?? 0) + coefficient;
  if (column.negative !== null) {
    const negative = model.variables[column.negative];
    negative[attribute] = (negative[attribute] ?? 0) - coefficient;
  }
}

/** Columns at zero are left out of the engine's result. */
function columnValue(result: SolverResult, name: string): number {
  const value = result[name];
  return typeof value === "number" ? value : 0;
}

function readValue(result: SolverResult, column: ColumnMapping): number {
  const negative = column.negative === null ? 0 : columnValue(result, column.negative);
  const value = column.offset + columnValue(result, column.positive) - negative;
  if (column.integral) {
    const rounded = Math.round(value);
    if (Math.abs(value - rounded) <= INTEGRALITY_TOLERANCE) {
      return rounded;
    }
  }
  return value;
}
