/**
 * Solutions
 *
 * A solution is bound to a frozen copy of the program it answers, and gives
 * a value to exactly the variables of that program.
 */

import { InvalidArgumentError, UnknownEntityError } from "../errors";
import type { Constraint, Variable } from "../model";
import { immutableCopy } from "../mp";
import type { ImmutableMP, ReadableMP } from "../mp";

/** Distance to 0 or 1 under which a BOOL value is read as a boolean. */
export const BOOLEAN_TOLERANCE = 1e-6;

export interface SolutionInit {
  /** Σ coefficient × value over the objective function when absent. */
  objectiveValue?: number;
  values: Iterable<readonly [Variable, number]>;
  /** Dual value per constraint, when the engine gives them. */
  duals?: Iterable<readonly [Constraint, number]>;
}

export class Solution {
  private readonly mp: ImmutableMP;
  private readonly objectiveValue: number;
  private readonly values: ReadonlyMap<string, number>;
  private readonly duals: ReadonlyArray<readonly [Constraint, number]>;

  private constructor(
    mp: ImmutableMP,
    objectiveValue: number,
    values: ReadonlyMap<string, number>,
    duals: ReadonlyArray<readonly [Constraint, number]>
  ) {
    this.mp = mp;
    this.objectiveValue = objectiveValue;
    this.values = values;
    this.duals = duals;
  }

  /**
   * @throws UnknownEntityError when a value or a dual is given for an entity
   * the program does not contain
   * @throws InvalidArgumentError when a variable of the program has no value,
   * or a number is not finite
   */
  static of(mp: ReadableMP, init: SolutionInit): Solution {
    const frozen = immutableCopy(mp);
    const values = new Map<string, number>();
    for (const [variable, value] of init.values) {
      if (!frozen.containsVariable(variable.description) || !frozen.getVariable(variable.description).equals(variable)) {
        throw new UnknownEntityError(variable.description, `program '${frozen.getName()}'`);
      }
      if (!Number.isFinite(value)) {
        throw new InvalidArgumentError(`Value of ${variable.description} must be finite, got ${value}.`);
      }
      values.set(variable.description, value);
    }
    const missing = frozen.getVariables().filter((variable) => !values.has(variable.description));
    if (missing.length > 0) {
      throw new InvalidArgumentError(
        `Solution misses values for ${missing.map((variable) => variable.description).join(", ")}.`
      );
    }
    const constraints = frozen.getConstraints();
    const duals: Array<readonly [Constraint, number]> = [];
    for (const [constraint, value] of init.duals ?? []) {
      const stored = constraints.find((candidate) => candidate.equals(constraint));
      if (stored === undefined) {
        throw new UnknownEntityError(constraint.description, `program '${frozen.getName()}'`);
      }
      if (!Number.isFinite(value)) {
        throw new InvalidArgumentError(`Dual value of ${constraint.description} must be finite, got ${value}.`);
      }
      duals.push([stored, value]);
    }
    const objectiveValue =
      init.objectiveValue ??
      frozen.getObjective().function.evaluate((variable) => values.get(variable.description) ?? 0);
    if (!Number.isFinite(objectiveValue)) {
      throw new InvalidArgumentError(`Objective value must be finite, got ${objectiveValue}.`);
    }
    return new Solution(frozen, objectiveValue, values, duals);
  }

  getProblem(): ImmutableMP {
    return this.mp;
  }

  getObjectiveValue(): number {
    return this.objectiveValue;
  }

  /** Σ coefficient × value over the objective function. */
  getComputedObjectiveValue(): number {
    return this.mp.getObjective().function.evaluate((variable) => this.getValue(variable));
  }

  /**
   * @throws UnknownEntityError for a variable of another program
   */
  getValue(variable: Variable): number {
    const value = this.values.get(variable.description);
    if (value === undefined || !this.mp.getVariable(variable.description).equals(variable)) {
      throw new UnknownEntityError(variable.description, `solution of '${this.mp.getName()}'`);
    }
    return value;
  }

  /**
   * @throws InvalidArgumentError when the variable is not BOOL or its value is
   * not within {@link BOOLEAN_TOLERANCE} of 0 or 1
   */
  getBooleanValue(variable: Variable): boolean {
    const value = this.getValue(variable);
    if (variable.kind !== "BOOL") {
      throw new InvalidArgumentError(`${variable.description} is ${variable.kind}, not BOOL.`);
    }
    if (Math.abs(value - 1) <= BOOLEAN_TOLERANCE) return true;
    if (Math.abs(value) <= BOOLEAN_TOLERANCE) return false;
    throw new InvalidArgumentError(`Value ${value} of ${variable.description} is not boolean.`);
  }

  /** Values in the order of the program's variables. */
  getVariableValues(): Map<Variable, number> {
    return new Map(this.mp.getVariables().map((variable) => [variable, this.getValue(variable)]));
  }

  hasDuals(): boolean {
    return this.duals.length > 0;
  }

  /**
   * Null when the engine gave no dual for this constraint.
   *
   * @throws UnknownEntityError for a constraint of another program
   */
  getDualValue(constraint: Constraint): number | null {
    if (!this.mp.getConstraints().some((candidate) => candidate.equals(constraint))) {
      throw new UnknownEntityError(constraint.description, `solution of '${this.mp.getName()}'`);
    }
    const entry = this.duals.find(([candidate]) => candidate.equals(constraint));
    return entry === undefined ? null : entry[1];
  }

  equals(other: Solution): boolean {
    if (!this.mp.equals(other.mp) || this.objectiveValue !== other.objectiveValue) {
      return false;
    }
    return this.mp.getVariables().every((variable) => this.getValue(variable) === other.getValue(variable));
  }
}
