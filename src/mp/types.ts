/**
 * Program interfaces
 *
 * `ReadableMP` is what engines, writers and views consume; `MP` adds the
 * mutators of the builder.
 */

import type { Bounds, Constraint, Objective, Sense, SumTerms, Variable, VariableKind } from "../model";
import type { MPDimension } from "./dimension";

/** Display name for a variable; null or undefined means "no name" (rendered as ""). */
export type VariableNamer = (variable: Variable) => string | null | undefined;

/** Display name for a constraint; null or undefined means "no name" (rendered as ""). */
export type ConstraintNamer = (constraint: Constraint) => string | null | undefined;

export const defaultVariableNamer: VariableNamer = (variable) => variable.toString();

export const defaultConstraintNamer: ConstraintNamer = (constraint) => constraint.toString();

export interface ReadableMP {
  getName(): string;

  /** Insertion order. */
  getVariables(): readonly Variable[];

  /** Insertion order. */
  getConstraints(): readonly Constraint[];

  getObjective(): Objective;

  getDimension(): MPDimension;

  containsVariable(description: string): boolean;

  /**
   * @throws UnknownEntityError when no variable has this description
   */
  getVariable(description: string): Variable;

  /**
   * Kind as this program presents it to engines. Views may differ from the
   * variable's own kind.
   *
   * @throws UnknownEntityError when the variable is not in this program
   */
  getVariableKind(variable: Variable): VariableKind;

  /**
   * @throws UnknownEntityError when the variable is not in this program
   */
  getVariableBounds(variable: Variable): Bounds;

  getVariablesNamer(): VariableNamer;

  getConstraintsNamer(): ConstraintNamer;

  /** Same variable set, constraint set and objective; names and namers are ignored. */
  equals(other: ReadableMP): boolean;

  hashCode(): number;
}

export interface MP extends ReadableMP {
  /** Null resets to the empty name. Returns whether the name changed. */
  setName(name: string | null): boolean;

  /**
   * Idempotent for an equal variable. Returns whether the variable set changed.
   *
   * @throws InvalidArgumentError when a different variable with the same
   * description is already present
   */
  addVariable(variable: Variable): boolean;

  /**
   * @throws InvalidArgumentError when the objective or a constraint uses the variable
   */
  removeVariable(variable: Variable): boolean;

  /**
   * Registers the variables of the left-hand side, then inserts the
   * constraint. Returns whether the constraint set changed.
   */
  add(constraint: Constraint): boolean;

  removeConstraint(constraint: Constraint): boolean;

  /** Registers the variables of the function. Returns whether the objective changed. */
  setObjective(objective: Objective): boolean;
  setObjective(fn: SumTerms, sense: Sense): boolean;

  /** Null restores the structural default. Returns whether the namer changed. */
  setVariablesNamer(namer: VariableNamer | null): boolean;

  setConstraintsNamer(namer: ConstraintNamer | null): boolean;

  /** Back to the state of a new empty program, namers included. */
  clear(): void;
}
