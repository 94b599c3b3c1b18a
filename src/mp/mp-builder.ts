/**
 * Mutable mathematical program
 *
 * Every variable used by a constraint or by the objective is a member of the
 * program: adding them registers their variables first. Variables are keyed
 * by description; registering a different variable under a description that
 * is already taken is rejected.
 */

import { invariant, InvalidArgumentError, UnknownEntityError } from "../errors";
import { Objective, ValueSet } from "../model";
import type { Bounds, Constraint, Sense, SumTerms, Variable, VariableKind } from "../model";
import { hashCombine, hashString } from "../model/hash";
import { MPDimension } from "./dimension";
import { defaultConstraintNamer, defaultVariableNamer } from "./types";
import type { ConstraintNamer, MP, ReadableMP, VariableNamer } from "./types";

export interface MPOptions {
  name?: string;
  variablesNamer?: VariableNamer;
  constraintsNamer?: ConstraintNamer;
}

export class MPBuilder implements MP {
  private name: string;
  private variables: Map<string, Variable> = new Map();
  private constraints: ValueSet<Constraint> = new ValueSet();
  private objective: Objective = Objective.ZERO;
  private kindCounts: Record<VariableKind, number> = { BOOL: 0, INT: 0, REAL: 0 };
  private variablesNamer: VariableNamer;
  private constraintsNamer: ConstraintNamer;

  constructor(options: MPOptions = {}) {
    this.name = options.name ?? "";
    this.variablesNamer = options.variablesNamer ?? defaultVariableNamer;
    this.constraintsNamer = options.constraintsNamer ?? defaultConstraintNamer;
  }

  /** Copies name, namers, variables (in order), constraints and objective. */
  static copyOf(source: ReadableMP): MPBuilder {
    const mp = new MPBuilder({
      name: source.getName(),
      variablesNamer: source.getVariablesNamer(),
      constraintsNamer: source.getConstraintsNamer(),
    });
    for (const variable of source.getVariables()) {
      mp.addVariable(variable);
    }
    mp.setObjective(source.getObjective());
    for (const constraint of source.getConstraints()) {
      mp.add(constraint);
    }
    return mp;
  }

  getName(): string {
    return this.name;
  }

  getVariables(): readonly Variable[] {
    return [...this.variables.values()];
  }

  getConstraints(): readonly Constraint[] {
    return this.constraints.toArray();
  }

  getObjective(): Objective {
    return this.objective;
  }

  getDimension(): MPDimension {
    return MPDimension.of(
      this.kindCounts.BOOL,
      this.kindCounts.INT,
      this.kindCounts.REAL,
      this.constraints.size
    );
  }

  containsVariable(description: string): boolean {
    return this.variables.has(description);
  }

  getVariable(description: string): Variable {
    const variable = this.variables.get(description);
    if (variable === undefined) {
      throw new UnknownEntityError(description, `program '${this.name}'`);
    }
    return variable;
  }

  getVariableKind(variable: Variable): VariableKind {
    return this.member(variable).kind;
  }

  getVariableBounds(variable: Variable): Bounds {
    return this.member(variable).bounds;
  }

  getVariablesNamer(): VariableNamer {
    return this.variablesNamer;
  }

  getConstraintsNamer(): ConstraintNamer {
    return this.constraintsNamer;
  }

  setName(name: string | null): boolean {
    const newName = name ?? "";
    const changed = newName !== this.name;
    this.name = newName;
    return changed;
  }

  addVariable(variable: Variable): boolean {
    if (!this.checkRegistrable(variable)) {
      return false;
    }
    this.variables.set(variable.description, variable);
    this.kindCounts[variable.kind]++;
    return true;
  }

  removeVariable(variable: Variable): boolean {
    const stored = this.variables.get(variable.description);
    if (stored === undefined || !stored.equals(variable)) {
      return false;
    }
    if (this.objective.function.getVariables().some((v) => v.equals(variable))) {
      throw new InvalidArgumentError(
        `Can't remove ${variable.description}: used in objective ${this.objective.toString()}.`
      );
    }
    const users = this.constraints
      .toArray()
      .filter((constraint) => constraint.lhs.getVariables().some((v) => v.equals(variable)));
    if (users.length > 0) {
      throw new InvalidArgumentError(
        `Can't remove ${variable.description}: used in constraints ${users
          .map((c) => c.description)
          .join(", ")}.`
      );
    }
    this.variables.delete(variable.description);
    this.kindCounts[variable.kind]--;
    return true;
  }

  add(constraint: Constraint): boolean {
    const addedVariables = this.registerAll(constraint.lhs);
    const added = this.constraints.add(constraint);
    invariant(!addedVariables || added, `new variables but constraint ${constraint.description} already present`);
    return added;
  }

  removeConstraint(constraint: Constraint): boolean {
    return this.constraints.delete(constraint);
  }

  setObjective(objective: Objective): boolean;
  setObjective(fn: SumTerms, sense: Sense): boolean;
  setObjective(objectiveOrFunction: Objective | SumTerms, sense?: Sense): boolean {
    const objective =
      objectiveOrFunction instanceof Objective
        ? objectiveOrFunction
        : Objective.of(objectiveOrFunction, sense ?? "MAX");
    this.registerAll(objective.function);
    const changed = !objective.equals(this.objective);
    this.objective = objective;
    return changed;
  }

  setVariablesNamer(namer: VariableNamer | null): boolean {
    const newNamer = namer ?? defaultVariableNamer;
    const changed = newNamer !== this.variablesNamer;
    this.variablesNamer = newNamer;
    return changed;
  }

  setConstraintsNamer(namer: ConstraintNamer | null): boolean {
    const newNamer = namer ?? defaultConstraintNamer;
    const changed = newNamer !== this.constraintsNamer;
    this.constraintsNamer = newNamer;
    return changed;
  }

  clear(): void {
    this.name = "";
    this.variables.clear();
    this.constraints.clear();
    this.objective = Objective.ZERO;
    this.kindCounts = { BOOL: 0, INT: 0, REAL: 0 };
    this.variablesNamer = defaultVariableNamer;
    this.constraintsNamer = defaultConstraintNamer;
  }

  equals(other: ReadableMP): boolean {
    return sameContent(this, other);
  }

  hashCode(): number {
    return contentHash(this);
  }

  toString(): string {
    return `MP '${this.name}' (${this.getDimension().toString()}), objective ${this.objective.toString()}`;
  }

  private member(variable: Variable): Variable {
    const stored = this.variables.get(variable.description);
    if (stored === undefined || !stored.equals(variable)) {
      throw new UnknownEntityError(variable.description, `program '${this.name}'`);
    }
    return stored;
  }

  /**
   * Whether the variable is new. Throws when its description belongs to a
   * different variable.
   */
  private checkRegistrable(variable: Variable): boolean {
    const stored = this.variables.get(variable.description);
    if (stored === undefined) {
      return true;
    }
    if (!stored.equals(variable)) {
      throw new InvalidArgumentError(
        `Program '${this.name}' already contains variable ${stored.description} ` +
          `(${stored.kind} ${stored.bounds.toString()}); refusing a different definition ` +
          `(${variable.kind} ${variable.bounds.toString()}).`
      );
    }
    return false;
  }

  /** Checks every variable before registering any, so a rejected sum leaves no trace. */
  private registerAll(sum: SumTerms): boolean {
    const variables = sum.getVariables();
    const seen = new Map<string, Variable>();
    for (const variable of variables) {
      const earlier = seen.get(variable.description);
      if (earlier !== undefined && !earlier.equals(variable)) {
        throw new InvalidArgumentError(
          `Two different variables share the description ${variable.description} in ${sum.toString()}.`
        );
      }
      seen.set(variable.description, variable);
      this.checkRegistrable(variable);
    }
    let added = false;
    for (const variable of variables) {
      added = this.addVariable(variable) || added;
    }
    return added;
  }
}

/** Content equality shared by the builder and the views. */
export function sameContent(mp: ReadableMP, other: ReadableMP): boolean {
  if (mp === other) {
    return true;
  }
  const variables = other.getVariables();
  if (variables.length !== mp.getVariables().length) {
    return false;
  }
  for (const variable of variables) {
    if (!mp.containsVariable(variable.description) || !mp.getVariable(variable.description).equals(variable)) {
      return false;
    }
  }
  return (
    new ValueSet(mp.getConstraints()).sameElements(other.getConstraints()) &&
    mp.getObjective().equals(other.getObjective())
  );
}

/** Order-independent, consistent with {@link sameContent}. */
export function contentHash(mp: ReadableMP): number {
  let variables = 0;
  for (const variable of mp.getVariables()) {
    variables = (variables + variable.hashCode()) | 0;
  }
  let constraints = 0;
  for (const constraint of mp.getConstraints()) {
    constraints = (constraints + constraint.hashCode()) | 0;
  }
  return hashCombine(hashString("MP"), variables, constraints, mp.getObjective().hashCode());
}
