/**
 * Views over a program
 *
 * A forwarder holds a reference to the wrapped program and delegates every
 * read to it, so it reflects later changes. The immutable view is the one
 * exception: it wraps a private deep copy.
 */

import type { Bounds, Constraint, Objective, Variable, VariableKind } from "../model";
import type { MPDimension } from "./dimension";
import { contentHash, MPBuilder, sameContent } from "./mp-builder";
import type { ConstraintNamer, ReadableMP, VariableNamer } from "./types";

export abstract class MPForwarder implements ReadableMP {
  protected readonly delegate: ReadableMP;

  constructor(delegate: ReadableMP) {
    this.delegate = delegate;
  }

  getName(): string {
    return this.delegate.getName();
  }

  getVariables(): readonly Variable[] {
    return this.delegate.getVariables();
  }

  getConstraints(): readonly Constraint[] {
    return this.delegate.getConstraints();
  }

  getObjective(): Objective {
    return this.delegate.getObjective();
  }

  getDimension(): MPDimension {
    return this.delegate.getDimension();
  }

  containsVariable(description: string): boolean {
    return this.delegate.containsVariable(description);
  }

  getVariable(description: string): Variable {
    return this.delegate.getVariable(description);
  }

  getVariableKind(variable: Variable): VariableKind {
    return this.delegate.getVariableKind(variable);
  }

  getVariableBounds(variable: Variable): Bounds {
    return this.delegate.getVariableBounds(variable);
  }

  getVariablesNamer(): VariableNamer {
    return this.delegate.getVariablesNamer();
  }

  getConstraintsNamer(): ConstraintNamer {
    return this.delegate.getConstraintsNamer();
  }

  equals(other: ReadableMP): boolean {
    return sameContent(this, other);
  }

  hashCode(): number {
    return contentHash(this);
  }

  toString(): string {
    return this.delegate.toString();
  }
}

/** Read access to a live program; has no mutators. */
export class MPReadView extends MPForwarder {}

/** A frozen deep copy, taken at construction. */
export class ImmutableMP extends MPForwarder {
  private constructor(copy: MPBuilder) {
    super(copy);
  }

  /** Returns `source` itself when it is already immutable. */
  static copyOf(source: ReadableMP): ImmutableMP {
    if (source instanceof ImmutableMP) {
      return source;
    }
    return new ImmutableMP(MPBuilder.copyOf(source));
  }
}

/**
 * Presents BOOL variables as INT, bounds [0, 1] unchanged, for engines with
 * no native binary type.
 */
export class MPWithTransformedBoolsView extends MPForwarder {
  getVariableKind(variable: Variable): VariableKind {
    const kind = this.delegate.getVariableKind(variable);
    return kind === "BOOL" ? "INT" : kind;
  }
}

export function readView(mp: ReadableMP): MPReadView {
  return new MPReadView(mp);
}

export function immutableCopy(mp: ReadableMP): ImmutableMP {
  return ImmutableMP.copyOf(mp);
}

export function withTransformedBools(mp: ReadableMP): MPWithTransformedBoolsView {
  return new MPWithTransformedBoolsView(mp);
}
