/**
 * Name resolution
 *
 * The name of a variable or constraint in a given target format comes from,
 * in order: the per-format namer configured in the parameters, the global
 * namer configured in the parameters, the program's own namer. A namer
 * answering null or undefined yields "".
 */

import type { Constraint, Variable } from "../model";
import type { ConstraintNamer, ReadableMP, VariableNamer } from "../mp";
import type { ReadableParameters } from "../parameters";
import type { ExportFormat } from "./format";

export interface NamingContext {
  parameters?: ReadableParameters;
  format?: ExportFormat;
}

export function getVariableNamer(mp: ReadableMP, context: NamingContext = {}): VariableNamer {
  const { parameters, format } = context;
  const byFormat = parameters?.getValue("NAMER_VARIABLES_BY_FORMAT");
  const formatNamer = format === undefined ? undefined : byFormat?.get(format);
  return formatNamer ?? parameters?.getValue("NAMER_VARIABLES") ?? mp.getVariablesNamer();
}

export function getConstraintNamer(mp: ReadableMP, context: NamingContext = {}): ConstraintNamer {
  const { parameters, format } = context;
  const byFormat = parameters?.getValue("NAMER_CONSTRAINTS_BY_FORMAT");
  const formatNamer = format === undefined ? undefined : byFormat?.get(format);
  return formatNamer ?? parameters?.getValue("NAMER_CONSTRAINTS") ?? mp.getConstraintsNamer();
}

export function resolveVariableName(mp: ReadableMP, variable: Variable, context: NamingContext = {}): string {
  return normalize(getVariableNamer(mp, context)(variable), variable.description);
}

export function resolveConstraintName(
  mp: ReadableMP,
  constraint: Constraint,
  context: NamingContext = {}
): string {
  return normalize(getConstraintNamer(mp, context)(constraint), constraint.description);
}

/** Namers are typed, but callers outside the type system can still return anything. */
function normalize(name: string | null | undefined, entity: string): string {
  if (name === null || name === undefined) {
    return "";
  }
  if (typeof name !== "string") {
    throw new TypeError(`Namer returned a ${typeof name} for ${entity}; expected a string.`);
  }
  return name;
}
