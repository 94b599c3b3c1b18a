/**
 * CPLEX LP text export
 *
 * Names come from the naming chain for the LP format, then are made valid
 * LP identifiers. Kinds and bounds are read through the program, so a view
 * can change how variables are declared.
 */

import { InvalidArgumentError } from "../errors";
import { operatorAsciiSymbol } from "../model";
import type { Constraint, SumTerms, Variable } from "../model";
import { defaultConstraintNamer } from "../mp";
import type { ReadableMP } from "../mp";
import { getConstraintNamer, getVariableNamer } from "../naming";
import type { NamingContext } from "../naming";
import type { ReadableParameters } from "../parameters";

/**
 * Replaces characters outside [A-Za-z0-9_] by "_" and prefixes names that
 * start with a digit.
 */
export function sanitizeLpName(name: string, prefix: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, "_");
  return /^[0-9]/.test(sanitized) ? prefix + sanitized : sanitized;
}

function formatLinear(sum: SumTerms, names: ReadonlyMap<string, string>): string {
  const parts: string[] = [];
  for (const term of sum) {
    const name = names.get(term.variable.description);
    if (name === undefined) {
      throw new Error(`Unnamed variable: ${term.variable.description}`);
    }
    const magnitude = Math.abs(term.coefficient);
    const body = magnitude === 1 ? name : `${magnitude} ${name}`;
    if (parts.length === 0) {
      parts.push(term.coefficient < 0 ? `- ${body}` : body);
    } else {
      parts.push(term.coefficient < 0 ? `- ${body}` : `+ ${body}`);
    }
  }
  return parts.join(" ");
}

function formatBounds(mp: ReadableMP, variable: Variable, name: string): string | null {
  const bounds = mp.getVariableBounds(variable);
  if (mp.getVariableKind(variable) === "BOOL") {
    return null;
  }
  if (!bounds.hasLower() && !bounds.hasUpper()) {
    return ` ${name} free`;
  }
  if (!bounds.hasUpper()) {
    return bounds.lower === 0 ? null : ` ${name} >= ${bounds.lower}`;
  }
  const lower = bounds.hasLower() ? String(bounds.lower) : "-inf";
  return ` ${lower} <= ${name} <= ${bounds.upper}`;
}

/**
 * Writes the program in CPLEX LP format. Lines end with "\n".
 *
 * @throws InvalidArgumentError when two variables end up with the same name
 */
export function writeLp(mp: ReadableMP, parameters?: ReadableParameters): string {
  const context: NamingContext = { parameters, format: "LP" };
  const variableNamer = getVariableNamer(mp, context);
  const chainNamer = getConstraintNamer(mp, context);
  // the structural default would put the whole inequality in the label
  const constraintNamer =
    chainNamer === defaultConstraintNamer ? (constraint: Constraint) => constraint.description : chainNamer;

  const names = new Map<string, string>();
  const taken = new Set<string>();
  mp.getVariables().forEach((variable, i) => {
    const resolved = variableNamer(variable) ?? "";
    const name = resolved.length === 0 ? `v${i + 1}` : sanitizeLpName(resolved, "v");
    if (taken.has(name)) {
      throw new InvalidArgumentError(`Variable name ${name} is used twice in LP export of '${mp.getName()}'.`);
    }
    taken.add(name);
    names.set(variable.description, name);
  });

  const lines: string[] = [];
  if (mp.getName().length > 0) {
    lines.push(`\\ Problem: ${mp.getName()}`);
  }
  const objective = mp.getObjective();
  lines.push(objective.sense === "MIN" ? "Minimize" : "Maximize");
  lines.push(objective.isZero() ? " obj:" : ` obj: ${formatLinear(objective.function, names)}`);

  lines.push("Subject To");
  for (const constraint of mp.getConstraints()) {
    const label = sanitizeLpName(constraintNamer(constraint) ?? "", "c");
    const body = `${formatLinear(constraint.lhs, names)} ${operatorAsciiSymbol(constraint.operator)} ${constraint.rhs}`;
    lines.push(label.length === 0 ? ` ${body}` : ` ${label}: ${body}`);
  }

  const boundLines: string[] = [];
  const generals: string[] = [];
  const binaries: string[] = [];
  for (const variable of mp.getVariables()) {
    const name = names.get(variable.description) ?? "";
    const line = formatBounds(mp, variable, name);
    if (line !== null) boundLines.push(line);
    const kind = mp.getVariableKind(variable);
    if (kind === "INT") generals.push(name);
    if (kind === "BOOL") binaries.push(name);
  }
  if (boundLines.length > 0) {
    lines.push("Bounds", ...boundLines);
  }
  if (generals.length > 0) {
    lines.push("General", ` ${generals.join(" ")}`);
  }
  if (binaries.length > 0) {
    lines.push("Binary", ` ${binaries.join(" ")}`);
  }
  lines.push("End");
  return lines.join("\n") + "\n";
}
