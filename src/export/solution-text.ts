/**
 * Plain-text rendering of a solution, for manual inspection.
 */

import { resolveVariableName } from "../naming";
import type { ReadableParameters } from "../parameters";
import type { Solution } from "../result";

/**
 * One line per variable with its range and value, then the objective value.
 * Lines are separated by "\n", with none after the last.
 */
export function solutionToString(solution: Solution, parameters?: ReadableParameters): string {
  const mp = solution.getProblem();
  const lines: string[] = [];
  for (const [variable, value] of solution.getVariableValues()) {
    const name = resolveVariableName(mp, variable, { parameters, format: "TEXT" });
    switch (mp.getVariableKind(variable)) {
      case "BOOL":
        lines.push(`${name} BOOL: ${value}`);
        break;
      case "INT":
        lines.push(`${name} ∈ ${variable.bounds.toString()} ∩ ℤ: ${value}`);
        break;
      case "REAL":
        lines.push(`${name} ∈ ${variable.bounds.toString()}: ${value}`);
        break;
    }
  }
  lines.push(`Objective value: ${solution.getObjectiveValue()}`);
  return lines.join("\n");
}
