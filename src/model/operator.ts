/**
 * Comparison operators of constraints.
 */

export type ComparisonOperator = "LE" | "EQ" | "GE";

export const COMPARISON_OPERATORS: readonly ComparisonOperator[] = ["LE", "EQ", "GE"];

const SYMBOLS: Record<ComparisonOperator, string> = { LE: "≤", EQ: "=", GE: "≥" };

const ASCII_SYMBOLS: Record<ComparisonOperator, string> = { LE: "<=", EQ: "=", GE: ">=" };

export function operatorSymbol(operator: ComparisonOperator): string {
  return SYMBOLS[operator];
}

/** For text formats restricted to ASCII. */
export function operatorAsciiSymbol(operator: ComparisonOperator): string {
  return ASCII_SYMBOLS[operator];
}

/** Whether `lhs operator rhs` holds, up to `tolerance`. */
export function satisfies(
  lhs: number,
  operator: ComparisonOperator,
  rhs: number,
  tolerance: number = 0
): boolean {
  switch (operator) {
    case "LE":
      return lhs <= rhs + tolerance;
    case "EQ":
      return Math.abs(lhs - rhs) <= tolerance;
    case "GE":
      return lhs >= rhs - tolerance;
  }
}
