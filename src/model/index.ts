/**
 * Value model: immutable terms, sums, variables, constraints and objectives.
 */

export { Bounds, HUGE } from "./bounds";
export { Variable, kindOf } from "./variable";
export type { Reference, VariableDomain, VariableKind } from "./variable";
export { Term } from "./term";
export { SumTerms } from "./sum-terms";
export { COMPARISON_OPERATORS, operatorAsciiSymbol, operatorSymbol, satisfies } from "./operator";
export type { ComparisonOperator } from "./operator";
export { Constraint } from "./constraint";
export { Objective } from "./objective";
export type { Sense } from "./objective";
export { ValueSet } from "./value-set";
export type { ValueObject } from "./value-set";
