export type { ExportFormat } from "./format";
export { getConstraintNamer, getVariableNamer, resolveConstraintName, resolveVariableName } from "./naming";
export type { NamingContext } from "./naming";
