export { ComputationTime, SolverDuration } from "./duration";
export { Result } from "./result";
export { BOOLEAN_TOLERANCE, Solution } from "./solution";
export type { SolutionInit } from "./solution";
export { canonicalize, foundFeasible, toResultStatus } from "./status";
export type { EngineOutcome, EngineVerdict, ResultStatus, StatusTable } from "./status";
export { Stopwatch } from "./stopwatch";
export type { Elapsed } from "./stopwatch";
