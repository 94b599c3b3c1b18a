/**
 * Canonical result statuses
 *
 * Every engine outcome is mapped once, after the solve, to one of these.
 * Engines describe their own codes with a status table; codes missing from
 * the table fall back to an error status, so an unknown code never crashes
 * the adapter.
 */

export type ResultStatus =
  | "OPTIMAL"
  | "FEASIBLE"
  | "INFEASIBLE"
  | "INFEASIBLE_OR_UNBOUNDED"
  | "UNBOUNDED"
  | "TIME_LIMIT_REACHED_WITH_SOLUTION"
  | "TIME_LIMIT_REACHED_NO_SOLUTION"
  | "MEMORY_LIMIT_REACHED_WITH_SOLUTION"
  | "MEMORY_LIMIT_REACHED_NO_SOLUTION"
  | "ERROR_WITH_SOLUTION"
  | "ERROR_NO_SOLUTION";

const FEASIBLE_STATUSES: ReadonlySet<ResultStatus> = new Set<ResultStatus>([
  "OPTIMAL",
  "FEASIBLE",
  "TIME_LIMIT_REACHED_WITH_SOLUTION",
  "MEMORY_LIMIT_REACHED_WITH_SOLUTION",
  "ERROR_WITH_SOLUTION",
]);

/** Whether a solution comes with this status. */
export function foundFeasible(status: ResultStatus): boolean {
  return FEASIBLE_STATUSES.has(status);
}

/**
 * What an engine code means, before the solution and the objective are
 * taken into account.
 */
export type EngineVerdict =
  | "OPTIMAL"
  | "FEASIBLE"
  | "INFEASIBLE"
  | "INFEASIBLE_OR_UNBOUNDED"
  | "UNBOUNDED"
  | "TIME_LIMIT"
  | "MEMORY_LIMIT"
  | "ERROR";

export type StatusTable<Code extends string | number> = ReadonlyMap<Code, EngineVerdict>;

export interface EngineOutcome<Code extends string | number> {
  code: Code;
  hasSolution: boolean;
  /** Whether the solved program has an objective function. */
  objectiveComplete: boolean;
}

function withOrWithout(hasSolution: boolean, withSolution: ResultStatus, without: ResultStatus): ResultStatus {
  return hasSolution ? withSolution : without;
}

export function canonicalize(verdict: EngineVerdict | undefined, hasSolution: boolean, objectiveComplete: boolean): ResultStatus {
  switch (verdict) {
    case "OPTIMAL":
      // engines answer "optimal" for a zero objective too
      if (!hasSolution) return "ERROR_NO_SOLUTION";
      return objectiveComplete ? "OPTIMAL" : "FEASIBLE";
    case "FEASIBLE":
      return withOrWithout(hasSolution, "FEASIBLE", "ERROR_NO_SOLUTION");
    case "INFEASIBLE":
      return "INFEASIBLE";
    case "INFEASIBLE_OR_UNBOUNDED":
      return "INFEASIBLE_OR_UNBOUNDED";
    case "UNBOUNDED":
      return "UNBOUNDED";
    case "TIME_LIMIT":
      return withOrWithout(hasSolution, "TIME_LIMIT_REACHED_WITH_SOLUTION", "TIME_LIMIT_REACHED_NO_SOLUTION");
    case "MEMORY_LIMIT":
      return withOrWithout(hasSolution, "MEMORY_LIMIT_REACHED_WITH_SOLUTION", "MEMORY_LIMIT_REACHED_NO_SOLUTION");
    case "ERROR":
    case undefined:
      return withOrWithout(hasSolution, "ERROR_WITH_SOLUTION", "ERROR_NO_SOLUTION");
  }
}

/** Maps an engine outcome through the engine's table. */
export function toResultStatus<Code extends string | number>(
  table: StatusTable<Code>,
  outcome: EngineOutcome<Code>
): ResultStatus {
  const verdict = table.get(outcome.code);
  if (verdict === undefined) {
    console.warn(`[status] Unrecognized engine status ${String(outcome.code)}; reporting an error.`);
  }
  return canonicalize(verdict, outcome.hasSolution, outcome.objectiveComplete);
}
