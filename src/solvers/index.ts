/**
 * Solvers Module
 *
 * Engine abstraction, the two bundled engines, and the facade that runs a
 * program through one of them.
 */

export type { Engine, EngineResult, EngineSettings } from "./types";
export { isMemoryError } from "./engine-errors";
export { MINISAT_STATUS_TABLE, MiniSatEngine, toPseudoBoolean } from "./minisat-solver";
export type { MiniSatCode, PseudoBooleanSum } from "./minisat-solver";
export { LP_SOLVER_STATUS_TABLE, LpSolverEngine, buildModel } from "./lp-solver";
export type { LpSolverCode } from "./lp-solver";
export { Solver } from "./solver";
