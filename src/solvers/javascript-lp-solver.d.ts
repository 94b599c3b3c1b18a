/**
 * Type declarations for the javascript-lp-solver npm package, which ships
 * none. Only what the LP engine uses is declared.
 */

declare module "javascript-lp-solver" {
  export interface Model {
    optimize: string;
    opType: "min" | "max";
    constraints: Record<string, { min?: number; max?: number; equal?: number }>;
    variables: Record<string, Record<string, number>>;
    ints?: Record<string, number>;
    binaries?: Record<string, number>;
    options?: { timeout?: number; tolerance?: number };
  }

  export interface SolverResult {
    feasible: boolean;
    result: number;
    bounded: boolean;
    isIntegral?: boolean;
    [key: string]: number | boolean | undefined;
  }

  interface Solver {
    Solve(model: Model): SolverResult;
  }

  const solver: Solver;
  export default solver;
}
