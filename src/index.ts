/**
 * mp-solve
 *
 * Build linear and mixed-integer programs, solve them with an interchangeable
 * engine, and read back canonical results.
 */

export * from "./errors";
export * from "./model";
export * from "./mp";
export * from "./parameters";
export * from "./naming";
export * from "./result";
export * from "./solvers";
export * from "./export";
