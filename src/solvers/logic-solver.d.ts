/**
 * Type declarations for logic-solver npm package
 *
 * This package provides MiniSat compiled to JavaScript via Emscripten.
 */

declare module "logic-solver" {
  namespace Logic {
    const TRUE: string;
    const FALSE: string;

    function not(operand: Term): string;
    function or(...operands: Term[]): Formula;
    function and(...operands: Term[]): Formula;

    type Term = string | number | Formula;
    type Formula = object;

    class Solver {
      constructor();
      getVarNum(variableName: string, noCreate?: boolean): number;
      getVarName(variableNum: number): string;
      require(...args: Term[]): void;
      forbid(...args: Term[]): void;
      solve(): Solution | null;
      solveAssuming(assumption: Term): Solution | null;
      minimizeWeightedSum(solution: Solution, costTerms: Term[], costWeights: number[] | number): Solution;
      maximizeWeightedSum(solution: Solution, costTerms: Term[], costWeights: number[] | number): Solution;
    }

    class Solution {
      getMap(): Record<string, boolean>;
      getTrueVars(): string[];
      evaluate(expression: Term): boolean;
      getWeightedSum(formulas: Term[], weights: number[] | number): number;
      ignoreUnknownVariables(): this;
    }

    class Bits {
      constructor(formulas: Term[]);
      bits: Term[];
    }

    function constantBits(wholeNumber: number): Bits;
    function equalBits(bits1: Bits, bits2: Bits): Formula;
    function lessThanOrEqual(bits1: Bits, bits2: Bits): Formula;
    function greaterThanOrEqual(bits1: Bits, bits2: Bits): Formula;
    function weightedSum(formulas: Term[], weights: number[] | number): Bits;
  }

  export = Logic;
}
