/**
 * Results of a solve attempt.
 */

import { InvalidArgumentError } from "../errors";
import { ImmutableParameters } from "../parameters";
import type { ReadableParameters } from "../parameters";
import type { ComputationTime } from "./duration";
import type { Solution } from "./solution";
import { foundFeasible } from "./status";
import type { ResultStatus } from "./status";

export class Result {
  readonly status: ResultStatus;
  readonly duration: ComputationTime;
  readonly parameters: ImmutableParameters;
  readonly solution: Solution | null;

  private constructor(
    status: ResultStatus,
    duration: ComputationTime,
    parameters: ImmutableParameters,
    solution: Solution | null
  ) {
    this.status = status;
    this.duration = duration;
    this.parameters = parameters;
    this.solution = solution;
  }

  /**
   * @throws InvalidArgumentError unless a solution is given exactly when the
   * status found a feasible point
   */
  static of(
    status: ResultStatus,
    duration: ComputationTime,
    parameters: ReadableParameters,
    solution: Solution | null
  ): Result {
    if (foundFeasible(status) !== (solution !== null)) {
      throw new InvalidArgumentError(
        solution === null
          ? `Status ${status} requires a solution.`
          : `Status ${status} does not admit a solution.`
      );
    }
    return new Result(status, duration, ImmutableParameters.copyOf(parameters), solution);
  }

  foundFeasible(): boolean {
    return foundFeasible(this.status);
  }

  /** Objective value of the solution, or null without one. */
  getObjectiveValue(): number | null {
    return this.solution?.getObjectiveValue() ?? null;
  }

  toString(): string {
    const value = this.getObjectiveValue();
    return value === null ? this.status : `${this.status} (objective ${value})`;
  }
}
