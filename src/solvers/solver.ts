/**
 * Solver facade
 *
 * Ties a program, its parameters and one engine together. Each `solve()` is
 * one synchronous engine call on a frozen copy of the program; the raw
 * outcome is turned into a canonical `Result`.
 */

import { EngineFailureError, invariant, MPError, StatePreconditionError } from "../errors";
import type { ReadableMP } from "../mp";
import { immutableCopy, MPBuilder } from "../mp";
import type { ParameterKey, ParameterValues, ReadableParameters } from "../parameters";
import { isCpuTimingSupported, SolverParameters } from "../parameters";
import { ComputationTime, foundFeasible, Result, Solution, Stopwatch, toResultStatus } from "../result";
import type { Engine, EngineResult, EngineSettings } from "./types";

export class Solver<Code extends string | number, Handle> {
  private readonly engine: Engine<Code, Handle>;
  private mp: ReadableMP;
  private readonly parameters: SolverParameters;
  private result: Result | null = null;
  private controlHandedOver: boolean = false;

  constructor(engine: Engine<Code, Handle>, mp: ReadableMP = new MPBuilder(), parameters?: ReadableParameters) {
    this.engine = engine;
    this.mp = mp;
    this.parameters = new SolverParameters();
    if (parameters !== undefined) {
      this.parameters.setParameters(parameters);
    }
  }

  getEngineName(): string {
    return this.engine.name;
  }

  getProblem(): ReadableMP {
    return this.mp;
  }

  /** The program to solve next. The solver keeps a reference, not a copy. */
  setProblem(mp: ReadableMP): void {
    this.checkInControl("setProblem");
    this.mp = mp;
  }

  getParameters(): ReadableParameters {
    return this.parameters;
  }

  setParameter<K extends ParameterKey>(key: K, value: ParameterValues[K]): boolean {
    this.checkInControl("setParameter");
    return this.parameters.setValue(key, value);
  }

  setParameters(parameters: ReadableParameters): boolean {
    this.checkInControl("setParameters");
    return this.parameters.setParameters(parameters);
  }

  /**
   * @throws ConfigurationConflictError when both time limits are set
   * @throws UnsupportedFeatureError when the engine cannot handle the
   * program or the requested timing
   * @throws EngineFailureError when the engine itself throws
   */
  solve(): Result {
    this.checkInControl("solve");
    const timing = this.parameters.getPreferredTimingType(
      this.engine.supportsCpuTiming && isCpuTimingSupported()
    );
    const settings: EngineSettings = {
      timing,
      maxSeconds: this.parameters.getValue(timing === "WALL" ? "MAX_WALL_SECONDS" : "MAX_CPU_SECONDS"),
      maxThreads: this.parameters.getValue("MAX_THREADS"),
      maxMemoryMb: this.parameters.getValue("MAX_MEMORY_MB"),
      maxTreeSizeMb: this.parameters.getValue("MAX_TREE_SIZE_MB"),
      deterministic: this.parameters.getValue("DETERMINISTIC") === 1,
      workDir: this.parameters.getValue("WORK_DIR"),
    };
    const problem = immutableCopy(this.mp);

    const stopwatch = Stopwatch.start();
    let outcome: EngineResult<Code>;
    try {
      outcome = this.engine.solve(problem, settings);
    } catch (error) {
      if (error instanceof MPError) {
        throw error;
      }
      throw new EngineFailureError(this.engine.name, error);
    }
    const elapsed = stopwatch.elapsed();

    const status = toResultStatus(this.engine.statusTable, {
      code: outcome.code,
      hasSolution: outcome.solved,
      objectiveComplete: problem.getObjective().isComplete(),
    });
    // a solution next to e.g. INFEASIBLE is an engine inconsistency; it is dropped
    const solution =
      outcome.solved && foundFeasible(status)
        ? Solution.of(problem, {
            objectiveValue: outcome.objectiveValue,
            values: outcome.values,
            duals: outcome.duals,
          })
        : null;
    const duration = ComputationTime.of(elapsed.wallMs, elapsed.cpuMs, outcome.duration ?? null);
    this.result = Result.of(status, duration, this.parameters, solution);

    console.debug(
      `[solver] ${this.engine.name} on '${problem.getName()}' (${problem.getDimension().toString()}): ` +
        `${this.result.toString()} in ${elapsed.wallMs.toFixed(1)}ms`
    );
    return this.result;
  }

  /**
   * @throws StatePreconditionError before the first solve
   */
  getResult(): Result {
    if (this.result === null) {
      throw new StatePreconditionError("getResult", "No result: solve() has not been called yet.");
    }
    invariant(
      !this.result.foundFeasible() || this.result.solution !== null,
      `status ${this.result.status} without a solution`
    );
    return this.result;
  }

  /**
   * Hands the engine's native model of the last solve over to the caller for
   * manual changes. This is one-way: the solver can no longer vouch for its
   * own view of the program and parameters, so every later mutation or solve
   * through it fails.
   *
   * @throws StatePreconditionError before the first solve
   */
  takeControl(): Handle {
    const handle = this.engine.getHandle();
    if (handle === null) {
      throw new StatePreconditionError("takeControl", "No engine model yet: solve() has not been called.");
    }
    this.controlHandedOver = true;
    return handle;
  }

  isControlHandedOver(): boolean {
    return this.controlHandedOver;
  }

  private checkInControl(operation: string): void {
    if (this.controlHandedOver) {
      throw new StatePreconditionError(
        operation,
        `Cannot ${operation}: control of the engine model was handed over.`
      );
    }
  }
}
