/**
 * Engine Abstraction Layer
 *
 * This provides the interface every solving engine is wrapped behind, so
 * that engines can be swapped without touching the program or the caller.
 */

import type { Constraint, Variable } from "../model";
import type { ReadableMP } from "../mp";
import type { TimingType } from "../parameters";
import type { SolverDuration, StatusTable } from "../result";

/**
 * Resolved parameter values handed to an engine. Limits are null when
 * unset; the engine decides what to do for those.
 */
export interface EngineSettings {
  timing: TimingType;
  /** Time limit in seconds for the timing type above */
  maxSeconds: number | null;
  maxThreads: number | null;
  maxMemoryMb: number | null;
  maxTreeSizeMb: number | null;
  /** Deterministic rather than opportunistic parallel mode */
  deterministic: boolean;
  workDir: string | null;
}

/**
 * Raw outcome of one engine call, in the engine's own status codes
 */
export type EngineResult<Code extends string | number> =
  | {
      code: Code;
      solved: true;
      values: Array<[Variable, number]>;
      /** Computed from the values when absent */
      objectiveValue?: number;
      duals?: Array<[Constraint, number]>;
      /** The engine's own timing, when it reports one */
      duration?: SolverDuration;
    }
  | { code: Code; solved: false; duration?: SolverDuration };

/**
 * A wrapped solving engine.
 * `Handle` is the engine-native model of the last solve.
 */
export interface Engine<Code extends string | number, Handle> {
  readonly name: string;

  /** How this engine's codes read as canonical verdicts */
  readonly statusTable: StatusTable<Code>;

  /** Whether the engine can honor a CPU time limit */
  readonly supportsCpuTiming: boolean;

  /**
   * Solve a frozen program. Called once per solve, synchronously.
   * @throws UnsupportedFeatureError when the program uses something this
   * engine cannot express
   */
  solve(mp: ReadableMP, settings: EngineSettings): EngineResult<Code>;

  /** Native model built by the last solve, or null before any */
  getHandle(): Handle | null;
}
