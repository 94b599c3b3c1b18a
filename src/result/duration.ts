/**
 * Durations of a solve, in milliseconds. They are measured by the caller;
 * these classes only carry them.
 */

import { InvalidArgumentError } from "../errors";

function checkDuration(label: string, ms: number): void {
  if (!Number.isFinite(ms) || ms < 0) {
    throw new InvalidArgumentError(`${label} must be a non-negative finite number of ms, got ${ms}.`);
  }
}

/** Time spent inside the engine, as the engine (or the adapter around it) measured it. */
export class SolverDuration {
  readonly wallMs: number;
  readonly cpuMs: number | null;

  private constructor(wallMs: number, cpuMs: number | null) {
    this.wallMs = wallMs;
    this.cpuMs = cpuMs;
  }

  static of(wallMs: number, cpuMs: number | null = null): SolverDuration {
    checkDuration("Solver wall time", wallMs);
    if (cpuMs !== null) checkDuration("Solver CPU time", cpuMs);
    return new SolverDuration(wallMs, cpuMs);
  }

  /** CPU time when known, else wall time. */
  getDuration(): number {
    return this.cpuMs ?? this.wallMs;
  }

  equals(other: SolverDuration): boolean {
    return this.wallMs === other.wallMs && this.cpuMs === other.cpuMs;
  }
}

/** Overall time of a solve call, plus the engine's own share when known. */
export class ComputationTime {
  readonly wallMs: number;
  readonly threadMs: number | null;
  readonly solver: SolverDuration | null;

  private constructor(wallMs: number, threadMs: number | null, solver: SolverDuration | null) {
    this.wallMs = wallMs;
    this.threadMs = threadMs;
    this.solver = solver;
  }

  static of(wallMs: number, threadMs: number | null = null, solver: SolverDuration | null = null): ComputationTime {
    checkDuration("Wall time", wallMs);
    if (threadMs !== null) checkDuration("Thread time", threadMs);
    return new ComputationTime(wallMs, threadMs, solver);
  }

  /** Solver CPU, then solver wall, then overall wall time. */
  getDuration(): number {
    return this.solver?.cpuMs ?? this.solver?.wallMs ?? this.wallMs;
  }
}
