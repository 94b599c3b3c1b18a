/**
 * Wall and CPU time measurement around a synchronous call.
 */

import { isCpuTimingSupported } from "../parameters";

export interface Elapsed {
  wallMs: number;
  /** Process CPU time (user + system), or null where it cannot be measured. */
  cpuMs: number | null;
}

export class Stopwatch {
  private readonly startWall: number;
  private readonly startCpu: NodeJS.CpuUsage | null;

  private constructor() {
    this.startCpu = isCpuTimingSupported() ? process.cpuUsage() : null;
    this.startWall = performance.now();
  }

  static start(): Stopwatch {
    return new Stopwatch();
  }

  elapsed(): Elapsed {
    const wallMs = performance.now() - this.startWall;
    if (this.startCpu === null) {
      return { wallMs, cpuMs: null };
    }
    const cpu = process.cpuUsage(this.startCpu);
    return { wallMs, cpuMs: (cpu.user + cpu.system) / 1000 };
  }
}
