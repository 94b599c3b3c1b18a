/**
 * Timing type resolution
 *
 * A solve is limited either by wall-clock time or by CPU time, never both.
 * When neither limit is set, CPU timing is preferred where the runtime can
 * measure it.
 */

import { ConfigurationConflictError, UnsupportedFeatureError } from "../errors";
import type { ParameterValues } from "./keys";

export type TimingType = "WALL" | "CPU";

export interface TimingLimits {
  getValue<K extends "MAX_WALL_SECONDS" | "MAX_CPU_SECONDS">(key: K): ParameterValues[K];
}

export function isCpuTimingSupported(): boolean {
  return typeof process !== "undefined" && typeof process.cpuUsage === "function";
}

/**
 * @throws ConfigurationConflictError when both limits are set
 * @throws UnsupportedFeatureError when only the CPU limit is set and CPU time
 * cannot be measured
 */
export function getPreferredTimingType(
  parameters: TimingLimits,
  cpuTimingSupported: boolean = isCpuTimingSupported()
): TimingType {
  const maxWall = parameters.getValue("MAX_WALL_SECONDS");
  const maxCpu = parameters.getValue("MAX_CPU_SECONDS");
  if (maxWall !== null && maxCpu !== null) {
    throw new ConfigurationConflictError(
      ["MAX_WALL_SECONDS", "MAX_CPU_SECONDS"],
      `MAX_WALL_SECONDS (${maxWall}) and MAX_CPU_SECONDS (${maxCpu}) are mutually exclusive; set at most one.`
    );
  }
  if (maxWall !== null) {
    return "WALL";
  }
  if (maxCpu !== null) {
    if (!cpuTimingSupported) {
      throw new UnsupportedFeatureError(
        "MAX_CPU_SECONDS",
        `MAX_CPU_SECONDS is set (${maxCpu}) but CPU time cannot be measured here.`
      );
    }
    return "CPU";
  }
  return cpuTimingSupported ? "CPU" : "WALL";
}

/** The limit, in seconds, that applies to the preferred timing type, or null. */
export function getMaxTime(
  parameters: TimingLimits,
  cpuTimingSupported: boolean = isCpuTimingSupported()
): { type: TimingType; seconds: number | null } {
  const type = getPreferredTimingType(parameters, cpuTimingSupported);
  const seconds =
    type === "WALL" ? parameters.getValue("MAX_WALL_SECONDS") : parameters.getValue("MAX_CPU_SECONDS");
  return { type, seconds };
}
