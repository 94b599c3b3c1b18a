/**
 * Tests for solver parameters and timing resolution.
 */

import { describe, it, expect } from "vitest";
import { ImmutableParameters, SolverParameters } from "./solver-parameters";
import { getPreferredTimingType } from "./timing";
import { PARAMETER_DEFAULTS } from "./keys";
import {
  ConfigurationConflictError,
  InvalidArgumentError,
  UnsupportedFeatureError,
} from "../errors";

describe("SolverParameters", () => {
  it("returns defaults for keys never set", () => {
    const parameters = new SolverParameters();
    expect(parameters.getValue("MAX_WALL_SECONDS")).toBeNull();
    expect(parameters.getValue("MAX_THREADS")).toBeNull();
    expect(parameters.getValue("DETERMINISTIC")).toBe(0);
    expect(parameters.getValue("WORK_DIR")).toBeNull();
    expect(parameters.getExplicitKeys()).toEqual([]);
  });

  it("stores values and drops those equal to the default", () => {
    const parameters = new SolverParameters();
    expect(parameters.setValue("MAX_THREADS", 4)).toBe(true);
    expect(parameters.setValue("MAX_THREADS", 4)).toBe(false);
    expect(parameters.getExplicitKeys()).toEqual(["MAX_THREADS"]);
    expect(parameters.setValue("MAX_THREADS", null)).toBe(true);
    expect(parameters.getExplicitKeys()).toEqual([]);
  });

  it("validates values per key", () => {
    const parameters = new SolverParameters();
    expect(() => parameters.setValue("MAX_WALL_SECONDS", 0)).toThrow(InvalidArgumentError);
    expect(() => parameters.setValue("MAX_MEMORY_MB", Infinity)).toThrow(InvalidArgumentError);
    expect(() => parameters.setValue("MAX_THREADS", 1.5)).toThrow(InvalidArgumentError);
    expect(() => parameters.setValue("DETERMINISTIC", 2)).toThrow(InvalidArgumentError);
    expect(() => parameters.setValue("WORK_DIR", "")).toThrow("Parameter WORK_DIR must be a non-empty string or null; got .");
  });

  it("accepts overridden defaults at construction", () => {
    const parameters = new SolverParameters({ DETERMINISTIC: 1 });
    expect(parameters.getValue("DETERMINISTIC")).toBe(1);
    expect(parameters.setValue("DETERMINISTIC", 1)).toBe(false);
    expect(() => new SolverParameters({ MAX_THREADS: 0 })).toThrow(InvalidArgumentError);
  });

  it("replaces all values at once", () => {
    const target = new SolverParameters();
    target.setValue("MAX_THREADS", 2);
    target.setValue("WORK_DIR", "/tmp/work");

    const source = new SolverParameters();
    source.setValue("MAX_THREADS", 2);
    source.setValue("MAX_WALL_SECONDS", 30);

    expect(target.setParameters(source)).toBe(true);
    expect(target.getValue("WORK_DIR")).toBeNull();
    expect(target.getValue("MAX_WALL_SECONDS")).toBe(30);
    expect(target.equals(source)).toBe(true);
    expect(target.setParameters(source)).toBe(false);
  });

  it("takes snapshots that do not follow later changes", () => {
    const parameters = new SolverParameters();
    parameters.setValue("MAX_CPU_SECONDS", 5);
    const snapshot = parameters.snapshot();
    parameters.setValue("MAX_CPU_SECONDS", 10);
    expect(snapshot.getValue("MAX_CPU_SECONDS")).toBe(5);
    expect(ImmutableParameters.copyOf(snapshot)).toBe(snapshot);
    expect(snapshot.toString()).toBe("Parameters{MAX_CPU_SECONDS=5}");
  });

  it("exposes the built-in defaults", () => {
    expect(new SolverParameters().getDefaults()).toEqual(PARAMETER_DEFAULTS);
  });
});

describe("getPreferredTimingType", () => {
  it("fails when both limits are set, whatever the values", () => {
    for (const [wall, cpu] of [
      [1, 1],
      [0.5, 3600],
      [100, 0.01],
    ]) {
      const parameters = new SolverParameters();
      parameters.setValue("MAX_WALL_SECONDS", wall);
      parameters.setValue("MAX_CPU_SECONDS", cpu);
      expect(() => parameters.getPreferredTimingType(true)).toThrow(ConfigurationConflictError);
      expect(() => parameters.getPreferredTimingType(false)).toThrow(ConfigurationConflictError);
    }
  });

  it("follows the limit that is set", () => {
    const wall = new SolverParameters();
    wall.setValue("MAX_WALL_SECONDS", 10);
    expect(wall.getPreferredTimingType(true)).toBe("WALL");
    expect(wall.getMaxTime(true)).toEqual({ type: "WALL", seconds: 10 });

    const cpu = new SolverParameters();
    cpu.setValue("MAX_CPU_SECONDS", 10);
    expect(cpu.getPreferredTimingType(true)).toBe("CPU");
    expect(() => cpu.getPreferredTimingType(false)).toThrow(UnsupportedFeatureError);
  });

  it("prefers CPU timing when nothing is set and CPU time is measurable", () => {
    const parameters = new SolverParameters();
    expect(getPreferredTimingType(parameters, true)).toBe("CPU");
    expect(getPreferredTimingType(parameters, false)).toBe("WALL");
    expect(parameters.getMaxTime(false)).toEqual({ type: "WALL", seconds: null });
  });

  it("names both parameters in the conflict", () => {
    const parameters = new SolverParameters();
    parameters.setValue("MAX_WALL_SECONDS", 1);
    parameters.setValue("MAX_CPU_SECONDS", 2);
    try {
      parameters.getPreferredTimingType(true);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationConflictError);
      if (error instanceof ConfigurationConflictError) {
        expect(error.parameters).toEqual(["MAX_WALL_SECONDS", "MAX_CPU_SECONDS"]);
        expect(error.kind).toBe("configuration-conflict");
      }
    }
  });
});
