/**
 * Solver parameter keys
 *
 * Keys fall into four typed categories. Every key has a default, so a value
 * can always be read; `null` in a limit means "no limit".
 */

import type { ConstraintNamer, VariableNamer } from "../mp";
import type { ExportFormat } from "../naming/format";

export type DoubleParameter =
  | "MAX_WALL_SECONDS"
  | "MAX_CPU_SECONDS"
  | "MAX_TREE_SIZE_MB"
  | "MAX_MEMORY_MB";

export type IntParameter = "MAX_THREADS" | "DETERMINISTIC";

export type StringParameter = "WORK_DIR";

export type ObjectParameter =
  | "NAMER_VARIABLES"
  | "NAMER_CONSTRAINTS"
  | "NAMER_VARIABLES_BY_FORMAT"
  | "NAMER_CONSTRAINTS_BY_FORMAT";

export interface ParameterValues {
  /** Wall-clock limit of a solve. Exclusive with MAX_CPU_SECONDS. */
  MAX_WALL_SECONDS: number | null;
  /** CPU-time limit of a solve. Exclusive with MAX_WALL_SECONDS. */
  MAX_CPU_SECONDS: number | null;
  MAX_TREE_SIZE_MB: number | null;
  MAX_MEMORY_MB: number | null;
  /** Null lets the engine decide. */
  MAX_THREADS: number | null;
  /** 1 for deterministic parallel mode, 0 for opportunistic. */
  DETERMINISTIC: number;
  WORK_DIR: string | null;
  NAMER_VARIABLES: VariableNamer | null;
  NAMER_CONSTRAINTS: ConstraintNamer | null;
  NAMER_VARIABLES_BY_FORMAT: ReadonlyMap<ExportFormat, VariableNamer> | null;
  NAMER_CONSTRAINTS_BY_FORMAT: ReadonlyMap<ExportFormat, ConstraintNamer> | null;
}

export type ParameterKey = keyof ParameterValues;

export const DOUBLE_PARAMETERS: readonly DoubleParameter[] = [
  "MAX_WALL_SECONDS",
  "MAX_CPU_SECONDS",
  "MAX_TREE_SIZE_MB",
  "MAX_MEMORY_MB",
];

export const INT_PARAMETERS: readonly IntParameter[] = ["MAX_THREADS", "DETERMINISTIC"];

export const STRING_PARAMETERS: readonly StringParameter[] = ["WORK_DIR"];

export const OBJECT_PARAMETERS: readonly ObjectParameter[] = [
  "NAMER_VARIABLES",
  "NAMER_CONSTRAINTS",
  "NAMER_VARIABLES_BY_FORMAT",
  "NAMER_CONSTRAINTS_BY_FORMAT",
];

export const PARAMETER_KEYS: readonly ParameterKey[] = [
  ...DOUBLE_PARAMETERS,
  ...INT_PARAMETERS,
  ...STRING_PARAMETERS,
  ...OBJECT_PARAMETERS,
];

export const PARAMETER_DEFAULTS: Readonly<ParameterValues> = Object.freeze({
  MAX_WALL_SECONDS: null,
  MAX_CPU_SECONDS: null,
  MAX_TREE_SIZE_MB: null,
  MAX_MEMORY_MB: null,
  MAX_THREADS: null,
  DETERMINISTIC: 0,
  WORK_DIR: null,
  NAMER_VARIABLES: null,
  NAMER_CONSTRAINTS: null,
  NAMER_VARIABLES_BY_FORMAT: null,
  NAMER_CONSTRAINTS_BY_FORMAT: null,
});

type Validator<K extends ParameterKey> = (value: ParameterValues[K]) => string | null;

const positiveOrNull = (value: number | null): string | null =>
  value === null || (Number.isFinite(value) && value > 0) ? null : "must be a positive finite number or null";

const anything = (): string | null => null;

/** Each validator returns a problem description, or null when the value is fine. */
export const PARAMETER_VALIDATORS: { readonly [K in ParameterKey]: Validator<K> } = {
  MAX_WALL_SECONDS: positiveOrNull,
  MAX_CPU_SECONDS: positiveOrNull,
  MAX_TREE_SIZE_MB: positiveOrNull,
  MAX_MEMORY_MB: positiveOrNull,
  MAX_THREADS: (value) =>
    value === null || (Number.isInteger(value) && value > 0) ? null : "must be a positive integer or null",
  DETERMINISTIC: (value) => (value === 0 || value === 1 ? null : "must be 0 or 1"),
  WORK_DIR: (value) => (value === null || value.length > 0 ? null : "must be a non-empty string or null"),
  NAMER_VARIABLES: anything,
  NAMER_CONSTRAINTS: anything,
  NAMER_VARIABLES_BY_FORMAT: anything,
  NAMER_CONSTRAINTS_BY_FORMAT: anything,
};
