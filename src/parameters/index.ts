export {
  DOUBLE_PARAMETERS,
  INT_PARAMETERS,
  OBJECT_PARAMETERS,
  PARAMETER_DEFAULTS,
  PARAMETER_KEYS,
  PARAMETER_VALIDATORS,
  STRING_PARAMETERS,
} from "./keys";
export type {
  DoubleParameter,
  IntParameter,
  ObjectParameter,
  ParameterKey,
  ParameterValues,
  StringParameter,
} from "./keys";
export { ImmutableParameters, SolverParameters } from "./solver-parameters";
export type { ReadableParameters } from "./solver-parameters";
export { getMaxTime, getPreferredTimingType, isCpuTimingSupported } from "./timing";
export type { TimingLimits, TimingType } from "./timing";
