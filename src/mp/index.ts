/**
 * Program builder, dimension and views.
 */

export { MPDimension } from "./dimension";
export { MPBuilder } from "./mp-builder";
export type { MPOptions } from "./mp-builder";
export { defaultConstraintNamer, defaultVariableNamer } from "./types";
export type { ConstraintNamer, MP, ReadableMP, VariableNamer } from "./types";
export {
  ImmutableMP,
  immutableCopy,
  MPForwarder,
  MPReadView,
  MPWithTransformedBoolsView,
  readView,
  withTransformedBools,
} from "./views";
export { oneFourThree, oneFourThreeLowX } from "./examples";
