/**
 * Error taxonomy
 *
 * Every failure raised on purpose by this library is an MPError. The `kind`
 * field tells the categories apart without instanceof chains.
 */

export type MPErrorKind =
  | "invalid-argument"
  | "unknown-entity"
  | "configuration-conflict"
  | "unsupported-feature"
  | "state-precondition"
  | "engine-failure";

export abstract class MPError extends Error {
  abstract readonly kind: MPErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed construction: non-finite numbers, empty sums, incompatible bounds. */
export class InvalidArgumentError extends MPError {
  readonly kind = "invalid-argument";
}

/**
 * A variable or constraint was looked up in a program (or a solution) that
 * does not contain it.
 */
export class UnknownEntityError extends MPError {
  readonly kind = "unknown-entity";
  readonly entity: string;

  constructor(entity: string, where: string) {
    super(`Unknown entity '${entity}' in ${where}.`);
    this.entity = entity;
  }
}

/** Mutually exclusive parameter settings. */
export class ConfigurationConflictError extends MPError {
  readonly kind = "configuration-conflict";
  readonly parameters: readonly string[];

  constructor(parameters: readonly string[], message: string) {
    super(message);
    this.parameters = parameters;
  }
}

export class UnsupportedFeatureError extends MPError {
  readonly kind = "unsupported-feature";
  readonly feature: string;

  constructor(feature: string, message: string) {
    super(message);
    this.feature = feature;
  }
}

/** An operation was called before the state it needs exists. */
export class StatePreconditionError extends MPError {
  readonly kind = "state-precondition";
  readonly operation: string;

  constructor(operation: string, message: string) {
    super(message);
    this.operation = operation;
  }
}

/** The engine itself threw. The original error is kept as `cause`. */
export class EngineFailureError extends MPError {
  readonly kind = "engine-failure";
  readonly engine: string;

  constructor(engine: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Engine ${engine} failed: ${detail}`, { cause });
    this.engine = engine;
  }
}

/**
 * Throws when an internal invariant does not hold. These indicate bugs in
 * this library, not caller misuse.
 */
export function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new Error(`Invariant violated: ${message}`);
  }
}
