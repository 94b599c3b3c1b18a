/**
 * Typed solver parameters
 *
 * Only values that differ from the default are stored; reading a key that
 * was never set returns its default.
 */

import { InvalidArgumentError } from "../errors";
import { PARAMETER_DEFAULTS, PARAMETER_KEYS, PARAMETER_VALIDATORS } from "./keys";
import type { ParameterKey, ParameterValues } from "./keys";
import { getMaxTime, getPreferredTimingType, isCpuTimingSupported } from "./timing";
import type { TimingType } from "./timing";

export interface ReadableParameters {
  getValue<K extends ParameterKey>(key: K): ParameterValues[K];
  /** Keys holding a value other than their default. */
  getExplicitKeys(): ParameterKey[];
  getDefaults(): Readonly<ParameterValues>;
  getPreferredTimingType(cpuTimingSupported?: boolean): TimingType;
  equals(other: ReadableParameters): boolean;
}

function check<K extends ParameterKey>(key: K, value: ParameterValues[K]): void {
  const problem = PARAMETER_VALIDATORS[key](value);
  if (problem !== null) {
    throw new InvalidArgumentError(`Parameter ${key} ${problem}; got ${String(value)}.`);
  }
}

abstract class ParametersBase implements ReadableParameters {
  protected readonly defaults: Readonly<ParameterValues>;
  protected values: Partial<ParameterValues> = {};

  protected constructor(defaults: Readonly<ParameterValues>) {
    this.defaults = defaults;
  }

  getValue<K extends ParameterKey>(key: K): ParameterValues[K] {
    const value = this.values[key];
    return value === undefined ? this.defaults[key] : value;
  }

  getExplicitKeys(): ParameterKey[] {
    return PARAMETER_KEYS.filter((key) => this.values[key] !== undefined);
  }

  getDefaults(): Readonly<ParameterValues> {
    return this.defaults;
  }

  getPreferredTimingType(cpuTimingSupported: boolean = isCpuTimingSupported()): TimingType {
    return getPreferredTimingType(this, cpuTimingSupported);
  }

  /** Limit in seconds for the preferred timing type, or null when unlimited. */
  getMaxTime(cpuTimingSupported: boolean = isCpuTimingSupported()): { type: TimingType; seconds: number | null } {
    return getMaxTime(this, cpuTimingSupported);
  }

  /** Compares effective values, defaults included. */
  equals(other: ReadableParameters): boolean {
    return PARAMETER_KEYS.every((key) => this.getValue(key) === other.getValue(key));
  }

  toString(): string {
    const entries = this.getExplicitKeys().map((key) => `${key}=${describe(this.getValue(key))}`);
    return `Parameters{${entries.join(", ")}}`;
  }
}

function describe(value: unknown): string {
  if (typeof value === "function") return "<function>";
  if (value instanceof Map) return `<${value.size} formats>`;
  return String(value);
}

export class SolverParameters extends ParametersBase {
  /**
   * @param defaults overrides of the built-in defaults for this instance
   */
  constructor(defaults: Partial<ParameterValues> = {}) {
    const merged: ParameterValues = { ...PARAMETER_DEFAULTS, ...defaults };
    for (const key of PARAMETER_KEYS) {
      checkKey(merged, key);
    }
    super(Object.freeze(merged));
  }

  /**
   * Sets a value; setting the default removes the entry. Returns whether the
   * effective value changed.
   *
   * @throws InvalidArgumentError when the value is not valid for the key
   */
  setValue<K extends ParameterKey>(key: K, value: ParameterValues[K]): boolean {
    check(key, value);
    const previous = this.getValue(key);
    if (value === this.defaults[key]) {
      delete this.values[key];
    } else {
      this.values[key] = value;
    }
    return previous !== value;
  }

  /**
   * Replaces every value by the ones of `other`: removes all, then sets all.
   * Returns whether any effective value changed.
   */
  setParameters(other: ReadableParameters): boolean {
    const before = this.snapshot();
    this.values = {};
    for (const key of PARAMETER_KEYS) {
      this.copyValue(other, key);
    }
    return !before.equals(this);
  }

  snapshot(): ImmutableParameters {
    return ImmutableParameters.copyOf(this);
  }

  private copyValue<K extends ParameterKey>(other: ReadableParameters, key: K): void {
    this.setValue(key, other.getValue(key));
  }
}

function checkKey<K extends ParameterKey>(values: ParameterValues, key: K): void {
  check(key, values[key]);
}

/** A frozen copy, as stored in results. */
export class ImmutableParameters extends ParametersBase {
  private constructor(source: ReadableParameters) {
    super(source.getDefaults());
    const values: Partial<ParameterValues> = {};
    for (const key of source.getExplicitKeys()) {
      copyInto(values, source, key);
    }
    this.values = Object.freeze(values);
  }

  static copyOf(source: ReadableParameters): ImmutableParameters {
    return source instanceof ImmutableParameters ? source : new ImmutableParameters(source);
  }
}

function copyInto<K extends ParameterKey>(
  target: Partial<ParameterValues>,
  source: ReadableParameters,
  key: K
): void {
  target[key] = source.getValue(key);
}
