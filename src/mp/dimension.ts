/**
 * Problem dimension: how many variables of each kind, and how many
 * constraints. A value, not a live view of the program.
 */

export class MPDimension {
  readonly binaries: number;
  readonly integersNotBool: number;
  readonly reals: number;
  readonly constraints: number;

  private constructor(binaries: number, integersNotBool: number, reals: number, constraints: number) {
    this.binaries = binaries;
    this.integersNotBool = integersNotBool;
    this.reals = reals;
    this.constraints = constraints;
  }

  static of(binaries: number, integersNotBool: number, reals: number, constraints: number): MPDimension {
    for (const count of [binaries, integersNotBool, reals, constraints]) {
      if (!Number.isInteger(count) || count < 0) {
        throw new RangeError(`Dimension counts must be non-negative integers, got ${count}.`);
      }
    }
    return new MPDimension(binaries, integersNotBool, reals, constraints);
  }

  /** Variables in the integer domain, binaries included. */
  getIntegers(): number {
    return this.binaries + this.integersNotBool;
  }

  getVariables(): number {
    return this.binaries + this.integersNotBool + this.reals;
  }

  getConstraints(): number {
    return this.constraints;
  }

  equals(other: MPDimension): boolean {
    return (
      this.binaries === other.binaries &&
      this.integersNotBool === other.integersNotBool &&
      this.reals === other.reals &&
      this.constraints === other.constraints
    );
  }

  toString(): string {
    return `${this.binaries} bool, ${this.integersNotBool} int, ${this.reals} real; ${this.constraints} constraints`;
  }
}
