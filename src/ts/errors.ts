/**
 * Base class for every failure raised while building oracles or compiling
 * function forms. All of them are raised eagerly, at construction or
 * compilation time.
 */
export class OracleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A generated index or value falls outside its declared domain. */
export class OutOfRangeError extends OracleError {
  constructor(
    message: string,
    public readonly value: number,
    public readonly limit: number,
  ) {
    super(message);
  }
}

/** A lookup table (or affine matrix) is incomplete or holds out-of-range data. */
export class MalformedTableError extends OracleError {}

/** An operation is disabled, a bound is exceeded, or a setting is invalid. */
export class ConfigurationError extends OracleError {}

/** Structural input is empty or non-rectangular. */
export class ShapeError extends OracleError {}

export class OverflowError extends OracleError {
  constructor(
    public readonly value: number,
    public readonly totalBits: number,
    public readonly fracBits: number,
    min: number,
    max: number,
  ) {
    super(
      `Value ${value} overflows signed fixed-point [${min}, ${max}] ` +
      `for totalBits=${totalBits}, fracBits=${fracBits}`
    );
  }
}

export class UnsupportedFormTypeError extends OracleError {
  constructor(public readonly kind: unknown) {
    super(`Unsupported function form kind: ${String(kind)}`);
  }
}

export class UnsupportedGateError extends OracleError {
  constructor(public readonly gate: unknown) {
    super(`Unsupported gate type in estimator: ${String(gate)}`);
  }
}
