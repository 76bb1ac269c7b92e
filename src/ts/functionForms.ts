import { DEFAULT_SYNTH_CONFIG, MAX_REGISTER_BITS, type SynthConfig } from './config';
import { ConfigurationError, MalformedTableError, OutOfRangeError } from './errors';

export type Bit = 0 | 1;

/** Explicit truth table mapping packed input x to packed output f(x). */
export type LookupTableForm = {
  readonly kind: 'lookup_table';
  readonly nInputBits: number;
  readonly nOutputBits: number;
  readonly table: ReadonlyMap<number, number>;
  readonly name: string;
};

/** Bit-affine map y = A·x ⊕ b over GF(2). `matrix[out][in]` selects input bit `in`. */
export type AffineXorForm = {
  readonly kind: 'affine_xor';
  readonly nInputBits: number;
  readonly nOutputBits: number;
  readonly matrix: readonly (readonly Bit[])[];
  readonly offsetBits: readonly Bit[];
  readonly name: string;
};

/** Callable that is only materialized when lowered to a lookup table. */
export type CompilableFunctionForm = {
  readonly kind: 'callable';
  readonly nInputBits: number;
  readonly nOutputBits: number;
  readonly fn: (x: number) => number;
  readonly name: string;
};

export type FunctionForm = LookupTableForm | AffineXorForm | CompilableFunctionForm;

type FormInit<F extends FunctionForm> = Omit<F, 'kind' | 'name'> & { name?: string };

/**
 * Builds a frozen table form. The table is copied and not validated here;
 * `validateLookupTable` or compilation checks it.
 *
 * @param init - Widths, the `input -> output` table and an optional name (default `"lut"`).
 * @returns The frozen form.
 */
export function lookupTableForm({
  nInputBits, nOutputBits, table, name = 'lut',
}: FormInit<LookupTableForm>): LookupTableForm {
  const form: LookupTableForm = { kind: 'lookup_table', nInputBits, nOutputBits, table: new Map(table), name };
  return Object.freeze(form);
}

/**
 * @param init - `matrix[outBit][inBit]` and `offsetBits[outBit]`, all 0/1; both are copied.
 * @returns The frozen form for `y = A·x ⊕ b`.
 */
export function affineXorForm({
  nInputBits, nOutputBits, matrix, offsetBits, name = 'affine_xor',
}: FormInit<AffineXorForm>): AffineXorForm {
  const form: AffineXorForm = {
    kind: 'affine_xor',
    nInputBits,
    nOutputBits,
    matrix: matrix.map(row => [...row]),
    offsetBits: [...offsetBits],
    name,
  };
  return Object.freeze(form);
}

/** Wraps a callable; it is enumerated only when the form is lowered to a table. */
export function compilableFunctionForm({
  nInputBits, nOutputBits, fn, name = 'callable_fn',
}: FormInit<CompilableFunctionForm>): CompilableFunctionForm {
  const form: CompilableFunctionForm = { kind: 'callable', nInputBits, nOutputBits, fn, name };
  return Object.freeze(form);
}

/**
 * Strict: the table must have exactly 2^nInputBits entries, every key in
 * [0, 2^nInputBits) and every value in [0, 2^nOutputBits).
 */
export function validateLookupTable(form: LookupTableForm): void {
  validateWidths(form);

  const nEntries = 2 ** form.nInputBits;
  const maxOut = 2 ** form.nOutputBits;

  if (form.table.size !== nEntries) {
    throw new MalformedTableError(
      `LookupTableForm "${form.name}" requires full table of size ${nEntries}, got ${form.table.size}`
    );
  }

  for (const [key, value] of form.table) {
    if (!Number.isInteger(key) || key < 0 || key >= nEntries) {
      throw new MalformedTableError(`Input key ${key} outside nInputBits=${form.nInputBits}`);
    }
    if (!Number.isInteger(value) || value < 0 || value >= maxOut) {
      throw new MalformedTableError(`Output value ${value} outside nOutputBits=${form.nOutputBits}`);
    }
  }
}

export function validateAffineXor(form: AffineXorForm): void {
  validateWidths(form);

  if (form.matrix.length !== form.nOutputBits) {
    throw new MalformedTableError('Matrix row count must match nOutputBits');
  }
  if (form.offsetBits.length !== form.nOutputBits) {
    throw new MalformedTableError('offsetBits length must match nOutputBits');
  }
  for (const row of form.matrix) {
    if (row.length !== form.nInputBits) {
      throw new MalformedTableError('Each matrix row length must match nInputBits');
    }
    if (!row.every(isBit)) {
      throw new MalformedTableError('Affine matrix entries must be 0/1');
    }
  }
  if (!form.offsetBits.every(isBit)) {
    throw new MalformedTableError('offsetBits entries must be 0/1');
  }
}

export function evaluateAffineXor(form: AffineXorForm, x: number): number {
  validateAffineXor(form);

  const maxX = 2 ** form.nInputBits;
  if (!Number.isInteger(x) || x < 0 || x >= maxX) {
    throw new OutOfRangeError(`x=${x} outside nInputBits=${form.nInputBits}`, x, maxX);
  }

  let out = 0;
  form.matrix.forEach((row, outBit) => {
    let bit: number = form.offsetBits[outBit];
    row.forEach((coeff, inBit) => {
      if (coeff === 1) bit ^= (x >>> inBit) & 1;
    });
    if (bit) out |= 1 << outBit;
  });

  return out;
}

export function affineToLookupTable(form: AffineXorForm): LookupTableForm {
  validateAffineXor(form);

  const table = new Map<number, number>();
  for (let x = 0; x < 2 ** form.nInputBits; x++) {
    table.set(x, evaluateAffineXor(form, x));
  }

  return lookupTableForm({
    nInputBits: form.nInputBits,
    nOutputBits: form.nOutputBits,
    table,
    name: `${form.name}_as_lut`,
  });
}

/**
 * Enumerates the whole input domain of `form.fn`. Refused when enumeration
 * is disabled or the domain is wider than `config.maxTruthTableInputBits`.
 */
export function callableToLookupTable(
  form: CompilableFunctionForm,
  config: SynthConfig = DEFAULT_SYNTH_CONFIG,
): LookupTableForm {
  if (!config.allowCallableEnumeration) {
    throw new ConfigurationError('Callable enumeration disabled in SynthConfig');
  }
  if (form.nInputBits > config.maxTruthTableInputBits) {
    throw new ConfigurationError(
      `nInputBits=${form.nInputBits} exceeds configured maximum ${config.maxTruthTableInputBits}`
    );
  }
  validateWidths(form);

  const maxOut = 2 ** form.nOutputBits;
  const table = new Map<number, number>();

  for (let x = 0; x < 2 ** form.nInputBits; x++) {
    const y = form.fn(x);
    if (!Number.isInteger(y) || y < 0 || y >= maxOut) {
      throw new OutOfRangeError(
        `Callable "${form.name}" produced y=${y} for x=${x}, outside nOutputBits=${form.nOutputBits}`,
        y,
        maxOut,
      );
    }
    table.set(x, y);
  }

  return lookupTableForm({
    nInputBits: form.nInputBits,
    nOutputBits: form.nOutputBits,
    table,
    name: `${form.name}_enumerated`,
  });
}

export function toLookupTable(form: FunctionForm, config?: SynthConfig): LookupTableForm {
  switch (form.kind) {
    case 'lookup_table':
      validateLookupTable(form);
      return form;
    case 'affine_xor':
      return affineToLookupTable(form);
    case 'callable':
      return callableToLookupTable(form, config);
  }
}

function validateWidths(form: FunctionForm) {
  for (const [label, bits] of [['nInputBits', form.nInputBits], ['nOutputBits', form.nOutputBits]] as const) {
    if (!Number.isInteger(bits) || bits < 0 || bits > MAX_REGISTER_BITS) {
      throw new ConfigurationError(
        `${label} of "${form.name}" must be an integer in [0, ${MAX_REGISTER_BITS}], got ${bits}`
      );
    }
  }
}

function isBit(value: number): value is Bit {
  return value === 0 || value === 1;
}
