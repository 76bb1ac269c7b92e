import compileFunctionForm from './compileFunctionForm';
import { DEFAULT_SYNTH_CONFIG, type SynthConfig } from './config';
import { OutOfRangeError, ShapeError } from './errors';
import { assertFixedPointWidths, bitsForRange, decodeSignedFixed, decodeUint, encodeSignedFixed, encodeUint } from './fixedPoint';
import { compilableFunctionForm } from './functionForms';
import { log } from './log';
import type { ReversibleCircuit } from './reversibleCircuit';
import { assertDimension, range } from './utils';

export type EntryFunction = (row: number, col: number) => number;

/**
 * Classical entry oracle O_A: (row, col) → A[row, col] as a signed
 * fixed-point bit string of `valueBits` bits, `fracBits` of them
 * fractional. Every entry is encoded when the oracle is built, so a value
 * that does not fit fails construction with `OverflowError`.
 */
export class EntryBinaryOracle {
  private constructor(
    readonly nRows: number,
    readonly nCols: number,
    readonly valueBits: number,
    readonly fracBits: number,
    readonly table: readonly (readonly string[])[],
  ) {}

  /**
   * Tabulates `entryFn` over every `(row, col)` of an `nRows` x `nCols` matrix.
   *
   * @param valueBits - Total width of each entry, in `[1, MAX_CODEC_BITS]`.
   * @param fracBits - Fractional bits of each entry.
   * @param entryFn - Called once per entry, row-major.
   * @returns The oracle holding every encoded entry.
   * @throws {ShapeError} If a dimension is not a positive integer.
   * @throws {ConfigurationError} If `valueBits` or `fracBits` is out of bounds.
   * @throws {OverflowError} If an entry does not fit the fixed-point format.
   */
  static fromFunction(
    nRows: number,
    nCols: number,
    valueBits: number,
    fracBits: number,
    entryFn: EntryFunction,
  ): EntryBinaryOracle {
    assertDimension(nRows, 'nRows');
    assertDimension(nCols, 'nCols');

    assertFixedPointWidths(valueBits, fracBits);

    const table = range(nRows).map(row => range(nCols).map(col =>
      encodeSignedFixed(entryFn(row, col), valueBits, fracBits)
    ));
    log.oracle('entry oracle %dx%d, Q%d.%d', nRows, nCols, valueBits - fracBits, fracBits);

    return new EntryBinaryOracle(nRows, nCols, valueBits, fracBits, table);
  }

  static fromDense(matrix: readonly (readonly number[])[], valueBits: number, fracBits: number): EntryBinaryOracle {
    if (matrix.length === 0 || matrix[0].length === 0) {
      throw new ShapeError('Matrix must be non-empty');
    }

    const nCols = matrix[0].length;
    matrix.forEach((row, i) => {
      if (row.length !== nCols) {
        throw new ShapeError(`Matrix must be rectangular: row ${i} has ${row.length} columns, expected ${nCols}`);
      }
    });

    return EntryBinaryOracle.fromFunction(matrix.length, nCols, valueBits, fracBits, (i, j) => matrix[i][j]);
  }

  lookupBits(row: number, col: number): string {
    if (!Number.isInteger(row) || row < 0 || row >= this.nRows) {
      throw new OutOfRangeError(`Row ${row} outside [0, ${this.nRows})`, row, this.nRows);
    }
    if (!Number.isInteger(col) || col < 0 || col >= this.nCols) {
      throw new OutOfRangeError(`Column ${col} outside [0, ${this.nCols})`, col, this.nCols);
    }

    return this.table[row][col];
  }

  lookupValue(row: number, col: number): number {
    return decodeSignedFixed(this.lookupBits(row, col), this.fracBits);
  }

  /** Truth table keyed `row ‖ col` bits, valued by the fixed-point code. */
  compileTruthTable(): Map<string, string> {
    const rowBits = bitsForRange(this.nRows);
    const colBits = bitsForRange(this.nCols);
    const compiled = new Map<string, string>();

    this.table.forEach((codes, row) => {
      codes.forEach((code, col) => {
        compiled.set(encodeUint(row, rowBits) + encodeUint(col, colBits), code);
      });
    });

    return compiled;
  }

  /**
   * Synthesizes (row ‖ col) → raw two's-complement code, col in the low
   * bits. Codes outside the matrix map to 0.
   */
  compileReversibleCircuit(config: SynthConfig = DEFAULT_SYNTH_CONFIG): ReversibleCircuit {
    const colBits = bitsForRange(this.nCols);
    const colMask = 2 ** colBits - 1;

    const form = compilableFunctionForm({
      nInputBits: bitsForRange(this.nRows) + colBits,
      nOutputBits: this.valueBits,
      fn: x => {
        const col = x & colMask;
        const row = x >>> colBits;
        return row < this.nRows && col < this.nCols ? decodeUint(this.table[row][col]) : 0;
      },
      name: 'entry_oracle',
    });

    return compileFunctionForm(form, config);
  }
}
