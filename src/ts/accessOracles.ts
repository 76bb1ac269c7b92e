import compileFunctionForm from './compileFunctionForm';
import { DEFAULT_SYNTH_CONFIG, type SynthConfig } from './config';
import { OutOfRangeError } from './errors';
import { bitsForRange, encodeUint } from './fixedPoint';
import { compilableFunctionForm } from './functionForms';
import { log } from './log';
import type { ReversibleCircuit } from './reversibleCircuit';
import { assertDimension, range } from './utils';

/** Generating function: (index, slot) → target index. */
export type SlotFunction = (index: number, slot: number) => number;

/**
 * Classical oracle (index, slot) → target. The table is total over
 * [0, indexDim) × [0, slots) and built once by the factory.
 */
abstract class SlotAccessOracle {
  protected constructor(
    private readonly indexDim: number,
    private readonly slots: number,
    private readonly targetDim: number,
    readonly table: readonly (readonly number[])[],
    private readonly circuitName: string,
  ) {}

  lookup(index: number, slot: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.indexDim) {
      throw new OutOfRangeError(`Index ${index} outside [0, ${this.indexDim})`, index, this.indexDim);
    }
    if (!Number.isInteger(slot) || slot < 0 || slot >= this.slots) {
      throw new OutOfRangeError(`Slot ${slot} outside [0, ${this.slots})`, slot, this.slots);
    }

    return this.table[index][slot];
  }

  /** Bit-string truth table keyed `index ‖ slot`, valued by the target index. */
  compileTruthTable(): Map<string, string> {
    const indexBits = bitsForRange(this.indexDim);
    const slotBits = bitsForRange(this.slots);
    const targetBits = bitsForRange(this.targetDim);
    const compiled = new Map<string, string>();

    this.table.forEach((targets, index) => {
      targets.forEach((target, slot) => {
        compiled.set(
          encodeUint(index, indexBits) + encodeUint(slot, slotBits),
          encodeUint(target, targetBits),
        );
      });
    });

    return compiled;
  }

  /**
   * Packs (index, slot) into one input register, slot in the low bits, and
   * synthesizes the lookup. Packed codes naming no entry of the domain
   * (non power-of-two dimensions) map to 0.
   */
  compileReversibleCircuit(config: SynthConfig = DEFAULT_SYNTH_CONFIG): ReversibleCircuit {
    const slotBits = bitsForRange(this.slots);
    const indexBits = bitsForRange(this.indexDim);
    const slotMask = 2 ** slotBits - 1;

    const form = compilableFunctionForm({
      nInputBits: indexBits + slotBits,
      nOutputBits: bitsForRange(this.targetDim),
      fn: x => {
        const slot = x & slotMask;
        const index = x >>> slotBits;
        return index < this.indexDim && slot < this.slots ? this.table[index][slot] : 0;
      },
      name: this.circuitName,
    });

    return compileFunctionForm(form, config);
  }
}

function buildSlotTable(
  indexDim: number,
  slots: number,
  targetDim: number,
  fn: SlotFunction,
  label: string,
): number[][] {
  return range(indexDim).map(index => range(slots).map(slot => {
    const target = fn(index, slot);
    if (!Number.isInteger(target) || target < 0 || target >= targetDim) {
      throw new OutOfRangeError(
        `${label} produced invalid index ${target} at (${index}, ${slot}); expected [0, ${targetDim})`,
        target,
        targetDim,
      );
    }
    return target;
  }));
}

/** Row-access oracle O_r: (row, slot) → column of the slot-th nonzero in the row. */
export class RowAccessOracle extends SlotAccessOracle {
  private constructor(
    readonly nRows: number,
    readonly nCols: number,
    readonly maxRowNnz: number,
    table: readonly (readonly number[])[],
  ) {
    super(nRows, maxRowNnz, nCols, table, 'row_access_oracle');
  }

  /**
   * @param maxRowNnz - Slots per row; `rowToColFn` is called for each one.
   * @param rowToColFn - Maps `(row, slot)` to a column in `[0, nCols)`.
   * @throws {ShapeError} If a dimension is not a positive integer.
   * @throws {OutOfRangeError} On the first column outside `[0, nCols)`.
   */
  static fromFunction(
    nRows: number,
    nCols: number,
    maxRowNnz: number,
    rowToColFn: SlotFunction,
  ): RowAccessOracle {
    assertDimension(nRows, 'nRows');
    assertDimension(nCols, 'nCols');
    assertDimension(maxRowNnz, 'maxRowNnz');

    const table = buildSlotTable(nRows, maxRowNnz, nCols, rowToColFn, 'Row oracle');
    log.oracle('row oracle %dx%d, %d slots per row', nRows, nCols, maxRowNnz);

    return new RowAccessOracle(nRows, nCols, maxRowNnz, table);
  }
}

/** Column-access oracle O_c: (col, slot) → row of the slot-th nonzero in the column. */
export class ColAccessOracle extends SlotAccessOracle {
  private constructor(
    readonly nRows: number,
    readonly nCols: number,
    readonly maxColNnz: number,
    table: readonly (readonly number[])[],
  ) {
    super(nCols, maxColNnz, nRows, table, 'col_access_oracle');
  }

  /**
   * Same as `RowAccessOracle.fromFunction` with rows and columns swapped:
   * `colToRowFn(col, slot)` must return a row in `[0, nRows)`.
   */
  static fromFunction(
    nRows: number,
    nCols: number,
    maxColNnz: number,
    colToRowFn: SlotFunction,
  ): ColAccessOracle {
    assertDimension(nRows, 'nRows');
    assertDimension(nCols, 'nCols');
    assertDimension(maxColNnz, 'maxColNnz');

    const table = buildSlotTable(nCols, maxColNnz, nRows, colToRowFn, 'Col oracle');
    log.oracle('col oracle %dx%d, %d slots per column', nRows, nCols, maxColNnz);

    return new ColAccessOracle(nRows, nCols, maxColNnz, table);
  }
}
