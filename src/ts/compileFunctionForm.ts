import { DEFAULT_SYNTH_CONFIG, type SynthConfig } from './config';
import { UnsupportedFormTypeError } from './errors';
import {
  type AffineXorForm,
  type FunctionForm,
  type LookupTableForm,
  callableToLookupTable,
  validateAffineXor,
  validateLookupTable,
} from './functionForms';
import { log } from './log';
import {
  ReversibleCircuit,
  type Polarity,
  type ReversibleOp,
  type SynthesisMethod,
} from './reversibleCircuit';
import { range } from './utils';

/**
 * Compile any function form into a reversible circuit on the packed
 * |x⟩|0⟩ layout. Affine forms take the CNOT/X path; lookup tables and
 * enumerated callables take the sum-of-minterms path.
 */
export default function compileFunctionForm(
  form: FunctionForm,
  config: SynthConfig = DEFAULT_SYNTH_CONFIG,
): ReversibleCircuit {
  switch (form.kind) {
    case 'affine_xor':
      return compileAffineXor(form);
    case 'lookup_table':
      return compileLookupTable(form);
    case 'callable':
      return compileLookupTable(callableToLookupTable(form, config));

    default: {
      const unknownForm: never = form;
      throw new UnsupportedFormTypeError(formKind(unknownForm));
    }
  }
}

/**
 * Baseline sum-of-minterms synthesis. For every output bit and every input
 * assignment that sets it, flip the zero-valued input wires, fire one
 * gate controlled on all inputs, then flip those wires back.
 */
export function compileLookupTable(form: LookupTableForm): ReversibleCircuit {
  validateLookupTable(form);

  const ops: ReversibleOp[] = [];
  const nInputs = form.nInputBits;
  const inputWires = range(nInputs);
  const keys = [...form.table.keys()].sort((a, b) => a - b);

  for (let outBit = 0; outBit < form.nOutputBits; outBit++) {
    const target = nInputs + outBit;
    const minterms = keys.filter(x => ((lookup(form, x) >>> outBit) & 1) === 1);

    for (const x of minterms) {
      const zeroControlWires = inputWires.filter(wire => ((x >>> wire) & 1) === 0);

      withNegativeControls(ops, zeroControlWires, () => {
        ops.push(controlledX(inputWires, target));
      });
    }
  }

  return finish(form, ops, 'sum_of_minterms');
}

/** Linear CNOT/X network: no multi-controlled gates, hence no T cost. */
export function compileAffineXor(form: AffineXorForm): ReversibleCircuit {
  validateAffineXor(form);

  const ops: ReversibleOp[] = [];

  form.matrix.forEach((row, outBit) => {
    const target = form.nInputBits + outBit;

    if (form.offsetBits[outBit] === 1) {
      ops.push({ gate: 'x', target });
    }

    row.forEach((coeff, inBit) => {
      if (coeff === 1) {
        ops.push({ gate: 'cx', control: inBit, polarity: 1, target });
      }
    });
  });

  return finish(form, ops, 'affine_xor');
}

/**
 * X-conjugates `wires` around `emit` so positive-control gates act as
 * negative controls on them. The wires are restored, in reverse order,
 * however `emit` exits.
 */
function withNegativeControls(ops: ReversibleOp[], wires: readonly number[], emit: () => void) {
  for (const wire of wires) {
    ops.push({ gate: 'x', target: wire });
  }

  try {
    emit();
  } finally {
    for (let i = wires.length - 1; i >= 0; i--) {
      ops.push({ gate: 'x', target: wires[i] });
    }
  }
}

function controlledX(controls: readonly number[], target: number): ReversibleOp {
  switch (controls.length) {
    case 0:
      return { gate: 'x', target };
    case 1:
      return { gate: 'cx', control: controls[0], polarity: 1, target };
    default:
      return {
        gate: 'mcx',
        controls: [...controls],
        polarities: controls.map((): Polarity => 1),
        target,
      };
  }
}

function finish(
  form: LookupTableForm | AffineXorForm,
  operations: ReversibleOp[],
  method: SynthesisMethod,
) {
  log.compile('%s via %s: %d ops on %d+%d wires',
    form.name, method, operations.length, form.nInputBits, form.nOutputBits);

  return new ReversibleCircuit({
    nInputBits: form.nInputBits,
    nOutputBits: form.nOutputBits,
    operations,
    metadata: { source: form.name, method },
  });
}

function lookup(form: LookupTableForm, x: number): number {
  const y = form.table.get(x);
  return y === undefined ? 0 : y;
}

function formKind(form: unknown): unknown {
  if (typeof form === 'object' && form !== null && 'kind' in form) {
    return form.kind;
  }

  return form;
}
