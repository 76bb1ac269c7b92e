import { UnsupportedGateError } from './errors';
import { log } from './log';

/** Whether a control fires when its wire is 0 or 1. */
export type Polarity = 0 | 1;

export type ReversibleOp =
  | { readonly gate: 'x'; readonly target: number }
  | { readonly gate: 'cx'; readonly control: number; readonly polarity: Polarity; readonly target: number }
  | {
    readonly gate: 'mcx';
    readonly controls: readonly number[];
    readonly polarities: readonly Polarity[];
    readonly target: number;
  };

export type SynthesisMethod = 'sum_of_minterms' | 'affine_xor';

export type CircuitMetadata = {
  readonly source: string;
  readonly method: SynthesisMethod;
};

/** Logical resource counters. `ancillaPeakEstimate` is a high-water mark. */
export type GateCost = {
  readonly xCount: number;
  readonly cnotCount: number;
  readonly toffoliCount: number;
  readonly tCount: number;
  readonly tDepthEstimate: number;
  readonly ancillaPeakEstimate: number;
};

export const ZERO_GATE_COST: GateCost = Object.freeze({
  xCount: 0,
  cnotCount: 0,
  toffoliCount: 0,
  tCount: 0,
  tDepthEstimate: 0,
  ancillaPeakEstimate: 0,
});

export function addGateCost(a: GateCost, b: GateCost): GateCost {
  return {
    xCount: a.xCount + b.xCount,
    cnotCount: a.cnotCount + b.cnotCount,
    toffoliCount: a.toffoliCount + b.toffoliCount,
    tCount: a.tCount + b.tCount,
    tDepthEstimate: a.tDepthEstimate + b.tDepthEstimate,
    ancillaPeakEstimate: Math.max(a.ancillaPeakEstimate, b.ancillaPeakEstimate),
  };
}

/**
 * Toffoli count of a k-controlled X decomposed as a Toffoli ladder over
 * k - 2 borrowed ancillas.
 */
export function mcxToffoliCount(nControls: number): number {
  if (nControls <= 1) return 0;
  if (nControls === 2) return 1;
  return 2 * nControls - 3;
}

/**
 * Reversible map |x⟩|0⟩ → |x⟩|f(x)⟩.
 *
 *  wires [0, nInputBits)                         input register
 *  wires [nInputBits, nInputBits + nOutputBits)  output register, starts at 0
 */
export class ReversibleCircuit {
  readonly nInputBits: number;
  readonly nOutputBits: number;
  readonly operations: readonly ReversibleOp[];
  readonly metadata: CircuitMetadata;

  constructor({ nInputBits, nOutputBits, operations, metadata }: {
    nInputBits: number,
    nOutputBits: number,
    operations: readonly ReversibleOp[],
    metadata: CircuitMetadata,
  }) {
    this.nInputBits = nInputBits;
    this.nOutputBits = nOutputBits;
    this.operations = Object.freeze([...operations]);
    this.metadata = Object.freeze({ ...metadata });
  }

  get nQubits(): number {
    return this.nInputBits + this.nOutputBits;
  }

  get outputOffset(): number {
    return this.nInputBits;
  }

  /**
   * Folds the operations left to right. Each MCX with k controls costs
   * T(k) Toffolis at 7 T gates and T-depth 3 apiece. Ancillas are never
   * released between gates, so the peak is a running maximum of k - 2.
   */
  estimateCost(): GateCost {
    const total = this.operations.reduce(
      (acc, op) => addGateCost(acc, gateCost(op)),
      ZERO_GATE_COST,
    );

    log.cost('%s (%s): %o', this.metadata.source, this.metadata.method, total);
    return total;
  }
}

function gateCost(op: ReversibleOp): GateCost {
  switch (op.gate) {
    case 'x':
      return { ...ZERO_GATE_COST, xCount: 1 };
    case 'cx':
      return { ...ZERO_GATE_COST, cnotCount: 1 };
    case 'mcx': {
      const k = op.controls.length;
      const toffoli = mcxToffoliCount(k);
      return {
        ...ZERO_GATE_COST,
        toffoliCount: toffoli,
        tCount: 7 * toffoli,
        tDepthEstimate: Math.max(1, 3 * toffoli),
        ancillaPeakEstimate: Math.max(0, k - 2),
      };
    }

    default: {
      const unknownOp: never = op;
      throw new UnsupportedGateError(gateName(unknownOp));
    }
  }
}

function gateName(op: unknown): unknown {
  if (typeof op === 'object' && op !== null && 'gate' in op) {
    return op.gate;
  }

  return op;
}
