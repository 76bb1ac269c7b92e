import type { EntryBinaryOracle } from './entryOracle';
import { ConfigurationError } from './errors';

/**
 * Rotation/phase data for one matrix entry. `theta` lies in [0, π] and
 * `phase` is 0 for non-negative values, π otherwise.
 */
export type AmplitudeEncoding = {
  readonly value: number;
  readonly normalizedAbs: number;
  readonly theta: number;
  readonly phase: number;
};

/**
 * "Full data-loading" amplitude oracle: every entry is loaded classically
 * as a fixed-point code, then mapped to rotation and phase data with
 * normalisation constant `alpha`.
 */
export class FullDataLoadingAmplitudeOracle {
  constructor(
    readonly entryOracle: EntryBinaryOracle,
    readonly alpha: number,
  ) {}

  encode(row: number, col: number): AmplitudeEncoding {
    if (!(this.alpha > 0)) {
      throw new ConfigurationError(`alpha must be positive, got ${this.alpha}`);
    }

    const value = this.entryOracle.lookupValue(row, col);
    const normalizedAbs = Math.min(Math.abs(value) / this.alpha, 1);

    return {
      value,
      normalizedAbs,
      theta: 2 * Math.asin(Math.sqrt(normalizedAbs)),
      phase: value >= 0 ? 0 : Math.PI,
    };
  }
}
