import { expect } from "chai";

import { FullDataLoadingAmplitudeOracle } from '../src/ts/amplitudeOracle';
import { EntryBinaryOracle } from '../src/ts/entryOracle';
import { ConfigurationError, OverflowError, ShapeError } from '../src/ts/errors';

const matrix = [
  [0.5, -0.25],
  [0.0, 0.125],
];

describe("Entry oracle", () => {
  const entry = EntryBinaryOracle.fromDense(matrix, 10, 8);

  it("loads every entry as a signed fixed-point code", () => {
    expect(entry.lookupValue(1, 1)).to.be.closeTo(0.125, 1e-9);
    expect(entry.lookupValue(0, 1)).to.equal(-0.25);
    expect(entry.lookupBits(0, 1)).to.equal("1111000000");
    expect(entry.lookupBits(0, 1)[0]).to.equal("1");
  });

  it("rejects empty and ragged matrices", () => {
    expect(() => EntryBinaryOracle.fromDense([], 10, 8)).to.throw(ShapeError);
    expect(() => EntryBinaryOracle.fromDense([[]], 10, 8)).to.throw(ShapeError);
    expect(() => EntryBinaryOracle.fromDense([[1, 2], [3]], 10, 8)).to.throw(ShapeError, "rectangular");
  });

  it("rejects values that overflow the fixed-point width at construction", () => {
    expect(() => EntryBinaryOracle.fromDense([[0.5, 4]], 10, 8)).to.throw(OverflowError);
  });

  it("rejects invalid widths", () => {
    expect(() => EntryBinaryOracle.fromDense(matrix, 0, 0)).to.throw(ConfigurationError);
    expect(() => EntryBinaryOracle.fromDense(matrix, 10, -1)).to.throw(ConfigurationError);
    expect(() => EntryBinaryOracle.fromDense(matrix, 54, 0)).to.throw(ConfigurationError, "totalBits");
  });

  it("compiles a truth table keyed row ‖ col", () => {
    const compiled = entry.compileTruthTable();

    expect([...compiled.keys()]).to.deep.equal(["00", "01", "10", "11"]);
    expect(compiled.get("01")).to.equal("1111000000");
    expect(compiled.get("11")).to.equal("0000100000");
  });

  it("synthesizes the raw codes into a reversible circuit", () => {
    // 1 -> "01", -1 -> "11"; packed x = row << 1 | col
    const small = EntryBinaryOracle.fromDense([[1, -1]], 2, 0);
    const circ = small.compileReversibleCircuit();

    expect(circ.nInputBits).to.equal(2);
    expect(circ.nOutputBits).to.equal(2);
    expect(circ.metadata.source).to.equal("entry_oracle_enumerated");
    expect(circ.operations).to.have.length(11);
    expect(circ.estimateCost().toffoliCount).to.equal(3);
  });
});

describe("Full data-loading amplitude oracle", () => {
  const entry = EntryBinaryOracle.fromDense(matrix, 10, 8);
  const amplitude = new FullDataLoadingAmplitudeOracle(entry, 1.0);

  it("encodes negative entries with phase π", () => {
    const amp = amplitude.encode(0, 1);

    expect(amp.value).to.equal(-0.25);
    expect(amp.normalizedAbs).to.be.closeTo(0.25, 1e-12);
    expect(amp.phase).to.be.closeTo(Math.PI, 1e-12);
    expect(amp.theta).to.be.closeTo(Math.PI / 3, 1e-12);
  });

  it("encodes non-negative entries with phase 0", () => {
    const amp = amplitude.encode(0, 0);

    expect(amp.phase).to.equal(0);
    expect(amp.theta).to.be.closeTo(Math.PI / 2, 1e-12);
    expect(amplitude.encode(1, 0)).to.deep.equal({ value: 0, normalizedAbs: 0, theta: 0, phase: 0 });
  });

  it("clamps the normalised magnitude at 1", () => {
    const amp = new FullDataLoadingAmplitudeOracle(entry, 0.25).encode(0, 0);

    expect(amp.normalizedAbs).to.equal(1);
    expect(amp.theta).to.be.closeTo(Math.PI, 1e-12);
  });

  it("keeps theta in [0, π] and phase in {0, π} for every entry", () => {
    for (const alpha of [0.1, 0.5, 1, 3]) {
      const oracle = new FullDataLoadingAmplitudeOracle(entry, alpha);

      for (let row = 0; row < 2; row++) {
        for (let col = 0; col < 2; col++) {
          const amp = oracle.encode(row, col);
          expect(amp.theta).to.be.within(0, Math.PI);
          expect(amp.normalizedAbs).to.be.within(0, 1);
          expect([0, Math.PI]).to.include(amp.phase);
        }
      }
    }
  });

  it("requires a positive alpha", () => {
    expect(() => new FullDataLoadingAmplitudeOracle(entry, 0).encode(0, 0)).to.throw(ConfigurationError);
    expect(() => new FullDataLoadingAmplitudeOracle(entry, -1).encode(0, 0)).to.throw(ConfigurationError);
  });
});
