import { expect } from "chai";

import {
  affineToLookupTable,
  affineXorForm,
  callableToLookupTable,
  compilableFunctionForm,
  evaluateAffineXor,
  lookupTableForm,
  toLookupTable,
  validateAffineXor,
  validateLookupTable,
  type Bit,
} from '../src/ts/functionForms';
import { synthConfig } from '../src/ts/config';
import { ConfigurationError, MalformedTableError, OutOfRangeError } from '../src/ts/errors';

describe("Lookup table forms", () => {
  it("accepts a complete table", () => {
    const form = lookupTableForm({
      nInputBits: 1,
      nOutputBits: 2,
      table: new Map([[0, 3], [1, 2]]),
    });

    expect(() => validateLookupTable(form)).not.to.throw();
    expect(form.name).to.equal("lut");
  });

  it("rejects incomplete tables", () => {
    const form = lookupTableForm({ nInputBits: 2, nOutputBits: 1, table: new Map([[0, 0], [1, 1], [2, 0]]) });
    expect(() => validateLookupTable(form)).to.throw(MalformedTableError, "size 4, got 3");
  });

  it("rejects keys outside the input width", () => {
    const form = lookupTableForm({ nInputBits: 1, nOutputBits: 1, table: new Map([[0, 0], [2, 1]]) });
    expect(() => validateLookupTable(form)).to.throw(MalformedTableError, "Input key 2");
  });

  it("rejects values outside the output width", () => {
    const form = lookupTableForm({ nInputBits: 1, nOutputBits: 1, table: new Map([[0, 0], [1, 2]]) });
    expect(() => validateLookupTable(form)).to.throw(MalformedTableError, "Output value 2");
  });

  it("is not affected by later changes to the source map", () => {
    const table = new Map([[0, 1], [1, 0]]);
    const form = lookupTableForm({ nInputBits: 1, nOutputBits: 1, table });
    table.set(1, 1);

    expect(form.table.get(1)).to.equal(0);
  });
});

describe("Affine XOR forms", () => {
  const form = affineXorForm({
    nInputBits: 3,
    nOutputBits: 2,
    matrix: [[1, 0, 1], [0, 1, 0]],
    offsetBits: [0, 1],
    name: "affine_test",
  });

  it("evaluates y = A·x ⊕ b bit by bit", () => {
    // x = 0b101: y0 = 1 ^ 1 = 0, y1 = 1 ^ 0 = 1
    expect(evaluateAffineXor(form, 0b101)).to.equal(0b10);
    // x = 0b011: y0 = 1 ^ 0 = 1, y1 = 1 ^ 1 = 0
    expect(evaluateAffineXor(form, 0b011)).to.equal(0b01);
    expect(evaluateAffineXor(form, 0)).to.equal(0b10);
  });

  it("rejects inputs outside the domain", () => {
    expect(() => evaluateAffineXor(form, 8)).to.throw(OutOfRangeError);
    expect(() => evaluateAffineXor(form, -1)).to.throw(OutOfRangeError);
  });

  it("lowers to a full lookup table", () => {
    const lut = affineToLookupTable(form);

    expect(lut.name).to.equal("affine_test_as_lut");
    expect(lut.table.size).to.equal(8);
    expect(lut.table.get(0b101)).to.equal(0b10);
    expect(() => validateLookupTable(lut)).not.to.throw();
  });

  it("rejects mismatched dimensions", () => {
    const bad = affineXorForm({ nInputBits: 2, nOutputBits: 1, matrix: [[1, 0, 1]], offsetBits: [0] });
    expect(() => validateAffineXor(bad)).to.throw(MalformedTableError, "row length");

    const badOffset = affineXorForm({ nInputBits: 1, nOutputBits: 1, matrix: [[1]], offsetBits: [] });
    expect(() => validateAffineXor(badOffset)).to.throw(MalformedTableError, "offsetBits length");
  });

  it("validates the form before evaluating it", () => {
    const wide = affineXorForm({
      nInputBits: 40,
      nOutputBits: 1,
      matrix: [Array.from({ length: 40 }, (_, i): Bit => (i === 35 ? 1 : 0))],
      offsetBits: [0],
    });
    expect(() => evaluateAffineXor(wide, 2 ** 35)).to.throw(ConfigurationError, "nInputBits");

    const shortOffset = affineXorForm({ nInputBits: 2, nOutputBits: 2, matrix: [[1, 0], [0, 1]], offsetBits: [1] });
    expect(() => evaluateAffineXor(shortOffset, 0b01)).to.throw(MalformedTableError, "offsetBits length");
  });
});

describe("Callable forms", () => {
  const xorConst = compilableFunctionForm({
    nInputBits: 2,
    nOutputBits: 2,
    fn: x => x ^ 0b01,
    name: "xor_const",
  });

  it("enumerates the whole domain", () => {
    const lut = callableToLookupTable(xorConst);

    expect(lut.name).to.equal("xor_const_enumerated");
    expect([...lut.table.entries()]).to.deep.equal([[0, 1], [1, 0], [2, 3], [3, 2]]);
  });

  it("refuses to enumerate when disabled", () => {
    const config = synthConfig({ allowCallableEnumeration: false });
    expect(() => callableToLookupTable(xorConst, config)).to.throw(ConfigurationError, "disabled");
  });

  it("refuses domains wider than the configured ceiling", () => {
    const wide = compilableFunctionForm({ nInputBits: 13, nOutputBits: 1, fn: () => 0 });
    expect(() => callableToLookupTable(wide)).to.throw(ConfigurationError, "exceeds configured maximum 12");
  });

  it("fails on the first out-of-range output", () => {
    const seen: number[] = [];
    const bad = compilableFunctionForm({
      nInputBits: 2,
      nOutputBits: 2,
      fn: x => {
        seen.push(x);
        return x === 1 ? 4 : 0;
      },
    });

    expect(() => callableToLookupTable(bad)).to.throw(OutOfRangeError, "y=4");
    expect(seen).to.deep.equal([0, 1]);
  });

  it("lowers every kind through toLookupTable", () => {
    expect(toLookupTable(xorConst).table.get(2)).to.equal(3);
    expect(toLookupTable(affineXorForm({ nInputBits: 1, nOutputBits: 1, matrix: [[1]], offsetBits: [1] }))
      .table.get(1)).to.equal(0);
  });
});
