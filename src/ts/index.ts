export { default as compileFunctionForm, compileAffineXor, compileLookupTable } from './compileFunctionForm';
export * from './accessOracles';
export * from './amplitudeOracle';
export * from './config';
export * from './entryOracle';
export * from './errors';
export * from './fixedPoint';
export * from './functionForms';
export * from './querySchedule';
export * from './reversibleCircuit';
export * from './sparseBlockEncoding';
export type * from './types';
