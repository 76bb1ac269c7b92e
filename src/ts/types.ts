/** SDK-neutral operation record handed to backend adapters. */
export type OperationRecord = Readonly<Record<string, number | string>>;

export type BlockEncodingMetadata = {
  readonly name: string;
  readonly alpha: number;
  readonly ancillaQubits: number;
  readonly logicalCostHint: Readonly<Record<string, number>>;
};

/** One query instance; `parameters` carries runtime knobs such as `row` and `slot`. */
export type BlockEncodingQuery = {
  readonly step: number;
  readonly parameters: Readonly<Record<string, number>>;
};

export interface BlockEncoding<Op extends OperationRecord = OperationRecord> {
  metadata(): BlockEncodingMetadata;
  query(request: BlockEncodingQuery): Op;
  adjointQuery(request: BlockEncodingQuery): Op;
}
