import type { BlockEncoding, BlockEncodingQuery, OperationRecord } from './types';

export type QueryCall = {
  readonly index: number;
  readonly encoding: BlockEncoding;
  readonly request: BlockEncodingQuery;
  readonly adjoint?: boolean;
};

/**
 * Ordered list of block-encoding queries. Each call may use a different
 * encoding or different parameters.
 */
export class QuerySchedule implements Iterable<QueryCall> {
  private readonly calls: QueryCall[] = [];

  append(call: QueryCall): void {
    this.calls.push(call);
  }

  get length(): number {
    return this.calls.length;
  }

  [Symbol.iterator](): Iterator<QueryCall> {
    return this.calls[Symbol.iterator]();
  }

  /** Runs every call in order and collects the operation records. */
  operations(): OperationRecord[] {
    return this.calls.map(({ encoding, request, adjoint }) =>
      adjoint ? encoding.adjointQuery(request) : encoding.query(request)
    );
  }
}
