import { ShapeError } from './errors';

/**
 * The integers 0, 1, .., limit - 1.
 */
export function range(limit: number): number[] {
  let res: number[] = [];

  for (let i = 0; i < limit; i++) {
    res.push(i);
  }

  return res;
}

export function assertDimension(value: number, what: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ShapeError(`${what} must be a positive integer, got ${value}`);
  }
}
