import { ConfigurationError, OutOfRangeError, OverflowError } from './errors';

/** Widest bit string whose integer value a double holds exactly. */
export const MAX_CODEC_BITS = 53;

/** Beyond this, `2 ** fracBits` is no longer a finite double. */
export const MAX_FRAC_BITS = 1023;

/** Number of bits needed to index a domain of `size` elements (at least 1). */
export function bitsForRange(size: number): number {
  if (size <= 1) return 1;
  return Math.ceil(Math.log2(size));
}

/**
 * Encodes a non-negative integer as an MSB-first bit string.
 *
 * @param value - Integer in `[0, 2^nBits)`.
 * @param nBits - Width of the result; the string is zero-padded to it.
 * @returns The `nBits`-character bit string.
 * @throws {OutOfRangeError} If `value` is not an integer or does not fit.
 */
export function encodeUint(value: number, nBits: number): string {
  const limit = 2 ** nBits;
  if (!Number.isInteger(value) || value < 0 || value >= limit) {
    throw new OutOfRangeError(`Value ${value} cannot fit in ${nBits} bits`, value, limit);
  }
  return value.toString(2).padStart(nBits, '0');
}

/**
 * @param bits - MSB-first bit string, at most `MAX_CODEC_BITS` long.
 * @returns The unsigned integer it spells.
 * @throws {OutOfRangeError} If `bits` is empty, too long or holds anything but 0/1.
 */
export function decodeUint(bits: string): number {
  assertBitString(bits);
  return parseInt(bits, 2);
}

/**
 * Encode `value` as a `totalBits`-wide two's-complement string (MSB first)
 * with `fracBits` fractional bits.
 *
 * Scaled values are rounded half-to-even. Anything outside
 * `[-2^(totalBits-1), 2^(totalBits-1) - 1] / 2^fracBits` throws
 * `OverflowError`; nothing is clamped.
 *
 * @param value - Real value to encode.
 * @param totalBits - Width of the result, in `[1, MAX_CODEC_BITS]`.
 * @param fracBits - Fractional bits, in `[0, MAX_FRAC_BITS]`.
 * @returns The `totalBits`-character bit string.
 * @throws {ConfigurationError} If either width is out of bounds.
 * @throws {OverflowError} If the rounded value is not representable.
 */
export function encodeSignedFixed(value: number, totalBits: number, fracBits: number): string {
  assertFixedPointWidths(totalBits, fracBits);

  const scale = 2 ** fracBits;
  const minInt = -(2 ** (totalBits - 1));
  const maxInt = 2 ** (totalBits - 1) - 1;
  const scaled = roundHalfEven(value * scale);

  if (!Number.isFinite(scaled) || scaled < minInt || scaled > maxInt) {
    throw new OverflowError(value, totalBits, fracBits, minInt / scale, maxInt / scale);
  }

  const raw = scaled < 0 ? 2 ** totalBits + scaled : scaled;
  return raw.toString(2).padStart(totalBits, '0');
}

/**
 * Inverse of `encodeSignedFixed`: the two's-complement integer in `bits`
 * divided by `2^fracBits`.
 *
 * @throws {OutOfRangeError} If `bits` is empty, longer than `MAX_CODEC_BITS` or not binary.
 * @throws {ConfigurationError} If `fracBits` is out of bounds.
 */
export function decodeSignedFixed(bits: string, fracBits: number): number {
  assertBitString(bits);
  assertFixedPointWidths(bits.length, fracBits);

  let raw = parseInt(bits, 2);
  if (bits[0] === '1') {
    raw -= 2 ** bits.length;
  }

  return raw / 2 ** fracBits;
}

/**
 * @throws {ConfigurationError} Unless `totalBits` is an integer in
 * `[1, MAX_CODEC_BITS]` and `fracBits` an integer in `[0, MAX_FRAC_BITS]`.
 */
export function assertFixedPointWidths(totalBits: number, fracBits: number): void {
  if (!Number.isInteger(totalBits) || totalBits < 1 || totalBits > MAX_CODEC_BITS) {
    throw new ConfigurationError(`totalBits must be an integer in [1, ${MAX_CODEC_BITS}], got ${totalBits}`);
  }
  if (!Number.isInteger(fracBits) || fracBits < 0 || fracBits > MAX_FRAC_BITS) {
    throw new ConfigurationError(`fracBits must be an integer in [0, ${MAX_FRAC_BITS}], got ${fracBits}`);
  }
}

function roundHalfEven(x: number): number {
  const r = Math.round(x);

  // Math.round sends .5 towards +Infinity; pull odd ties back to the even side
  if (Math.abs(x % 1) === 0.5 && r % 2 !== 0) {
    return r - 1;
  }

  return r + 0; // normalise -0
}

// value: the string's length; limit: the widest string accepted
function assertBitString(bits: string) {
  if (bits.length === 0 || bits.length > MAX_CODEC_BITS) {
    throw new OutOfRangeError(
      `Bit string length ${bits.length} outside [1, ${MAX_CODEC_BITS}]`,
      bits.length,
      MAX_CODEC_BITS,
    );
  }
  if (!/^[01]+$/.test(bits)) {
    throw new OutOfRangeError(`Expected a bit string, got "${bits}"`, bits.length, MAX_CODEC_BITS);
  }
}
