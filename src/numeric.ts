/**
 * Integer width bookkeeping.
 *
 * Integers are stored in the narrowest of three representations that holds
 * them exactly, so an overflow check only has to look at the tag.
 */

export type IntegerWidth = 'int32' | 'int64' | 'bigint';

export type IntegerRepr =
  | { width: 'int32'; value: number }
  | { width: 'int64'; value: bigint }
  | { width: 'bigint'; value: bigint };

export const INT32_MIN = -(2n ** 31n);
export const INT32_MAX = 2n ** 31n - 1n;
export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

/**
 * Number of bits a two's complement representation of `value` needs,
 * sign bit included.
 *
 * effectiveBitCount(2147483647n) === 32
 * effectiveBitCount(2147483648n) === 33
 * effectiveBitCount(-(2n ** 63n)) === 64
 */
export function effectiveBitCount(value: bigint): number {
  const magnitude = value < 0n ? ~value : value;
  const bits = magnitude === 0n ? 0 : magnitude.toString(2).length;
  return bits + 1;
}

export function fitsInInt32(value: bigint): boolean {
  return value >= INT32_MIN && value <= INT32_MAX;
}

export function fitsInInt64(value: bigint): boolean {
  return value >= INT64_MIN && value <= INT64_MAX;
}

export function narrowInteger(value: bigint): IntegerRepr {
  if (fitsInInt32(value)) {
    return { width: 'int32', value: Number(value) };
  }
  if (fitsInInt64(value)) {
    return { width: 'int64', value };
  }
  return { width: 'bigint', value };
}

export function widenInteger(repr: IntegerRepr): bigint {
  return repr.width === 'int32' ? BigInt(repr.value) : repr.value;
}

/**
 * Whether converting to a double and back gives the same integer.
 */
export function fitsExactlyInDouble(value: bigint): boolean {
  // 52 bits of mantissa plus the sign
  if (effectiveBitCount(value) <= 52) {
    return true;
  }
  const approximated = Number(value);
  return Number.isFinite(approximated) && BigInt(approximated) === value;
}
