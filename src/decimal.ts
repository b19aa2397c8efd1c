/** Largest |scale| still printed in plain notation; covers every double. */
const MAX_PLAIN_SCALE = 1100;

function signum(value: bigint): number {
  return value === 0n ? 0 : value < 0n ? -1 : 1;
}

/**
 * Arbitrary-precision decimal: `unscaled × 10^-scale`.
 */
export class BigDecimal {
  readonly unscaled: bigint;
  readonly scale: number;

  constructor(unscaled: bigint, scale = 0) {
    if (!Number.isInteger(scale)) {
      throw new RangeError(`Scale must be an integer: ${scale}`);
    }
    this.unscaled = unscaled;
    this.scale = scale;
  }

  private static readonly PATTERN = /^([+-])?(\d+)(?:\.(\d+))?(?:[eE]([+-]?\d+))?$/;

  /**
   * Parse plain or scientific decimal notation, e.g. `-12.5` or `3e-4`.
   */
  static parse(text: string): BigDecimal {
    const match = text.match(BigDecimal.PATTERN);
    if (!match) {
      throw new RangeError(`Not a decimal number: ${text}`);
    }
    const sign = match[1] === '-' ? '-' : '';
    const integerDigits = match[2] ?? '0';
    const fractionDigits = match[3] ?? '';
    const exponent = match[4] === undefined ? 0 : Number.parseInt(match[4], 10);
    if (!Number.isSafeInteger(exponent)) {
      throw new RangeError(`Exponent out of range: ${text}`);
    }
    const unscaled = BigInt(`${sign}${integerDigits}${fractionDigits}`);
    return new BigDecimal(unscaled, fractionDigits.length - exponent);
  }

  static fromBigInt(value: bigint): BigDecimal {
    return new BigDecimal(value, 0);
  }

  /**
   * The exact decimal value of a finite double, with no rounding.
   */
  static fromNumber(value: number): BigDecimal {
    if (!Number.isFinite(value)) {
      throw new RangeError(`Cannot represent ${value} as a decimal`);
    }
    if (value === 0) {
      return new BigDecimal(0n, 0);
    }
    const view = new DataView(new ArrayBuffer(8));
    view.setFloat64(0, value);
    const bits = view.getBigUint64(0);
    const negative = bits >> 63n === 1n;
    const biasedExponent = Number((bits >> 52n) & 0x7ffn);
    let mantissa = bits & ((1n << 52n) - 1n);
    let exponent: number;
    if (biasedExponent === 0) {
      // subnormal
      exponent = -1074;
    } else {
      mantissa |= 1n << 52n;
      exponent = biasedExponent - 1075;
    }
    while (exponent < 0 && (mantissa & 1n) === 0n) {
      mantissa >>= 1n;
      exponent += 1;
    }
    const signed = negative ? -mantissa : mantissa;
    if (exponent >= 0) {
      return new BigDecimal(signed << BigInt(exponent), 0);
    }
    // m × 2^-k == m × 5^k × 10^-k
    return new BigDecimal(signed * 5n ** BigInt(-exponent), -exponent);
  }

  /**
   * The same value with the smallest scale that keeps it exact.
   */
  stripTrailingZeros(): BigDecimal {
    if (this.unscaled === 0n) {
      return new BigDecimal(0n, 0);
    }
    let unscaled = this.unscaled;
    let scale = this.scale;
    while (unscaled % 10n === 0n) {
      unscaled /= 10n;
      scale -= 1;
    }
    return new BigDecimal(unscaled, scale);
  }

  compareTo(other: BigDecimal): number {
    const sign = signum(this.unscaled);
    const otherSign = signum(other.unscaled);
    if (sign !== otherSign) {
      return sign < otherSign ? -1 : 1;
    }
    if (sign === 0) {
      return 0;
    }
    const exponent = this.adjustedExponent();
    const otherExponent = other.adjustedExponent();
    if (exponent !== otherExponent) {
      return (exponent < otherExponent) === (sign > 0) ? -1 : 1;
    }
    // same magnitude order, so the scales differ by at most the digit counts
    const scale = Math.max(this.scale, other.scale);
    const left = this.unscaled * 10n ** BigInt(scale - this.scale);
    const right = other.unscaled * 10n ** BigInt(scale - other.scale);
    if (left === right) {
      return 0;
    }
    return left < right ? -1 : 1;
  }

  equals(other: BigDecimal): boolean {
    return this.compareTo(other) === 0;
  }

  /**
   * Nearest double to this value.
   */
  toNumber(): number {
    return Number(`${this.unscaled}e${-this.scale}`);
  }

  /** Power of ten of the leading digit. */
  private adjustedExponent(): number {
    const digits = this.unscaled < 0n ? (-this.unscaled).toString() : this.unscaled.toString();
    return digits.length - 1 - this.scale;
  }

  /**
   * Plain notation, or `<unscaled>e<exponent>` once the scale is too large to
   * print in full.
   */
  toString(): string {
    if (Math.abs(this.scale) > MAX_PLAIN_SCALE) {
      return `${this.unscaled}e${-this.scale}`;
    }
    const negative = this.unscaled < 0n;
    const digits = (negative ? -this.unscaled : this.unscaled).toString();
    const sign = negative ? '-' : '';
    if (this.scale <= 0) {
      return this.unscaled === 0n ? '0' : `${sign}${digits}${'0'.repeat(-this.scale)}`;
    }
    const padded = digits.padStart(this.scale + 1, '0');
    const point = padded.length - this.scale;
    return `${sign}${padded.slice(0, point)}.${padded.slice(point)}`;
  }
}
