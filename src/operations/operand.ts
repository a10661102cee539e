import { Decimal } from 'decimal.js';
import { DivisionByZeroError } from '../errors.js';

/**
 * Significant digits kept when a quotient does not terminate (e.g. 1 / 3).
 * Rounding is half-even.
 */
export const DIVISION_PRECISION = 28;

// Sums, differences and products never reach this many digits, so they stay exact.
const ExactDecimal = Decimal.clone({ precision: 1e9, rounding: Decimal.ROUND_HALF_EVEN });
const QuotientDecimal = Decimal.clone({ precision: DIVISION_PRECISION, rounding: Decimal.ROUND_HALF_EVEN });

/**
 * Largest magnitude accepted for a literal's exponent and for the power of ten of
 * its leading digit. Results render positionally, so this bounds their length.
 */
export const MAX_EXPONENT = 999_999;

const LITERAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(?:e([+-]?\d+))?$/i;

/**
 * An exact decimal number together with its exponent: the power of ten of its
 * last significant digit. `1.50` has exponent -2 and keeps rendering as `1.50`,
 * and results carry the exponent their operands imply (`1.5 + 2.5` is `4.0`).
 */
export class Operand {
  private constructor(
    readonly value: Decimal,
    readonly exponent: number
  ) {
    Object.freeze(this);
  }

  /**
   * Parse a decimal literal: optional sign, digits with an optional point, optional exponent.
   * Returns null for anything else, including `inf`, `nan` and out-of-range exponents.
   */
  static parse(literal: string): Operand | null {
    const text = literal.trim();
    const match = LITERAL_PATTERN.exec(text);
    if (!match) return null;

    const mantissa = match[1];
    const pointIndex = mantissa.indexOf('.');
    const fractionDigits = pointIndex === -1 ? 0 : mantissa.length - pointIndex - 1;
    const shift = match[2] === undefined ? 0 : Number(match[2]);
    const exponent = shift - fractionDigits;
    if (!Number.isSafeInteger(exponent) || Math.abs(exponent) > MAX_EXPONENT) return null;

    const value = new ExactDecimal(text);
    if (!value.isFinite() || Math.abs(value.e) > MAX_EXPONENT) return null;

    return new Operand(value, exponent);
  }

  static of(value: Decimal.Value, exponent = 0): Operand {
    const decimal = new ExactDecimal(value);
    return new Operand(decimal, Math.min(exponent, -decimal.decimalPlaces()));
  }

  isZero(): boolean {
    return this.value.isZero();
  }

  plus(other: Operand): Operand {
    return new Operand(this.value.plus(other.value), Math.min(this.exponent, other.exponent));
  }

  minus(other: Operand): Operand {
    return new Operand(this.value.minus(other.value), Math.min(this.exponent, other.exponent));
  }

  times(other: Operand): Operand {
    return new Operand(this.value.times(other.value), this.exponent + other.exponent);
  }

  /**
   * An exact quotient keeps the exponent `a - b` where its digits allow it (`20 / 4` is `5`,
   * `10 / 4` is `2.5`). A non-terminating one is rounded to {@link DIVISION_PRECISION}
   * significant digits, all of which are shown.
   */
  dividedBy(divisor: Operand): Operand {
    if (divisor.isZero()) {
      throw new DivisionByZeroError();
    }

    const quotient = new QuotientDecimal(this.value).div(divisor.value);
    const exact = new ExactDecimal(quotient);

    if (exact.times(divisor.value).eq(this.value)) {
      const idealExponent = this.exponent - divisor.exponent;
      return new Operand(exact, Math.min(idealExponent, -exact.decimalPlaces()));
    }

    return new Operand(exact, quotient.e - (DIVISION_PRECISION - 1));
  }

  /**
   * Plain positional notation with `-exponent` fractional digits. Negative zero renders as `0`.
   */
  toString(): string {
    const value = this.value.isZero() ? this.value.abs() : this.value;
    return value.toFixed(Math.max(0, -this.exponent));
  }

  toJSON(): string {
    return this.toString();
  }
}
