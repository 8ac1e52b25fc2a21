import Decimal from 'decimal.js';
import { Logger } from '@nestjs/common';
import { InvalidArgumentException } from '../exceptions';

/**
 * Numeric input accepted anywhere a quantity enters the system.
 * Strings keep the caller's exact decimal digits; numbers are expanded exactly.
 */
export type DecimalInput = number | string | Decimal;

/**
 * Decimal constructor used for every computation. Operands are capped at
 * MAX_SIGNIFICANT_DIGITS, so the product of any two of them fits the working
 * precision and the only rounding that happens is the one a RoundingOption asks for.
 */
const WORKING_PRECISION = 10000;

export const MAX_SIGNIFICANT_DIGITS = WORKING_PRECISION / 2;

export const ExactDecimal = Decimal.clone({
  precision: WORKING_PRECISION,
  rounding: Decimal.ROUND_HALF_EVEN
});

// IEEE-754 binary64 layout
const MANTISSA_BITS = 52n;
const EXPONENT_MASK = 0x7ffn;
const FRACTION_MASK = (1n << MANTISSA_BITS) - 1n;
const EXPONENT_BIAS = 1075;

/**
 * Exact decimal arithmetic helpers built on Decimal.js.
 *
 * Reference: https://mikemcl.github.io/decimal.js/
 */
export class DecimalUtil {
  private static readonly logger = new Logger(DecimalUtil.name);

  /**
   * Convert input to an exact, finite Decimal.
   * @param value - Number, decimal string or Decimal
   * @param context - Name of the quantity, used in messages (e.g. "error")
   * @throws InvalidArgumentException if the input is malformed, NaN, infinite
   * or longer than MAX_SIGNIFICANT_DIGITS
   */
  static toDecimal(value: DecimalInput, context?: string): Decimal {
    const label = context ? ` (${context})` : '';

    let decimal: Decimal;
    try {
      decimal = typeof value === 'number'
        ? this.fromBinaryFloat(value, label)
        : new ExactDecimal(value);
    } catch (error) {
      if (error instanceof InvalidArgumentException) {
        throw error;
      }
      this.logger.error('Failed to convert to Decimal', {
        value: String(value),
        context,
        error: error instanceof Error ? error.message : String(error)
      });
      throw new InvalidArgumentException(
        `Invalid number: ${String(value)}${label}`,
        'UNREPRESENTABLE_NUMBER'
      );
    }

    if (decimal.isNaN()) {
      throw new InvalidArgumentException(`Invalid number: NaN${label}`, 'UNREPRESENTABLE_NUMBER');
    }

    if (!decimal.isFinite()) {
      throw new InvalidArgumentException(`Invalid number: Infinity${label}`, 'UNREPRESENTABLE_NUMBER');
    }

    this.checkSignificantDigits(decimal, context);
    return decimal;
  }

  /**
   * Reject quantities with more significant digits than exact arithmetic can carry.
   */
  static checkSignificantDigits(value: Decimal, context?: string): void {
    const digits = value.sd();
    if (digits > MAX_SIGNIFICANT_DIGITS) {
      const label = context ? ` (${context})` : '';
      throw new InvalidArgumentException(
        `Invalid number: ${digits} significant digits${label}; at most ${MAX_SIGNIFICANT_DIGITS} are supported`,
        'UNREPRESENTABLE_NUMBER'
      );
    }
  }

  /**
   * Exact decimal expansion of a double: every finite double is
   * mantissa * 2^exponent, which equals mantissa * 5^-exponent * 10^exponent.
   * @example DecimalUtil.fromBinaryFloat(0.5).toString() === '0.5'
   */
  static fromBinaryFloat(value: number, label = ''): Decimal {
    if (!Number.isFinite(value)) {
      throw new InvalidArgumentException(
        `Invalid number: ${String(value)}${label}`,
        'UNREPRESENTABLE_NUMBER'
      );
    }

    if (Number.isSafeInteger(value)) {
      return new ExactDecimal(value);
    }

    const view = new DataView(new ArrayBuffer(8));
    view.setFloat64(0, value);
    const bits = view.getBigUint64(0);

    const negative = bits >> 63n === 1n;
    const biasedExponent = Number((bits >> MANTISSA_BITS) & EXPONENT_MASK);
    const fraction = bits & FRACTION_MASK;

    // Subnormals have no implicit leading bit and share the smallest exponent
    const mantissa = biasedExponent === 0 ? fraction : fraction | (1n << MANTISSA_BITS);
    const exponent = Math.max(biasedExponent, 1) - EXPONENT_BIAS;

    const digits = exponent >= 0
      ? (mantissa << BigInt(exponent)).toString()
      : `${(mantissa * 5n ** BigInt(-exponent)).toString()}e${exponent}`;

    const magnitude = new ExactDecimal(digits);
    return negative ? magnitude.negated() : magnitude;
  }

  /**
   * Decimal exponent of the most significant digit, floor(log10(|x|)).
   * Zero has no significant digit.
   */
  static msdExponent(value: Decimal): number | undefined {
    if (value.isZero()) {
      return undefined;
    }
    return value.e;
  }

  /**
   * Multiply by 10^places. Exact for any integer `places`.
   */
  static shift(value: Decimal, places: number): Decimal {
    if (places === 0) {
      return value;
    }
    return new ExactDecimal(value).times(new ExactDecimal(`1e${places}`));
  }

  /**
   * Exact product; a multiplier of one is passed through untouched.
   */
  static multiply(a: Decimal, b: Decimal): Decimal {
    if (b.eq(1)) {
      return a;
    }
    return new ExactDecimal(a).times(b);
  }

  /**
   * Fixed-point rendering with exactly `decimalPlaces` digits after the point.
   * Zero never carries a sign.
   */
  static toFixed(value: Decimal, decimalPlaces: number): string {
    const unsigned = value.isZero() ? value.abs() : value;
    return unsigned.toFixed(decimalPlaces);
  }
}
