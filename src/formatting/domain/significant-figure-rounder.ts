import Decimal from 'decimal.js';
import { Logger } from '@nestjs/common';
import { DecimalUtil } from '../../common/utilities/decimal.util';
import { InvalidArgumentException } from '../../common/exceptions';
import { AppConfig } from '../../config/app.config';
import { RoundingOption, roundAtPosition } from './rounding-option';
import { DEFAULT_NOTATION_POLICY, NotationPolicy, chooseExponent } from './notation.policy';

export interface RoundingResult {
  roundedValue: string;
  roundedError: string;
  exponent: string;
  decimalPlaces: number;
}

/**
 * Value and error rounded at a shared power of ten, before any rescaling for display.
 */
export interface RoundedQuantities {
  value: Decimal;
  error: Decimal;
  /** Exponent of the last kept digit of both quantities. */
  position: number;
}

export class SignificantFigureRounder {
  private static readonly logger = new Logger(SignificantFigureRounder.name);

  /**
   * Round a value and its error so the error keeps `significantFigures` digits
   * and both quantities end on the same decimal place.
   *
   * **Algorithm Overview:**
   * 1. Scale value and error by the multiplier
   * 2. Anchor on the error, or on the value when the error is exactly zero
   * 3. Last kept digit: msd(anchor) - (significantFigures - 1)
   * 4. **Carry correction**: if rounding pushed the anchor up a decade
   *    (9.96 -> 10), recompute the position from the rounded magnitude and
   *    round the unrounded anchor again
   * 5. Round value and error at the final position
   *
   * @example
   * SignificantFigureRounder.quantities(new Decimal('656'), new Decimal('10'), 1, RoundingOption.ROUND_HALF_EVEN)
   * // { value: 660, error: 10, position: 1 }
   */
  static quantities(
    value: Decimal,
    error: Decimal,
    significantFigures: number,
    rounding: RoundingOption,
    multiplier: Decimal = new Decimal(1)
  ): RoundedQuantities {
    this.validateSignificantFigures(significantFigures);
    this.validateMultiplier(multiplier);
    DecimalUtil.checkSignificantDigits(value, 'value');
    DecimalUtil.checkSignificantDigits(error, 'error');
    DecimalUtil.checkSignificantDigits(multiplier, 'multiplier');

    if (error.isNegative() && !error.isZero()) {
      throw new InvalidArgumentException(
        `The error on a value should be non-negative, not ${error.toString()}`,
        'NEGATIVE_ERROR'
      );
    }

    const scaledValue = DecimalUtil.multiply(value, multiplier);
    const scaledError = DecimalUtil.multiply(error, multiplier);

    const anchor = scaledError.isZero() ? scaledValue : scaledError;
    const anchorExponent = DecimalUtil.msdExponent(anchor);

    if (anchorExponent === undefined) {
      return { value: scaledValue.abs(), error: scaledError.abs(), position: 0 };
    }

    let position = anchorExponent - (significantFigures - 1);
    const roundedAnchor = roundAtPosition(anchor, position, rounding);
    const roundedExponent = DecimalUtil.msdExponent(roundedAnchor);

    if (roundedExponent !== undefined && roundedExponent > anchorExponent) {
      const corrected = roundedExponent - (significantFigures - 1);
      this.logger.debug(`Carry moved rounding position from ${position} to ${corrected}`, {
        anchor: anchor.toString(),
        significantFigures
      });
      position = corrected;
    }

    return {
      value: roundAtPosition(scaledValue, position, rounding),
      error: roundAtPosition(scaledError, position, rounding),
      position
    };
  }

  /**
   * Round and render value and error as strings sharing one exponent and one
   * decimal-place count.
   * @throws InvalidArgumentException for a negative error, a bad significant-figure
   * count, a non-positive multiplier, or output longer than MAX_RENDERED_DIGITS
   */
  static round(
    value: Decimal,
    error: Decimal,
    significantFigures: number,
    rounding: RoundingOption,
    multiplier: Decimal = new Decimal(1),
    notation: NotationPolicy = DEFAULT_NOTATION_POLICY
  ): RoundingResult {
    const rounded = this.quantities(value, error, significantFigures, rounding, multiplier);

    const magnitudes = [rounded.value, rounded.error]
      .map(quantity => DecimalUtil.msdExponent(quantity))
      .filter((exponent): exponent is number => exponent !== undefined);
    const magnitude = magnitudes.length > 0 ? Math.max(...magnitudes) : undefined;

    const exponent = chooseExponent(rounded.position, magnitude, notation);
    const decimalPlaces = Math.max(0, exponent - rounded.position);
    this.validateRenderedDigits(magnitude, exponent, decimalPlaces);

    return {
      roundedValue: DecimalUtil.toFixed(DecimalUtil.shift(rounded.value, -exponent), decimalPlaces),
      roundedError: DecimalUtil.toFixed(DecimalUtil.shift(rounded.error, -exponent), decimalPlaces),
      exponent: String(exponent),
      decimalPlaces
    };
  }

  static validateSignificantFigures(significantFigures: number): void {
    if (!Number.isInteger(significantFigures)) {
      throw new InvalidArgumentException(
        `The significant figures in the error should be integral, not ${significantFigures}`,
        'INVALID_SIGNIFICANT_FIGURES'
      );
    }

    if (significantFigures < 1) {
      throw new InvalidArgumentException(
        `The significant figures in the error should be positive, not ${significantFigures}`,
        'INVALID_SIGNIFICANT_FIGURES'
      );
    }

    if (significantFigures > AppConfig.MAX_SIGNIFICANT_FIGURES) {
      throw new InvalidArgumentException(
        `At most ${AppConfig.MAX_SIGNIFICANT_FIGURES} significant figures are supported, got ${significantFigures}`,
        'SIGNIFICANT_FIGURES_TOO_LARGE'
      );
    }
  }

  private static validateRenderedDigits(
    magnitude: number | undefined,
    exponent: number,
    decimalPlaces: number
  ): void {
    const integerDigits = magnitude === undefined ? 1 : Math.max(1, magnitude - exponent + 1);
    const renderedDigits = integerDigits + decimalPlaces;

    if (renderedDigits > AppConfig.MAX_RENDERED_DIGITS) {
      throw new InvalidArgumentException(
        `Rendering would need ${renderedDigits} digits; at most ${AppConfig.MAX_RENDERED_DIGITS} are supported`,
        'RENDERED_DIGITS_TOO_LARGE'
      );
    }
  }

  private static validateMultiplier(multiplier: Decimal): void {
    if (!multiplier.isFinite() || !multiplier.isPositive() || multiplier.isZero()) {
      throw new InvalidArgumentException(
        `The multiplier should be a positive number, not ${multiplier.toString()}`,
        'INVALID_MULTIPLIER'
      );
    }
  }
}
