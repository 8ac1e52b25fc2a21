import Decimal from 'decimal.js';
import { DecimalInput, DecimalUtil } from '../../common/utilities/decimal.util';
import { InvalidArgumentException } from '../../common/exceptions';
import { RoundingOption, isRoundingOption } from './rounding-option';
import { NotationPolicy, DEFAULT_NOTATION_POLICY } from './notation.policy';
import { RoundingResult, SignificantFigureRounder } from './significant-figure-rounder';
import { PLAIN_TEMPLATE, SIUNITX_TEMPLATE, Template, renderTemplate } from './template';

/**
 * A measured value with its uncertainty, ready to be rendered with matched precision.
 * Immutable: every render call takes its own multiplier, units and template.
 *
 * @example
 * new FormattedValue(10, 0.1).formatted(SIUNITX_TEMPLATE, '\\meter', 0.01)
 * // '\\SI{0.100 \\pm 0.001 e0}{\\meter}'
 */
export class FormattedValue {
  readonly value: Decimal;
  readonly error: Decimal;

  constructor(
    private readonly inputValue: DecimalInput,
    private readonly inputError: DecimalInput = 0,
    readonly errorSignificantFigures: number = 1,
    readonly rounding: RoundingOption = RoundingOption.ROUND_HALF_EVEN
  ) {
    SignificantFigureRounder.validateSignificantFigures(errorSignificantFigures);

    if (!isRoundingOption(rounding)) {
      throw new InvalidArgumentException(
        `Unsupported rounding option ${String(rounding)}`,
        'UNSUPPORTED_ROUNDING'
      );
    }

    this.value = DecimalUtil.toDecimal(inputValue, 'value');
    this.error = DecimalUtil.toDecimal(inputError, 'error');

    if (this.error.isNegative() && !this.error.isZero()) {
      throw new InvalidArgumentException(
        `The error on a value should be non-negative, not ${String(inputError)}`,
        'NEGATIVE_ERROR'
      );
    }

    Object.freeze(this);
  }

  /** The value and error exactly as they were given. */
  actualData(): [DecimalInput, DecimalInput] {
    return [this.inputValue, this.inputError];
  }

  /** Value and error rounded at their shared decimal place, without exponent rescaling. */
  roundedData(multiplier: DecimalInput = 1): [Decimal, Decimal] {
    const rounded = SignificantFigureRounder.quantities(
      this.value,
      this.error,
      this.errorSignificantFigures,
      this.rounding,
      DecimalUtil.toDecimal(multiplier, 'multiplier')
    );
    return [rounded.value, rounded.error];
  }

  round(
    multiplier: DecimalInput = 1,
    notation: NotationPolicy = DEFAULT_NOTATION_POLICY
  ): RoundingResult {
    return SignificantFigureRounder.round(
      this.value,
      this.error,
      this.errorSignificantFigures,
      this.rounding,
      DecimalUtil.toDecimal(multiplier, 'multiplier'),
      notation
    );
  }

  formatted(
    template: Template = SIUNITX_TEMPLATE,
    units: string = '',
    multiplier: DecimalInput = 1,
    notation: NotationPolicy = DEFAULT_NOTATION_POLICY
  ): string {
    const result = this.round(multiplier, notation);
    return renderTemplate(template, result.roundedValue, result.roundedError, result.exponent, units);
  }

  toString(): string {
    return this.formatted(PLAIN_TEMPLATE);
  }
}
