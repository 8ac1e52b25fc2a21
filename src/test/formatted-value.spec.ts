import Decimal from 'decimal.js';
import { FormattedValue } from '../formatting/domain/formatted-value';
import { RoundingOption } from '../formatting/domain/rounding-option';
import { NATURAL_TEMPLATE, NUM_TEMPLATE, SIUNITX_TEMPLATE, functionTemplate } from '../formatting/domain/template';
import { DecimalInput, DecimalUtil } from '../common/utilities/decimal.util';
import { InvalidArgumentException } from '../common/exceptions';

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof InvalidArgumentException) {
      return error.code;
    }
    throw error;
  }
  return undefined;
}

const decimalPlaces = (rendered: string) =>
  rendered.includes('.') ? rendered.split('.')[1].length : 0;

const significantDigits = (rendered: string) =>
  rendered.replace('.', '').replace(/^0+/, '').length;

describe('FormattedValue', () => {
  describe('construction', () => {
    it('should accept non-negative errors of every input type', () => {
      const errors: DecimalInput[] = [0, 1.0, new Decimal(1), 5e10, '0.25', -0];
      for (const error of errors) {
        expect(() => new FormattedValue(10, error)).not.toThrow();
      }
    });

    it('should reject negative errors', () => {
      const errors: DecimalInput[] = [-1, -1.0, new Decimal(-1), new Decimal('-5e10'), '-0.1'];
      for (const error of errors) {
        expect(errorCode(() => new FormattedValue(10, error))).toBe('NEGATIVE_ERROR');
      }
    });

    it('should validate the significant figure count', () => {
      expect(() => new FormattedValue(10, 1, 10)).not.toThrow();
      expect(errorCode(() => new FormattedValue(10, 1, -1))).toBe('INVALID_SIGNIFICANT_FIGURES');
      expect(errorCode(() => new FormattedValue(10, 1, 0))).toBe('INVALID_SIGNIFICANT_FIGURES');
      expect(errorCode(() => new FormattedValue(10, 1, 1.5))).toBe('INVALID_SIGNIFICANT_FIGURES');
    });

    it('should accept every rounding option', () => {
      for (const rounding of Object.values(RoundingOption)) {
        expect(() => new FormattedValue(10, 1, 1, rounding)).not.toThrow();
      }
    });

    it('should reject an unknown rounding option from untyped input', () => {
      const payload: { rounding: RoundingOption } = JSON.parse('{"rounding": "Invalid Rounding"}');
      expect(errorCode(() => new FormattedValue(10, 1, 1, payload.rounding))).toBe('UNSUPPORTED_ROUNDING');
    });

    it('should reject values that are not finite numbers', () => {
      expect(errorCode(() => new FormattedValue(Number.NaN, 1))).toBe('UNREPRESENTABLE_NUMBER');
      expect(errorCode(() => new FormattedValue('12,5', 1))).toBe('UNREPRESENTABLE_NUMBER');
    });

    it('should reject inputs with more significant digits than exact arithmetic carries', () => {
      const tooLong = '1.' + '0'.repeat(9999) + '1';
      expect(errorCode(() => new FormattedValue(tooLong, '0.1', 1, RoundingOption.ROUND_UP)))
        .toBe('UNREPRESENTABLE_NUMBER');
      expect(errorCode(() => new FormattedValue('1', tooLong))).toBe('UNREPRESENTABLE_NUMBER');
    });

    it('should be frozen after construction', () => {
      expect(Object.isFrozen(new FormattedValue(1, 0.1))).toBe(true);
    });
  });

  describe('actualData', () => {
    it('should return the inputs unchanged', () => {
      const error = new Decimal(1);
      const [value, actualError] = new FormattedValue(1.0, error).actualData();
      expect(value).toBe(1);
      expect(actualError).toBe(error);
    });
  });

  describe('roundedData', () => {
    it('should round value and error to the error significant figures', () => {
      const cases: Array<[FormattedValue, string, string]> = [
        [new FormattedValue(10.0, 0.1, 1), '10', '0.1'],
        [new FormattedValue(10.0, 0.1, 2), '10', '0.1'],
        [new FormattedValue(100, 10, 1), '100', '10'],
        [new FormattedValue(1, 0.15, 1), '1', '0.1'],
        [new FormattedValue('1', '0.15', 1), '1', '0.2']
      ];

      for (const [formattedValue, value, error] of cases) {
        const [roundedValue, roundedError] = formattedValue.roundedData();
        expect(roundedValue.toString()).toBe(value);
        expect(roundedError.toString()).toBe(error);
      }
    });

    it('should apply the multiplier before rounding', () => {
      const [value, error] = new FormattedValue(0.001, 0.0001, 1).roundedData(1000);
      expect(value.toString()).toBe('1');
      expect(error.toString()).toBe('0.1');
    });
  });

  describe('round', () => {
    it('should pad trailing zeros to the error precision', () => {
      expect(new FormattedValue(10.0, 0.1, 1).round()).toMatchObject({ roundedValue: '10.0', roundedError: '0.1' });
      expect(new FormattedValue(10.0, 0.1, 2).round()).toMatchObject({ roundedValue: '10.00', roundedError: '0.10' });
      expect(new FormattedValue(10.0, 0.1, 3).round()).toMatchObject({ roundedValue: '10.000', roundedError: '0.100' });
    });

    it('should use the exact expansion of binary floats for ties', () => {
      expect(new FormattedValue(1, 0.15).round().roundedError).toBe('0.1');
      expect(new FormattedValue('1', '0.15').round().roundedError).toBe('0.2');
    });

    it('should round long inputs once, with the requested option', () => {
      const longValue = '1.' + '0'.repeat(4998) + '1';
      const result = new FormattedValue(longValue, '0.1', 1, RoundingOption.ROUND_UP).round();

      expect(result.roundedValue).toBe('1.1');
      expect(result.roundedError).toBe('0.1');
    });

    it('should reject a value and error whose rendering would be unbounded', () => {
      expect(errorCode(() => new FormattedValue('1e300000000', '1e-300000000').round()))
        .toBe('RENDERED_DIGITS_TOO_LARGE');
      expect(errorCode(() => new FormattedValue('1e300000000', '1e-300000000').formatted()))
        .toBe('RENDERED_DIGITS_TOO_LARGE');
    });

    it('should render the documented scenarios', () => {
      expect(new FormattedValue(10973731.768160, 0.000021, 2).round()).toEqual({
        roundedValue: '10973731.768160',
        roundedError: '0.000021',
        exponent: '0',
        decimalPlaces: 6
      });
      expect(new FormattedValue('0.000002671', '0.000000452').round()).toEqual({
        roundedValue: '2.7',
        roundedError: '0.5',
        exponent: '-6',
        decimalPlaces: 1
      });
      expect(new FormattedValue(656, 10).round()).toEqual({
        roundedValue: '66',
        roundedError: '1',
        exponent: '1',
        decimalPlaces: 0
      });
    });
  });

  describe('formatted', () => {
    it('should default to the siunitx template', () => {
      expect(new FormattedValue(10, 0.1).formatted(undefined, '\\centi\\meter'))
        .toBe('\\SI{10.0 \\pm 0.1 e0}{\\centi\\meter}');
    });

    it('should scale by the multiplier before rounding', () => {
      expect(new FormattedValue(10, 0.1).formatted(SIUNITX_TEMPLATE, '\\meter', 1 / 100))
        .toBe('\\SI{0.100 \\pm 0.001 e0}{\\meter}');
    });

    it('should render the same request with different templates and multipliers', () => {
      const formattedValue = new FormattedValue('0.000002671', '0.000000452');

      expect(formattedValue.formatted(NUM_TEMPLATE)).toBe('\\num{2.7 \\pm 0.5 e-6}');
      expect(formattedValue.formatted(NATURAL_TEMPLATE, 'um', '1e6')).toBe('(2.7 ± 0.5) x 10^0 um');
      expect(formattedValue.formatted(NUM_TEMPLATE)).toBe('\\num{2.7 \\pm 0.5 e-6}');
    });

    it('should accept function templates', () => {
      const template = functionTemplate((value, error, exponent, units) =>
        `${value} +/- ${error} [10^${exponent} ${units}]`
      );
      expect(new FormattedValue(656, 10).formatted(template, 'V')).toBe('66 +/- 1 [10^1 V]');
    });

    it('should reject a non-positive multiplier', () => {
      expect(errorCode(() => new FormattedValue(10, 0.1).formatted(SIUNITX_TEMPLATE, '', 0)))
        .toBe('INVALID_MULTIPLIER');
    });
  });

  describe('toString', () => {
    it('should render value and error in fixed point', () => {
      expect(String(new FormattedValue(10, 0.1))).toBe('10.0 ± 0.1');
    });

    it('should append the exponent when there is one', () => {
      expect(String(new FormattedValue(656, 10))).toBe('(66 ± 1)e1');
    });

    it('should render zero with zero error', () => {
      expect(String(new FormattedValue(0))).toBe('0 ± 0');
    });
  });

  describe('properties', () => {
    const cases: Array<[string, string, number]> = [
      ['10973731.768160', '0.000021', 2],
      ['0.000002671', '0.000000452', 1],
      ['656', '10', 1],
      ['12.34', '9.96', 1],
      ['12.34', '9.96', 2],
      ['5.123', '0.0996', 1],
      ['-42.4242', '0.0123', 3],
      ['1234567', '200', 1],
      ['3.14159', '0', 3]
    ];

    it('should render value and error with the same number of decimal places', () => {
      for (const [value, error, figures] of cases) {
        const result = new FormattedValue(value, error, figures).round();
        expect(decimalPlaces(result.roundedValue)).toBe(result.decimalPlaces);
        expect(decimalPlaces(result.roundedError)).toBe(result.decimalPlaces);
      }
    });

    it('should keep the requested significant figures on a non-zero error', () => {
      for (const [value, error, figures] of cases.filter(([, error]) => error !== '0')) {
        const result = new FormattedValue(value, error, figures).round();
        expect(significantDigits(result.roundedError)).toBe(figures);
      }
    });

    it('should be idempotent', () => {
      for (const [value, error, figures] of cases) {
        const [roundedValue, roundedError] = new FormattedValue(value, error, figures).roundedData();
        const [again, againError] = new FormattedValue(roundedValue, roundedError, figures).roundedData();
        expect(again.eq(roundedValue)).toBe(true);
        expect(againError.eq(roundedError)).toBe(true);
      }
    });

    it('should distribute power-of-ten multipliers', () => {
      for (const [value, error, figures] of cases) {
        const formattedValue = new FormattedValue(value, error, figures);
        const [roundedValue, roundedError] = formattedValue.roundedData();
        const [scaledValue, scaledError] = formattedValue.roundedData('1e3');
        expect(scaledValue.eq(DecimalUtil.shift(roundedValue, 3))).toBe(true);
        expect(scaledError.eq(DecimalUtil.shift(roundedError, 3))).toBe(true);
      }
    });
  });
});
