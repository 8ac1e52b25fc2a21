import Decimal from 'decimal.js';
import { DecimalUtil } from '../../common/utilities/decimal.util';

export enum RoundingOption {
  ROUND_HALF_EVEN = 'ROUND_HALF_EVEN',
  ROUND_05UP = 'ROUND_05UP',
  ROUND_CEILING = 'ROUND_CEILING',
  ROUND_DOWN = 'ROUND_DOWN',
  ROUND_FLOOR = 'ROUND_FLOOR',
  ROUND_HALF_DOWN = 'ROUND_HALF_DOWN',
  ROUND_HALF_UP = 'ROUND_HALF_UP',
  ROUND_UP = 'ROUND_UP'
}

/**
 * Rounds a value to a whole number of units of its last kept digit.
 * Implementations receive a value already shifted so that digit is the units place.
 */
type RoundingStrategy = (value: Decimal) => Decimal;

const directional = (mode: Decimal.Rounding): RoundingStrategy =>
  (value) => value.toDecimalPlaces(0, mode);

/**
 * Truncate, then step away from zero when the kept digit is 0 or 5 and
 * something non-zero was dropped.
 */
const roundZeroFiveUp: RoundingStrategy = (value) => {
  const truncated = value.toDecimalPlaces(0, Decimal.ROUND_DOWN);
  if (truncated.eq(value)) {
    return truncated;
  }

  const lastDigit = truncated.abs().mod(10);
  if (lastDigit.eq(0) || lastDigit.eq(5)) {
    return value.toDecimalPlaces(0, Decimal.ROUND_UP);
  }
  return truncated;
};

const ROUNDING_STRATEGIES: Record<RoundingOption, RoundingStrategy> = {
  [RoundingOption.ROUND_HALF_EVEN]: directional(Decimal.ROUND_HALF_EVEN),
  [RoundingOption.ROUND_HALF_UP]: directional(Decimal.ROUND_HALF_UP),
  [RoundingOption.ROUND_HALF_DOWN]: directional(Decimal.ROUND_HALF_DOWN),
  [RoundingOption.ROUND_UP]: directional(Decimal.ROUND_UP),
  [RoundingOption.ROUND_DOWN]: directional(Decimal.ROUND_DOWN),
  [RoundingOption.ROUND_CEILING]: directional(Decimal.ROUND_CEIL),
  [RoundingOption.ROUND_FLOOR]: directional(Decimal.ROUND_FLOOR),
  [RoundingOption.ROUND_05UP]: roundZeroFiveUp
};

const ROUNDING_OPTIONS: ReadonlySet<string> = new Set(Object.values(RoundingOption));

export function isRoundingOption(value: unknown): value is RoundingOption {
  return typeof value === 'string' && ROUNDING_OPTIONS.has(value);
}

/**
 * Round `value` so that its last kept digit sits at 10^position.
 * Negative positions keep decimal places; positive ones round to tens, hundreds, etc.
 *
 * @example roundAtPosition(new Decimal('656'), 1, RoundingOption.ROUND_HALF_EVEN) // 660
 */
export function roundAtPosition(
  value: Decimal,
  position: number,
  rounding: RoundingOption
): Decimal {
  const shifted = DecimalUtil.shift(value, -position);
  const rounded = ROUNDING_STRATEGIES[rounding](shifted);
  return DecimalUtil.shift(rounded, position);
}
