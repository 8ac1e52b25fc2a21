export { FormattedValue } from './formatting/domain/formatted-value';
export {
  SignificantFigureRounder,
  RoundingResult,
  RoundedQuantities
} from './formatting/domain/significant-figure-rounder';
export { RoundingOption, isRoundingOption, roundAtPosition } from './formatting/domain/rounding-option';
export { NotationPolicy, DEFAULT_NOTATION_POLICY, chooseExponent } from './formatting/domain/notation.policy';
export * from './formatting/domain/template';
export { DecimalInput, DecimalUtil, ExactDecimal, MAX_SIGNIFICANT_DIGITS } from './common/utilities/decimal.util';
export { InvalidArgumentException, InvalidArgumentCode } from './common/exceptions';
