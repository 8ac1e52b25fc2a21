import { AppConfig } from '../../config/app.config';

/**
 * Decides when a rounded pair is rendered with a power-of-ten exponent.
 */
export interface NotationPolicy {
  /** Leading-digit exponents below this are rendered in scientific notation. */
  minFixedExponent: number;
  /** Rounding positions above this are absorbed into the exponent. */
  maxTrailingZeros: number;
}

export const DEFAULT_NOTATION_POLICY: Readonly<NotationPolicy> = Object.freeze({
  minFixedExponent: AppConfig.SCIENTIFIC_MIN_FIXED_EXPONENT,
  maxTrailingZeros: AppConfig.SCIENTIFIC_MAX_TRAILING_ZEROS
});

/**
 * Pick the shared exponent for a pair rounded at 10^position.
 *
 * - Rounding left of the units place would print insignificant zeros, so the
 *   exponent becomes the rounding position and the error ends on the units digit.
 * - Tiny magnitudes take the exponent of their leading digit.
 * - Everything else is fixed-point.
 *
 * @param position - Exponent of the last kept digit
 * @param magnitude - Leading-digit exponent of the larger rounded quantity, if any is non-zero
 */
export function chooseExponent(
  position: number,
  magnitude: number | undefined,
  policy: NotationPolicy = DEFAULT_NOTATION_POLICY
): number {
  if (position > policy.maxTrailingZeros) {
    return position;
  }

  if (magnitude !== undefined && magnitude < policy.minFixedExponent) {
    return magnitude;
  }

  return 0;
}
