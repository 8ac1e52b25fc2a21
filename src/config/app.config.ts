// Unset, blank or non-numeric values fall back to the default
export function numberFromEnv(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const AppConfig = {
  PORT: numberFromEnv(process.env.PORT, 3000),
  LOG_TO_FILE: process.env.LOG_TO_FILE === 'true',
  DEFAULT_ERROR_SIGNIFICANT_FIGURES: numberFromEnv(process.env.DEFAULT_ERROR_SIGNIFICANT_FIGURES, 1),
  MAX_SIGNIFICANT_FIGURES: numberFromEnv(process.env.MAX_SIGNIFICANT_FIGURES, 1000),
  // Upper bound on integer plus fractional digits in one rendered quantity
  MAX_RENDERED_DIGITS: numberFromEnv(process.env.MAX_RENDERED_DIGITS, 10000),
  // Leading-digit exponents below this switch rendering to scientific notation
  SCIENTIFIC_MIN_FIXED_EXPONENT: numberFromEnv(process.env.SCIENTIFIC_MIN_FIXED_EXPONENT, -4),
  // Insignificant trailing zeros tolerated before the exponent absorbs them
  SCIENTIFIC_MAX_TRAILING_ZEROS: numberFromEnv(process.env.SCIENTIFIC_MAX_TRAILING_ZEROS, 0)
};
