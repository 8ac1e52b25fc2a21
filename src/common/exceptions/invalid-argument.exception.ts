import { BadRequestException } from '@nestjs/common';

export type InvalidArgumentCode =
  | 'NEGATIVE_ERROR'
  | 'INVALID_SIGNIFICANT_FIGURES'
  | 'SIGNIFICANT_FIGURES_TOO_LARGE'
  | 'UNREPRESENTABLE_NUMBER'
  | 'UNSUPPORTED_ROUNDING'
  | 'INVALID_MULTIPLIER'
  | 'INVALID_TEMPLATE_SLOT'
  | 'MALFORMED_TEMPLATE'
  | 'UNKNOWN_TEMPLATE'
  | 'RENDERED_DIGITS_TOO_LARGE';

export class InvalidArgumentException extends BadRequestException {
  constructor(message: string, public readonly code: InvalidArgumentCode) {
    super({
      statusCode: 400,
      message,
      code,
      timestamp: new Date().toISOString()
    });
  }
}
