import { ApiProperty } from '@nestjs/swagger';
import { IsDefined, IsEnum, IsIn, IsInt, IsOptional, IsString, Min } from 'class-validator';
import { RoundingOption } from '../domain/rounding-option';
import { BUILT_IN_TEMPLATE_NAMES } from '../domain/template';

export class FormatRequestDto {
  @ApiProperty({
    example: '10973731.768160',
    description: 'Measured value; decimal strings keep their exact digits, numbers are expanded exactly',
    oneOf: [{ type: 'string' }, { type: 'number' }]
  })
  @IsDefined()
  value!: string | number;

  @ApiProperty({
    example: '0.000021',
    required: false,
    description: 'Uncertainty on the value (must be >= 0, defaults to 0)',
    oneOf: [{ type: 'string' }, { type: 'number' }]
  })
  @IsOptional()
  error?: string | number;

  @ApiProperty({ example: 2, required: false, description: 'Significant figures kept on the error (>= 1)' })
  @IsOptional()
  @IsInt()
  @Min(1, { message: 'errorSignificantFigures must be at least 1' })
  errorSignificantFigures?: number;

  @ApiProperty({ enum: RoundingOption, required: false, default: RoundingOption.ROUND_HALF_EVEN })
  @IsOptional()
  @IsEnum(RoundingOption)
  rounding?: RoundingOption;

  @ApiProperty({ enum: BUILT_IN_TEMPLATE_NAMES, required: false, default: 'SIUNITX' })
  @IsOptional()
  @IsIn(BUILT_IN_TEMPLATE_NAMES)
  template?: string;

  @ApiProperty({
    example: '{0} +/- {1} (1e{2}) {3}',
    required: false,
    description: 'Custom pattern with slots {0} value, {1} error, {2} exponent, {3} units; overrides template'
  })
  @IsOptional()
  @IsString()
  pattern?: string;

  @ApiProperty({ example: '\\meter', required: false, description: 'Units, passed through untouched' })
  @IsOptional()
  @IsString()
  units?: string;

  @ApiProperty({
    example: 1,
    required: false,
    description: 'Positive scale applied to value and error before rounding',
    oneOf: [{ type: 'string' }, { type: 'number' }]
  })
  @IsOptional()
  multiplier?: string | number;
}
