import { ApiProperty } from '@nestjs/swagger';

export class FormatResponseDto {
  @ApiProperty({ example: '\\SI{10973731.768160 \\pm 0.000021 e0}{}', description: 'Rendered template' })
  formatted!: string;

  @ApiProperty({ example: '10973731.768160' })
  roundedValue!: string;

  @ApiProperty({ example: '0.000021' })
  roundedError!: string;

  @ApiProperty({ example: '0', description: 'Shared power-of-ten exponent' })
  exponent!: string;

  @ApiProperty({ example: 6, description: 'Digits after the decimal point in both rounded strings' })
  decimalPlaces!: number;

  @ApiProperty({ example: 'SIUNITX', description: 'Built-in template name, or "custom" for a pattern' })
  template!: string;
}

export class TemplateDescriptorDto {
  @ApiProperty({ example: 'SIUNITX' })
  name!: string;

  @ApiProperty({ example: '\\SI{{{0} \\pm {1} e{2}}}{{{3}}}' })
  pattern!: string;
}
