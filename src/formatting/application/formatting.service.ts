import { Injectable, Logger } from '@nestjs/common';
import { FormattedValue } from '../domain/formatted-value';
import { RoundingOption } from '../domain/rounding-option';
import {
  BUILT_IN_TEMPLATES,
  BUILT_IN_TEMPLATE_NAMES,
  Template,
  isBuiltInTemplateName,
  renderTemplate,
  stringTemplate
} from '../domain/template';
import { FormatRequestDto } from '../dto/format-request.dto';
import { FormatResponseDto, TemplateDescriptorDto } from '../dto/format-response.dto';
import { InvalidArgumentException } from '../../common/exceptions';
import { AppConfig } from '../../config/app.config';

@Injectable()
export class FormattingService {
  private readonly logger = new Logger(FormattingService.name);

  format(dto: FormatRequestDto): FormatResponseDto {
    const start = Date.now();
    this.logger.debug('Formatting request received', {
      template: dto.pattern !== undefined ? 'custom' : dto.template,
      rounding: dto.rounding
    });

    try {
      const formattedValue = new FormattedValue(
        dto.value,
        dto.error ?? 0,
        dto.errorSignificantFigures ?? AppConfig.DEFAULT_ERROR_SIGNIFICANT_FIGURES,
        dto.rounding ?? RoundingOption.ROUND_HALF_EVEN
      );
      const { name, template } = this.resolveTemplate(dto);

      const result = formattedValue.round(dto.multiplier ?? 1);
      const formatted = renderTemplate(
        template,
        result.roundedValue,
        result.roundedError,
        result.exponent,
        dto.units ?? ''
      );

      this.logger.debug(`Formatting completed in ${Date.now() - start}ms`, {
        exponent: result.exponent,
        decimalPlaces: result.decimalPlaces
      });

      return { formatted, ...result, template: name };
    } catch (error) {
      this.logger.warn('Formatting request rejected', {
        error: error instanceof Error ? error.message : String(error)
      });
      throw error;
    }
  }

  listTemplates(): TemplateDescriptorDto[] {
    return BUILT_IN_TEMPLATE_NAMES.map(name => {
      const template = BUILT_IN_TEMPLATES[name];
      return {
        name,
        pattern: template.kind === 'string' ? template.pattern : '<function>'
      };
    });
  }

  private resolveTemplate(dto: FormatRequestDto): { name: string; template: Template } {
    if (dto.pattern !== undefined) {
      return { name: 'custom', template: stringTemplate(dto.pattern) };
    }

    const name = dto.template ?? 'SIUNITX';
    if (!isBuiltInTemplateName(name)) {
      throw new InvalidArgumentException(`Unknown template: ${name}`, 'UNKNOWN_TEMPLATE');
    }
    return { name, template: BUILT_IN_TEMPLATES[name] };
  }
}
