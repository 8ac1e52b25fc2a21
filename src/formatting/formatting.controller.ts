import { Body, Controller, Get, HttpCode, Logger, Post, UseGuards } from '@nestjs/common';
import { ApiBody, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Throttle } from '@nestjs/throttler';
import { FormattingService } from './application/formatting.service';
import { FormatRequestDto } from './dto/format-request.dto';
import { FormatResponseDto, TemplateDescriptorDto } from './dto/format-response.dto';
import { CustomThrottleGuard } from '../common/infrastructure/throttle.guard';

@ApiTags('Formatting')
@Controller('v1/format')
@UseGuards(CustomThrottleGuard)
export class FormattingController {
  private readonly logger = new Logger(FormattingController.name);

  constructor(private readonly service: FormattingService) {}

  @Throttle({ short: { limit: 50, ttl: 1000 } })
  @Post()
  @HttpCode(200)
  @ApiBody({ type: FormatRequestDto })
  @ApiResponse({ status: 200, type: FormatResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid value, error, significant figures or template' })
  format(@Body() dto: FormatRequestDto): FormatResponseDto {
    this.logger.debug('Received format request');
    return this.service.format(dto);
  }

  @Get('templates')
  @ApiResponse({ status: 200, type: [TemplateDescriptorDto] })
  templates(): TemplateDescriptorDto[] {
    this.logger.debug('Listing built-in templates');
    return this.service.listTemplates();
  }
}
