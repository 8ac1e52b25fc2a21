import { Module } from '@nestjs/common';
import { FormattingController } from './formatting.controller';
import { FormattingService } from './application/formatting.service';

@Module({
  controllers: [FormattingController],
  providers: [FormattingService],
  exports: [FormattingService]
})
export class FormattingModule {}
