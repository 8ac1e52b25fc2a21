import { Module, MiddlewareConsumer } from '@nestjs/common';
import { ThrottlerModule } from '@nestjs/throttler';
import { FormattingModule } from './formatting/formatting.module';
import { HealthController } from './health/health.controller';
import { CorrelationIdMiddleware } from './common/infrastructure/correlation-id.middleware';
import { LoggerService } from './common/utilities/logger.service';

@Module({
  imports: [
    ThrottlerModule.forRoot([
      {
        name: 'short',
        ttl: 1000,
        limit: 100,
      },
      {
        name: 'long',
        ttl: 60000,
        limit: 3000,
      }
    ]),
    FormattingModule,
  ],
  controllers: [HealthController],
  providers: [LoggerService]
})
export class AppModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(CorrelationIdMiddleware).forRoutes('*');
  }
}
