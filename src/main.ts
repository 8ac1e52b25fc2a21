import 'reflect-metadata';
import * as dotenv from 'dotenv';
dotenv.config();
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { ValidationPipe, Logger } from '@nestjs/common';
import { PerformanceInterceptor } from './common/infrastructure/performance.interceptor';
import { GlobalExceptionFilter } from './common/infrastructure/global-exception.filter';
import { AppConfig } from './config/app.config';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  try {
    const app = await NestFactory.create(AppModule);

    // Global pipes and filters
    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true,
        transform: true,
        forbidNonWhitelisted: true
      })
    );

    app.useGlobalInterceptors(new PerformanceInterceptor());
    app.useGlobalFilters(new GlobalExceptionFilter());

    app.enableCors({
      origin: (process.env.CORS_ORIGINS || 'http://localhost:3000').split(','),
      methods: ['GET', 'POST'],
      allowedHeaders: ['Content-Type', 'X-Correlation-ID']
    });

    const config = new DocumentBuilder()
      .setTitle('Uncertainty Formatter API')
      .setDescription('Formats a measured value and its uncertainty with matched significant figures')
      .setVersion('1.0.0')
      .build();

    SwaggerModule.setup('api', app, SwaggerModule.createDocument(app, config));

    process.on('SIGTERM', () => {
      logger.log('SIGTERM received');
      app.close().catch((error: unknown) => {
        logger.error('Failed to close application', error instanceof Error ? error.stack : String(error));
      });
    });

    await app.listen(AppConfig.PORT);
    logger.log(`✓ Application listening on port ${AppConfig.PORT}`);
    logger.log(`✓ API Documentation: http://localhost:${AppConfig.PORT}/api`);

  } catch (error) {
    logger.error('Failed to bootstrap application', error instanceof Error ? error.stack : String(error));
    process.exit(1);
  }
}

void bootstrap();
