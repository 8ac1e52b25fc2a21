import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';
import { LoggerService } from '../utilities/logger.service';

export const CORRELATION_ID_HEADER = 'x-correlation-id';

@Injectable()
export class CorrelationIdMiddleware implements NestMiddleware {
  constructor(private readonly loggerService: LoggerService) {}

  use(req: Request, res: Response, next: NextFunction) {
    // Reuse the caller's correlation ID or generate a new one
    const header = req.headers[CORRELATION_ID_HEADER];
    const correlationId = typeof header === 'string' && header.length > 0 ? header : uuid();

    res.setHeader(CORRELATION_ID_HEADER, correlationId);
    this.loggerService.setCorrelationId(correlationId);

    this.loggerService.log('Incoming request', {
      correlationId,
      method: req.method,
      path: req.path,
      ip: req.ip,
      userAgent: req.get('user-agent')
    });

    const start = Date.now();
    res.on('finish', () => {
      this.loggerService.log('Request completed', {
        correlationId,
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        durationMs: Date.now() - start
      });
    });

    next();
  }
}
