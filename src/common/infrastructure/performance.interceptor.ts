import { CallHandler, ExecutionContext, Injectable, NestInterceptor, Logger } from '@nestjs/common';
import { Request } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';

@Injectable()
export class PerformanceInterceptor implements NestInterceptor {
  private readonly logger = new Logger(PerformanceInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const start = Date.now();
    const method = request.method;
    const url = request.url;
    const handler = `${context.getClass().name}.${context.getHandler().name}`;

    this.logger.log(`[${handler}] Request started`, { method, url });

    return next.handle().pipe(
      tap({
        next: () => {
          const duration = Date.now() - start;
          this.logger.log(`[${handler}] Request completed successfully`, {
            method,
            url,
            durationMs: duration
          });
        },
        error: (error: unknown) => {
          const duration = Date.now() - start;
          this.logger.error(`[${handler}] Request failed`, {
            method,
            url,
            durationMs: duration,
            error: error instanceof Error ? error.message : String(error)
          });
        }
      })
    );
  }
}
