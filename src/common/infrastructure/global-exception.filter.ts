import { ExceptionFilter, Catch, ArgumentsHost, HttpException, Logger } from '@nestjs/common';
import { Request, Response } from 'express';

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status = 500;
    let message = 'Internal Server Error';
    let code = 'INTERNAL_SERVER_ERROR';
    const errors: string[] = [];

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();

      if (typeof exceptionResponse === 'object' && exceptionResponse !== null) {
        const responseCode = 'code' in exceptionResponse ? exceptionResponse.code : undefined;
        const responseMessage = 'message' in exceptionResponse ? exceptionResponse.message : undefined;
        code = typeof responseCode === 'string' ? responseCode : 'HTTP_EXCEPTION';
        if (Array.isArray(responseMessage)) {
          errors.push(...responseMessage.map(String));
          message = errors.join('; ');
        } else {
          message = typeof responseMessage === 'string' ? responseMessage : exception.message;
        }
      } else {
        message = exceptionResponse;
      }
    } else if (exception instanceof Error) {
      message = exception.message;
    }

    const errorResponse = {
      statusCode: status,
      message,
      code,
      timestamp: new Date().toISOString(),
      path: request.url,
      method: request.method,
      ...(errors.length > 0 && { errors })
    };

    this.logger.error(`Exception caught: ${message}`, {
      statusCode: status,
      code,
      path: request.url,
      method: request.method,
      exception: exception instanceof Error ? exception.stack : String(exception)
    });

    response.status(status).json(errorResponse);
  }
}
