import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    // Browser noise (devtools probes, favicon) is answered but not logged
    const isNoiseRequest =
      request.url.includes('/.well-known/') || request.url.includes('/favicon.ico');

    const httpStatus =
      exception instanceof HttpException
        ? exception.getStatus()
        : HttpStatus.INTERNAL_SERVER_ERROR;

    const message =
      exception instanceof HttpException
        ? exception.getResponse()
        : 'Internal server error';

    if (!isNoiseRequest) {
      const summary = `${request.method} ${request.url} -> ${httpStatus}: ${JSON.stringify(message)}`;
      if (exception instanceof Error) {
        this.logger.error(`${summary} (${exception.name}: ${exception.message})`, exception.stack);
      } else {
        this.logger.error(`${summary} (raw exception: ${String(exception)})`);
      }
    }

    if (!response.headersSent) {
      response.status(httpStatus).json({
        statusCode: httpStatus,
        timestamp: new Date().toISOString(),
        path: request.url,
        message: typeof message === 'string' ? message : JSON.stringify(message),
      });
    }
  }
}
