import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';

interface ExceptionResponse {
  message?: string | string[];
  error?: string;
}

export interface ErrorResponseBody {
  success: false;
  statusCode: number;
  error: string;
  message: string | string[];
  timestamp: string;
  path: string;
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger('Exception');

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const body = this.toBody(exception, request.url);

    response.status(body.statusCode).json(body);
  }

  toBody(exception: unknown, path: string): ErrorResponseBody {
    let status: number;
    let error: string;
    let message: string | string[];

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      error = exception.name;
      const exceptionResponse = exception.getResponse();

      if (typeof exceptionResponse === 'string') {
        message = exceptionResponse;
      } else {
        const responseObj = exceptionResponse as ExceptionResponse;
        message = responseObj.message || exception.message;
        error = responseObj.error || error;
      }

      if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
        this.logger.error(`${error}: ${exception.message}`, exception.stack);
      }
    } else {
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      error = 'InternalServerError';
      message = 'Internal server error';

      if (exception instanceof Error) {
        this.logger.error(`Unhandled error: ${exception.message}`, exception.stack);
      } else {
        this.logger.error(`Unhandled error: ${String(exception)}`);
      }
    }

    return {
      success: false,
      statusCode: status,
      error,
      message,
      timestamp: new Date().toISOString(),
      path,
    };
  }
}
