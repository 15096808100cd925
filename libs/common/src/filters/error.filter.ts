import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { DispatchErrorCode, isDispatchErrorBody } from '../exceptions/dispatch.exception';

export interface ErrorResponseBody {
  meta: {
    code: number;
    message: string;
    error: string;
  };
  path: string;
  timestamp: string;
}

@Catch()
export class ErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger('ErrorHandler');

  catch(exception: unknown, host: ArgumentsHost): void {
    if (host.getType() !== 'http') {
      return;
    }

    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status = exception instanceof HttpException ? exception.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;
    const message = this.getErrorMessage(exception);

    const body: ErrorResponseBody = {
      meta: {
        code: status,
        message,
        error: this.getErrorCode(exception, status),
      },
      path: request.url,
      timestamp: new Date().toISOString(),
    };

    if (status >= 500) {
      this.logger.error(
        `${status} - ${request.method} ${request.url}: ${message}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.logger.warn(`${status} - ${request.method} ${request.url}: ${message}`);
    }

    response.status(status).json(body);
  }

  private getErrorMessage(exception: unknown): string {
    if (exception instanceof HttpException) {
      const response = exception.getResponse();
      if (typeof response === 'object' && response !== null) {
        const message: unknown = Reflect.get(response, 'message');
        if (Array.isArray(message)) {
          return message.join(', ');
        }
        if (typeof message === 'string') {
          return message;
        }
      }
      return exception.message;
    }
    return 'Internal server error';
  }

  private getErrorCode(exception: unknown, status: number): string {
    if (exception instanceof HttpException) {
      const response = exception.getResponse();
      if (isDispatchErrorBody(response)) {
        return response.code;
      }
      if (status === HttpStatus.BAD_REQUEST) {
        return DispatchErrorCode.VALIDATION_ERROR;
      }
      return exception.name;
    }
    return 'INTERNAL_ERROR';
  }
}
