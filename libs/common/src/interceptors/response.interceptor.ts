import { CallHandler, ExecutionContext, Injectable, NestInterceptor, StreamableFile } from '@nestjs/common';
import { HTTP_CODE_METADATA } from '@nestjs/common/constants';
import { Reflector } from '@nestjs/core';
import { Request } from 'express';
import { Observable, map } from 'rxjs';

const DEFAULT_MESSAGE_RESPONSE: Record<number, string> = {
  200: 'OK',
  201: 'Created',
  202: 'Accepted',
  204: 'NoContent',
};

export interface ResponseEnvelope {
  meta: {
    code: number;
    message: string;
    totalData?: number;
  };
  data: unknown;
}

/**
 * Wraps every successful JSON body as `{ meta: { code, message }, data }`.
 * Arrays also report `totalData`. Errors are rendered by ErrorFilter.
 */
@Injectable()
export class ResponseInterceptor implements NestInterceptor {
  public constructor(
    private readonly reflector: Reflector,
    private readonly excludePaths: string[] = [],
  ) {}

  public intercept(context: ExecutionContext, next: CallHandler<unknown>): Observable<unknown> {
    if (context.getType() !== 'http') {
      return next.handle();
    }

    const request = context.switchToHttp().getRequest<Request>();

    return next.handle().pipe(
      map(body => {
        if (body instanceof StreamableFile || this.excludePaths.includes(request.url)) {
          return body;
        }

        const status =
          this.reflector.get<number | undefined>(HTTP_CODE_METADATA, context.getHandler()) ??
          (request.method === 'POST' ? 201 : 200);

        const envelope: ResponseEnvelope = {
          meta: {
            code: status,
            message: DEFAULT_MESSAGE_RESPONSE[status] ?? '',
          },
          data: body === undefined ? null : body,
        };
        if (Array.isArray(body)) {
          envelope.meta.totalData = body.length;
        }
        return envelope;
      }),
    );
  }
}
