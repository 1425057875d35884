import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { Request } from 'express';
import { Observable, map } from 'rxjs';

export interface SuccessEnvelope<T> {
  success: true;
  data: T;
  message: string;
}

function payloadMessage(data: unknown): string {
  if (
    data &&
    typeof data === 'object' &&
    'message' in data &&
    typeof data.message === 'string'
  ) {
    return data.message;
  }
  return '';
}

@Injectable()
export class ResponseInterceptor<T>
  implements NestInterceptor<T, SuccessEnvelope<T>>
{
  private readonly reflector: Reflector;

  constructor(reflector?: Reflector) {
    this.reflector = reflector ?? new Reflector();
  }

  intercept(
    context: ExecutionContext,
    next: CallHandler<T>,
  ): Observable<SuccessEnvelope<T>> {
    return next.handle().pipe(
      map((data) => {
        const metaMessage = this.reflector.getAllAndOverride<string>(
          'response_message',
          [context.getHandler(), context.getClass()],
        );

        const method = context.switchToHttp().getRequest<Request>()?.method;
        const defaultMessage =
          method === 'POST'
            ? 'Created successfully.'
            : method === 'PATCH' || method === 'PUT'
              ? 'Updated successfully.'
              : method === 'DELETE'
                ? 'Deleted successfully.'
                : 'OK.';

        const message = metaMessage || payloadMessage(data) || defaultMessage;

        return {
          success: true,
          data,
          message,
        };
      }),
    );
  }
}
