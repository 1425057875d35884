import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { ERROR_MESSAGES } from '../../config/constants';
import { errorMessage, errorStack } from '../utils/error.util';
import { ErrorEnvelope } from '../interfaces/http-exception.interface';

const ROUTER_MISS = /^Cannot (GET|POST|PUT|PATCH|DELETE|HEAD|OPTIONS) /;

function describeException(exception: HttpException): {
  error: string;
  details?: string[];
} {
  const body = exception.getResponse();
  if (typeof body === 'string') return { error: body };

  const message = 'message' in body ? body.message : undefined;
  if (Array.isArray(message)) {
    const details = message.map(String);
    return { error: details[0] ?? exception.message, details };
  }
  if (typeof message === 'string') return { error: message };
  return { error: exception.message };
}

/**
 * Renders every HTTP error as an ErrorEnvelope. Unmatched routes become
 * "Endpoint not found"; non-HTTP errors become a bare 500.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    if (host.getType() !== 'http') {
      this.logger.error(
        `Unhandled ${host.getType()} error: ${errorMessage(exception)}`,
      );
      return;
    }

    const ctx = host.switchToHttp();
    const req = ctx.getRequest<Request>();
    const res = ctx.getResponse<Response>();

    let statusCode: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let error: string = ERROR_MESSAGES.internalError;
    let details: string[] | undefined;

    if (exception instanceof HttpException) {
      statusCode = exception.getStatus();
      ({ error, details } = describeException(exception));
      if (statusCode === HttpStatus.NOT_FOUND && ROUTER_MISS.test(error)) {
        error = ERROR_MESSAGES.endpointNotFound;
      }
    } else {
      this.logger.error(
        `Unhandled error on ${req.method} ${req.url}: ${errorMessage(exception)}`,
        errorStack(exception),
      );
    }

    if (res.headersSent) {
      res.end();
      return;
    }

    const body: ErrorEnvelope = {
      success: false,
      statusCode,
      error,
      ...(details ? { details } : {}),
      path: req.url,
      timestamp: new Date().toISOString(),
    };
    res.status(statusCode).json(body);
  }
}
