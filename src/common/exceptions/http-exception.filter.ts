import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { Logger } from '../interceptors/logging.interceptor';

export interface ErrorBody {
  statusCode: number;
  timestamp: string;
  path: string;
  error: string;
  message: string | string[];
  status?: string;
}

const readField = (source: object, key: string): unknown =>
  key in source ? Reflect.get(source, key) : undefined;

export function describeException(exception: unknown): Omit<ErrorBody, 'timestamp' | 'path'> {
  if (exception instanceof HttpException) {
    const statusCode = exception.getStatus();
    const payload = exception.getResponse();
    if (typeof payload === 'string') {
      return { statusCode, error: exception.name, message: payload };
    }
    const message = readField(payload, 'message');
    const status = readField(payload, 'status');
    return {
      statusCode,
      error: exception.name,
      message:
        typeof message === 'string' || Array.isArray(message) ? message : exception.message,
      // failed operation results carry their own status (verification_failed, ...)
      ...(typeof status === 'string' ? { status } : {}),
    };
  }
  if (exception instanceof Error) {
    return { statusCode: HttpStatus.INTERNAL_SERVER_ERROR, error: exception.name, message: 'Internal server error' };
  }
  return { statusCode: HttpStatus.INTERNAL_SERVER_ERROR, error: 'Internal Server Error', message: 'Internal server error' };
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const body = describeException(exception);

    const logged = Array.isArray(body.message) ? body.message.join(', ') : body.message;
    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      Logger.error(
        `${request.method} ${request.url} ${body.statusCode} - ${exception instanceof Error ? exception.message : logged}`,
        exception instanceof Error ? exception.stack || 'No stack trace available' : '',
        'HttpExceptionFilter',
      );
    } else {
      Logger.warn(`${request.method} ${request.url} ${body.statusCode} - ${logged}`, 'HttpExceptionFilter');
    }

    response.status(body.statusCode).json({
      ...body,
      timestamp: new Date().toISOString(),
      path: request.url,
    });
  }
}
