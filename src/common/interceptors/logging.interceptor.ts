import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { Request } from 'express';

const LEVELS = ['error', 'warn', 'info', 'debug'] as const;
type LogLevel = (typeof LEVELS)[number];

const currentLevel = (): LogLevel => {
  const configured = process.env.LOG_LEVEL || 'debug';
  return LEVELS.find((level) => level === configured) ?? 'debug';
};

const enabled = (level: LogLevel): boolean => LEVELS.indexOf(level) <= LEVELS.indexOf(currentLevel());

export class Logger {
  static log(message: string, context?: string) {
    if (enabled('info')) {
      console.log(`[LOG] ${new Date().toISOString()} [${context || 'App'}] ${message}`);
    }
  }

  static error(message: string, trace: string, context?: string) {
    console.error(`[ERROR] ${new Date().toISOString()} [${context || 'App'}] ${message}`);
    if (trace) {
      console.error(trace);
    }
  }

  static warn(message: string, context?: string) {
    if (enabled('warn')) {
      console.warn(`[WARN] ${new Date().toISOString()} [${context || 'App'}] ${message}`);
    }
  }

  static debug(message: string, context?: string) {
    if (enabled('debug')) {
      console.debug(`[DEBUG] ${new Date().toISOString()} [${context || 'App'}] ${message}`);
    }
  }
}

// gateway callbacks carry signatures; keep them out of the logs
const REDACTED_FIELDS = new Set(['signature', 'razorpay_signature', 'password']);

const redact = (value: unknown): unknown => {
  if (Array.isArray(value)) return value.map(redact);
  if (typeof value !== 'object' || value === null) return value;
  return Object.fromEntries(
    Object.entries(value).map(([key, field]) => [key, REDACTED_FIELDS.has(key) ? '[redacted]' : redact(field)]),
  );
};

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const { method, url, body, query, params } = request;

    Logger.debug(
      `Request: ${method} ${url} \nBody: ${JSON.stringify(redact(body))} \nQuery: ${JSON.stringify(query)} \nParams: ${JSON.stringify(params)}`,
      'LoggingInterceptor',
    );

    const now = Date.now();
    return next.handle().pipe(
      tap(() => {
        Logger.debug(`Response: ${method} ${url} ${Date.now() - now}ms`, 'LoggingInterceptor');
      }),
    );
  }
}
