import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';

import { GatewayLogger } from './gateway-logger.service';
import { LogCategory } from './log-levels';

const SLOW_REQUEST_MS = 2000;

/**
 * Logs the request line, bodies at TRACE, and the response line for every
 * handled request. Failures are logged by the exception filter.
 */
@Injectable()
export class RequestLoggingInterceptor implements NestInterceptor {
  constructor(private readonly logger: GatewayLogger) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const httpContext = context.switchToHttp();
    const request = httpContext.getRequest<Request>();
    const response = httpContext.getResponse<Response>();
    const startedAt = Date.now();
    const url = request.originalUrl ?? request.url;

    this.logger.enrichContext({ operation: context.getHandler().name });

    this.logger.info(LogCategory.HTTP, `→ ${request.method} ${url}`, {
      userAgent: request.headers['user-agent'],
      ip: request.ip,
    });

    if (isNonEmptyObject(request.body)) {
      this.logger.trace(LogCategory.HTTP, 'Request body', { body: request.body });
    }

    return next.handle().pipe(
      tap((responseBody: unknown) => {
        const durationMs = Date.now() - startedAt;

        this.logger.info(LogCategory.HTTP, `← ${response.statusCode} ${request.method} ${url}`, {
          status: response.statusCode,
          durationMs,
        });

        if (responseBody !== undefined) {
          this.logger.trace(LogCategory.HTTP, 'Response body', { body: responseBody });
        }

        if (durationMs > SLOW_REQUEST_MS) {
          this.logger.warn(LogCategory.HTTP, `Slow request: ${durationMs}ms`, {
            status: response.statusCode,
            durationMs,
          });
        }
      }),
    );
  }
}

function isNonEmptyObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && Object.keys(value).length > 0;
}
