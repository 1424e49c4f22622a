import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
} from '@nestjs/common';
import type { Response } from 'express';

import { GatewayLogger } from '../logging/gateway-logger.service';
import { LogCategory } from '../logging/log-levels';
import { GatewayException } from './gateway.exception';
import { OutcomeReporter } from './outcome-reporter.service';

/**
 * Global filter: every error leaving a controller or guard is projected into a
 * `{ status, error, detail }` body by the reporter. Framework `HttpException`s
 * (unknown routes, pipe failures) keep their own status.
 */
@Catch()
export class GatewayExceptionFilter implements ExceptionFilter {
  constructor(
    private readonly reporter: OutcomeReporter,
    private readonly logger: GatewayLogger,
  ) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const ctx = this.logger.getContext();
      this.logger.warn(LogCategory.HTTP, `Framework rejection: ${exception.message}`, {
        principal: ctx?.principal,
        operation: ctx?.operation,
        status,
      });
      response.status(status).json({
        status,
        error: exception.name.replace(/Exception$/, ''),
        detail: describeHttpException(exception),
      });
      return;
    }

    const projection = exception instanceof GatewayException
      ? this.reporter.reportHttp(exception.gatewayError)
      : this.reporter.reportUnexpected(exception);

    for (const [name, value] of Object.entries(projection.headers)) {
      response.setHeader(name, value);
    }
    response.status(projection.status).json(projection.body);
  }
}

function describeHttpException(exception: HttpException): string {
  const body = exception.getResponse();
  if (typeof body === 'string') return body;
  if (typeof body === 'object' && body !== null && 'message' in body) {
    const message = body.message;
    if (typeof message === 'string') return message;
    if (Array.isArray(message)) return message.map(String).join('; ');
  }
  return exception.message;
}
