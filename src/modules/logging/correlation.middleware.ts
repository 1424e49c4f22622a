import { Injectable, NestMiddleware } from '@nestjs/common';
import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'node:crypto';

import { GatewayLogger } from './gateway-logger.service';

/**
 * Opens the correlation context for an HTTP request. Runs before guards so that
 * authentication logs and the exception filter share the request id.
 */
@Injectable()
export class CorrelationMiddleware implements NestMiddleware {
  constructor(private readonly logger: GatewayLogger) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const incoming = req.headers['x-request-id'];
    const requestId = typeof incoming === 'string' && incoming.length > 0 ? incoming : randomUUID();
    res.setHeader('X-Request-Id', requestId);

    this.logger.runWithContext(
      {
        requestId,
        method: req.method,
        path: req.originalUrl ?? req.url,
        startTime: Date.now(),
      },
      () => next(),
    );
  }
}
