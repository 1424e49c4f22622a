import type { NextFunction, Request, Response } from 'express';

import { CorrelationMiddleware } from './correlation.middleware';
import { GatewayLogger } from './gateway-logger.service';
import type { CorrelationContext } from './gateway-logger.service';

describe('CorrelationMiddleware', () => {
  let logger: GatewayLogger;
  let middleware: CorrelationMiddleware;
  let setHeader: jest.Mock;

  function run(headers: Record<string, string>): CorrelationContext | undefined {
    let seen: CorrelationContext | undefined;
    const req = { headers, method: 'GET', originalUrl: '/games/7', url: '/games/7' } as unknown as Request;
    const res = { setHeader } as unknown as Response;
    const next: NextFunction = () => {
      seen = logger.getContext();
    };
    middleware.use(req, res, next);
    return seen;
  }

  beforeEach(() => {
    logger = new GatewayLogger();
    middleware = new CorrelationMiddleware(logger);
    setHeader = jest.fn();
  });

  it('should reuse an incoming X-Request-Id', () => {
    const ctx = run({ 'x-request-id': 'upstream-id' });
    expect(ctx?.requestId).toBe('upstream-id');
    expect(setHeader).toHaveBeenCalledWith('X-Request-Id', 'upstream-id');
  });

  it('should generate a request id when none is sent', () => {
    const ctx = run({});
    expect(ctx?.requestId).toMatch(/^[0-9a-f-]{36}$/);
    expect(ctx?.method).toBe('GET');
    expect(ctx?.path).toBe('/games/7');
  });

  it('should close the context after next() returns', () => {
    run({});
    expect(logger.getContext()).toBeUndefined();
  });
});
