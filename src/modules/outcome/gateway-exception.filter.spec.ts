import { ArgumentsHost, BadRequestException, NotFoundException } from '@nestjs/common';

import { GatewayLogger } from '../logging/gateway-logger.service';
import { GatewayExceptionFilter } from './gateway-exception.filter';
import { unauthorized } from './gateway-error';
import { GatewayException } from './gateway.exception';
import { OutcomeReporter } from './outcome-reporter.service';

describe('GatewayExceptionFilter', () => {
  let logger: GatewayLogger;
  let filter: GatewayExceptionFilter;
  let status: jest.Mock;
  let json: jest.Mock;
  let setHeader: jest.Mock;
  let host: ArgumentsHost;

  beforeEach(() => {
    logger = new GatewayLogger();
    for (const method of ['debug', 'warn', 'error', 'fatal'] as const) {
      jest.spyOn(logger, method).mockImplementation();
    }
    filter = new GatewayExceptionFilter(new OutcomeReporter(logger), logger);

    json = jest.fn();
    setHeader = jest.fn();
    status = jest.fn().mockReturnValue({ json });
    const response = { status, setHeader };
    host = {
      switchToHttp: () => ({ getResponse: () => response }),
    } as unknown as ArgumentsHost;
  });

  it('should project a GatewayException through the reporter', () => {
    filter.catch(new GatewayException(unauthorized('Incorrect app ID or token.')), host);

    expect(setHeader).toHaveBeenCalledWith('WWW-Authenticate', 'Basic realm="game-gateway"');
    expect(status).toHaveBeenCalledWith(401);
    expect(json).toHaveBeenCalledWith({ status: 401, error: 'Unauthorized', detail: 'Incorrect app ID or token.' });
  });

  it('should keep the status of framework HttpExceptions', () => {
    filter.catch(new BadRequestException('Validation failed (numeric string is expected)'), host);

    expect(status).toHaveBeenCalledWith(400);
    expect(json).toHaveBeenCalledWith({
      status: 400,
      error: 'BadRequest',
      detail: 'Validation failed (numeric string is expected)',
    });
  });

  it('should describe unknown routes', () => {
    filter.catch(new NotFoundException('Cannot GET /nowhere'), host);
    expect(json).toHaveBeenCalledWith({ status: 404, error: 'NotFound', detail: 'Cannot GET /nowhere' });
  });

  it('should turn anything else into a generic 500', () => {
    filter.catch(new Error('database password is test-secret'), host);

    expect(status).toHaveBeenCalledWith(500);
    expect(json).toHaveBeenCalledWith({ status: 500, error: 'Internal Server Error', detail: 'Internal server error.' });
    expect(logger.fatal).toHaveBeenCalled();
  });
});
