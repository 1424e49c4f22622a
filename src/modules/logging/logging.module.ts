import { Global, Module } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';

import { GatewayLogger } from './gateway-logger.service';
import { CorrelationMiddleware } from './correlation.middleware';
import { RequestLoggingInterceptor } from './request-logging.interceptor';

@Global()
@Module({
  providers: [
    GatewayLogger,
    CorrelationMiddleware,
    {
      provide: APP_INTERCEPTOR,
      useClass: RequestLoggingInterceptor
    }
  ],
  exports: [GatewayLogger, CorrelationMiddleware]
})
export class LoggingModule {}
