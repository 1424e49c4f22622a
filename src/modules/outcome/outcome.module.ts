import { Global, Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';

import { OutcomeReporter } from './outcome-reporter.service';
import { GatewayExceptionFilter } from './gateway-exception.filter';

@Global()
@Module({
  providers: [
    OutcomeReporter,
    {
      provide: APP_FILTER,
      useClass: GatewayExceptionFilter
    }
  ],
  exports: [OutcomeReporter]
})
export class OutcomeModule {}
