import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { RepositoryModule } from '../../infrastructure/repositories/repository.module';
import { AuthModule } from '../auth/auth.module';
import { CommandsModule } from '../commands/commands.module';
import { GamesModule } from '../games/games.module';
import { IdentityModule } from '../identity/identity.module';
import { CorrelationMiddleware } from '../logging/correlation.middleware';
import { LoggingModule } from '../logging/logging.module';
import { OutcomeModule } from '../outcome/outcome.module';
import { TenantModule } from '../tenant/tenant.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    LoggingModule,
    OutcomeModule,
    RepositoryModule.register(),
    TenantModule,
    AuthModule,
    IdentityModule,
    GamesModule,
    CommandsModule
  ]
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(CorrelationMiddleware).forRoutes('*');
  }
}
