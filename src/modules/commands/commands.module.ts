import { Module, OnModuleInit } from '@nestjs/common';

import { GamesModule } from '../games/games.module';
import { TenantModule } from '../tenant/tenant.module';
import { CommandDispatcherService } from './command-dispatcher.service';
import { NewGameCommand } from './new-game.command';
import { TenantGatekeeperService } from './tenant-gatekeeper.service';

@Module({
  imports: [TenantModule, GamesModule],
  providers: [TenantGatekeeperService, CommandDispatcherService, NewGameCommand],
  exports: [TenantGatekeeperService, CommandDispatcherService]
})
export class CommandsModule implements OnModuleInit {
  constructor(
    private readonly dispatcher: CommandDispatcherService,
    private readonly newGame: NewGameCommand,
  ) {}

  onModuleInit(): void {
    this.dispatcher.register(this.newGame);
  }
}
