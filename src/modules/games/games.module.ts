import { Module } from '@nestjs/common';

import { AuthModule } from '../auth/auth.module';
import { IdentityModule } from '../identity/identity.module';
import { GameCreationService } from './game-creation.service';
import { GameRecordService } from './game-record.service';
import { GamesController } from './games.controller';
import { UsersController } from './users.controller';

@Module({
  imports: [AuthModule, IdentityModule],
  controllers: [GamesController, UsersController],
  providers: [GameRecordService, GameCreationService],
  exports: [GameRecordService, GameCreationService]
})
export class GamesModule {}
