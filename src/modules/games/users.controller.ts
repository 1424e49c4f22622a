import { Controller, Get, Param, UseGuards } from '@nestjs/common';

import { ApiPrincipal } from '../auth/api-principal.decorator';
import { ApiScopeGuard } from '../auth/api-scope.guard';
import { RequireScope } from '../auth/require-scope.decorator';
import type { AuthorizedPrincipal } from '../auth/scope-authorizer.service';
import { notFound } from '../outcome/gateway-error';
import { GatewayException } from '../outcome/gateway.exception';
import { GameRecordService } from './game-record.service';
import { toMemberView } from './game.views';
import type { UserView } from './game.views';

@Controller('users')
@UseGuards(ApiScopeGuard)
export class UsersController {
  constructor(private readonly records: GameRecordService) {}

  /**
   * GET /users/:externalId
   * Applications that also hold `games:read` get the member's games embedded.
   */
  @Get(':externalId')
  @RequireScope('users:read')
  async getUser(
    @Param('externalId') externalId: string,
    @ApiPrincipal() principal: AuthorizedPrincipal | undefined,
  ): Promise<UserView> {
    const member = await this.records.getUserByExternalId(externalId);
    if (!member) {
      throw new GatewayException(notFound('user', externalId));
    }

    const view: UserView = toMemberView(member);
    if (principal?.scopes.has('games:read')) {
      view.games = await this.records.listGamesForMember(member.id);
    }
    return view;
  }
}
