import { Body, Controller, Get, HttpCode, Param, ParseIntPipe, Post, Res, UseGuards } from '@nestjs/common';
import type { Response } from 'express';

import { ApiScopeGuard } from '../auth/api-scope.guard';
import { RequireScope } from '../auth/require-scope.decorator';
import { notFound } from '../outcome/gateway-error';
import { GatewayException, unwrapOrThrow } from '../outcome/gateway.exception';
import { NewGameDto, toGameRequest } from './dto/new-game.dto';
import { GameCreationService } from './game-creation.service';
import { GameRecordService } from './game-record.service';
import type { GameView } from './game.views';

/** Game ids are PostgreSQL `SERIAL` values. */
export const MAX_GAME_ID = 2_147_483_647;

export interface NewGameResponse {
  gameId: number;
  warnings: string[];
}

@Controller()
@UseGuards(ApiScopeGuard)
export class GamesController {
  constructor(
    private readonly creation: GameCreationService,
    private readonly records: GameRecordService,
  ) {}

  /**
   * GET /games/:id
   * A game with its sides and their members.
   */
  @Get('games/:id')
  @RequireScope('games:read')
  async getGame(@Param('id', ParseIntPipe) id: number): Promise<GameView> {
    if (id < 1 || id > MAX_GAME_ID) {
      throw new GatewayException(notFound('game', String(id)));
    }
    const game = await this.records.getGameById(id);
    if (!game) {
      throw new GatewayException(notFound('game', String(id)));
    }
    return game;
  }

  /**
   * POST /game/new
   * Resolves every side member, then records the game. A client that hangs up
   * before the record is written cancels the request.
   */
  @Post('game/new')
  @HttpCode(200)
  @RequireScope('games:new')
  async createGame(
    @Body() dto: NewGameDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<NewGameResponse> {
    const request = unwrapOrThrow(toGameRequest(dto));

    const abort = new AbortController();
    const onClose = (): void => {
      if (!res.writableFinished) abort.abort();
    };
    res.on('close', onClose);
    try {
      const created = unwrapOrThrow(await this.creation.createGame(request, { signal: abort.signal }));
      return { gameId: created.game.id, warnings: created.warnings };
    } finally {
      res.off('close', onClose);
    }
  }
}
