import { Inject, Injectable } from '@nestjs/common';

import { GAME_REPOSITORY, MEMBER_REPOSITORY } from '../../domain/repositories/repository.tokens';
import type { IGameRepository } from '../../domain/repositories/game.repository.interface';
import type { IMemberRepository } from '../../domain/repositories/member.repository.interface';
import type { GameRecord } from '../../domain/models/game.model';
import type { MemberRecord } from '../../domain/models/member.model';
import type { Identity } from '../identity/identity.types';
import { toGameSummary, toGameView } from './game.views';
import type { GameSummaryView, GameView } from './game.views';
import type { GameCreated, GameFlags } from './game.types';

/** How far back the duplicate-matchup warning looks. */
export const MATCHUP_HISTORY_LIMIT = 50;

function matchupKey(sides: number[][]): string {
  return sides
    .map((ids) => [...ids].sort((a, b) => a - b).join(','))
    .sort()
    .join('|');
}

/**
 * Persistence capability for games: turns resolved identities into durable
 * member records and game rows, and reads them back as views.
 */
@Injectable()
export class GameRecordService {
  constructor(
    @Inject(GAME_REPOSITORY) private readonly games: IGameRepository,
    @Inject(MEMBER_REPOSITORY) private readonly members: IMemberRepository,
  ) {}

  async createGameRecord(
    groups: Identity[][],
    tenantId: string,
    name: string,
    flags: GameFlags,
  ): Promise<GameCreated> {
    const sides: number[][] = [];
    const stored: MemberRecord[] = [];
    for (const group of groups) {
      const ids: number[] = [];
      for (const identity of group) {
        const member = await this.members.upsert({ externalId: identity.id, displayName: identity.displayName });
        stored.push(member);
        ids.push(member.id);
      }
      sides.push(ids);
    }

    const warnings: string[] = [];
    const sizes = sides.map((ids) => ids.length);
    if (new Set(sizes).size > 1) {
      warnings.push(`Side imbalance: side sizes are ${sizes.join(', ')}.`);
    }

    const key = matchupKey(sides);
    const recent = await this.games.findRecentByTenant(tenantId, MATCHUP_HISTORY_LIMIT);
    const previous = recent.find((game) => matchupKey(game.sides.map((s) => s.memberIds)) === key);
    if (previous) {
      warnings.push(`Duplicate historical matchup: game ${previous.id} had the same sides.`);
    }

    const game = await this.games.create({
      tenantId,
      name,
      isRanked: flags.isRanked,
      isMobile: flags.isMobile,
      sides,
    });
    return { game: toGameView(game, stored), warnings };
  }

  async updateNotes(gameId: number, notes: string): Promise<GameView> {
    return this.toView(await this.games.updateNotes(gameId, notes));
  }

  async getGameById(gameId: number): Promise<GameView | null> {
    const game = await this.games.findById(gameId);
    return game ? this.toView(game) : null;
  }

  async getUserByExternalId(externalId: string): Promise<MemberRecord | null> {
    return this.members.findByExternalId(externalId);
  }

  async listGamesForMember(memberId: number): Promise<GameSummaryView[]> {
    const games = await this.games.findByMember(memberId);
    return games.map(toGameSummary);
  }

  private async toView(game: GameRecord): Promise<GameView> {
    const members = await this.members.findByIds(game.sides.flatMap((side) => side.memberIds));
    return toGameView(game, members);
  }
}
