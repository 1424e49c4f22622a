import type { GameRecord } from '../../domain/models/game.model';
import type { MemberRecord } from '../../domain/models/member.model';

export interface MemberView {
  id: number;
  externalId: string;
  displayName: string;
}

export interface GameSideView {
  position: number;
  members: MemberView[];
}

export interface GameSummaryView {
  id: number;
  tenantId: string;
  name: string;
  isRanked: boolean;
  isMobile: boolean;
  createdAt: string;
}

export interface GameView extends GameSummaryView {
  notes: string | null;
  sides: GameSideView[];
}

export interface UserView extends MemberView {
  /** Present only when the caller holds `games:read`. */
  games?: GameSummaryView[];
}

export function toMemberView(member: MemberRecord): MemberView {
  return { id: member.id, externalId: member.externalId, displayName: member.displayName };
}

export function toGameSummary(game: GameRecord): GameSummaryView {
  return {
    id: game.id,
    tenantId: game.tenantId,
    name: game.name,
    isRanked: game.isRanked,
    isMobile: game.isMobile,
    createdAt: game.createdAt.toISOString(),
  };
}

/** Members missing from `members` are dropped from their side. */
export function toGameView(game: GameRecord, members: MemberRecord[]): GameView {
  const byId = new Map(members.map((m) => [m.id, m]));
  return {
    ...toGameSummary(game),
    notes: game.notes,
    sides: game.sides.map((side) => ({
      position: side.position,
      members: side.memberIds.flatMap((id) => {
        const member = byId.get(id);
        return member ? [toMemberView(member)] : [];
      }),
    })),
  };
}
