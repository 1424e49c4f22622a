/**
 * Domain models for persisted games.
 *
 * Sides are stored in request order; `memberIds` reference `MemberRecord.id`
 * in position-in-side order.
 */
export interface GameSideRecord {
  position: number;
  memberIds: number[];
}

export interface GameRecord {
  id: number;
  tenantId: string;
  name: string;
  isRanked: boolean;
  isMobile: boolean;
  notes: string | null;
  createdAt: Date;
  updatedAt: Date;
  sides: GameSideRecord[];
}

export interface GameCreateInput {
  tenantId: string;
  name: string;
  isRanked: boolean;
  isMobile: boolean;
  /** Member ids per side, in side order. */
  sides: number[][];
}
