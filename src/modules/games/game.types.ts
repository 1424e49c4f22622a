import type { GameView } from './game.views';

/** A proposed game, before any identity is resolved. */
export interface GameRequest {
  name: string;
  tenantId: string;
  isRanked: boolean;
  isMobile: boolean;
  notes: string;
  /** Member ids per side, in side order then position-in-side. */
  sides: string[][];
}

export interface GameFlags {
  isRanked: boolean;
  isMobile: boolean;
}

export interface GameCreated {
  game: GameView;
  warnings: string[];
}

export interface CreateGameOptions {
  /** Aborting stops the workflow before anything is committed. */
  signal?: AbortSignal;
}
