/**
 * IGameRepository: persistence port for games and their sides.
 *
 * Implementations:
 *   - PostgresGameRepository
 *   - InMemoryGameRepository (testing / lightweight deployments)
 */
import type { GameRecord, GameCreateInput } from '../models/game.model';

export interface IGameRepository {
  /** Create the game and all of its side rows atomically. */
  create(input: GameCreateInput): Promise<GameRecord>;

  findById(id: number): Promise<GameRecord | null>;

  /** Replace the free-text notes of an existing game. */
  updateNotes(id: number, notes: string): Promise<GameRecord>;

  /** Most recent games of a tenant, newest first. */
  findRecentByTenant(tenantId: string, limit: number): Promise<GameRecord[]>;

  /** Games a member played in, newest first. */
  findByMember(memberId: number): Promise<GameRecord[]>;
}
