/**
 * InMemoryGameRepository: IGameRepository backed by an in-memory Map.
 * Ids are assigned sequentially from 1, mirroring a SERIAL column.
 */
import { Injectable } from '@nestjs/common';
import type { IGameRepository } from '../../../domain/repositories/game.repository.interface';
import type { GameRecord, GameCreateInput } from '../../../domain/models/game.model';

function copyGame(game: GameRecord): GameRecord {
  return {
    ...game,
    sides: game.sides.map((side) => ({ position: side.position, memberIds: [...side.memberIds] })),
  };
}

function newestFirst(a: GameRecord, b: GameRecord): number {
  return b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id;
}

@Injectable()
export class InMemoryGameRepository implements IGameRepository {
  private readonly games: Map<number, GameRecord> = new Map();
  private nextId = 1;

  async create(input: GameCreateInput): Promise<GameRecord> {
    const now = new Date();
    const record: GameRecord = {
      id: this.nextId++,
      tenantId: input.tenantId,
      name: input.name,
      isRanked: input.isRanked,
      isMobile: input.isMobile,
      notes: null,
      createdAt: now,
      updatedAt: now,
      sides: input.sides.map((memberIds, position) => ({ position, memberIds: [...memberIds] })),
    };
    this.games.set(record.id, record);
    return copyGame(record);
  }

  async findById(id: number): Promise<GameRecord | null> {
    const game = this.games.get(id);
    return game ? copyGame(game) : null;
  }

  async updateNotes(id: number, notes: string): Promise<GameRecord> {
    const existing = this.games.get(id);
    if (!existing) {
      throw new Error(`Game with id ${id} not found`);
    }
    const updated: GameRecord = { ...existing, notes, updatedAt: new Date() };
    this.games.set(id, updated);
    return copyGame(updated);
  }

  async findRecentByTenant(tenantId: string, limit: number): Promise<GameRecord[]> {
    return Array.from(this.games.values())
      .filter((g) => g.tenantId === tenantId)
      .sort(newestFirst)
      .slice(0, limit)
      .map(copyGame);
  }

  async findByMember(memberId: number): Promise<GameRecord[]> {
    return Array.from(this.games.values())
      .filter((g) => g.sides.some((side) => side.memberIds.includes(memberId)))
      .sort(newestFirst)
      .map(copyGame);
  }

  /** Clears all data. Used by test teardowns. */
  clear(): void {
    this.games.clear();
    this.nextId = 1;
  }
}
