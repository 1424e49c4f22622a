/**
 * PostgresGameRepository: IGameRepository backed by `games` and
 * `game_side_members`. A game and its side rows are written in one transaction.
 */
import { Injectable } from '@nestjs/common';
import type { PoolClient } from 'pg';
import { PostgresService } from '../../../modules/database/postgres.service';
import type { IGameRepository } from '../../../domain/repositories/game.repository.interface';
import type { GameRecord, GameCreateInput, GameSideRecord } from '../../../domain/models/game.model';

export interface GameRow {
  id: number;
  tenant_id: string;
  name: string;
  is_ranked: boolean;
  is_mobile: boolean;
  notes: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface SideMemberRow {
  game_id: number;
  side_position: number;
  slot: number;
  member_id: number;
}

/** Rows must arrive ordered by side_position, slot. */
export function toSides(rows: SideMemberRow[]): GameSideRecord[] {
  const sides: GameSideRecord[] = [];
  for (const row of rows) {
    let side = sides.find((s) => s.position === row.side_position);
    if (!side) {
      side = { position: row.side_position, memberIds: [] };
      sides.push(side);
    }
    side.memberIds.push(row.member_id);
  }
  return sides;
}

export function toGameRecord(row: GameRow, sideRows: SideMemberRow[]): GameRecord {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    name: row.name,
    isRanked: row.is_ranked,
    isMobile: row.is_mobile,
    notes: row.notes,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    sides: toSides(sideRows.filter((s) => s.game_id === row.id)),
  };
}

@Injectable()
export class PostgresGameRepository implements IGameRepository {
  constructor(private readonly db: PostgresService) {}

  async create(input: GameCreateInput): Promise<GameRecord> {
    return this.db.transaction(async (client) => {
      const inserted = await client.query<GameRow>(
        `INSERT INTO games (tenant_id, name, is_ranked, is_mobile)
         VALUES ($1, $2, $3, $4)
         RETURNING *`,
        [input.tenantId, input.name, input.isRanked, input.isMobile],
      );
      const game = inserted.rows[0];
      const sideRows = await this.insertSides(client, game.id, input.sides);
      return toGameRecord(game, sideRows);
    });
  }

  async findById(id: number): Promise<GameRecord | null> {
    const rows = await this.db.query<GameRow>('SELECT * FROM games WHERE id = $1', [id]);
    const games = await this.withSides(rows);
    return games[0] ?? null;
  }

  async updateNotes(id: number, notes: string): Promise<GameRecord> {
    const rows = await this.db.query<GameRow>(
      'UPDATE games SET notes = $2, updated_at = now() WHERE id = $1 RETURNING *',
      [id, notes],
    );
    if (rows.length === 0) {
      throw new Error(`Game with id ${id} not found`);
    }
    const [game] = await this.withSides(rows);
    return game;
  }

  async findRecentByTenant(tenantId: string, limit: number): Promise<GameRecord[]> {
    const rows = await this.db.query<GameRow>(
      'SELECT * FROM games WHERE tenant_id = $1 ORDER BY created_at DESC, id DESC LIMIT $2',
      [tenantId, limit],
    );
    return this.withSides(rows);
  }

  async findByMember(memberId: number): Promise<GameRecord[]> {
    const rows = await this.db.query<GameRow>(
      `SELECT g.* FROM games g
       WHERE EXISTS (SELECT 1 FROM game_side_members s WHERE s.game_id = g.id AND s.member_id = $1)
       ORDER BY g.created_at DESC, g.id DESC`,
      [memberId],
    );
    return this.withSides(rows);
  }

  private async insertSides(client: PoolClient, gameId: number, sides: number[][]): Promise<SideMemberRow[]> {
    const values: number[] = [];
    const tuples: string[] = [];
    sides.forEach((memberIds, position) => {
      memberIds.forEach((memberId, slot) => {
        const base = values.length;
        tuples.push(`($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4})`);
        values.push(gameId, position, slot, memberId);
      });
    });
    const result = await client.query<SideMemberRow>(
      `INSERT INTO game_side_members (game_id, side_position, slot, member_id)
       VALUES ${tuples.join(', ')}
       RETURNING *`,
      values,
    );
    return [...result.rows].sort((a, b) => a.side_position - b.side_position || a.slot - b.slot);
  }

  private async withSides(rows: GameRow[]): Promise<GameRecord[]> {
    if (rows.length === 0) return [];
    const sideRows = await this.db.query<SideMemberRow>(
      `SELECT * FROM game_side_members
       WHERE game_id = ANY($1::int[])
       ORDER BY game_id, side_position, slot`,
      [rows.map((r) => r.id)],
    );
    return rows.map((row) => toGameRecord(row, sideRows));
  }
}
