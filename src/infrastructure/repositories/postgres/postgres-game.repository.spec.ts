import { Test } from '@nestjs/testing';

import { PostgresService } from '../../../modules/database/postgres.service';
import { PostgresGameRepository, toSides } from './postgres-game.repository';
import type { GameRow, SideMemberRow } from './postgres-game.repository';

describe('PostgresGameRepository', () => {
  let repository: PostgresGameRepository;
  let db: { query: jest.Mock; transaction: jest.Mock };
  let client: { query: jest.Mock };

  const createdAt = new Date('2026-01-02T03:04:05Z');
  const gameRow: GameRow = {
    id: 7,
    tenant_id: '100',
    name: 'Friday',
    is_ranked: false,
    is_mobile: true,
    notes: null,
    created_at: createdAt,
    updated_at: createdAt,
  };
  const sideRows: SideMemberRow[] = [
    { game_id: 7, side_position: 0, slot: 0, member_id: 1 },
    { game_id: 7, side_position: 0, slot: 1, member_id: 2 },
    { game_id: 7, side_position: 1, slot: 0, member_id: 3 },
  ];

  beforeEach(async () => {
    client = { query: jest.fn() };
    db = {
      query: jest.fn(),
      transaction: jest.fn((fn: (c: typeof client) => Promise<unknown>) => fn(client)),
    };
    const module = await Test.createTestingModule({
      providers: [PostgresGameRepository, { provide: PostgresService, useValue: db }],
    }).compile();
    repository = module.get(PostgresGameRepository);
  });

  describe('toSides', () => {
    it('should group ordered rows by side position', () => {
      expect(toSides(sideRows)).toEqual([
        { position: 0, memberIds: [1, 2] },
        { position: 1, memberIds: [3] },
      ]);
    });
  });

  describe('create', () => {
    it('should insert the game and its side members in one transaction', async () => {
      client.query
        .mockResolvedValueOnce({ rows: [gameRow] })
        .mockResolvedValueOnce({ rows: [sideRows[2], sideRows[0], sideRows[1]] });

      const game = await repository.create({
        tenantId: '100',
        name: 'Friday',
        isRanked: false,
        isMobile: true,
        sides: [[1, 2], [3]],
      });

      expect(db.transaction).toHaveBeenCalledTimes(1);
      expect(client.query).toHaveBeenNthCalledWith(
        1,
        expect.stringContaining('INSERT INTO games'),
        ['100', 'Friday', false, true],
      );
      expect(client.query).toHaveBeenNthCalledWith(
        2,
        expect.stringContaining('VALUES ($1, $2, $3, $4), ($5, $6, $7, $8), ($9, $10, $11, $12)'),
        [7, 0, 0, 1, 7, 0, 1, 2, 7, 1, 0, 3],
      );
      expect(game.sides).toEqual([
        { position: 0, memberIds: [1, 2] },
        { position: 1, memberIds: [3] },
      ]);
    });
  });

  describe('findById', () => {
    it('should load the side rows for the game', async () => {
      db.query.mockResolvedValueOnce([gameRow]).mockResolvedValueOnce(sideRows);
      const game = await repository.findById(7);
      expect(game?.name).toBe('Friday');
      expect(db.query).toHaveBeenLastCalledWith(expect.stringContaining('game_id = ANY($1::int[])'), [[7]]);
    });

    it('should return null without querying sides when the game is missing', async () => {
      db.query.mockResolvedValueOnce([]);
      expect(await repository.findById(8)).toBeNull();
      expect(db.query).toHaveBeenCalledTimes(1);
    });
  });

  describe('updateNotes', () => {
    it('should throw when no row was updated', async () => {
      db.query.mockResolvedValueOnce([]);
      await expect(repository.updateNotes(9, 'x')).rejects.toThrow('Game with id 9 not found');
    });

    it('should return the updated game', async () => {
      db.query.mockResolvedValueOnce([{ ...gameRow, notes: 'close one' }]).mockResolvedValueOnce(sideRows);
      expect((await repository.updateNotes(7, 'close one')).notes).toBe('close one');
    });
  });

  describe('findRecentByTenant', () => {
    it('should order newest first and apply the limit', async () => {
      db.query.mockResolvedValueOnce([]);
      await repository.findRecentByTenant('100', 50);
      expect(db.query).toHaveBeenCalledWith(expect.stringContaining('ORDER BY created_at DESC, id DESC LIMIT $2'), ['100', 50]);
    });
  });
});
