import { InMemoryGameRepository } from '../../infrastructure/repositories/inmemory/inmemory-game.repository';
import { InMemoryMemberRepository } from '../../infrastructure/repositories/inmemory/inmemory-member.repository';
import type { Identity } from '../identity/identity.types';
import { GameRecordService } from './game-record.service';

const identity = (id: string, displayName: string): Identity => ({ tenantId: '100', id, displayName, topRoleRank: 0 });

describe('GameRecordService', () => {
  let games: InMemoryGameRepository;
  let members: InMemoryMemberRepository;
  let service: GameRecordService;

  const ann = identity('201', 'Ann');
  const bob = identity('202', 'Bob');
  const cy = identity('203', 'Cy');
  const dee = identity('204', 'Dee');
  const flags = { isRanked: true, isMobile: false };

  beforeEach(() => {
    games = new InMemoryGameRepository();
    members = new InMemoryMemberRepository();
    service = new GameRecordService(games, members);
  });

  // ─── createGameRecord ─────────────────────────────────────────────

  describe('createGameRecord', () => {
    it('should upsert members and return the game view', async () => {
      const { game, warnings } = await service.createGameRecord([[ann, bob], [cy, dee]], '100', 'Friday', flags);

      expect(warnings).toEqual([]);
      expect(game.id).toBe(1);
      expect(game.tenantId).toBe('100');
      expect(game.isRanked).toBe(true);
      expect(game.isMobile).toBe(false);
      expect(game.notes).toBeNull();
      expect(game.sides).toEqual([
        {
          position: 0,
          members: [
            { id: 1, externalId: '201', displayName: 'Ann' },
            { id: 2, externalId: '202', displayName: 'Bob' },
          ],
        },
        {
          position: 1,
          members: [
            { id: 3, externalId: '203', displayName: 'Cy' },
            { id: 4, externalId: '204', displayName: 'Dee' },
          ],
        },
      ]);
    });

    it('should warn about unequal side sizes', async () => {
      const { warnings } = await service.createGameRecord([[ann, bob], [cy]], '100', 'Uneven', flags);
      expect(warnings).toEqual(['Side imbalance: side sizes are 2, 1.']);
    });

    it('should warn when a recent game had the same sides in any order', async () => {
      await service.createGameRecord([[ann, bob], [cy, dee]], '100', 'First', flags);
      const { game, warnings } = await service.createGameRecord([[dee, cy], [bob, ann]], '100', 'Second', flags);
      expect(game.id).toBe(2);
      expect(warnings).toEqual(['Duplicate historical matchup: game 1 had the same sides.']);
    });

    it('should not compare matchups across tenants', async () => {
      await service.createGameRecord([[ann], [bob]], '100', 'First', flags);
      const { warnings } = await service.createGameRecord([[ann], [bob]], '999', 'Elsewhere', flags);
      expect(warnings).toEqual([]);
    });

    it('should refresh display names of known members', async () => {
      await service.createGameRecord([[ann], [bob]], '100', 'First', flags);
      await service.createGameRecord([[identity('201', 'Annie')], [cy]], '100', 'Second', flags);
      expect((await service.getUserByExternalId('201'))?.displayName).toBe('Annie');
    });
  });

  // ─── reads ────────────────────────────────────────────────────────

  describe('reads', () => {
    it('updateNotes should return the game with its notes', async () => {
      await service.createGameRecord([[ann], [bob]], '100', 'Friday', flags);
      const game = await service.updateNotes(1, 'good game');
      expect(game.notes).toBe('good game');
      expect(game.sides[1].members[0].displayName).toBe('Bob');
    });

    it('getGameById should return null for an unknown game', async () => {
      expect(await service.getGameById(5)).toBeNull();
    });

    it('listGamesForMember should return summaries newest first', async () => {
      await service.createGameRecord([[ann], [bob]], '100', 'One', flags);
      await service.createGameRecord([[cy], [ann]], '100', 'Two', flags);
      const summaries = await service.listGamesForMember(1);
      expect(summaries.map((g) => g.name)).toEqual(['Two', 'One']);
      expect(summaries[0]).not.toHaveProperty('sides');
      expect(typeof summaries[0].createdAt).toBe('string');
    });
  });
});
