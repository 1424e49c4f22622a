import { parseScopes } from '../auth/scope-authorizer.service';
import { GameRecordService } from './game-record.service';
import { UsersController } from './users.controller';

describe('UsersController', () => {
  let records: { getUserByExternalId: jest.Mock; listGamesForMember: jest.Mock };
  let controller: UsersController;

  const member = {
    id: 3,
    externalId: '201',
    displayName: 'Ann',
    createdAt: new Date('2026-01-01T00:00:00Z'),
    updatedAt: new Date('2026-01-01T00:00:00Z'),
  };
  const summary = {
    id: 1,
    tenantId: '100',
    name: 'Friday',
    isRanked: false,
    isMobile: true,
    createdAt: '2026-01-01T00:00:00.000Z',
  };

  beforeEach(() => {
    records = {
      getUserByExternalId: jest.fn().mockResolvedValue(member),
      listGamesForMember: jest.fn().mockResolvedValue([summary]),
    };
    controller = new UsersController(records as unknown as GameRecordService);
  });

  it('should return the member without games for users:read only', async () => {
    const principal = { appId: 'app1', scopes: parseScopes('users:read') };
    await expect(controller.getUser('201', principal)).resolves.toEqual({ id: 3, externalId: '201', displayName: 'Ann' });
    expect(records.listGamesForMember).not.toHaveBeenCalled();
  });

  it('should embed game summaries when games:read is also held', async () => {
    const principal = { appId: 'app1', scopes: parseScopes('users:read games:read') };
    const user = await controller.getUser('201', principal);
    expect(user.games).toEqual([summary]);
    expect(records.listGamesForMember).toHaveBeenCalledWith(3);
  });

  it('should throw not-found for an unknown user', async () => {
    records.getUserByExternalId.mockResolvedValue(null);
    await expect(controller.getUser('404', undefined)).rejects.toMatchObject({
      gatewayError: { kind: 'not-found', subject: 'user', id: '404' },
    });
  });
});
