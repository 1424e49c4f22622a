import { ConfigService } from '@nestjs/config';

import { InMemoryApiApplicationRepository } from '../../infrastructure/repositories/inmemory/inmemory-api-application.repository';
import { GatewayLogger } from '../logging/gateway-logger.service';
import { LogCategory } from '../logging/log-levels';
import { ApiApplicationSeeder, DEFAULT_SEED_SCOPES } from './api-application.seeder';
import { ApiApplicationService, hashToken } from './api-application.service';

describe('ApiApplicationSeeder', () => {
  let repository: InMemoryApiApplicationRepository;
  let logger: GatewayLogger;

  function seeder(env: Record<string, string>): ApiApplicationSeeder {
    return new ApiApplicationSeeder(new ApiApplicationService(repository), new ConfigService(env), logger);
  }

  beforeEach(() => {
    repository = new InMemoryApiApplicationRepository();
    logger = new GatewayLogger();
    for (const method of ['info', 'warn'] as const) {
      jest.spyOn(logger, method).mockImplementation();
    }
  });

  it('should register the configured application with its scopes', async () => {
    await seeder({ API_SEED_APP_ID: 'app1', API_SEED_APP_TOKEN: 'test-secret', API_SEED_APP_SCOPES: 'games:read' })
      .onApplicationBootstrap();

    const stored = await repository.findByAppId('app1');
    expect(stored?.tokenHash).toBe(hashToken('test-secret'));
    expect(stored?.scopes).toBe('games:read');
    expect(logger.info).toHaveBeenCalledWith(LogCategory.AUTH, 'Seeded API application app1', { scopes: 'games:read' });
  });

  it('should default to every scope', async () => {
    await seeder({ API_SEED_APP_ID: 'app1', API_SEED_APP_TOKEN: 'test-secret' }).onApplicationBootstrap();
    expect((await repository.findByAppId('app1'))?.scopes).toBe(DEFAULT_SEED_SCOPES);
  });

  it('should do nothing when no seed is configured', async () => {
    await seeder({}).onApplicationBootstrap();
    expect(await repository.findByAppId('app1')).toBeNull();
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should warn and skip when only half the credential is set', async () => {
    await seeder({ API_SEED_APP_ID: 'app1' }).onApplicationBootstrap();
    expect(await repository.findByAppId('app1')).toBeNull();
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});
