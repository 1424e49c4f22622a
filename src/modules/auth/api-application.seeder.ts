import { Injectable, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { GatewayLogger } from '../logging/gateway-logger.service';
import { LogCategory } from '../logging/log-levels';
import { ApiApplicationService } from './api-application.service';

export const DEFAULT_SEED_SCOPES = 'users:read games:read games:new';

/**
 * Provisions one API application from the environment at start-up
 * (`API_SEED_APP_ID`, `API_SEED_APP_TOKEN`, `API_SEED_APP_SCOPES`). Saving an
 * existing app id replaces its token and scopes.
 */
@Injectable()
export class ApiApplicationSeeder implements OnApplicationBootstrap {
  constructor(
    private readonly applications: ApiApplicationService,
    private readonly config: ConfigService,
    private readonly logger: GatewayLogger,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    const appId = this.config.get<string>('API_SEED_APP_ID') ?? '';
    const token = this.config.get<string>('API_SEED_APP_TOKEN') ?? '';
    if (!appId && !token) {
      return;
    }
    if (!appId || !token) {
      this.logger.warn(LogCategory.AUTH, 'API_SEED_APP_ID and API_SEED_APP_TOKEN must be set together; no application seeded');
      return;
    }

    const scopes = this.config.get<string>('API_SEED_APP_SCOPES') || DEFAULT_SEED_SCOPES;
    await this.applications.register(appId, token, scopes);
    this.logger.info(LogCategory.AUTH, `Seeded API application ${appId}`, { scopes });
  }
}
