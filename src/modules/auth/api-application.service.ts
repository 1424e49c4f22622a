import { Inject, Injectable } from '@nestjs/common';
import { createHash, timingSafeEqual } from 'node:crypto';

import { API_APPLICATION_REPOSITORY } from '../../domain/repositories/repository.tokens';
import type { IApiApplicationRepository } from '../../domain/repositories/api-application.repository.interface';
import type { ApiApplicationRecord } from '../../domain/models/api-application.model';

export function hashToken(token: string): string {
  return createHash('sha256').update(token, 'utf8').digest('hex');
}

/**
 * Credential store for API applications. Tokens are compared by SHA-256 digest
 * in constant time.
 */
@Injectable()
export class ApiApplicationService {
  constructor(
    @Inject(API_APPLICATION_REPOSITORY) private readonly applications: IApiApplicationRepository,
  ) {}

  /** The matching application, or `null` when the app id or token is wrong. */
  async authenticate(appId: string, token: string): Promise<ApiApplicationRecord | null> {
    const app = await this.applications.findByAppId(appId);
    if (!app) {
      return null;
    }
    const expected = Buffer.from(app.tokenHash, 'hex');
    const presented = Buffer.from(hashToken(token), 'hex');
    if (expected.length !== presented.length || !timingSafeEqual(expected, presented)) {
      return null;
    }
    return app;
  }

  async register(appId: string, token: string, scopes: string): Promise<ApiApplicationRecord> {
    return this.applications.save({ appId, tokenHash: hashToken(token), scopes });
  }
}
