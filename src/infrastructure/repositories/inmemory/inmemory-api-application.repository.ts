/**
 * InMemoryApiApplicationRepository: IApiApplicationRepository backed by a Map.
 */
import { Injectable } from '@nestjs/common';
import type { IApiApplicationRepository } from '../../../domain/repositories/api-application.repository.interface';
import type { ApiApplicationRecord, ApiApplicationCreateInput } from '../../../domain/models/api-application.model';

@Injectable()
export class InMemoryApiApplicationRepository implements IApiApplicationRepository {
  private readonly applications: Map<string, ApiApplicationRecord> = new Map();

  async findByAppId(appId: string): Promise<ApiApplicationRecord | null> {
    const app = this.applications.get(appId);
    return app ? { ...app } : null;
  }

  async save(input: ApiApplicationCreateInput): Promise<ApiApplicationRecord> {
    const record: ApiApplicationRecord = {
      appId: input.appId,
      tokenHash: input.tokenHash,
      scopes: input.scopes,
      createdAt: this.applications.get(input.appId)?.createdAt ?? new Date(),
    };
    this.applications.set(record.appId, record);
    return { ...record };
  }

  /** Clears all data. Used by test teardowns. */
  clear(): void {
    this.applications.clear();
  }
}
