/**
 * PostgresApiApplicationRepository: IApiApplicationRepository backed by `api_applications`.
 */
import { Injectable } from '@nestjs/common';
import { PostgresService } from '../../../modules/database/postgres.service';
import type { IApiApplicationRepository } from '../../../domain/repositories/api-application.repository.interface';
import type { ApiApplicationRecord, ApiApplicationCreateInput } from '../../../domain/models/api-application.model';

interface ApiApplicationRow {
  app_id: string;
  token_hash: string;
  scopes: string;
  created_at: Date;
}

function toRecord(row: ApiApplicationRow): ApiApplicationRecord {
  return {
    appId: row.app_id,
    tokenHash: row.token_hash,
    scopes: row.scopes,
    createdAt: row.created_at,
  };
}

@Injectable()
export class PostgresApiApplicationRepository implements IApiApplicationRepository {
  constructor(private readonly db: PostgresService) {}

  async findByAppId(appId: string): Promise<ApiApplicationRecord | null> {
    const rows = await this.db.query<ApiApplicationRow>('SELECT * FROM api_applications WHERE app_id = $1', [appId]);
    return rows.length > 0 ? toRecord(rows[0]) : null;
  }

  async save(input: ApiApplicationCreateInput): Promise<ApiApplicationRecord> {
    const rows = await this.db.query<ApiApplicationRow>(
      `INSERT INTO api_applications (app_id, token_hash, scopes)
       VALUES ($1, $2, $3)
       ON CONFLICT (app_id)
       DO UPDATE SET token_hash = EXCLUDED.token_hash, scopes = EXCLUDED.scopes
       RETURNING *`,
      [input.appId, input.tokenHash, input.scopes],
    );
    return toRecord(rows[0]);
  }
}
