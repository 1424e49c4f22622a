/**
 * PostgresMemberRepository: IMemberRepository backed by the `members` table.
 */
import { Injectable } from '@nestjs/common';
import { PostgresService } from '../../../modules/database/postgres.service';
import type { IMemberRepository } from '../../../domain/repositories/member.repository.interface';
import type { MemberRecord, MemberUpsertInput } from '../../../domain/models/member.model';

export interface MemberRow {
  id: number;
  external_id: string;
  display_name: string;
  created_at: Date;
  updated_at: Date;
}

export function toMemberRecord(row: MemberRow): MemberRecord {
  return {
    id: row.id,
    externalId: row.external_id,
    displayName: row.display_name,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

@Injectable()
export class PostgresMemberRepository implements IMemberRepository {
  constructor(private readonly db: PostgresService) {}

  async upsert(input: MemberUpsertInput): Promise<MemberRecord> {
    const rows = await this.db.query<MemberRow>(
      `INSERT INTO members (external_id, display_name)
       VALUES ($1, $2)
       ON CONFLICT (external_id)
       DO UPDATE SET display_name = EXCLUDED.display_name, updated_at = now()
       RETURNING *`,
      [input.externalId, input.displayName],
    );
    return toMemberRecord(rows[0]);
  }

  async findByExternalId(externalId: string): Promise<MemberRecord | null> {
    const rows = await this.db.query<MemberRow>('SELECT * FROM members WHERE external_id = $1', [externalId]);
    return rows.length > 0 ? toMemberRecord(rows[0]) : null;
  }

  async findByIds(ids: number[]): Promise<MemberRecord[]> {
    if (ids.length === 0) return [];
    const rows = await this.db.query<MemberRow>('SELECT * FROM members WHERE id = ANY($1::int[])', [ids]);
    return rows.map(toMemberRecord);
  }
}
