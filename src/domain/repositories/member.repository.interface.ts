/**
 * IMemberRepository: persistence port for durable member records.
 *
 * Implementations:
 *   - PostgresMemberRepository
 *   - InMemoryMemberRepository (testing / lightweight deployments)
 */
import type { MemberRecord, MemberUpsertInput } from '../models/member.model';

export interface IMemberRepository {
  /** Insert the member or refresh its display name; returns the stored record. */
  upsert(input: MemberUpsertInput): Promise<MemberRecord>;

  findByExternalId(externalId: string): Promise<MemberRecord | null>;

  /** Records for the given ids; unknown ids are skipped. Order is unspecified. */
  findByIds(ids: number[]): Promise<MemberRecord[]>;
}
