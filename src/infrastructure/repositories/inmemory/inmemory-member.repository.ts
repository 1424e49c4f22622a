/**
 * InMemoryMemberRepository: IMemberRepository backed by an in-memory Map.
 * Suitable for testing and lightweight deployments.
 */
import { Injectable } from '@nestjs/common';
import type { IMemberRepository } from '../../../domain/repositories/member.repository.interface';
import type { MemberRecord, MemberUpsertInput } from '../../../domain/models/member.model';

@Injectable()
export class InMemoryMemberRepository implements IMemberRepository {
  private readonly members: Map<number, MemberRecord> = new Map();
  private nextId = 1;

  async upsert(input: MemberUpsertInput): Promise<MemberRecord> {
    const existing = this.findStored(input.externalId);
    const now = new Date();
    if (existing) {
      const updated: MemberRecord = { ...existing, displayName: input.displayName, updatedAt: now };
      this.members.set(updated.id, updated);
      return { ...updated };
    }
    const record: MemberRecord = {
      id: this.nextId++,
      externalId: input.externalId,
      displayName: input.displayName,
      createdAt: now,
      updatedAt: now,
    };
    this.members.set(record.id, record);
    return { ...record };
  }

  async findByExternalId(externalId: string): Promise<MemberRecord | null> {
    const found = this.findStored(externalId);
    return found ? { ...found } : null;
  }

  async findByIds(ids: number[]): Promise<MemberRecord[]> {
    const results: MemberRecord[] = [];
    for (const id of new Set(ids)) {
      const member = this.members.get(id);
      if (member) results.push({ ...member });
    }
    return results;
  }

  /** Clears all data. Used by test teardowns. */
  clear(): void {
    this.members.clear();
    this.nextId = 1;
  }

  private findStored(externalId: string): MemberRecord | undefined {
    for (const member of this.members.values()) {
      if (member.externalId === externalId) return member;
    }
    return undefined;
  }
}
