/**
 * Durable record of an external chat identity that took part in at least one game.
 * `externalId` is the chat platform's member id and is unique across tenants.
 */
export interface MemberRecord {
  id: number;
  externalId: string;
  displayName: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface MemberUpsertInput {
  externalId: string;
  displayName: string;
}
