/** A member resolved within one tenant's membership universe. */
export interface Identity {
  tenantId: string;
  id: string;
  displayName: string;
  /** Highest role position held; 0 without roles. */
  topRoleRank: number;
}

/** The directory answered: this member does not exist in the tenant. */
export class MemberNotFoundError extends Error {
  constructor(readonly tenantId: string, readonly memberId: string) {
    super(`Member ${memberId} not found in tenant ${tenantId}`);
    this.name = 'MemberNotFoundError';
  }
}

/**
 * Remote membership universe. Any failure other than `MemberNotFoundError` is
 * treated as transient by callers.
 */
export interface MembershipDirectory {
  hasTenant(tenantId: string): Promise<boolean>;
  fetchMember(tenantId: string, memberId: string): Promise<Identity>;
}

/** Tenant-scoped identity cache. Entries are served without re-validation. */
export interface MemberCache {
  get(tenantId: string, memberId: string): Identity | undefined;
  set(identity: Identity): void;
  clear(): void;
}

/** Decimal id without leading zeros, so `"0201"` and `"201"` name the same member. */
export function canonicalId(digits: string): string {
  return digits.replace(/^0+(?=\d)/, '');
}

export const MEMBERSHIP_DIRECTORY = 'MEMBERSHIP_DIRECTORY';
export const MEMBER_CACHE = 'MEMBER_CACHE';
