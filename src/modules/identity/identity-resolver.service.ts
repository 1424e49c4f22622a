import { Inject, Injectable } from '@nestjs/common';

import { GatewayLogger } from '../logging/gateway-logger.service';
import { LogCategory } from '../logging/log-levels';
import { fail, notFound, ok } from '../outcome/gateway-error';
import type { NotFoundError, Result, TransientError } from '../outcome/gateway-error';
import { MEMBER_CACHE, MEMBERSHIP_DIRECTORY, MemberNotFoundError } from './identity.types';
import type { Identity, MemberCache, MembershipDirectory } from './identity.types';

export type IdentityResolution = Result<Identity, NotFoundError | TransientError>;

/**
 * Cache-then-fetch member resolution. A cache hit makes no remote call. On a
 * miss the tenant is checked first, then the member is fetched and cached.
 */
@Injectable()
export class IdentityResolverService {
  constructor(
    @Inject(MEMBERSHIP_DIRECTORY) private readonly directory: MembershipDirectory,
    @Inject(MEMBER_CACHE) private readonly cache: MemberCache,
    private readonly logger: GatewayLogger,
  ) {}

  async resolve(tenantId: string, memberId: string): Promise<IdentityResolution> {
    const cached = this.cache.get(tenantId, memberId);
    if (cached) {
      this.logger.debug(LogCategory.IDENTITY, 'Member cache hit', { tenantId, memberId });
      return ok(cached);
    }

    let tenantKnown: boolean;
    try {
      tenantKnown = await this.directory.hasTenant(tenantId);
    } catch (error) {
      return this.transient(`Tenant lookup failed for ${tenantId}`, error);
    }
    if (!tenantKnown) {
      this.logger.debug(LogCategory.IDENTITY, `Tenant ${tenantId} not found`);
      return fail(notFound('tenant', tenantId));
    }

    try {
      const identity = await this.directory.fetchMember(tenantId, memberId);
      this.cache.set(identity);
      this.logger.debug(LogCategory.IDENTITY, 'Member fetched', { tenantId, memberId });
      return ok(identity);
    } catch (error) {
      if (error instanceof MemberNotFoundError) {
        this.logger.debug(LogCategory.IDENTITY, `Member ${memberId} not found in tenant ${tenantId}`);
        return fail(notFound('member', memberId));
      }
      return this.transient(`Member fetch failed for ${memberId}`, error);
    }
  }

  private transient(detail: string, cause: unknown): IdentityResolution {
    this.logger.warn(LogCategory.IDENTITY, detail, {
      reason: cause instanceof Error ? cause.message : String(cause),
    });
    return fail({ kind: 'transient', detail, cause });
  }
}
