import { Injectable } from '@nestjs/common';

import { GatewayLogger } from '../logging/gateway-logger.service';
import { LogCategory } from '../logging/log-levels';
import { fail, forbidden, ok, unauthorized } from '../outcome/gateway-error';
import type { AuthError, Result } from '../outcome/gateway-error';
import { ApiApplicationService } from './api-application.service';

export type ScopeSet = ReadonlySet<string>;

export interface BasicCredentials {
  principal: string;
  secret: string;
}

export interface AuthorizedPrincipal {
  appId: string;
  scopes: ScopeSet;
}

export const INVALID_CREDENTIALS_DETAIL = 'Incorrect app ID or token.';

/** Whitespace-delimited scope string → set; duplicates collapse. */
export function parseScopes(raw: string): ScopeSet {
  return new Set(raw.split(/\s+/).filter((scope) => scope.length > 0));
}

/**
 * Decode an `Authorization: Basic <base64(id:secret)>` header.
 * Returns `null` for a missing or malformed header.
 */
export function parseBasicCredentials(header: string | undefined): BasicCredentials | null {
  if (!header) return null;
  const match = /^Basic\s+(\S+)\s*$/i.exec(header);
  if (!match) return null;
  const decoded = Buffer.from(match[1], 'base64').toString('utf8');
  const separator = decoded.indexOf(':');
  if (separator <= 0) return null;
  return {
    principal: decoded.slice(0, separator),
    secret: decoded.slice(separator + 1),
  };
}

/**
 * Resolves credentials to a scope set (authentication) and checks a single
 * operation's scope against it (authorisation). The two steps stay separate:
 * a valid credential lacking a scope is `forbidden`, never `unauthorized`.
 */
@Injectable()
export class ScopeAuthorizer {
  constructor(
    private readonly applications: ApiApplicationService,
    private readonly logger: GatewayLogger,
  ) {}

  async authorize(credentials: BasicCredentials | null): Promise<Result<AuthorizedPrincipal, AuthError>> {
    if (!credentials) {
      this.logger.warn(LogCategory.AUTH, 'Missing or malformed Authorization header');
      return fail(unauthorized(INVALID_CREDENTIALS_DETAIL));
    }

    const app = await this.applications.authenticate(credentials.principal, credentials.secret);
    if (!app) {
      this.logger.warn(LogCategory.AUTH, `Failed app authentication attempted with app ${credentials.principal}`);
      return fail(unauthorized(INVALID_CREDENTIALS_DETAIL));
    }

    this.logger.info(LogCategory.AUTH, `Successful app authentication for app ${app.appId}`);
    return ok({ appId: app.appId, scopes: parseScopes(app.scopes) });
  }

  requireScope(principal: AuthorizedPrincipal, scope: string): Result<AuthorizedPrincipal, AuthError> {
    if (!principal.scopes.has(scope)) {
      this.logger.warn(LogCategory.AUTH, `App ${principal.appId} lacks scope ${scope}`);
      return fail(forbidden(scope));
    }
    return ok(principal);
  }
}
