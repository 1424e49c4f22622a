import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { Request } from 'express';

import { GatewayLogger } from '../logging/gateway-logger.service';
import { GatewayException } from '../outcome/gateway.exception';
import { REQUIRED_SCOPE_KEY } from './require-scope.decorator';
import { ScopeAuthorizer, parseBasicCredentials } from './scope-authorizer.service';
import type { AuthorizedPrincipal } from './scope-authorizer.service';

export interface AuthenticatedRequest extends Request {
  principal?: AuthorizedPrincipal;
}

/**
 * Authenticates every API request with Basic application credentials and, when
 * the handler declares `@RequireScope`, checks that scope.
 */
@Injectable()
export class ApiScopeGuard implements CanActivate {
  constructor(
    private readonly authorizer: ScopeAuthorizer,
    private readonly reflector: Reflector,
    private readonly logger: GatewayLogger,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    this.logger.enrichContext({ operation: context.getHandler().name });

    const authenticated = await this.authorizer.authorize(parseBasicCredentials(request.headers.authorization));
    if (!authenticated.ok) {
      throw new GatewayException(authenticated.error);
    }
    this.logger.enrichContext({ principal: authenticated.value.appId });

    const requiredScope = this.reflector.getAllAndOverride<string | undefined>(REQUIRED_SCOPE_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (requiredScope) {
      const authorized = this.authorizer.requireScope(authenticated.value, requiredScope);
      if (!authorized.ok) {
        throw new GatewayException(authorized.error);
      }
    }

    request.principal = authenticated.value;
    return true;
  }
}
