import { createParamDecorator, ExecutionContext } from '@nestjs/common';

import type { AuthorizedPrincipal } from './scope-authorizer.service';
import type { AuthenticatedRequest } from './api-scope.guard';

/** Injects the principal the scope guard attached to the request. */
export const ApiPrincipal = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): AuthorizedPrincipal | undefined =>
    ctx.switchToHttp().getRequest<AuthenticatedRequest>().principal,
);
