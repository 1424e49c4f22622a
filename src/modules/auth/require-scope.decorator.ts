import { SetMetadata } from '@nestjs/common';

export const REQUIRED_SCOPE_KEY = 'requiredScope';

/** Scope token an API application needs to call the decorated handler. */
export const RequireScope = (scope: string) => SetMetadata(REQUIRED_SCOPE_KEY, scope);
