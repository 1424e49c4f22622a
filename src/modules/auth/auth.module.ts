import { Module } from '@nestjs/common';

import { ApiApplicationSeeder } from './api-application.seeder';
import { ApiApplicationService } from './api-application.service';
import { ScopeAuthorizer } from './scope-authorizer.service';
import { ApiScopeGuard } from './api-scope.guard';

@Module({
  providers: [ApiApplicationService, ApiApplicationSeeder, ScopeAuthorizer, ApiScopeGuard],
  exports: [ApiApplicationService, ScopeAuthorizer, ApiScopeGuard]
})
export class AuthModule {}
