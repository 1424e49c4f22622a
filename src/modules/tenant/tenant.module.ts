import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { tenantConfig } from './tenant-config';
import { TenantConfigService } from './tenant-config.service';

@Module({
  imports: [ConfigModule.forFeature(tenantConfig)],
  providers: [TenantConfigService],
  exports: [TenantConfigService]
})
export class TenantModule {}
