import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';

import { GatewayLogger } from '../logging/gateway-logger.service';
import { LogCategory } from '../logging/log-levels';
import { tenantConfig } from './tenant-config';
import type { TenantSettings, TenantSettingKey } from './tenant-config';

/**
 * Read-only view of per-tenant settings. Unknown tenants fall back to the
 * process-wide defaults; lookups never throw.
 */
@Injectable()
export class TenantConfigService implements OnModuleInit {
  constructor(
    @Inject(tenantConfig.KEY) private readonly config: ConfigType<typeof tenantConfig>,
    private readonly logger: GatewayLogger,
  ) {}

  onModuleInit(): void {
    if (this.config.source === null) {
      this.logger.warn(LogCategory.TENANT, 'No tenant config file found; every tenant uses the default prefix', {
        defaultPrefix: this.config.defaultPrefix,
      });
      return;
    }
    this.logger.info(LogCategory.TENANT, `Loaded ${Object.keys(this.config.tenants).length} tenant(s)`, {
      source: this.config.source,
      primaryTenantId: this.config.primaryTenantId,
    });
  }

  get defaultPrefix(): string {
    return this.config.defaultPrefix;
  }

  get primaryTenantId(): string | null {
    return this.config.primaryTenantId;
  }

  hasTenant(tenantId: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.config.tenants, tenantId);
  }

  getPrefix(tenantId: string): string {
    if (!this.hasTenant(tenantId)) {
      this.logger.warn(LogCategory.TENANT, `Message received from unconfigured tenant ${tenantId}; using default prefix`);
      return this.config.defaultPrefix;
    }
    return this.config.tenants[tenantId].commandPrefix ?? this.config.defaultPrefix;
  }

  getSetting<K extends TenantSettingKey>(tenantId: string, key: K): TenantSettings[K] | undefined {
    if (!this.hasTenant(tenantId)) {
      return undefined;
    }
    return this.config.tenants[tenantId][key];
  }
}
