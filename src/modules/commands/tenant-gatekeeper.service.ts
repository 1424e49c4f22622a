import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { GatewayLogger } from '../logging/gateway-logger.service';
import { LogCategory } from '../logging/log-levels';
import { OutcomeReporter } from '../outcome/outcome-reporter.service';
import { TenantConfigService } from '../tenant/tenant-config.service';
import { topRoleRank } from './command-context';
import type { CommandContext } from './command-context';

export type GateVerdict = 'allowed' | 'denied-no-guild' | 'denied-insufficient-role';

/**
 * Decides whether a chat message is addressed to the bot and whether its
 * author may use it. Only the primary tenant enforces a minimum role.
 */
@Injectable()
export class TenantGatekeeperService {
  private readonly botUserId: string | undefined;

  constructor(
    private readonly tenants: TenantConfigService,
    private readonly logger: GatewayLogger,
    private readonly reporter: OutcomeReporter,
    config: ConfigService,
  ) {
    this.botUserId = config.get<string>('BOT_USER_ID') || undefined;
  }

  /** Mention triggers first, then the tenant's prefix. */
  resolveTriggers(ctx: Pick<CommandContext, 'guild'>): string[] {
    const mentions = this.botUserId ? [`<@${this.botUserId}> `, `<@!${this.botUserId}> `] : [];
    const prefix = ctx.guild ? this.tenants.getPrefix(ctx.guild.id) : this.tenants.defaultPrefix;
    return [...mentions, prefix];
  }

  matchTrigger(content: string, triggers: string[]): string | null {
    return triggers.find((trigger) => content.startsWith(trigger)) ?? null;
  }

  async evaluate(ctx: CommandContext): Promise<GateVerdict> {
    const { guild } = ctx;
    if (!guild) {
      return 'denied-no-guild';
    }
    if (guild.id !== this.tenants.primaryTenantId) {
      return 'allowed';
    }

    const roleName = this.tenants.getSetting(guild.id, 'minimumRoleName');
    if (!roleName) {
      return 'allowed';
    }

    const required = guild.roles.find((role) => role.name === roleName);
    if (!required) {
      this.logger.error(LogCategory.TENANT, `Minimum role "${roleName}" does not exist in tenant ${guild.id}`);
      return 'denied-insufficient-role';
    }

    if (topRoleRank(ctx.author) < required.position) {
      this.logger.debug(LogCategory.TENANT, `Member ${ctx.author.id} is below role "${roleName}"`, { tenantId: guild.id });
      await this.reporter.sendReply(ctx, `You must attain "${roleName}" role to use this bot`);
      return 'denied-insufficient-role';
    }
    return 'allowed';
  }
}
