import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { GatewayLogger } from '../logging/gateway-logger.service';
import { LogCategory } from '../logging/log-levels';
import { DiscordMembershipDirectory } from './discord-membership.directory';
import { InMemoryMemberCache } from './in-memory-member.cache';
import { IdentityResolverService } from './identity-resolver.service';
import { MEMBER_CACHE, MEMBERSHIP_DIRECTORY } from './identity.types';

const DEFAULT_MEMBER_CACHE_TTL_MS = 300_000;

function cacheTtl(config: ConfigService): number {
  return Number(config.get<string>('MEMBER_CACHE_TTL_MS')) || DEFAULT_MEMBER_CACHE_TTL_MS;
}

@Module({
  providers: [
    {
      provide: MEMBER_CACHE,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => new InMemoryMemberCache(cacheTtl(config)),
    },
    {
      provide: MEMBERSHIP_DIRECTORY,
      inject: [ConfigService, GatewayLogger],
      useFactory: (config: ConfigService, logger: GatewayLogger) => {
        const botToken = config.get<string>('DISCORD_BOT_TOKEN') ?? '';
        if (!botToken) {
          logger.warn(LogCategory.IDENTITY, 'DISCORD_BOT_TOKEN is not set; member lookups will be rejected by Discord');
        }
        return new DiscordMembershipDirectory(
          {
            botToken,
            baseUrl: config.get<string>('DISCORD_API_BASE_URL'),
            roleCacheTtlMs: cacheTtl(config),
          },
          logger,
        );
      },
    },
    IdentityResolverService,
  ],
  exports: [IdentityResolverService, MEMBER_CACHE]
})
export class IdentityModule {}
