import { GatewayLogger } from '../logging/gateway-logger.service';
import { LogCategory } from '../logging/log-levels';
import { MemberNotFoundError } from './identity.types';
import type { Identity, MembershipDirectory } from './identity.types';

export const DEFAULT_DISCORD_API_BASE_URL = 'https://discord.com/api/v10';
const REQUEST_TIMEOUT_MS = 10_000;

export interface DiscordDirectoryOptions {
  botToken: string;
  baseUrl?: string;
  /** How long a guild's role positions are reused. */
  roleCacheTtlMs: number;
  fetchImpl?: typeof fetch;
  now?: () => number;
}

interface DiscordRole {
  id: string;
  name: string;
  position: number;
}

interface DiscordGuildMember {
  nick?: string | null;
  roles: string[];
  user: { id: string; username: string; global_name?: string | null };
}

interface RoleCacheEntry {
  positions: Map<string, number>;
  expiresAt: number;
}

/** Raised for any non-404 failure talking to the Discord API. */
export class DiscordApiError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = 'DiscordApiError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDiscordRole(value: unknown): value is DiscordRole {
  return isRecord(value)
    && typeof value.id === 'string'
    && typeof value.name === 'string'
    && typeof value.position === 'number';
}

function isDiscordGuildMember(value: unknown): value is DiscordGuildMember {
  if (!isRecord(value) || !Array.isArray(value.roles) || !isRecord(value.user)) return false;
  return value.roles.every((r) => typeof r === 'string')
    && typeof value.user.id === 'string'
    && typeof value.user.username === 'string';
}

/**
 * MembershipDirectory over the Discord REST API. Guild role positions are
 * cached so a member's top role rank can be computed from the role ids on the
 * member object.
 */
export class DiscordMembershipDirectory implements MembershipDirectory {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;
  private readonly roleCache = new Map<string, RoleCacheEntry>();

  constructor(
    private readonly options: DiscordDirectoryOptions,
    private readonly logger: GatewayLogger,
  ) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_DISCORD_API_BASE_URL).replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? Date.now;
  }

  async hasTenant(tenantId: string): Promise<boolean> {
    return (await this.loadRolePositions(tenantId)) !== null;
  }

  async fetchMember(tenantId: string, memberId: string): Promise<Identity> {
    const positions = await this.loadRolePositions(tenantId);
    if (positions === null) {
      throw new DiscordApiError(404, `Guild ${tenantId} disappeared while fetching member ${memberId}`);
    }

    const response = await this.get(`/guilds/${encodeURIComponent(tenantId)}/members/${encodeURIComponent(memberId)}`);
    // 400 covers ids that are not snowflakes at all
    if (response.status === 404 || response.status === 400) {
      throw new MemberNotFoundError(tenantId, memberId);
    }
    if (!response.ok) {
      throw new DiscordApiError(response.status, `Discord API returned ${response.status}: ${await response.text()}`);
    }

    const body: unknown = await response.json();
    if (!isDiscordGuildMember(body)) {
      throw new DiscordApiError(response.status, `Unexpected guild member payload for ${memberId}`);
    }
    this.logger.trace(LogCategory.IDENTITY, 'Discord member payload', { member: body });

    return {
      tenantId,
      id: body.user.id,
      displayName: body.nick ?? body.user.global_name ?? body.user.username,
      topRoleRank: body.roles.reduce((max, roleId) => Math.max(max, positions.get(roleId) ?? 0), 0),
    };
  }

  /** Role id → position for a guild, or `null` when the guild does not exist. */
  private async loadRolePositions(tenantId: string): Promise<Map<string, number> | null> {
    const cached = this.roleCache.get(tenantId);
    if (cached && cached.expiresAt > this.now()) {
      return cached.positions;
    }

    const response = await this.get(`/guilds/${encodeURIComponent(tenantId)}/roles`);
    if (response.status === 404 || response.status === 403) {
      this.roleCache.delete(tenantId);
      return null;
    }
    if (!response.ok) {
      throw new DiscordApiError(response.status, `Discord API returned ${response.status}: ${await response.text()}`);
    }

    const body: unknown = await response.json();
    if (!Array.isArray(body) || !body.every(isDiscordRole)) {
      throw new DiscordApiError(response.status, `Unexpected role payload for guild ${tenantId}`);
    }
    const positions = new Map(body.map((role) => [role.id, role.position]));
    const now = this.now();
    for (const [cachedTenant, entry] of this.roleCache) {
      if (entry.expiresAt > now) break;
      this.roleCache.delete(cachedTenant);
    }
    this.roleCache.delete(tenantId);
    this.roleCache.set(tenantId, { positions, expiresAt: now + this.options.roleCacheTtlMs });
    return positions;
  }

  private async get(path: string): Promise<Response> {
    return this.fetchImpl(`${this.baseUrl}${path}`, {
      headers: { Authorization: `Bot ${this.options.botToken}` },
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
  }
}
