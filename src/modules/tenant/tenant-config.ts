import { registerAs } from '@nestjs/config';
import * as fs from 'node:fs';
import * as path from 'node:path';

export const FALLBACK_COMMAND_PREFIX = '$';

export interface TenantSettings {
  name?: string;
  commandPrefix?: string;
  /** Role a member must reach to use the bot; only enforced on the primary tenant. */
  minimumRoleName?: string;
}

export type TenantSettingKey = keyof TenantSettings;

export interface TenantConfig {
  /** File the settings were read from, `null` when none was found. */
  source: string | null;
  defaultPrefix: string;
  primaryTenantId: string | null;
  tenants: Record<string, TenantSettings>;
}

/**
 * Validate the raw JSON of a tenants file. Throws with a message naming the
 * offending field.
 */
export function parseTenantConfig(raw: unknown, source: string | null, fallbackPrefix: string): TenantConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error('Tenant config must be a JSON object.');
  }
  const doc: Record<string, unknown> = { ...raw };

  const defaultPrefix = doc.defaultPrefix ?? fallbackPrefix;
  if (typeof defaultPrefix !== 'string' || defaultPrefix.length === 0) {
    throw new Error('Tenant config "defaultPrefix" must be a non-empty string.');
  }

  const primary = doc.primaryTenantId ?? null;
  if (primary !== null && typeof primary !== 'string' && typeof primary !== 'number') {
    throw new Error('Tenant config "primaryTenantId" must be a string.');
  }

  const rawTenants = doc.tenants ?? {};
  if (typeof rawTenants !== 'object' || rawTenants === null || Array.isArray(rawTenants)) {
    throw new Error('Tenant config "tenants" must be an object keyed by tenant id.');
  }

  const tenants: Record<string, TenantSettings> = {};
  for (const [id, value] of Object.entries(rawTenants)) {
    tenants[id] = parseTenantSettings(id, value);
  }

  return {
    source,
    defaultPrefix,
    primaryTenantId: primary === null ? null : String(primary),
    tenants,
  };
}

function parseTenantSettings(id: string, value: unknown): TenantSettings {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`Tenant "${id}" settings must be an object.`);
  }
  const entry: Record<string, unknown> = { ...value };
  const settings: TenantSettings = {};
  for (const key of ['name', 'commandPrefix', 'minimumRoleName'] as const) {
    const field = entry[key];
    if (field === undefined) continue;
    if (typeof field !== 'string' || field.length === 0) {
      throw new Error(`Tenant "${id}" setting "${key}" must be a non-empty string.`);
    }
    settings[key] = field;
  }
  return settings;
}

/** Read the tenants file; a missing file yields an empty store. */
export function loadTenantConfig(filePath: string, fallbackPrefix: string): TenantConfig {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    return { source: null, defaultPrefix: fallbackPrefix, primaryTenantId: null, tenants: {} };
  }
  const raw: unknown = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  return parseTenantConfig(raw, resolved, fallbackPrefix);
}

export const tenantConfig = registerAs('tenants', (): TenantConfig =>
  loadTenantConfig(
    process.env.TENANT_CONFIG_PATH ?? 'config/tenants.json',
    process.env.DEFAULT_COMMAND_PREFIX || FALLBACK_COMMAND_PREFIX,
  ),
);
