import { fail, ok, validationError } from '../../outcome/gateway-error';
import type { Result, ValidationError } from '../../outcome/gateway-error';
import { canonicalId } from '../../identity/identity.types';
import type { GameRequest } from '../game.types';

/**
 * POST /game/new body.
 *
 * Member and tenant ids may arrive as numbers from clients that parse
 * snowflakes naively; they are normalised to canonical decimal strings.
 */
export class NewGameDto {
  name?: string;
  tenantId?: string | number;
  isRanked?: boolean;
  isMobile?: boolean;
  notes?: string;
  sides?: (string | number)[][];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toId(value: unknown): string | null {
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) return canonicalId(value.trim());
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) return String(value);
  return null;
}

function optionalBoolean(body: Record<string, unknown>, key: string, fallback: boolean): boolean | null {
  const value = body[key];
  if (value === undefined) return fallback;
  return typeof value === 'boolean' ? value : null;
}

export function toGameRequest(body: unknown): Result<GameRequest, ValidationError> {
  if (!isRecord(body)) {
    return fail(validationError('Request body must be a JSON object.'));
  }

  if (typeof body.name !== 'string') {
    return fail(validationError('"name" must be a string.'));
  }

  const tenantId = toId(body.tenantId);
  if (tenantId === null) {
    return fail(validationError('"tenantId" must be a numeric id.'));
  }

  const isRanked = optionalBoolean(body, 'isRanked', false);
  if (isRanked === null) return fail(validationError('"isRanked" must be a boolean.'));
  const isMobile = optionalBoolean(body, 'isMobile', true);
  if (isMobile === null) return fail(validationError('"isMobile" must be a boolean.'));

  const notes = body.notes ?? '';
  if (typeof notes !== 'string') {
    return fail(validationError('"notes" must be a string.'));
  }

  if (!Array.isArray(body.sides)) {
    return fail(validationError('"sides" must be an array of member id arrays.'));
  }
  const rawSides: unknown[] = body.sides;
  const sides: string[][] = [];
  for (const side of rawSides) {
    if (!Array.isArray(side)) {
      return fail(validationError('"sides" must be an array of member id arrays.'));
    }
    const members: unknown[] = side;
    const ids: string[] = [];
    for (const member of members) {
      const id = toId(member);
      if (id === null) {
        return fail(validationError(`Member id ${JSON.stringify(member)} is not a numeric id.`));
      }
      ids.push(id);
    }
    sides.push(ids);
  }

  return ok({ name: body.name, tenantId, isRanked, isMobile, notes, sides });
}
