import { Injectable } from '@nestjs/common';

import { IdentityResolverService } from '../identity/identity-resolver.service';
import { canonicalId } from '../identity/identity.types';
import type { Identity } from '../identity/identity.types';
import { GatewayLogger } from '../logging/gateway-logger.service';
import { LogCategory } from '../logging/log-levels';
import { fail, ok, validationError } from '../outcome/gateway-error';
import type { GatewayError, Result, ValidationError } from '../outcome/gateway-error';
import { GameRecordService } from './game-record.service';
import type { CreateGameOptions, GameCreated, GameRequest } from './game.types';

export const NOTES_NOT_SAVED_WARNING = 'Game notes could not be saved.';

@Injectable()
export class GameCreationService {
  constructor(
    private readonly identities: IdentityResolverService,
    private readonly records: GameRecordService,
    private readonly logger: GatewayLogger,
  ) {}

  /** Shape checks that need no remote call. `null` when the request is acceptable. */
  validate(request: GameRequest): ValidationError | null {
    if (request.name.trim().length === 0) {
      return validationError('Game name must not be empty.');
    }
    if (request.sides.length < 2) {
      return validationError('A game needs at least two sides.');
    }
    const emptySide = request.sides.findIndex((side) => side.length === 0);
    if (emptySide >= 0) {
      return validationError(`Side ${emptySide + 1} has no members.`);
    }
    const seen = new Set<string>();
    for (const memberId of request.sides.flat().map(canonicalId)) {
      if (seen.has(memberId)) {
        return validationError(`Member ${memberId} appears more than once in the game.`);
      }
      seen.add(memberId);
    }
    return null;
  }

  async createGame(request: GameRequest, options: CreateGameOptions = {}): Promise<Result<GameCreated>> {
    const { signal } = options;
    const invalid = this.validate(request);
    if (invalid) {
      this.logger.debug(LogCategory.GAME, `Rejected game request: ${invalid.reason}`);
      return fail(invalid);
    }

    this.logger.info(LogCategory.GAME, 'Game creation attempted', {
      tenantId: request.tenantId,
      name: request.name,
      sides: request.sides,
    });

    // Sequential and fail-fast: the first unresolvable member ends the request.
    const groups: Identity[][] = [];
    for (const side of request.sides) {
      const group: Identity[] = [];
      for (const memberId of side.map(canonicalId)) {
        if (signal?.aborted) return this.cancelled(request);
        const resolved = await this.identities.resolve(request.tenantId, memberId);
        if (!resolved.ok) return fail(resolved.error);
        group.push(resolved.value);
      }
      groups.push(group);
    }
    if (signal?.aborted) return this.cancelled(request);

    let created: GameCreated;
    try {
      created = await this.records.createGameRecord(groups, request.tenantId, request.name.trim(), {
        isRanked: request.isRanked,
        isMobile: request.isMobile,
      });
    } catch (error) {
      return fail<GatewayError>({ kind: 'persistence', detail: 'Game could not be created.', cause: error });
    }
    this.logger.info(LogCategory.GAME, `Game ${created.game.id} created`, {
      tenantId: request.tenantId,
      warnings: created.warnings,
    });

    if (request.notes.length === 0) {
      return ok(created);
    }
    try {
      const game = await this.records.updateNotes(created.game.id, request.notes);
      return ok({ game, warnings: created.warnings });
    } catch (error) {
      this.logger.error(LogCategory.GAME, `Notes for game ${created.game.id} could not be saved`, error);
      return ok({ game: created.game, warnings: [...created.warnings, NOTES_NOT_SAVED_WARNING] });
    }
  }

  private cancelled(request: GameRequest): Result<GameCreated> {
    this.logger.warn(LogCategory.GAME, 'Game creation cancelled before commit', { tenantId: request.tenantId });
    return fail({ kind: 'cancelled' });
  }
}
