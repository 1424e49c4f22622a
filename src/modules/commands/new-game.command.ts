import { Injectable } from '@nestjs/common';

import { GameCreationService } from '../games/game-creation.service';
import { canonicalId } from '../identity/identity.types';
import { OutcomeReporter } from '../outcome/outcome-reporter.service';
import { CommandError } from './command-context';
import type { CommandContext, CommandHandler } from './command-context';

export const NEW_GAME_USAGE = 'Usage: newgame <name>: @member @member vs @member @member';

/**
 * Splits `<name>: <side> vs <side> [vs <side>…]` into a name and member id
 * groups. Members are mentions or bare ids.
 */
export function parseNewGameArgs(args: string[]): { name: string; sides: string[][] } | null {
  const text = args.join(' ');
  const colon = text.indexOf(':');
  if (colon < 0) return null;

  const name = text.slice(0, colon).trim();
  const sides = text
    .slice(colon + 1)
    .split(/\s+vs\s+/i)
    .map((side) => (side.match(/\d+/g) ?? []).map(canonicalId));
  return { name, sides };
}

/** Chat front end to the game creation workflow. */
@Injectable()
export class NewGameCommand implements CommandHandler {
  readonly name = 'newgame';
  readonly aliases = ['ng'];
  readonly handlesOwnErrors = false;

  constructor(
    private readonly creation: GameCreationService,
    private readonly reporter: OutcomeReporter,
  ) {}

  async execute(ctx: CommandContext, args: string[]): Promise<void> {
    if (!ctx.guild) {
      throw new CommandError('check-failure', 'newgame needs a guild');
    }
    const parsed = parseNewGameArgs(args);
    if (!parsed) {
      await this.reporter.sendReply(ctx, NEW_GAME_USAGE);
      throw new CommandError('user-input', `Could not parse arguments: ${args.join(' ')}`);
    }

    const result = await this.creation.createGame({
      name: parsed.name,
      tenantId: ctx.guild.id,
      isRanked: false,
      isMobile: true,
      notes: '',
      sides: parsed.sides,
    });
    if (!result.ok) {
      await this.reporter.sendReply(ctx, this.reporter.toCommandReply(result.error));
      return;
    }

    const lines = [`Game ${result.value.game.id} created.`, ...result.value.warnings];
    await this.reporter.sendReply(ctx, lines.join('\n'));
  }
}
