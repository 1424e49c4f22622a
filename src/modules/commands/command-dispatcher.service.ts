import { Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';

import { GatewayLogger } from '../logging/gateway-logger.service';
import { LogCategory } from '../logging/log-levels';
import { OutcomeReporter } from '../outcome/outcome-reporter.service';
import { CommandError } from './command-context';
import type { CommandContext, CommandHandler } from './command-context';
import { TenantGatekeeperService } from './tenant-gatekeeper.service';

export type DispatchOutcome =
  | { status: 'ignored' }
  | { status: 'rejected'; command: string; error: CommandError }
  | { status: 'completed'; command: string }
  | { status: 'failed'; command: string; error: unknown };

@Injectable()
export class CommandDispatcherService {
  private readonly handlers = new Map<string, CommandHandler>();

  constructor(
    private readonly gatekeeper: TenantGatekeeperService,
    private readonly reporter: OutcomeReporter,
    private readonly logger: GatewayLogger,
  ) {}

  register(handler: CommandHandler): void {
    for (const name of [handler.name, ...(handler.aliases ?? [])]) {
      const key = name.toLowerCase();
      if (this.handlers.has(key)) {
        throw new Error(`Command name "${name}" is already registered`);
      }
      this.handlers.set(key, handler);
    }
    this.logger.debug(LogCategory.COMMAND, `Registered command ${handler.name}`, { aliases: handler.aliases ?? [] });
  }

  /** Runs one message inside its own correlation context. Always settles with an outcome. */
  async dispatch(ctx: CommandContext): Promise<DispatchOutcome> {
    return this.logger.runWithContext(
      { requestId: randomUUID(), tenantId: ctx.guild?.id, startTime: Date.now() },
      () => this.route(ctx),
    );
  }

  private async route(ctx: CommandContext): Promise<DispatchOutcome> {
    const trigger = this.gatekeeper.matchTrigger(ctx.content, this.gatekeeper.resolveTriggers(ctx));
    if (trigger === null) {
      return { status: 'ignored' };
    }

    const [name, ...args] = ctx.content.slice(trigger.length).trim().split(/\s+/);
    if (!name) {
      return { status: 'ignored' };
    }

    const handler = this.handlers.get(name.toLowerCase());
    if (!handler) {
      return this.reject(ctx, name, new CommandError('command-not-found', `Command "${name}" is not found`));
    }
    this.logger.enrichContext({ operation: handler.name });

    const verdict = await this.gatekeeper.evaluate(ctx);
    if (verdict !== 'allowed') {
      return this.reject(ctx, handler.name, new CommandError('check-failure', `The check functions for command ${handler.name} failed (${verdict}).`));
    }

    this.logger.info(LogCategory.COMMAND, `Running command ${handler.name}`, {
      tenantId: ctx.guild?.id,
      authorId: ctx.author.id,
    });
    try {
      await handler.execute(ctx, args);
    } catch (error) {
      await this.reporter.reportCommandError(ctx, handler, error);
      if (error instanceof CommandError) {
        return { status: 'rejected', command: handler.name, error };
      }
      return { status: 'failed', command: handler.name, error };
    }
    return { status: 'completed', command: handler.name };
  }

  private async reject(ctx: CommandContext, command: string, error: CommandError): Promise<DispatchOutcome> {
    await this.reporter.reportCommandError(ctx, { name: command }, error);
    return { status: 'rejected', command, error };
  }
}
