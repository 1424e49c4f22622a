import { Injectable } from '@nestjs/common';

import { GatewayLogger } from '../logging/gateway-logger.service';
import { LogCategory } from '../logging/log-levels';
import { CommandError } from '../commands/command-context';
import type { CommandContext, CommandInvocation } from '../commands/command-context';
import type { GatewayError, NotFoundSubject } from './gateway-error';

export const BASIC_AUTH_CHALLENGE = 'Basic realm="game-gateway"';
export const GENERIC_HTTP_DETAIL = 'Internal server error.';
export const GENERIC_COMMAND_REPLY = 'Unhandled error while running this command.';

export interface HttpProjection {
  status: number;
  body: { status: number; error: string; detail: string };
  headers: Record<string, string>;
}

const NOT_FOUND_LABELS: Record<NotFoundSubject, string> = {
  tenant: 'Tenant',
  member: 'Member',
  game: 'Game',
  user: 'User',
};

/**
 * Normalises gateway outcomes for both surfaces.
 *
 * HTTP: validation → 400, unauthorized → 401 + challenge, forbidden → 403,
 * not-found → 404, anything else → 500 with a generic body.
 * Commands: ignorable `CommandError`s are logged at WARN without a reply; all other
 * errors are logged at FATAL and answered with a generic message.
 */
@Injectable()
export class OutcomeReporter {
  constructor(private readonly logger: GatewayLogger) {}

  /** Pure mapping, no logging. */
  toHttp(error: GatewayError): HttpProjection {
    switch (error.kind) {
      case 'validation':
        return projection(400, 'Bad Request', error.reason);
      case 'auth':
        if (error.reason === 'unauthorized') {
          return projection(401, 'Unauthorized', error.detail, { 'WWW-Authenticate': BASIC_AUTH_CHALLENGE });
        }
        return projection(403, 'Forbidden', `Not authorised for scope ${error.requiredScope}.`);
      case 'not-found':
        return projection(404, 'Not Found', `${NOT_FOUND_LABELS[error.subject]} not found by ID ${error.id}.`);
      default:
        return projection(500, 'Internal Server Error', GENERIC_HTTP_DETAIL);
    }
  }

  /** Log a failed HTTP outcome with the acting principal and operation, then project it. */
  reportHttp(error: GatewayError): HttpProjection {
    const result = this.toHttp(error);
    const data = { ...this.actor(), status: result.status, kind: error.kind };

    switch (error.kind) {
      case 'validation':
        this.logger.warn(LogCategory.HTTP, `Rejected request: ${error.reason}`, data);
        break;
      case 'auth':
        this.logger.warn(LogCategory.AUTH, `Request ${error.reason}`, data);
        break;
      case 'not-found':
        this.logger.debug(LogCategory.HTTP, `${NOT_FOUND_LABELS[error.subject]} ${error.id} not found`, data);
        break;
      case 'transient':
      case 'persistence':
        this.logger.error(LogCategory.HTTP, `Request failed: ${error.detail}`, error.cause, data);
        break;
      case 'cancelled':
        this.logger.warn(LogCategory.HTTP, 'Request cancelled before commit', data);
        break;
      case 'internal':
        this.logger.fatal(LogCategory.HTTP, 'Unhandled exception', error.cause, data);
        break;
    }
    return result;
  }

  reportUnexpected(cause: unknown): HttpProjection {
    return this.reportHttp({ kind: 'internal', cause });
  }

  /** Reply text for a workflow error surfaced by a command handler. */
  toCommandReply(error: GatewayError): string {
    switch (error.kind) {
      case 'validation':
        return error.reason;
      case 'not-found':
        return `${NOT_FOUND_LABELS[error.subject]} not found by ID ${error.id}.`;
      case 'transient':
        return 'The chat platform did not answer in time. Try again shortly.';
      case 'auth':
        return 'You are not allowed to do that.';
      default:
        return GENERIC_COMMAND_REPLY;
    }
  }

  async reportCommandError(ctx: CommandContext, invocation: CommandInvocation | null, error: unknown): Promise<void> {
    if (invocation?.handlesOwnErrors) {
      return;
    }

    const data = {
      command: invocation?.name,
      tenantId: ctx.guild?.id,
      channelId: ctx.channelId,
      authorId: ctx.author.id,
    };

    if (error instanceof CommandError) {
      this.logger.warn(LogCategory.COMMAND, `Ignored ${error.kind} in command ${invocation?.name ?? '<none>'}: ${error.message}`, data);
      return;
    }

    this.logger.fatal(LogCategory.COMMAND, `Unhandled exception in command ${invocation?.name ?? '<none>'}`, error, data);
    await this.sendReply(ctx, GENERIC_COMMAND_REPLY);
  }

  /** Post to the invoking channel; a failed send is logged at ERROR and reported as `false`. */
  async sendReply(ctx: CommandContext, text: string): Promise<boolean> {
    try {
      await ctx.send(text);
      return true;
    } catch (error) {
      this.logger.error(LogCategory.COMMAND, `Reply to channel ${ctx.channelId} could not be sent`, error, {
        tenantId: ctx.guild?.id,
      });
      return false;
    }
  }

  private actor(): { principal?: string; operation?: string } {
    const ctx = this.logger.getContext();
    return { principal: ctx?.principal, operation: ctx?.operation };
  }
}

function projection(status: number, error: string, detail: string, headers: Record<string, string> = {}): HttpProjection {
  return { status, body: { status, error, detail }, headers };
}
