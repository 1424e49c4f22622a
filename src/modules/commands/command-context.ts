/**
 * Shapes the chat transport hands to the command surface. The transport itself
 * lives outside this service; it adapts its own message events into these.
 */

export interface CommandRole {
  id: string;
  name: string;
  /** Hierarchy position; higher outranks lower. */
  position: number;
}

export interface CommandMember {
  id: string;
  displayName: string;
  roles: CommandRole[];
}

export interface CommandGuild {
  id: string;
  roles: CommandRole[];
}

export interface CommandContext {
  /** `null` for direct messages. */
  guild: CommandGuild | null;
  channelId: string;
  author: CommandMember;
  content: string;
  /** Post a message to the invoking channel. */
  send(text: string): Promise<void>;
}

export interface CommandInvocation {
  name: string;
  /** The handler reports its own failures; the reporter stays silent. */
  handlesOwnErrors?: boolean;
}

export interface CommandHandler extends CommandInvocation {
  aliases?: string[];
  execute(ctx: CommandContext, args: string[]): Promise<void>;
}

export type CommandErrorKind = 'command-not-found' | 'user-input' | 'check-failure';

/** Errors the reporter logs quietly without replying. */
export class CommandError extends Error {
  constructor(readonly kind: CommandErrorKind, message: string) {
    super(message);
    this.name = 'CommandError';
  }
}

/** Highest role position held by a member; members without roles rank 0. */
export function topRoleRank(member: CommandMember): number {
  return member.roles.reduce((max, role) => Math.max(max, role.position), 0);
}
