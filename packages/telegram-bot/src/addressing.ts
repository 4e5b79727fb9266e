import type { PlatformChatType } from '@warden/protocol';
import { findCommand } from './commands.js';

export interface TextEntity {
  type: string;
  offset: number;
  length: number;
  /** Set for text_mention entities */
  userId?: number;
}

/** Transport-neutral view of an inbound text message */
export interface InboundMessage {
  updateId?: number;
  userId: number;
  chatId: number;
  chatType: PlatformChatType;
  text: string;
  entities: TextEntity[];
  /** Author of the message being replied to */
  replyToUserId?: number;
}

export interface BotIdentity {
  id: number;
  username: string;
}

export interface ParsedCommandText {
  name: string;
  /** Username after `@`, when the command names a bot */
  target?: string;
  args: string[];
}

const COMMAND_RE = /^\/([A-Za-z0-9_]+)(?:@([A-Za-z0-9_]+))?(?:\s+([\s\S]*))?$/;

/**
 * Split `/name@bot arg1 arg2` into its parts. Returns null for plain text.
 */
export function parseCommandText(text: string): ParsedCommandText | null {
  const match = COMMAND_RE.exec(text.trim());
  if (!match) return null;

  const [, name = '', target, rest] = match;
  return {
    name: name.toLowerCase(),
    target,
    args: rest ? rest.trim().split(/\s+/).filter(Boolean) : [],
  };
}

function sameUsername(a: string, b: string): boolean {
  return a.replace(/^@/, '').toLowerCase() === b.replace(/^@/, '').toLowerCase();
}

function entityText(message: InboundMessage, entity: TextEntity): string {
  return message.text.slice(entity.offset, entity.offset + entity.length);
}

/** True when a command names another bot explicitly */
export function isCommandForOtherBot(command: ParsedCommandText, bot: BotIdentity): boolean {
  return command.target !== undefined && !sameUsername(command.target, bot.username);
}

/**
 * Whether a group message is meant for the bot: a mention of its username,
 * a text_mention of its account, a `/command@bot`, one of its own commands
 * sent bare, or a reply to one of its messages. Bare commands it does not
 * know belong to other bots in the group.
 */
export function isAddressedToBot(message: InboundMessage, bot: BotIdentity): boolean {
  if (message.replyToUserId === bot.id) return true;

  const command = parseCommandText(message.text);
  if (command) {
    if (command.target !== undefined) return !isCommandForOtherBot(command, bot);
    if (findCommand(command.name)) return true;
  }

  return message.entities.some(entity => {
    switch (entity.type) {
      case 'mention':
        return sameUsername(entityText(message, entity), bot.username);
      case 'text_mention':
        return entity.userId === bot.id;
      default:
        return false;
    }
  });
}

/**
 * Remove mentions of the bot and the whitespace they leave behind.
 */
export function stripBotMention(message: InboundMessage, bot: BotIdentity): string {
  const ranges = message.entities
    .filter(entity =>
      (entity.type === 'mention' && sameUsername(entityText(message, entity), bot.username))
      || (entity.type === 'text_mention' && entity.userId === bot.id))
    .sort((a, b) => b.offset - a.offset);

  let text = message.text;
  for (const entity of ranges) {
    text = text.slice(0, entity.offset) + text.slice(entity.offset + entity.length);
  }
  return text.replace(/[ \t]{2,}/g, ' ').trim();
}
