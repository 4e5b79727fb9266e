import type { AccessRequest, ChatType, DenyReason } from '@warden/protocol';
import { toChatType } from '@warden/protocol';
import {
  AuthError,
  isAuthError,
  structuredLog,
  type AuthorizationService,
  type AuthRepository,
} from '@warden/core';
import {
  type BotIdentity,
  type InboundMessage,
  isAddressedToBot,
  isCommandForOtherBot,
  parseCommandText,
  stripBotMention,
} from './addressing.js';
import {
  findCommand,
  parseCommandArgs,
  renderHelp,
  targetGroupOf,
  type ParsedCommand,
} from './commands.js';
import { executeAdminCommand } from './admin-commands.js';
import type { ConversationEngine } from './engine.js';
import { classifyError } from './error-utils.js';

/** Sends the gate's single reply for an event */
export type Responder = (text: string) => Promise<void>;

export type GateOutcome = 'ignored' | 'rejected' | 'executed' | 'forwarded' | 'failed' | 'cancelled';

export interface CommandGateOptions {
  service: AuthorizationService;
  repository: AuthRepository;
  engine: ConversationEngine;
  bot: BotIdentity;
}

const DENY_MESSAGES: Record<DenyReason, string> = {
  InsufficientRole: '⛔ You do not have permission to use this command.',
  WrongChatType: '⛔ This command is not available in this chat.',
  GroupNotAuthorized: '⛔ This group is not authorized to use the bot.',
  NotWhitelisted: '⛔ You are not on the whitelist. Ask an administrator for access.',
};

const TRANSIENT_FAILURE_MESSAGE = '⚠️ A temporary error occurred. Please try again shortly.';
const GENERIC_FAILURE_MESSAGE = '❌ Something went wrong. Contact an administrator if it keeps happening.';

type Routed =
  | { kind: 'command'; command: ParsedCommand; request: AccessRequest }
  | { kind: 'chat'; text: string; request: AccessRequest };

/**
 * Entry point for every inbound message: addressing → validation → decision →
 * reject, execute or forward. Sends at most one reply per message. An aborted
 * signal stops processing before any write or engine call; an abort that
 * arrives later only suppresses the reply.
 */
export class CommandGate {
  private readonly service: AuthorizationService;
  private readonly repository: AuthRepository;
  private readonly engine: ConversationEngine;
  private readonly bot: BotIdentity;

  constructor(options: CommandGateOptions) {
    this.service = options.service;
    this.repository = options.repository;
    this.engine = options.engine;
    this.bot = options.bot;
  }

  async handle(message: InboundMessage, responder: Responder, signal?: AbortSignal): Promise<GateOutcome> {
    const chatType = toChatType(message.chatType);
    if (chatType === null) return 'ignored';
    if (chatType === 'group' && !isAddressedToBot(message, this.bot)) return 'ignored';

    const reply = async (text: string): Promise<void> => {
      if (signal?.aborted) {
        structuredLog('debug', 'gate', 'reply_cancelled', { chatId: message.chatId, updateId: message.updateId });
        return;
      }
      await responder(text);
    };

    try {
      let routed: Routed | null;
      try {
        routed = this.route(message, chatType);
      } catch (err) {
        if (isAuthError(err, 'BadRequest')) {
          await reply(`⚠️ ${err.message}`);
          return 'rejected';
        }
        throw err;
      }
      if (routed === null) return 'ignored';

      if (signal?.aborted) return this.cancelled(message, 'before_decision');
      const verdict = await this.service.decide(routed.request);
      if (!verdict.allowed) {
        await reply(DENY_MESSAGES[verdict.reason]);
        return 'rejected';
      }

      // Nothing has been written yet; a late abort still stops here
      if (signal?.aborted) return this.cancelled(message, 'after_decision');

      if (routed.kind === 'chat') {
        const answer = await this.engine.respond(
          { userId: message.userId, chatId: message.chatId, text: routed.text },
          signal,
        );
        await reply(answer);
        return 'forwarded';
      }

      const command = routed.command;
      if (command.name === 'help') {
        const role = await this.repository.getRole(message.userId);
        await reply(renderHelp(role, chatType));
        return 'executed';
      }

      try {
        const text = await executeAdminCommand(command, {
          repository: this.repository,
          actorId: message.userId,
          verdict,
        });
        await reply(text);
        return 'executed';
      } catch (err) {
        if (isAuthError(err, 'InsufficientRole')) {
          await reply(DENY_MESSAGES.InsufficientRole);
          return 'rejected';
        }
        if (isAuthError(err, 'BadRequest')) {
          await reply(`⚠️ ${err.message}`);
          return 'rejected';
        }
        throw err;
      }
    } catch (err) {
      return this.fail(err, message, reply);
    }
  }

  /**
   * Turn the message into a command or a chat request. Throws BadRequest
   * for unknown commands and malformed arguments; null means ignore.
   */
  private route(message: InboundMessage, chatType: ChatType): Routed | null {
    const base = { userId: message.userId, chatId: message.chatId, chatType };
    const parsed = parseCommandText(message.text);

    if (parsed) {
      if (isCommandForOtherBot(parsed, this.bot)) return null;

      const def = findCommand(parsed.name);
      if (!def) {
        throw new AuthError('BadRequest', `Unknown command /${parsed.name}. Send /help for the list of commands.`);
      }
      const command = parseCommandArgs(def, parsed.args, { chatType, chatId: message.chatId });
      const targetGroupId = targetGroupOf(command);
      return {
        kind: 'command',
        command,
        request: { ...base, action: def.action, ...(targetGroupId !== undefined ? { targetGroupId } : {}) },
      };
    }

    const text = stripBotMention(message, this.bot);
    if (!text) return null;
    return { kind: 'chat', text, request: { ...base, action: 'chat' } };
  }

  private cancelled(message: InboundMessage, stage: string): GateOutcome {
    structuredLog('debug', 'gate', 'handle_cancelled', {
      stage,
      chatId: message.chatId,
      updateId: message.updateId,
    });
    return 'cancelled';
  }

  private async fail(err: unknown, message: InboundMessage, reply: Responder): Promise<GateOutcome> {
    const classified = classifyError(err);
    structuredLog('error', 'gate', 'handle_failed', {
      category: classified.category,
      code: classified.code,
      message: classified.message,
      retryable: classified.retryable,
      userId: message.userId,
      chatId: message.chatId,
      updateId: message.updateId,
    });

    try {
      await reply(classified.category === 'storage' || classified.category === 'timeout'
        ? TRANSIENT_FAILURE_MESSAGE
        : GENERIC_FAILURE_MESSAGE);
    } catch (replyErr) {
      structuredLog('error', 'gate', 'reply_failed', {
        chatId: message.chatId,
        message: classifyError(replyErr).message,
      });
    }
    return 'failed';
  }
}
