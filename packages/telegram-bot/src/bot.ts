import { Telegraf, Context } from 'telegraf';
import type { MessageEntity } from 'telegraf/types';
import { TELEGRAM_MSG_LIMIT } from '@warden/protocol';
import {
  AuthStore,
  AuthorizationService,
  RetryingRepository,
  bootstrapSuperAdmins,
  loadConfig,
  setLogLevel,
  structuredLog,
  type AuthRepository,
} from '@warden/core';
import type { BotIdentity, InboundMessage, TextEntity } from './addressing.js';
import { CommandGate } from './gate.js';
import { HttpConversationEngine, type ConversationEngine } from './engine.js';
import { classifyError } from './error-utils.js';
import { loadBotConfig, type BotConfig } from './config.js';

export function splitLongMessage(text: string, maxLen = TELEGRAM_MSG_LIMIT): string[] {
  if (text.length <= maxLen) return [text];
  const chunks: string[] = [];
  let remaining = text;
  while (remaining.length > 0) {
    chunks.push(remaining.slice(0, maxLen));
    remaining = remaining.slice(maxLen);
  }
  return chunks;
}

function toTextEntity(entity: MessageEntity): TextEntity {
  return {
    type: entity.type,
    offset: entity.offset,
    length: entity.length,
    ...('user' in entity ? { userId: entity.user.id } : {}),
  };
}

export interface WardenBotOptions {
  config: BotConfig;
  repository: AuthRepository;
  engine: ConversationEngine;
}

export class WardenBot {
  private bot: Telegraf;
  private config: BotConfig;
  private repository: AuthRepository;
  private engine: ConversationEngine;
  private gate: CommandGate | null = null;
  // Replies still pending; aborted on stop
  private inFlight = new Set<AbortController>();

  constructor(options: WardenBotOptions) {
    this.config = options.config;
    this.repository = options.repository;
    this.engine = options.engine;
    this.bot = new Telegraf(options.config.telegramToken, {
      handlerTimeout: options.config.engineTimeoutMs + 10_000,
    });
    this.setupHandlers();
  }

  private setupHandlers() {
    // Global error handler - catch all unhandled errors in update processing
    this.bot.catch(async (err: unknown, ctx: Context) => {
      const classified = classifyError(err);
      structuredLog('error', 'telegram-bot', 'unhandled_update_error', {
        category: classified.category,
        code: classified.code,
        message: classified.message,
        retryable: classified.retryable,
        chatId: ctx.chat?.id,
        updateId: ctx.update.update_id,
      });

      const errorMsg = classified.retryable
        ? '⚠️ A temporary error occurred. Please try again shortly.'
        : '❌ Something went wrong. Contact an administrator if it keeps happening.';
      await this.safeReply(ctx, errorMsg);
    });

    // Commands and plain text both arrive as text messages
    this.bot.on('text', async (ctx) => {
      const from = ctx.from;
      const gate = this.gate;
      if (!gate || !from || from.is_bot) return;

      const msg = ctx.message;
      const inbound: InboundMessage = {
        updateId: ctx.update.update_id,
        userId: from.id,
        chatId: msg.chat.id,
        chatType: msg.chat.type,
        text: msg.text,
        entities: (msg.entities ?? []).map(toTextEntity),
        replyToUserId: msg.reply_to_message?.from?.id,
      };

      const controller = new AbortController();
      this.inFlight.add(controller);
      try {
        const outcome = await gate.handle(inbound, text => this.safeReply(ctx, text), controller.signal);
        structuredLog('debug', 'telegram-bot', 'update_handled', {
          updateId: inbound.updateId,
          chatId: inbound.chatId,
          outcome,
        });
      } finally {
        this.inFlight.delete(controller);
      }
    });
  }

  /**
   * Send a reply, split into Telegram-sized chunks. Failures are logged.
   */
  private async safeReply(ctx: Context, text: string): Promise<void> {
    for (const chunk of splitLongMessage(text)) {
      try {
        await ctx.reply(chunk);
      } catch (err) {
        const classified = classifyError(err);
        structuredLog('error', 'telegram-bot', 'reply_failed', {
          chatId: ctx.chat?.id,
          category: classified.category,
          code: classified.code,
          message: classified.message,
        });
        return;
      }
    }
  }

  async start(): Promise<{ success: boolean; error?: string }> {
    // Process-level error handlers
    process.once('unhandledRejection', (reason) => {
      structuredLog('error', 'telegram-bot', 'unhandled_rejection', {
        message: reason instanceof Error ? reason.message : String(reason),
        stack: reason instanceof Error ? reason.stack : undefined,
      });
    });

    try {
      const me = await this.bot.telegram.getMe();
      const identity: BotIdentity = { id: me.id, username: me.username };
      this.gate = new CommandGate({
        service: new AuthorizationService(this.repository),
        repository: this.repository,
        engine: this.engine,
        bot: identity,
      });

      // bot.launch() resolves only when the bot stops
      this.bot.launch().catch((err: unknown) => {
        const classified = classifyError(err);
        structuredLog('error', 'telegram-bot', 'bot_launch_failed', {
          category: classified.category,
          message: classified.message,
        });
      });

      structuredLog('info', 'telegram-bot', 'bot_started', {
        username: identity.username,
        engine: this.config.engineUrl,
      });

      // Graceful shutdown
      process.once('SIGINT', () => this.stop('SIGINT'));
      process.once('SIGTERM', () => this.stop('SIGTERM'));

      return { success: true };
    } catch (err) {
      const classified = classifyError(err);
      structuredLog('error', 'telegram-bot', 'bot_launch_failed', {
        category: classified.category,
        message: classified.message,
      });
      return { success: false, error: classified.message };
    }
  }

  stop(signal: string): void {
    structuredLog('info', 'telegram-bot', 'bot_stopping', { signal, inFlight: this.inFlight.size });
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
    this.bot.stop(signal);
  }
}

export interface RunBotOptions {
  configDir?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration, open the store, apply bootstrap admins and start polling.
 */
export async function runBot(options: RunBotOptions = {}): Promise<{ success: boolean; error?: string }> {
  const env = options.env ?? process.env;
  const config = await loadConfig(options.configDir, env);
  setLogLevel(config.logLevel);
  const botConfig = loadBotConfig(env);

  const store = AuthStore.create(config.storage.dbPath);
  try {
    const repository = new RetryingRepository(store, {
      attempts: config.storage.retryAttempts,
      delayMs: config.storage.retryDelayMs,
    });
    await bootstrapSuperAdmins(repository, config.initialSuperAdmins);

    const bot = new WardenBot({
      config: botConfig,
      repository,
      engine: new HttpConversationEngine({
        url: botConfig.engineUrl,
        apiKey: botConfig.engineApiKey,
        timeoutMs: botConfig.engineTimeoutMs,
      }),
    });
    const result = await bot.start();
    if (result.success) {
      process.once('exit', () => store.close());
    } else {
      store.close();
    }
    return result;
  } catch (err) {
    store.close();
    throw err;
  }
}
