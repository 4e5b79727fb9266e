// Gate
export { CommandGate, type Responder, type GateOutcome, type CommandGateOptions } from './gate.js';

// Addressing
export {
  isAddressedToBot,
  isCommandForOtherBot,
  parseCommandText,
  stripBotMention,
  type InboundMessage,
  type TextEntity,
  type BotIdentity,
  type ParsedCommandText,
} from './addressing.js';

// Commands
export {
  COMMANDS,
  findCommand,
  parseCommandArgs,
  parseId,
  parseRole,
  parseScope,
  renderHelp,
  renderList,
  visibleCommands,
  type CommandDef,
  type CommandName,
  type ParsedCommand,
} from './commands.js';
export { executeAdminCommand, type AdminCommand, type AdminContext } from './admin-commands.js';

// Conversation engine
export {
  HttpConversationEngine,
  EngineError,
  type ConversationEngine,
  type ConversationInput,
  type HttpEngineOptions,
} from './engine.js';

// Bot
export { WardenBot, runBot, splitLongMessage, type WardenBotOptions, type RunBotOptions } from './bot.js';
export { loadBotConfig, type BotConfig } from './config.js';
export { classifyError, type ClassifiedError, type ErrorCategory } from './error-utils.js';
