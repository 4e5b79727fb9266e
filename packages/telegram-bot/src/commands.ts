import type { Action, ChatType, Role, ScopeType } from '@warden/protocol';
import { ACTION_SPECS, LIST_DISPLAY_LIMIT } from '@warden/protocol';
import { AuthError } from '@warden/core';

export type CommandName =
  | 'permission_set'
  | 'group_authorize'
  | 'group_revoke'
  | 'group_list'
  | 'whitelist_add'
  | 'whitelist_remove'
  | 'whitelist_list'
  | 'help'
  | 'start';

export interface CommandDef {
  name: CommandName;
  action: Action;
  description: string;
  usage: string;
}

export const COMMANDS: Record<CommandName, CommandDef> = {
  permission_set: {
    name: 'permission_set',
    action: 'permission_set',
    description: 'Set a user role',
    usage: '/permission_set <user_id> <super_admin|group_admin|none>',
  },
  group_authorize: {
    name: 'group_authorize',
    action: 'group_authorize',
    description: 'Open a group to whitelisted users',
    usage: '/group_authorize <chat_id>',
  },
  group_revoke: {
    name: 'group_revoke',
    action: 'group_revoke',
    description: 'Close a group again',
    usage: '/group_revoke <chat_id>',
  },
  group_list: {
    name: 'group_list',
    action: 'group_list',
    description: 'List authorized groups',
    usage: '/group_list',
  },
  whitelist_add: {
    name: 'whitelist_add',
    action: 'whitelist_add',
    description: 'Whitelist a user',
    usage: '/whitelist_add <user_id> [global|group] [chat_id]',
  },
  whitelist_remove: {
    name: 'whitelist_remove',
    action: 'whitelist_remove',
    description: 'Remove a whitelist entry',
    usage: '/whitelist_remove <user_id> [global|group] [chat_id]',
  },
  whitelist_list: {
    name: 'whitelist_list',
    action: 'whitelist_list',
    description: 'Show whitelist entries',
    usage: '/whitelist_list [global|group] [chat_id]',
  },
  help: {
    name: 'help',
    action: 'help',
    description: 'Show available commands',
    usage: '/help',
  },
  start: {
    name: 'start',
    action: 'help',
    description: 'Show available commands',
    usage: '/start',
  },
};

export function findCommand(name: string): CommandDef | null {
  for (const def of Object.values(COMMANDS)) {
    if (def.name === name) return def;
  }
  return null;
}

// ──────────────────────────────────────────────
// Argument parsing
// ──────────────────────────────────────────────

export interface WhitelistTarget {
  scopeType: ScopeType;
  /** Set iff scopeType is GROUP */
  chatId: number | null;
}

export type ParsedCommand =
  | { name: 'permission_set'; userId: number; role: Role }
  | { name: 'group_authorize' | 'group_revoke'; chatId: number }
  | { name: 'group_list' }
  | { name: 'whitelist_add' | 'whitelist_remove'; userId: number; target: WhitelistTarget }
  | { name: 'whitelist_list'; scopeType?: ScopeType; chatId?: number }
  | { name: 'help' };

export interface CommandContext {
  chatType: ChatType;
  chatId: number;
}

function usageError(def: CommandDef, problem: string): AuthError {
  return new AuthError('BadRequest', `${problem}\nUsage: ${def.usage}`);
}

const ID_RE = /^-?\d+$/;

export function parseId(value: string): number | null {
  if (!ID_RE.test(value)) return null;
  const id = Number(value);
  return Number.isSafeInteger(id) ? id : null;
}

export function parseRole(value: string): Role | null {
  switch (value.toLowerCase()) {
    case 'super_admin':
      return 'SUPER_ADMIN';
    case 'group_admin':
      return 'GROUP_ADMIN';
    case 'none':
      return 'NONE';
    default:
      return null;
  }
}

export function parseScope(value: string): ScopeType | null {
  switch (value.toLowerCase()) {
    case 'global':
    case 'private':
      return 'GLOBAL';
    case 'group':
      return 'GROUP';
    default:
      return null;
  }
}

function requireId(def: CommandDef, value: string | undefined, label: string): number {
  if (value === undefined) {
    throw usageError(def, `Missing ${label}.`);
  }
  const id = parseId(value);
  if (id === null) {
    throw usageError(def, `Invalid ${label}: ${value}`);
  }
  return id;
}

function rejectExtra(def: CommandDef, args: string[], expected: number): void {
  if (args.length > expected) {
    throw usageError(def, 'Too many arguments.');
  }
}

/**
 * Resolve `[global|group] [chat_id]` for whitelist_add/remove. Inside a group
 * the entry defaults to that group; in private chat it defaults to GLOBAL, and
 * a bare chat id means GROUP scope on that chat.
 */
function parseWhitelistTarget(def: CommandDef, args: string[], context: CommandContext): WhitelistTarget {
  const [first, second] = args;
  const inGroup = context.chatType === 'group';

  if (first === undefined) {
    return inGroup ? { scopeType: 'GROUP', chatId: context.chatId } : { scopeType: 'GLOBAL', chatId: null };
  }

  const bareChatId = parseId(first);
  if (bareChatId !== null) {
    rejectExtra(def, args, 1);
    return { scopeType: 'GROUP', chatId: bareChatId };
  }

  const scopeType = parseScope(first);
  if (scopeType === null) {
    throw usageError(def, `Invalid scope: ${first}`);
  }

  if (scopeType === 'GLOBAL') {
    rejectExtra(def, args, 1);
    return { scopeType, chatId: null };
  }

  rejectExtra(def, args, 2);
  if (second === undefined) {
    if (!inGroup) {
      throw usageError(def, 'GROUP scope needs a chat id outside a group.');
    }
    return { scopeType, chatId: context.chatId };
  }
  return { scopeType, chatId: requireId(def, second, 'chat id') };
}

export function parseCommandArgs(def: CommandDef, args: string[], context: CommandContext): ParsedCommand {
  switch (def.name) {
    case 'permission_set': {
      rejectExtra(def, args, 2);
      const userId = requireId(def, args[0], 'user id');
      const rawRole = args[1];
      if (rawRole === undefined) {
        throw usageError(def, 'Missing role.');
      }
      const role = parseRole(rawRole);
      if (role === null) {
        throw usageError(def, `Invalid role: ${rawRole}`);
      }
      return { name: 'permission_set', userId, role };
    }

    case 'group_authorize':
    case 'group_revoke': {
      rejectExtra(def, args, 1);
      return { name: def.name, chatId: requireId(def, args[0], 'chat id') };
    }

    case 'group_list':
      rejectExtra(def, args, 0);
      return { name: 'group_list' };

    case 'whitelist_add':
    case 'whitelist_remove': {
      const userId = requireId(def, args[0], 'user id');
      return { name: def.name, userId, target: parseWhitelistTarget(def, args.slice(1), context) };
    }

    case 'whitelist_list': {
      const [first, second] = args;
      if (first === undefined) {
        return context.chatType === 'group'
          ? { name: 'whitelist_list', scopeType: 'GROUP', chatId: context.chatId }
          : { name: 'whitelist_list' };
      }
      const bareChatId = parseId(first);
      if (bareChatId !== null) {
        rejectExtra(def, args, 1);
        return { name: 'whitelist_list', scopeType: 'GROUP', chatId: bareChatId };
      }
      const scopeType = parseScope(first);
      if (scopeType === null) {
        throw usageError(def, `Invalid scope: ${first}`);
      }
      if (scopeType === 'GLOBAL') {
        rejectExtra(def, args, 1);
        return { name: 'whitelist_list', scopeType };
      }
      rejectExtra(def, args, 2);
      if (second === undefined) {
        return context.chatType === 'group'
          ? { name: 'whitelist_list', scopeType, chatId: context.chatId }
          : { name: 'whitelist_list', scopeType };
      }
      return { name: 'whitelist_list', scopeType, chatId: requireId(def, second, 'chat id') };
    }

    case 'help':
    case 'start':
      return { name: 'help' };
  }
}

/**
 * Group a GROUP_ADMIN would act on, for the authorization request
 */
export function targetGroupOf(command: ParsedCommand): number | undefined {
  switch (command.name) {
    case 'whitelist_add':
    case 'whitelist_remove':
      return command.target.chatId ?? undefined;
    case 'whitelist_list':
      return command.chatId;
    default:
      return undefined;
  }
}

// ──────────────────────────────────────────────
// Help & list rendering
// ──────────────────────────────────────────────

/**
 * Commands shown to a caller: super-admin commands only to SUPER_ADMIN in
 * private chat, group-admin commands to either admin role, ordinary ones to all.
 */
export function visibleCommands(role: Role, chatType: ChatType): CommandDef[] {
  return Object.values(COMMANDS).filter(def => {
    if (def.name === 'start') return false;
    switch (ACTION_SPECS[def.action].actionClass) {
      case 'super_admin':
        return role === 'SUPER_ADMIN' && chatType === 'private';
      case 'group_admin':
        return role === 'SUPER_ADMIN' || role === 'GROUP_ADMIN';
      case 'ordinary':
        return true;
    }
  });
}

export function renderHelp(role: Role, chatType: ChatType): string {
  const lines = visibleCommands(role, chatType).map(def => `${def.usage} - ${def.description}`);
  return ['Available commands:', ...lines].join('\n');
}

/**
 * Render at most LIST_DISPLAY_LIMIT items followed by "... and N more".
 */
export function renderList(title: string, items: string[], limit: number = LIST_DISPLAY_LIMIT): string {
  const shown = items.slice(0, limit).map(item => `• ${item}`);
  const lines = [`${title} (${items.length}):`, ...shown];
  if (items.length > limit) {
    lines.push(`... and ${items.length - limit} more`);
  }
  return lines.join('\n');
}
