import type { Verdict, WhitelistEntry } from '@warden/protocol';
import { AuthError, isAuthError, type AuthRepository } from '@warden/core';
import { renderList, type ParsedCommand, type WhitelistTarget } from './commands.js';

export type AdminCommand = Exclude<ParsedCommand, { name: 'help' }>;

export interface AdminContext {
  repository: AuthRepository;
  /** Caller */
  actorId: number;
  verdict: Verdict;
}

function describeTarget(target: WhitelistTarget): string {
  return target.scopeType === 'GLOBAL' ? 'global' : `group ${target.chatId}`;
}

function describeEntry(entry: WhitelistEntry): string {
  return entry.scopeType === 'GLOBAL' ? `${entry.userId} (global)` : `${entry.userId} (group ${entry.chatId})`;
}

function actsAsGroupAdmin(context: AdminContext): boolean {
  return context.verdict.allowed && context.verdict.reason === 'group_admin';
}

// GROUP_ADMINs only manage group-scoped entries
function assertScopeAllowed(context: AdminContext, global: boolean): void {
  if (global && actsAsGroupAdmin(context)) {
    throw new AuthError('InsufficientRole', 'Group admins can only manage group whitelist entries');
  }
}

// Inside a group, a GROUP_ADMIN acts on that group only
function assertGroupTarget(context: AdminContext, chatId: number | null | undefined): void {
  const { verdict } = context;
  if (actsAsGroupAdmin(context) && verdict.chatType === 'group' && chatId != null && chatId !== verdict.chatId) {
    throw new AuthError('BadRequest', 'Manage other groups from a private chat.');
  }
}

/**
 * Run an authorized admin command and return the reply text. AlreadyExists
 * and NotFound become informational replies; other errors propagate.
 */
export async function executeAdminCommand(command: AdminCommand, context: AdminContext): Promise<string> {
  const { repository, actorId } = context;

  switch (command.name) {
    case 'permission_set': {
      const prior = await repository.setRole(command.userId, command.role, actorId);
      if (prior === command.role) {
        return `ℹ️ User ${command.userId} already has role ${command.role}.`;
      }
      return `✅ User ${command.userId}: ${prior} → ${command.role}`;
    }

    case 'group_authorize': {
      const already = await repository.isGroupAuthorized(command.chatId);
      await repository.authorizeGroup(command.chatId, actorId);
      return already
        ? `ℹ️ Group ${command.chatId} was already authorized.`
        : `✅ Group ${command.chatId} authorized.`;
    }

    case 'group_revoke': {
      try {
        await repository.revokeGroup(command.chatId);
        return `✅ Group ${command.chatId} revoked.`;
      } catch (err) {
        if (isAuthError(err, 'NotFound')) {
          return `ℹ️ Group ${command.chatId} is not authorized.`;
        }
        throw err;
      }
    }

    case 'group_list': {
      const groups = await repository.listAuthorizedGroups();
      if (groups.length === 0) {
        return 'No authorized groups.';
      }
      return renderList('Authorized groups', groups.map(String));
    }

    case 'whitelist_add': {
      assertScopeAllowed(context, command.target.scopeType === 'GLOBAL');
      assertGroupTarget(context, command.target.chatId);
      try {
        await repository.addWhitelist(command.userId, command.target.scopeType, command.target.chatId, actorId);
        return `✅ User ${command.userId} whitelisted (${describeTarget(command.target)}).`;
      } catch (err) {
        if (isAuthError(err, 'AlreadyExists')) {
          return `ℹ️ User ${command.userId} is already whitelisted (${describeTarget(command.target)}).`;
        }
        throw err;
      }
    }

    case 'whitelist_remove': {
      assertScopeAllowed(context, command.target.scopeType === 'GLOBAL');
      assertGroupTarget(context, command.target.chatId);
      try {
        await repository.removeWhitelist(command.userId, command.target.scopeType, command.target.chatId);
        return `✅ User ${command.userId} removed from the whitelist (${describeTarget(command.target)}).`;
      } catch (err) {
        if (isAuthError(err, 'NotFound')) {
          return `ℹ️ User ${command.userId} is not whitelisted (${describeTarget(command.target)}).`;
        }
        throw err;
      }
    }

    case 'whitelist_list': {
      assertScopeAllowed(context, command.chatId === undefined);
      assertGroupTarget(context, command.chatId);
      const entries = await repository.listWhitelist(command.scopeType, command.chatId);
      if (entries.length === 0) {
        return 'Whitelist is empty.';
      }
      return renderList('Whitelist', entries.map(describeEntry));
    }
  }
}
