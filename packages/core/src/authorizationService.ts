import type {
  AccessRequest,
  AllowReason,
  DecisionLayer,
  DenyReason,
  Verdict,
} from '@warden/protocol';
import { ACTION_SPECS } from '@warden/protocol';
import type { AuthRepository } from './repository.js';
import { structuredLog } from './logger.js';

/**
 * Access decisions: role → command class → group-admin actions → ordinary access.
 * First matching rule wins. Reads only; every verdict derives from the
 * repository's current state plus the request.
 */
export class AuthorizationService {
  constructor(private readonly repository: AuthRepository) {}

  async decide(request: AccessRequest): Promise<Verdict> {
    const verdict = await this.evaluate(request);
    this.logDecision(verdict);
    return verdict;
  }

  private async evaluate(request: AccessRequest): Promise<Verdict> {
    const { userId, chatId, chatType, action } = request;
    const role = await this.repository.getRole(userId);

    // Rule 1: super admins bypass all gating
    if (role === 'SUPER_ADMIN') {
      return this.allow('super_admin', 'role', request);
    }

    const actionSpec = ACTION_SPECS[action];

    switch (actionSpec.actionClass) {
      // Rule 2: fenced before any whitelist logic. Rule 1 has already admitted
      // super admins in every chat, so WrongChatType cannot arise here.
      case 'super_admin':
        return this.deny('InsufficientRole', 'command', request);

      // Rule 3: whitelist management
      case 'group_admin': {
        if (role !== 'GROUP_ADMIN') {
          return this.deny('InsufficientRole', 'group_admin', request);
        }
        if (chatType === 'group' || request.targetGroupId !== undefined) {
          return this.allow('group_admin', 'group_admin', request);
        }
        return this.deny('InsufficientRole', 'group_admin', request);
      }

      // Rule 4: conversational access
      case 'ordinary': {
        if (chatType === 'group' && !(await this.repository.isGroupAuthorized(chatId))) {
          return this.deny('GroupNotAuthorized', 'access', request);
        }
        if (role !== 'NONE') {
          return this.allow('role', 'access', request);
        }
        if (await this.repository.isWhitelisted(userId, 'GLOBAL')) {
          return this.allow('whitelist_global', 'access', request);
        }
        if (chatType === 'group' && (await this.repository.isWhitelisted(userId, 'GROUP', chatId))) {
          return this.allow('whitelist_group', 'access', request);
        }
        return this.deny('NotWhitelisted', 'access', request);
      }
    }
  }

  // --- Helpers ---

  private allow(reason: AllowReason, layer: DecisionLayer, request: AccessRequest): Verdict {
    return {
      allowed: true,
      reason,
      layer,
      userId: request.userId,
      chatId: request.chatId,
      chatType: request.chatType,
      action: request.action,
    };
  }

  private deny(reason: DenyReason, layer: DecisionLayer, request: AccessRequest): Verdict {
    return {
      allowed: false,
      reason,
      layer,
      userId: request.userId,
      chatId: request.chatId,
      chatType: request.chatType,
      action: request.action,
    };
  }

  private logDecision(verdict: Verdict): void {
    structuredLog(
      verdict.allowed ? 'info' : 'warn',
      'authorization',
      verdict.allowed ? 'access_granted' : 'access_denied',
      {
        userId: verdict.userId,
        chatId: verdict.chatId,
        chatType: verdict.chatType,
        action: verdict.action,
        layer: verdict.layer,
        reason: verdict.reason,
      },
    );
  }
}
