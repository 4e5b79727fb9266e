import type { Role, ScopeType, Permission, WhitelistEntry } from '@warden/protocol';
import { AuthError } from './errors.js';
import { type AuthRepository, resolveScopeChatId, lastSuperAdminError } from './repository.js';

function whitelistKey(userId: number, scopeType: ScopeType, chatId: number | null): string {
  return `${userId}:${scopeType}:${chatId ?? ''}`;
}

/**
 * Map-backed AuthRepository with the same error semantics as AuthStore.
 * Used by tests of the service and gate, and by tools that need a throwaway store.
 */
export class InMemoryAuthRepository implements AuthRepository {
  private permissions = new Map<number, Permission>();
  private whitelist = new Map<string, WhitelistEntry>();
  private groups = new Map<number, { authorizedBy: number; authorizedAt: number; seq: number }>();
  private seq = 0;
  private now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
  }

  async setRole(userId: number, role: Role, grantedBy: number | null): Promise<Role> {
    const prior = this.permissions.get(userId)?.role ?? 'NONE';
    if (prior === role) return prior;

    if (prior === 'SUPER_ADMIN') {
      const superAdmins = [...this.permissions.values()].filter(p => p.role === 'SUPER_ADMIN').length;
      if (superAdmins <= 1) {
        throw lastSuperAdminError(userId);
      }
    }

    this.permissions.set(userId, { userId, role, grantedBy, grantedAt: this.now() });
    return prior;
  }

  async getRole(userId: number): Promise<Role> {
    return this.permissions.get(userId)?.role ?? 'NONE';
  }

  async listPermissions(role?: Role): Promise<Permission[]> {
    return [...this.permissions.values()]
      .filter(p => p.role !== 'NONE' && (role === undefined || p.role === role))
      .sort((a, b) => a.grantedAt - b.grantedAt || a.userId - b.userId)
      .map(p => ({ ...p }));
  }

  async addWhitelist(userId: number, scopeType: ScopeType, chatId?: number | null, createdBy: number | null = null): Promise<WhitelistEntry> {
    const scopedChatId = resolveScopeChatId(scopeType, chatId);
    const key = whitelistKey(userId, scopeType, scopedChatId);
    if (this.whitelist.has(key)) {
      throw new AuthError('AlreadyExists', `addWhitelist: entry already exists`);
    }
    const entry: WhitelistEntry = {
      id: ++this.seq,
      userId,
      scopeType,
      chatId: scopedChatId,
      createdBy,
      createdAt: this.now(),
    };
    this.whitelist.set(key, entry);
    return { ...entry };
  }

  async removeWhitelist(userId: number, scopeType: ScopeType, chatId?: number | null): Promise<void> {
    const scopedChatId = resolveScopeChatId(scopeType, chatId);
    if (!this.whitelist.delete(whitelistKey(userId, scopeType, scopedChatId))) {
      throw new AuthError('NotFound', `No ${scopeType} whitelist entry for user ${userId}`);
    }
  }

  async isWhitelisted(userId: number, scopeType: ScopeType, chatId?: number | null): Promise<boolean> {
    const scopedChatId = resolveScopeChatId(scopeType, chatId);
    return this.whitelist.has(whitelistKey(userId, scopeType, scopedChatId));
  }

  async listWhitelist(scopeType?: ScopeType, chatId?: number | null): Promise<WhitelistEntry[]> {
    return [...this.whitelist.values()]
      .filter(e => scopeType === undefined || e.scopeType === scopeType)
      .filter(e => chatId === undefined || chatId === null || e.chatId === chatId)
      .sort((a, b) => a.createdAt - b.createdAt || a.id - b.id)
      .map(e => ({ ...e }));
  }

  async authorizeGroup(chatId: number, authorizedBy: number): Promise<void> {
    if (this.groups.has(chatId)) return;
    this.groups.set(chatId, { authorizedBy, authorizedAt: this.now(), seq: ++this.seq });
  }

  async revokeGroup(chatId: number): Promise<void> {
    if (!this.groups.delete(chatId)) {
      throw new AuthError('NotFound', `Group ${chatId} is not authorized`);
    }
  }

  async isGroupAuthorized(chatId: number): Promise<boolean> {
    return this.groups.has(chatId);
  }

  async listAuthorizedGroups(): Promise<number[]> {
    return [...this.groups.entries()]
      .sort(([, a], [, b]) => a.authorizedAt - b.authorizedAt || a.seq - b.seq)
      .map(([chatId]) => chatId);
  }
}
