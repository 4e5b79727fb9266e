import type {
  Role,
  ScopeType,
  Permission,
  WhitelistEntry,
} from '@warden/protocol';
import { AuthError } from './errors.js';

/**
 * Storage contract for permissions, whitelist entries and authorized groups.
 * Every operation is atomic; implementations translate storage failures into
 * AuthError kinds instead of leaking driver errors.
 */
export interface AuthRepository {
  /** Upsert the role, returning the previous one (NONE when there was no row) */
  setRole(userId: number, role: Role, grantedBy: number | null): Promise<Role>;
  getRole(userId: number): Promise<Role>;
  /** Rows with an elevated role, grantedAt ascending */
  listPermissions(role?: Role): Promise<Permission[]>;

  /** Fails with AlreadyExists when the tuple is present */
  addWhitelist(userId: number, scopeType: ScopeType, chatId?: number | null, createdBy?: number | null): Promise<WhitelistEntry>;
  /** Fails with NotFound when the tuple is absent */
  removeWhitelist(userId: number, scopeType: ScopeType, chatId?: number | null): Promise<void>;
  isWhitelisted(userId: number, scopeType: ScopeType, chatId?: number | null): Promise<boolean>;
  /** createdAt ascending */
  listWhitelist(scopeType?: ScopeType, chatId?: number | null): Promise<WhitelistEntry[]>;

  authorizeGroup(chatId: number, authorizedBy: number): Promise<void>;
  /** Fails with NotFound when the group is not authorized */
  revokeGroup(chatId: number): Promise<void>;
  isGroupAuthorized(chatId: number): Promise<boolean>;
  /** authorizedAt ascending */
  listAuthorizedGroups(): Promise<number[]>;
}

/**
 * Normalize the chat argument of a whitelist tuple: GROUP needs a chat id,
 * GLOBAL must not carry one.
 */
export function resolveScopeChatId(scopeType: ScopeType, chatId: number | null | undefined): number | null {
  if (scopeType === 'GROUP') {
    if (chatId === undefined || chatId === null) {
      throw new AuthError('BadRequest', 'GROUP whitelist entries require a chat id');
    }
    return chatId;
  }
  if (chatId !== undefined && chatId !== null) {
    throw new AuthError('BadRequest', 'GLOBAL whitelist entries cannot name a chat');
  }
  return null;
}

export function lastSuperAdminError(userId: number): AuthError {
  return new AuthError('BadRequest', `User ${userId} is the last super admin and cannot be demoted`);
}
