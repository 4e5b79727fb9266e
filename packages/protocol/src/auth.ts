/**
 * Authorization types for Warden.
 * Decision order: role → command class → group-admin actions → ordinary access.
 */

// ──────────────────────────────────────────────
// Roles & scopes
// ──────────────────────────────────────────────

/** Elevated trust level. NONE is the same as having no permission row. */
export type Role = 'SUPER_ADMIN' | 'GROUP_ADMIN' | 'NONE';

export const ROLES: readonly Role[] = ['SUPER_ADMIN', 'GROUP_ADMIN', 'NONE'];

/** Higher rank wins: SUPER_ADMIN > GROUP_ADMIN > NONE */
export const ROLE_RANK: Record<Role, number> = {
  SUPER_ADMIN: 2,
  GROUP_ADMIN: 1,
  NONE: 0,
};

export type ScopeType = 'GLOBAL' | 'GROUP';

export const SCOPE_TYPES: readonly ScopeType[] = ['GLOBAL', 'GROUP'];

/** Chat types as the platform reports them */
export type PlatformChatType = 'private' | 'group' | 'supergroup' | 'channel';

/** Chat types the decision logic distinguishes */
export type ChatType = 'private' | 'group';

// ──────────────────────────────────────────────
// Persisted entities
// ──────────────────────────────────────────────

export interface Permission {
  userId: number;
  role: Role;
  /** null when granted by bootstrap */
  grantedBy: number | null;
  grantedAt: number;
}

export interface WhitelistEntry {
  id: number;
  userId: number;
  scopeType: ScopeType;
  /** Set iff scopeType is GROUP */
  chatId: number | null;
  createdBy: number | null;
  createdAt: number;
}

export interface AuthorizedGroup {
  chatId: number;
  authorizedBy: number;
  authorizedAt: number;
}

// ──────────────────────────────────────────────
// Actions
// ──────────────────────────────────────────────

export type Action =
  | 'permission_set'
  | 'group_authorize'
  | 'group_revoke'
  | 'group_list'
  | 'whitelist_add'
  | 'whitelist_remove'
  | 'whitelist_list'
  | 'help'
  | 'chat';

export type ActionClass = 'super_admin' | 'group_admin' | 'ordinary';

export interface ActionSpec {
  actionClass: ActionClass;
}

export const ACTION_SPECS: Record<Action, ActionSpec> = {
  permission_set: { actionClass: 'super_admin' },
  group_authorize: { actionClass: 'super_admin' },
  group_revoke: { actionClass: 'super_admin' },
  group_list: { actionClass: 'super_admin' },
  whitelist_add: { actionClass: 'group_admin' },
  whitelist_remove: { actionClass: 'group_admin' },
  whitelist_list: { actionClass: 'group_admin' },
  help: { actionClass: 'ordinary' },
  chat: { actionClass: 'ordinary' },
};

// ──────────────────────────────────────────────
// Decisions
// ──────────────────────────────────────────────

export interface AccessRequest {
  userId: number;
  chatId: number;
  chatType: ChatType;
  action: Action;
  /** Group a GROUP_ADMIN acts on from a private chat */
  targetGroupId?: number;
}

export type AllowReason =
  | 'super_admin'
  | 'group_admin'
  | 'role'
  | 'whitelist_global'
  | 'whitelist_group';

export type DenyReason =
  | 'InsufficientRole'
  | 'WrongChatType'
  | 'GroupNotAuthorized'
  | 'NotWhitelisted';

/** Which rule of the decision order produced the verdict */
export type DecisionLayer = 'role' | 'command' | 'group_admin' | 'access';

interface VerdictContext {
  layer: DecisionLayer;
  userId: number;
  chatId: number;
  chatType: ChatType;
  action: Action;
}

export type Verdict =
  | (VerdictContext & { allowed: true; reason: AllowReason })
  | (VerdictContext & { allowed: false; reason: DenyReason });
