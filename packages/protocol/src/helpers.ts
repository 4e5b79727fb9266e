import type { Role, ScopeType, PlatformChatType, ChatType } from './auth.js';

export function isRole(value: string): value is Role {
  return value === 'SUPER_ADMIN' || value === 'GROUP_ADMIN' || value === 'NONE';
}

export function isScopeType(value: string): value is ScopeType {
  return value === 'GLOBAL' || value === 'GROUP';
}

/** Collapse platform chat types; channels take no part in authorization */
export function toChatType(chatType: PlatformChatType): ChatType | null {
  switch (chatType) {
    case 'private':
      return 'private';
    case 'group':
    case 'supergroup':
      return 'group';
    case 'channel':
      return null;
  }
}
