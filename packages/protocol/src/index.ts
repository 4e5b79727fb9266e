// Authorization types
export type {
  Role,
  ScopeType,
  PlatformChatType,
  ChatType,
  Permission,
  WhitelistEntry,
  AuthorizedGroup,
  Action,
  ActionClass,
  ActionSpec,
  AccessRequest,
  AllowReason,
  DenyReason,
  DecisionLayer,
  Verdict,
} from './auth.js';

export { ROLES, ROLE_RANK, SCOPE_TYPES, ACTION_SPECS } from './auth.js';

// Helpers
export { isRole, isScopeType, toChatType } from './helpers.js';

// Config types
export type { LogLevel, StorageConfig, WardenConfig } from './config.js';
export { DEFAULT_STORAGE_CONFIG } from './config.js';

// Constants
export {
  DEFAULT_ENGINE_URL,
  DEFAULT_ENGINE_TIMEOUT_MS,
  TELEGRAM_MSG_LIMIT,
  LIST_DISPLAY_LIMIT,
} from './constants.js';
