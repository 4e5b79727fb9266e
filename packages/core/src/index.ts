// Errors
export { AuthError, isAuthError, type AuthErrorKind } from './errors.js';

// Logging
export { structuredLog, parseLogLevel, setLogLevel, getLogLevel } from './logger.js';

// Config
export {
  DEFAULT_CONFIG,
  ConfigError,
  loadConfig,
  saveConfig,
  ensureConfigDir,
  parseIds,
  type ConfigFile,
} from './config.js';

// Repository
export { type AuthRepository, resolveScopeChatId } from './repository.js';
export { AuthStore, translateStorageError, type AuthStoreOptions } from './authStore.js';
export { InMemoryAuthRepository } from './memoryRepository.js';
export { RetryingRepository, withStorageRetry, type RetryOptions } from './retry.js';

// Authorization
export { AuthorizationService } from './authorizationService.js';
export { bootstrapSuperAdmins, type BootstrapResult } from './bootstrap.js';
