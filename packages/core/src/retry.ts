import type { Role, ScopeType, Permission, WhitelistEntry } from '@warden/protocol';
import { isAuthError } from './errors.js';
import { structuredLog } from './logger.js';
import type { AuthRepository } from './repository.js';

export interface RetryOptions {
  /** Total tries, first included */
  attempts: number;
  /** Base delay; doubles per retry */
  delayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

const MAX_DELAY_MS = 5000;

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Retry fn while it fails with StorageUnavailable, up to `attempts` tries.
 * Any other error is rethrown immediately.
 */
export async function withStorageRetry<T>(operation: string, fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts));
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isAuthError(err, 'StorageUnavailable') || attempt >= attempts) {
        throw err;
      }
      const delay = Math.min(options.delayMs * Math.pow(2, attempt - 1), MAX_DELAY_MS);
      structuredLog('warn', 'storage', 'retry', { operation, attempt, delayMs: delay, message: err.message });
      await sleep(delay);
    }
  }
}

/**
 * AuthRepository decorator applying bounded retries at the repository boundary.
 */
export class RetryingRepository implements AuthRepository {
  constructor(
    private readonly inner: AuthRepository,
    private readonly options: RetryOptions,
  ) {}

  private retry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withStorageRetry(operation, fn, this.options);
  }

  setRole(userId: number, role: Role, grantedBy: number | null): Promise<Role> {
    return this.retry('setRole', () => this.inner.setRole(userId, role, grantedBy));
  }

  getRole(userId: number): Promise<Role> {
    return this.retry('getRole', () => this.inner.getRole(userId));
  }

  listPermissions(role?: Role): Promise<Permission[]> {
    return this.retry('listPermissions', () => this.inner.listPermissions(role));
  }

  addWhitelist(userId: number, scopeType: ScopeType, chatId?: number | null, createdBy?: number | null): Promise<WhitelistEntry> {
    return this.retry('addWhitelist', () => this.inner.addWhitelist(userId, scopeType, chatId, createdBy));
  }

  removeWhitelist(userId: number, scopeType: ScopeType, chatId?: number | null): Promise<void> {
    return this.retry('removeWhitelist', () => this.inner.removeWhitelist(userId, scopeType, chatId));
  }

  isWhitelisted(userId: number, scopeType: ScopeType, chatId?: number | null): Promise<boolean> {
    return this.retry('isWhitelisted', () => this.inner.isWhitelisted(userId, scopeType, chatId));
  }

  listWhitelist(scopeType?: ScopeType, chatId?: number | null): Promise<WhitelistEntry[]> {
    return this.retry('listWhitelist', () => this.inner.listWhitelist(scopeType, chatId));
  }

  authorizeGroup(chatId: number, authorizedBy: number): Promise<void> {
    return this.retry('authorizeGroup', () => this.inner.authorizeGroup(chatId, authorizedBy));
  }

  revokeGroup(chatId: number): Promise<void> {
    return this.retry('revokeGroup', () => this.inner.revokeGroup(chatId));
  }

  isGroupAuthorized(chatId: number): Promise<boolean> {
    return this.retry('isGroupAuthorized', () => this.inner.isGroupAuthorized(chatId));
  }

  listAuthorizedGroups(): Promise<number[]> {
    return this.retry('listAuthorizedGroups', () => this.inner.listAuthorizedGroups());
  }
}
