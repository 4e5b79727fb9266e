/**
 * AuthStore - SQLite-backed authorization storage
 *
 * Holds the three authorization tables:
 * - permissions: one row per user with an explicit role
 * - whitelist: per-user GLOBAL or GROUP access grants
 * - authorized_groups: group chats opened for non-privileged use
 *
 * Writes run in IMMEDIATE transactions so read-then-write sequences on the
 * same key serialize; WAL mode keeps readers unblocked.
 */

import Database from 'better-sqlite3';
import type { Role, ScopeType, Permission, WhitelistEntry } from '@warden/protocol';
import { isRole, isScopeType } from '@warden/protocol';
import { mkdirSync } from 'fs';
import path from 'path';
import os from 'os';
import { AuthError } from './errors.js';
import { type AuthRepository, resolveScopeChatId, lastSuperAdminError } from './repository.js';

export interface AuthStoreOptions {
  /** Clock used for audit timestamps */
  now?: () => number;
}

// Database row types
interface PermissionRow {
  user_id: number;
  role: string;
  granted_by: number | null;
  granted_at: number;
}

interface WhitelistRow {
  id: number;
  user_id: number;
  scope_type: string;
  chat_id: number | null;
  created_by: number | null;
  created_at: number;
}

function rowToPermission(row: PermissionRow): Permission {
  if (!isRole(row.role)) {
    throw new Error(`Unknown role in permissions table: ${row.role}`);
  }
  return {
    userId: row.user_id,
    role: row.role,
    grantedBy: row.granted_by,
    grantedAt: row.granted_at,
  };
}

function rowToWhitelistEntry(row: WhitelistRow): WhitelistEntry {
  if (!isScopeType(row.scope_type)) {
    throw new Error(`Unknown scope type in whitelist table: ${row.scope_type}`);
  }
  return {
    id: row.id,
    userId: row.user_id,
    scopeType: row.scope_type,
    chatId: row.chat_id,
    createdBy: row.created_by,
    createdAt: row.created_at,
  };
}

function sqliteCode(err: unknown): string | null {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return null;
}

const UNAVAILABLE_CODES = ['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_IOERR', 'SQLITE_CANTOPEN', 'SQLITE_FULL', 'SQLITE_READONLY'];

/**
 * Map driver errors onto the AuthError taxonomy. Errors that match no
 * storage condition are returned unchanged.
 */
export function translateStorageError(err: unknown, operation: string): unknown {
  if (err instanceof AuthError) return err;

  const code = sqliteCode(err);
  if (code === 'SQLITE_CONSTRAINT_UNIQUE' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY') {
    return new AuthError('AlreadyExists', `${operation}: entry already exists`, { cause: err });
  }
  if (code && UNAVAILABLE_CODES.some(prefix => code.startsWith(prefix))) {
    return new AuthError('StorageUnavailable', `${operation}: storage unavailable (${code})`, { cause: err });
  }
  // better-sqlite3 raises a TypeError once the handle is closed
  if (err instanceof TypeError && err.message.includes('database connection is not open')) {
    return new AuthError('StorageUnavailable', `${operation}: database connection is closed`, { cause: err });
  }
  return err;
}

function resolveDbPath(dbPath: string): string {
  if (dbPath === ':memory:') return dbPath;
  const resolved = dbPath.replace(/^~(?=$|\/)/, os.homedir());
  mkdirSync(path.dirname(resolved), { recursive: true });
  return resolved;
}

export class AuthStore implements AuthRepository {
  private db: Database.Database;
  private now: () => number;

  private constructor(dbPath: string, options: AuthStoreOptions) {
    this.db = new Database(resolveDbPath(dbPath));
    this.now = options.now ?? Date.now;
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('busy_timeout = 5000');
    this.initSchema();
  }

  /**
   * Open (and create if needed) the store at dbPath
   */
  static create(dbPath: string, options: AuthStoreOptions = {}): AuthStore {
    try {
      return new AuthStore(dbPath, options);
    } catch (err) {
      throw translateStorageError(err, 'open');
    }
  }

  /**
   * Close database connection
   */
  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS permissions (
        user_id INTEGER PRIMARY KEY,
        role TEXT NOT NULL CHECK(role IN ('SUPER_ADMIN', 'GROUP_ADMIN', 'NONE')),
        granted_by INTEGER,
        granted_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_permissions_role ON permissions(role);

      CREATE TABLE IF NOT EXISTS whitelist (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL,
        scope_type TEXT NOT NULL CHECK(scope_type IN ('GLOBAL', 'GROUP')),
        chat_id INTEGER,
        created_by INTEGER,
        created_at INTEGER NOT NULL,
        CHECK ((scope_type = 'GROUP') = (chat_id IS NOT NULL))
      );

      -- NULLs are distinct in plain UNIQUE constraints; fold GLOBAL rows onto one key
      CREATE UNIQUE INDEX IF NOT EXISTS idx_whitelist_tuple
        ON whitelist(user_id, scope_type, COALESCE(chat_id, 0));
      CREATE INDEX IF NOT EXISTS idx_whitelist_chat ON whitelist(scope_type, chat_id);

      CREATE TABLE IF NOT EXISTS authorized_groups (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        chat_id INTEGER NOT NULL UNIQUE,
        authorized_by INTEGER NOT NULL,
        authorized_at INTEGER NOT NULL
      );
    `);
  }

  private async run<T>(operation: string, fn: () => T): Promise<T> {
    try {
      return fn();
    } catch (err) {
      throw translateStorageError(err, operation);
    }
  }

  private selectRole(userId: number): Role {
    const row = this.db
      .prepare<[number], PermissionRow>('SELECT * FROM permissions WHERE user_id = ?')
      .get(userId);
    return row ? rowToPermission(row).role : 'NONE';
  }

  // --- Permissions ---

  setRole(userId: number, role: Role, grantedBy: number | null): Promise<Role> {
    return this.run('setRole', () => {
      const tx = this.db.transaction((): Role => {
        const prior = this.selectRole(userId);
        if (prior === role) return prior;

        if (prior === 'SUPER_ADMIN') {
          const { count } = this.db
            .prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM permissions WHERE role = 'SUPER_ADMIN'`)
            .get() ?? { count: 0 };
          if (count <= 1) {
            throw lastSuperAdminError(userId);
          }
        }

        this.db.prepare<[number, string, number | null, number]>(`
          INSERT INTO permissions (user_id, role, granted_by, granted_at)
          VALUES (?, ?, ?, ?)
          ON CONFLICT(user_id) DO UPDATE SET
            role = excluded.role,
            granted_by = excluded.granted_by,
            granted_at = excluded.granted_at
        `).run(userId, role, grantedBy, this.now());

        return prior;
      });
      return tx.immediate();
    });
  }

  getRole(userId: number): Promise<Role> {
    return this.run('getRole', () => this.selectRole(userId));
  }

  listPermissions(role?: Role): Promise<Permission[]> {
    return this.run('listPermissions', () => {
      const rows = role === undefined
        ? this.db.prepare<[], PermissionRow>(`
            SELECT * FROM permissions WHERE role != 'NONE'
            ORDER BY granted_at ASC, user_id ASC
          `).all()
        : this.db.prepare<[string], PermissionRow>(`
            SELECT * FROM permissions WHERE role = ? AND role != 'NONE'
            ORDER BY granted_at ASC, user_id ASC
          `).all(role);
      return rows.map(rowToPermission);
    });
  }

  // --- Whitelist ---

  addWhitelist(userId: number, scopeType: ScopeType, chatId?: number | null, createdBy: number | null = null): Promise<WhitelistEntry> {
    return this.run('addWhitelist', () => {
      const scopedChatId = resolveScopeChatId(scopeType, chatId);
      const result = this.db.prepare<[number, string, number | null, number | null, number]>(`
        INSERT INTO whitelist (user_id, scope_type, chat_id, created_by, created_at)
        VALUES (?, ?, ?, ?, ?)
      `).run(userId, scopeType, scopedChatId, createdBy, this.now());

      const row = this.db
        .prepare<[number | bigint], WhitelistRow>('SELECT * FROM whitelist WHERE id = ?')
        .get(result.lastInsertRowid);
      if (!row) {
        throw new Error(`Whitelist entry vanished after insert: ${String(result.lastInsertRowid)}`);
      }
      return rowToWhitelistEntry(row);
    });
  }

  removeWhitelist(userId: number, scopeType: ScopeType, chatId?: number | null): Promise<void> {
    return this.run('removeWhitelist', () => {
      const scopedChatId = resolveScopeChatId(scopeType, chatId);
      const result = this.db.prepare<[number, string, number | null]>(`
        DELETE FROM whitelist
        WHERE user_id = ? AND scope_type = ? AND chat_id IS ?
      `).run(userId, scopeType, scopedChatId);
      if (result.changes === 0) {
        throw new AuthError('NotFound', `No ${scopeType} whitelist entry for user ${userId}`);
      }
    });
  }

  isWhitelisted(userId: number, scopeType: ScopeType, chatId?: number | null): Promise<boolean> {
    return this.run('isWhitelisted', () => {
      const scopedChatId = resolveScopeChatId(scopeType, chatId);
      const row = this.db.prepare<[number, string, number | null], { id: number }>(`
        SELECT id FROM whitelist
        WHERE user_id = ? AND scope_type = ? AND chat_id IS ?
      `).get(userId, scopeType, scopedChatId);
      return row !== undefined;
    });
  }

  listWhitelist(scopeType?: ScopeType, chatId?: number | null): Promise<WhitelistEntry[]> {
    return this.run('listWhitelist', () => {
      const conditions: string[] = [];
      const values: Array<string | number> = [];

      if (scopeType !== undefined) {
        conditions.push('scope_type = ?');
        values.push(scopeType);
      }
      if (chatId !== undefined && chatId !== null) {
        conditions.push('chat_id = ?');
        values.push(chatId);
      }

      const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
      const rows = this.db.prepare<Array<string | number>, WhitelistRow>(`
        SELECT * FROM whitelist ${where}
        ORDER BY created_at ASC, id ASC
      `).all(...values);
      return rows.map(rowToWhitelistEntry);
    });
  }

  // --- Authorized groups ---

  authorizeGroup(chatId: number, authorizedBy: number): Promise<void> {
    return this.run('authorizeGroup', () => {
      // Re-authorizing keeps the original audit row
      this.db.prepare<[number, number, number]>(`
        INSERT INTO authorized_groups (chat_id, authorized_by, authorized_at)
        VALUES (?, ?, ?)
        ON CONFLICT(chat_id) DO NOTHING
      `).run(chatId, authorizedBy, this.now());
    });
  }

  revokeGroup(chatId: number): Promise<void> {
    return this.run('revokeGroup', () => {
      const result = this.db
        .prepare<[number]>('DELETE FROM authorized_groups WHERE chat_id = ?')
        .run(chatId);
      if (result.changes === 0) {
        throw new AuthError('NotFound', `Group ${chatId} is not authorized`);
      }
    });
  }

  isGroupAuthorized(chatId: number): Promise<boolean> {
    return this.run('isGroupAuthorized', () => {
      const row = this.db
        .prepare<[number], { id: number }>('SELECT id FROM authorized_groups WHERE chat_id = ?')
        .get(chatId);
      return row !== undefined;
    });
  }

  listAuthorizedGroups(): Promise<number[]> {
    return this.run('listAuthorizedGroups', () => {
      const rows = this.db.prepare<[], { chat_id: number }>(`
        SELECT chat_id FROM authorized_groups
        ORDER BY authorized_at ASC, id ASC
      `).all();
      return rows.map(row => row.chat_id);
    });
  }
}
