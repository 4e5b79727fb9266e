/** Log levels accepted by LOG_LEVEL, lowest first */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface StorageConfig {
  /** SQLite file path. `~` expands to the home directory; `:memory:` is allowed */
  dbPath: string;
  /** Total tries for a StorageUnavailable failure (1 = no retry) */
  retryAttempts: number;
  /** Base delay for exponential backoff between tries */
  retryDelayMs: number;
}

export interface WardenConfig {
  configDir: string;
  storage: StorageConfig;
  /** User IDs promoted to SUPER_ADMIN at every start */
  initialSuperAdmins: number[];
  logLevel: LogLevel;
}

export const DEFAULT_STORAGE_CONFIG: StorageConfig = {
  dbPath: '~/.warden/auth.db',
  retryAttempts: 3,
  retryDelayMs: 100,
};
