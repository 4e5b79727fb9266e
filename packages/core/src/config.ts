import { readFile, writeFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import type { WardenConfig } from '@warden/protocol';
import { DEFAULT_STORAGE_CONFIG } from '@warden/protocol';
import { parseLogLevel, structuredLog } from './logger.js';

const DEFAULT_CONFIG_DIR = process.env.WARDEN_CONFIG_DIR ?? join(homedir(), '.warden');

export const DEFAULT_CONFIG: WardenConfig = {
  configDir: DEFAULT_CONFIG_DIR,
  storage: { ...DEFAULT_STORAGE_CONFIG },
  initialSuperAdmins: [],
  logLevel: 'info',
};

const userId = z.number().int().refine(Number.isSafeInteger, 'must be a safe integer');

const configFileSchema = z.object({
  storage: z.object({
    dbPath: z.string().min(1),
    retryAttempts: z.number().int().min(1).max(10),
    retryDelayMs: z.number().int().min(0),
  }).partial().optional(),
  initialSuperAdmins: z.array(userId).optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Parse a comma-separated id list. Parts that are not integers are dropped
 * with a warning.
 */
export function parseIds(raw: string): number[] {
  const ids: number[] = [];
  for (const part of raw.split(',')) {
    const trimmed = part.trim();
    if (!trimmed) continue;
    const id = Number(trimmed);
    if (/^-?\d+$/.test(trimmed) && Number.isSafeInteger(id)) {
      ids.push(id);
    } else {
      structuredLog('warn', 'config', 'invalid_user_id', { value: trimmed });
    }
  }
  return ids;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function readConfigFile(configPath: string): Promise<ConfigFile> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return {};
    throw new ConfigError(`Cannot read ${configPath}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`${configPath} is not valid JSON`, { cause: err });
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${configPath}: ${issues}`);
  }
  return parsed.data;
}

function applyEnvOverrides(config: WardenConfig, env: NodeJS.ProcessEnv): WardenConfig {
  const result: WardenConfig = { ...config, storage: { ...config.storage } };

  if (env.WARDEN_DB_PATH) {
    result.storage.dbPath = env.WARDEN_DB_PATH;
  }
  if (env.INITIAL_SUPER_ADMINS !== undefined) {
    result.initialSuperAdmins = parseIds(env.INITIAL_SUPER_ADMINS);
  }
  if (env.LOG_LEVEL) {
    const level = parseLogLevel(env.LOG_LEVEL);
    if (level) {
      result.logLevel = level;
    } else {
      structuredLog('warn', 'config', 'invalid_log_level', { value: env.LOG_LEVEL });
    }
  }
  if (env.WARDEN_STORAGE_RETRY_ATTEMPTS) {
    const attempts = Number(env.WARDEN_STORAGE_RETRY_ATTEMPTS);
    if (Number.isInteger(attempts) && attempts >= 1) {
      result.storage.retryAttempts = attempts;
    } else {
      structuredLog('warn', 'config', 'invalid_retry_attempts', { value: env.WARDEN_STORAGE_RETRY_ATTEMPTS });
    }
  }
  return result;
}

export async function ensureConfigDir(configDir: string = DEFAULT_CONFIG_DIR): Promise<void> {
  await mkdir(configDir, { recursive: true });
}

/**
 * Load config.json from configDir, merged over DEFAULT_CONFIG, then apply
 * environment overrides. A missing file yields the defaults; a malformed one
 * raises ConfigError.
 */
export async function loadConfig(
  configDir: string = DEFAULT_CONFIG_DIR,
  env: NodeJS.ProcessEnv = process.env,
): Promise<WardenConfig> {
  const userConfig = await readConfigFile(join(configDir, 'config.json'));
  const merged: WardenConfig = {
    ...DEFAULT_CONFIG,
    storage: {
      ...DEFAULT_CONFIG.storage,
      ...(userConfig.storage ?? {}),
    },
    initialSuperAdmins: userConfig.initialSuperAdmins ?? DEFAULT_CONFIG.initialSuperAdmins,
    logLevel: userConfig.logLevel ?? DEFAULT_CONFIG.logLevel,
    configDir,
  };
  return applyEnvOverrides(merged, env);
}

export async function saveConfig(config: ConfigFile, configDir: string = DEFAULT_CONFIG_DIR): Promise<void> {
  await ensureConfigDir(configDir);
  const configPath = join(configDir, 'config.json');
  const existing = await readConfigFile(configPath);
  const merged: ConfigFile = {
    ...existing,
    ...config,
    storage: { ...(existing.storage ?? {}), ...(config.storage ?? {}) },
  };
  await writeFile(configPath, JSON.stringify(merged, null, 2), 'utf-8');
}
