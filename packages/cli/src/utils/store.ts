import chalk from 'chalk';
import {
  AuthStore,
  RetryingRepository,
  loadConfig,
  setLogLevel,
  type AuthRepository,
} from '@warden/core';
import type { WardenConfig } from '@warden/protocol';

/**
 * Open the configured store for one CLI command and close it afterwards.
 */
export async function withRepository<T>(
  fn: (repository: AuthRepository, config: WardenConfig) => Promise<T>,
): Promise<T> {
  const config = await loadConfig();
  setLogLevel(config.logLevel);
  const store = AuthStore.create(config.storage.dbPath);
  try {
    const repository = new RetryingRepository(store, {
      attempts: config.storage.retryAttempts,
      delayMs: config.storage.retryDelayMs,
    });
    return await fn(repository, config);
  } finally {
    store.close();
  }
}

/**
 * Print the error and set a failing exit code instead of throwing out of commander.
 */
export async function reportErrors(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    console.error(chalk.red(`✗ ${err instanceof Error ? err.message : String(err)}`));
    process.exitCode = 1;
  }
}
