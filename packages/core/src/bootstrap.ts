import type { AuthRepository } from './repository.js';
import { structuredLog } from './logger.js';

export interface BootstrapResult {
  /** Users that had no elevated role */
  created: number[];
  /** Users raised from GROUP_ADMIN */
  upgraded: number[];
  /** Users already SUPER_ADMIN */
  unchanged: number[];
}

/**
 * Promote the configured initial administrators to SUPER_ADMIN.
 * Safe to run on every start: existing super admins are left untouched.
 */
export async function bootstrapSuperAdmins(repository: AuthRepository, userIds: readonly number[]): Promise<BootstrapResult> {
  const result: BootstrapResult = { created: [], upgraded: [], unchanged: [] };

  const distinct = [...new Set(userIds)];
  if (distinct.length === 0) {
    structuredLog('warn', 'bootstrap', 'no_initial_admins', {
      hint: 'set INITIAL_SUPER_ADMINS or initialSuperAdmins in config.json',
    });
    return result;
  }

  for (const userId of distinct) {
    const current = await repository.getRole(userId);
    if (current === 'SUPER_ADMIN') {
      result.unchanged.push(userId);
      continue;
    }

    const prior = await repository.setRole(userId, 'SUPER_ADMIN', null);
    if (prior === 'SUPER_ADMIN') {
      // Promoted concurrently by another writer
      result.unchanged.push(userId);
    } else if (prior === 'GROUP_ADMIN') {
      result.upgraded.push(userId);
    } else {
      result.created.push(userId);
    }
  }

  structuredLog('info', 'bootstrap', 'super_admins_applied', {
    created: result.created.length,
    upgraded: result.upgraded.length,
    unchanged: result.unchanged.length,
  });
  return result;
}
