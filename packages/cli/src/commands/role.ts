import { Command } from 'commander';
import chalk from 'chalk';
import type { Role } from '@warden/protocol';
import type { AuthRepository } from '@warden/core';
import { parseId, parseRole } from '@warden/telegram-bot';
import { reportErrors, withRepository } from '../utils/store.js';

function requireUserId(raw: string): number {
  const userId = parseId(raw);
  if (userId === null) {
    throw new Error(`Invalid user id: ${raw}`);
  }
  return userId;
}

export async function getRole(repository: AuthRepository, rawUserId: string): Promise<Role> {
  return repository.getRole(requireUserId(rawUserId));
}

/**
 * Set a role from the operator console. There is no acting user, so the
 * grant is recorded without a grantor.
 */
export async function setRole(repository: AuthRepository, rawUserId: string, rawRole: string): Promise<string> {
  const userId = requireUserId(rawUserId);
  const role = parseRole(rawRole);
  if (role === null) {
    throw new Error(`Invalid role: ${rawRole} (expected super_admin, group_admin or none)`);
  }
  const prior = await repository.setRole(userId, role, null);
  return prior === role ? `User ${userId} already has role ${role}` : `User ${userId}: ${prior} → ${role}`;
}

export const roleCommand = new Command('role')
  .description('Inspect or change user roles');

roleCommand
  .command('get')
  .description('Show the role of a user')
  .argument('<user_id>', 'Telegram user ID')
  .action(async (userId: string) => {
    await reportErrors(() => withRepository(async (repository) => {
      console.log(await getRole(repository, userId));
    }));
  });

roleCommand
  .command('set')
  .description('Set the role of a user')
  .argument('<user_id>', 'Telegram user ID')
  .argument('<role>', 'super_admin | group_admin | none')
  .action(async (userId: string, role: string) => {
    await reportErrors(() => withRepository(async (repository) => {
      console.log(chalk.green(`✓ ${await setRole(repository, userId, role)}`));
    }));
  });
