import { Command } from 'commander';
import chalk from 'chalk';
import { formatPermission } from '../utils/format.js';
import { reportErrors, withRepository } from '../utils/store.js';

export const adminsCommand = new Command('admins')
  .description('Inspect users with an elevated role');

adminsCommand
  .command('list')
  .description('List super admins and group admins')
  .action(async () => {
    await reportErrors(() => withRepository(async (repository) => {
      const permissions = await repository.listPermissions();
      if (permissions.length === 0) {
        console.log(chalk.yellow('No admins yet. Run `warden init --admins <ids>`.'));
        return;
      }
      for (const permission of permissions) {
        const line = formatPermission(permission);
        console.log(permission.role === 'SUPER_ADMIN' ? chalk.magenta(line) : chalk.cyan(line));
      }
    }));
  });
