import { Command } from 'commander';
import chalk from 'chalk';
import { bootstrapSuperAdmins, parseIds, saveConfig } from '@warden/core';
import { formatBootstrap } from '../utils/format.js';
import { reportErrors, withRepository } from '../utils/store.js';

export const initCommand = new Command('init')
  .description('Create the authorization database and apply the initial super admins')
  .option('--admins <ids>', 'Initial super admin user IDs, comma-separated (saved to config.json)')
  .action(async (opts: { admins?: string }) => {
    await reportErrors(async () => {
      if (opts.admins !== undefined) {
        const ids = parseIds(opts.admins);
        if (ids.length === 0) {
          throw new Error(`No valid user IDs in "${opts.admins}"`);
        }
        await saveConfig({ initialSuperAdmins: ids });
      }

      await withRepository(async (repository, config) => {
        console.log(chalk.cyan('🛡  Warden'));
        console.log(chalk.gray(`Database: ${config.storage.dbPath}`));

        const result = await bootstrapSuperAdmins(repository, config.initialSuperAdmins);
        const lines = formatBootstrap(result);
        if (lines.length === 0) {
          console.log(chalk.yellow('No initial super admins configured. Use --admins or INITIAL_SUPER_ADMINS.'));
          return;
        }
        for (const line of lines) {
          console.log(chalk.green(`✓ ${line}`));
        }
      });
    });
  });
