import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '@warden/core';
import { reportErrors } from '../utils/store.js';

export const configCommand = new Command('config')
  .description('View Warden configuration');

configCommand
  .command('show')
  .description('Show the effective configuration (file, defaults and environment)')
  .action(async () => {
    await reportErrors(async () => {
      const config = await loadConfig();
      console.log(chalk.bold('⚙️  Warden Configuration'));
      console.log();
      console.log(JSON.stringify(config, null, 2));
    });
  });

configCommand
  .command('path')
  .description('Show config directory path')
  .action(async () => {
    await reportErrors(async () => {
      const config = await loadConfig();
      console.log(config.configDir);
    });
  });
