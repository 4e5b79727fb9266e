import { Command } from 'commander';
import chalk from 'chalk';
import { reportErrors, withRepository } from '../utils/store.js';

export const groupsCommand = new Command('groups')
  .description('Inspect authorized groups');

groupsCommand
  .command('list')
  .description('List authorized group chats, oldest first')
  .action(async () => {
    await reportErrors(() => withRepository(async (repository) => {
      const groups = await repository.listAuthorizedGroups();
      if (groups.length === 0) {
        console.log(chalk.gray('No authorized groups.'));
        return;
      }
      console.log(chalk.bold(`Authorized groups (${groups.length})`));
      for (const chatId of groups) console.log(`  ${chatId}`);
    }));
  });
