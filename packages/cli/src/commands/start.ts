import { Command } from 'commander';
import chalk from 'chalk';
import { runBot } from '@warden/telegram-bot';
import { reportErrors } from '../utils/store.js';

export const startCommand = new Command('start')
  .description('Start the Telegram bot in the foreground')
  .action(async () => {
    await reportErrors(async () => {
      console.log(chalk.cyan('🛡  Warden Telegram Bot'));
      const result = await runBot();
      if (!result.success) {
        throw new Error(`Bot failed to start: ${result.error ?? 'unknown error'}`);
      }
      console.log(chalk.green('✓ Bot is running. Press Ctrl+C to stop.'));
    });
  });
