import { Command } from 'commander';
import chalk from 'chalk';
import type { ScopeType } from '@warden/protocol';
import type { AuthRepository } from '@warden/core';
import { parseId, parseScope } from '@warden/telegram-bot';
import { formatWhitelistEntry } from '../utils/format.js';
import { reportErrors, withRepository } from '../utils/store.js';

export interface WhitelistListOptions {
  scope?: string;
  chat?: string;
}

export async function listWhitelist(repository: AuthRepository, opts: WhitelistListOptions): Promise<string[]> {
  let scopeType: ScopeType | undefined;
  if (opts.scope !== undefined) {
    const parsed = parseScope(opts.scope);
    if (parsed === null) {
      throw new Error(`Invalid scope: ${opts.scope} (expected global or group)`);
    }
    scopeType = parsed;
  }

  let chatId: number | undefined;
  if (opts.chat !== undefined) {
    const parsed = parseId(opts.chat);
    if (parsed === null) {
      throw new Error(`Invalid chat id: ${opts.chat}`);
    }
    chatId = parsed;
    scopeType ??= 'GROUP';
  }

  const entries = await repository.listWhitelist(scopeType, chatId);
  return entries.map(formatWhitelistEntry);
}

export const whitelistCommand = new Command('whitelist')
  .description('Inspect whitelist entries');

whitelistCommand
  .command('list')
  .description('List whitelist entries, oldest first')
  .option('--scope <scope>', 'global or group')
  .option('--chat <chat_id>', 'Only entries for this group chat')
  .action(async (opts: WhitelistListOptions) => {
    await reportErrors(() => withRepository(async (repository) => {
      const lines = await listWhitelist(repository, opts);
      if (lines.length === 0) {
        console.log(chalk.gray('No whitelist entries.'));
        return;
      }
      console.log(chalk.bold(`Whitelist (${lines.length})`));
      for (const line of lines) console.log(`  ${line}`);
    }));
  });
