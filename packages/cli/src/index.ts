import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { roleCommand } from './commands/role.js';
import { whitelistCommand } from './commands/whitelist.js';
import { groupsCommand } from './commands/groups.js';
import { adminsCommand } from './commands/admins.js';
import { startCommand } from './commands/start.js';
import { configCommand } from './commands/config.js';

const program = new Command();

program
  .name('warden')
  .description('🛡  Warden - access control for a conversational Telegram bot')
  .version('0.1.0');

// Setup & run
program.addCommand(initCommand);
program.addCommand(startCommand);

// Inspection
program.addCommand(roleCommand);
program.addCommand(whitelistCommand);
program.addCommand(groupsCommand);
program.addCommand(adminsCommand);

// Configuration
program.addCommand(configCommand);

await program.parseAsync();
