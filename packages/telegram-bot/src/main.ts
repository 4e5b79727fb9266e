import { structuredLog } from '@warden/core';
import { runBot } from './bot.js';

try {
  const result = await runBot();
  if (!result.success) {
    process.exitCode = 1;
  }
} catch (err) {
  structuredLog('error', 'telegram-bot', 'startup_failed', {
    message: err instanceof Error ? err.message : String(err),
  });
  process.exitCode = 1;
}
