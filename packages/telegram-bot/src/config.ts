import { DEFAULT_ENGINE_URL, DEFAULT_ENGINE_TIMEOUT_MS } from '@warden/protocol';
import { ConfigError } from '@warden/core';

export interface BotConfig {
  telegramToken: string;
  engineUrl: string;
  engineApiKey: string;
  engineTimeoutMs: number;
}

// Load bot settings from environment (set by the CLI's start command or manually)
export function loadBotConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const token = env.TELEGRAM_BOT_TOKEN;
  if (!token) {
    throw new ConfigError(
      'TELEGRAM_BOT_TOKEN is required.\n'
      + '  1. Create a bot with @BotFather and copy its token\n'
      + '  2. export TELEGRAM_BOT_TOKEN="<token>"\n'
      + '  3. export INITIAL_SUPER_ADMINS="<your user id>"',
    );
  }

  const timeout = Number(env.WARDEN_ENGINE_TIMEOUT_MS);
  return {
    telegramToken: token,
    engineUrl: env.WARDEN_ENGINE_URL ?? DEFAULT_ENGINE_URL,
    engineApiKey: env.WARDEN_ENGINE_API_KEY ?? '',
    engineTimeoutMs: Number.isInteger(timeout) && timeout > 0 ? timeout : DEFAULT_ENGINE_TIMEOUT_MS,
  };
}
