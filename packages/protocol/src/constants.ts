export const DEFAULT_ENGINE_URL = 'http://127.0.0.1:18790';
export const DEFAULT_ENGINE_TIMEOUT_MS = 120_000;
// Telegram caps messages at 4096 chars; keep a margin
export const TELEGRAM_MSG_LIMIT = 4000;
export const LIST_DISPLAY_LIMIT = 20;
