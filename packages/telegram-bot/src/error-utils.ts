import { isAuthError } from '@warden/core';
import { EngineError } from './engine.js';

// Error classification for structured logging
export type ErrorCategory = 'auth' | 'storage' | 'telegram_api' | 'timeout' | 'network' | 'internal';

export interface ClassifiedError {
  category: ErrorCategory;
  code?: number;
  message: string;
  retryable: boolean;
}

function telegramStatusCode(error: Error): number | null {
  if (!('response' in error)) return null;
  const response = error.response;
  if (typeof response === 'object' && response !== null && 'error_code' in response && typeof response.error_code === 'number') {
    return response.error_code;
  }
  if (typeof response === 'object' && response !== null && 'status_code' in response && typeof response.status_code === 'number') {
    return response.status_code;
  }
  return null;
}

export function classifyError(err: unknown): ClassifiedError {
  const error = err instanceof Error ? err : new Error(String(err));
  const msg = error.message;

  if (isAuthError(error)) {
    return {
      category: error.kind === 'StorageUnavailable' ? 'storage' : 'auth',
      message: msg,
      retryable: error.retryable,
    };
  }

  // Telegram API errors (from Telegraf)
  const code = telegramStatusCode(error);
  if (code !== null) {
    return {
      category: 'telegram_api',
      code,
      message: msg,
      retryable: code === 429 || code >= 500,
    };
  }

  if (error instanceof EngineError) {
    return {
      category: 'network',
      code: error.status,
      message: msg,
      retryable: error.status === 429 || error.status >= 500,
    };
  }

  // Timeout errors
  if (error.name === 'TimeoutError' || msg.includes('timed out') || msg.includes('timeout') || msg.includes('TimeoutError')) {
    return { category: 'timeout', message: msg, retryable: true };
  }

  // Network errors
  if (msg.includes('ECONNREFUSED') || msg.includes('ENOTFOUND') || msg.includes('fetch failed') || msg.includes('network')) {
    return { category: 'network', message: msg, retryable: true };
  }

  return { category: 'internal', message: msg, retryable: false };
}
