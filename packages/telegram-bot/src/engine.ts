import { z } from 'zod';
import { DEFAULT_ENGINE_TIMEOUT_MS } from '@warden/protocol';

export interface ConversationInput {
  userId: number;
  chatId: number;
  text: string;
}

/**
 * Whatever produces replies for authorized conversational messages.
 * The gate calls it once per message and never retries.
 */
export interface ConversationEngine {
  respond(input: ConversationInput, signal?: AbortSignal): Promise<string>;
}

export class EngineError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = 'EngineError';
  }
}

const engineResponseSchema = z.object({
  reply: z.string(),
});

export interface HttpEngineOptions {
  url: string;
  apiKey: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

// Aborts when either the caller cancels or the timeout fires
function combineSignals(timeoutMs: number, signal?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
  const timeout = AbortSignal.timeout(timeoutMs);
  if (!signal) {
    return { signal: timeout, dispose: () => undefined };
  }

  const controller = new AbortController();
  const abort = (source: AbortSignal) => () => controller.abort(source.reason);
  const onCaller = abort(signal);
  const onTimeout = abort(timeout);

  if (signal.aborted) {
    controller.abort(signal.reason);
  } else {
    signal.addEventListener('abort', onCaller, { once: true });
    timeout.addEventListener('abort', onTimeout, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      signal.removeEventListener('abort', onCaller);
      timeout.removeEventListener('abort', onTimeout);
    },
  };
}

/**
 * Conversation engine reached over HTTP: POST {engineUrl}/api/chat
 */
export class HttpConversationEngine implements ConversationEngine {
  private readonly url: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpEngineOptions) {
    this.url = options.url.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_ENGINE_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async respond(input: ConversationInput, signal?: AbortSignal): Promise<string> {
    const combined = combineSignals(this.timeoutMs, signal);
    try {
      const res = await this.fetchImpl(`${this.url}/api/chat`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...(this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {}),
        },
        body: JSON.stringify(input),
        signal: combined.signal,
      });

      if (!res.ok) {
        const detail = await res.text().catch((err: unknown) => String(err));
        throw new EngineError(res.status, `Engine responded ${res.status}: ${detail.slice(0, 200)}`);
      }

      const parsed = engineResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw new EngineError(res.status, `Engine returned an unexpected body: ${parsed.error.message}`);
      }
      return parsed.data.reply;
    } finally {
      combined.dispose();
    }
  }
}
