import { getAnthropicClient } from './anthropic.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface ChatParams {
  model: string;
  system: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature?: number;
  /** Ask the provider for a bare JSON object where it supports that */
  json_mode?: boolean;
  signal?: AbortSignal;
}

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatResponse {
  text: string;
  usage: { input_tokens: number; output_tokens: number };
}

export interface LLMProvider {
  readonly name: string;
  chat(params: ChatParams): Promise<ChatResponse>;
}

/** Non-2xx answer from an HTTP provider. `status` feeds retry classification. */
export class ProviderHttpError extends Error {
  readonly status: number;

  constructor(provider: string, status: number, body: string) {
    super(`${provider} API error ${status}: ${body.slice(0, 500)}`);
    this.name = 'ProviderHttpError';
    this.status = status;
  }
}

export function createCombinedAbortSignal(
  callerSignal: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; cleanup: () => void } {
  const timeoutController = new AbortController();
  const combinedController = new AbortController();
  const timeout = setTimeout(() => {
    timeoutController.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  timeout.unref?.();

  const abortCombined = (reason?: unknown) => {
    if (combinedController.signal.aborted) return;
    combinedController.abort(reason);
  };

  const onCallerAbort = () => abortCombined(callerSignal?.reason);
  const onTimeoutAbort = () => abortCombined(timeoutController.signal.reason);

  if (callerSignal) {
    if (callerSignal.aborted) {
      onCallerAbort();
    } else {
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }
  }
  timeoutController.signal.addEventListener('abort', onTimeoutAbort, { once: true });

  const cleanup = () => {
    clearTimeout(timeout);
    if (callerSignal) {
      callerSignal.removeEventListener('abort', onCallerAbort);
    }
    timeoutController.signal.removeEventListener('abort', onTimeoutAbort);
    if (!timeoutController.signal.aborted) {
      timeoutController.abort();
    }
  };

  return { signal: combinedController.signal, cleanup };
}

// ─── Anthropic provider ──────────────────────────────────────────────

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';

  async chat(params: ChatParams): Promise<ChatResponse> {
    const anthropic = getAnthropicClient();
    const { signal, cleanup } = createCombinedAbortSignal(params.signal, 180_000);
    try {
      const response = await anthropic.messages.create({
        model: params.model,
        max_tokens: params.max_tokens,
        system: params.system,
        messages: params.messages,
        ...(params.temperature !== undefined ? { temperature: params.temperature } : {}),
      }, { signal });

      let text = '';
      for (const block of response.content) {
        if (block.type === 'text') {
          text += block.text;
        }
      }

      return {
        text,
        usage: {
          input_tokens: response.usage?.input_tokens ?? 0,
          output_tokens: response.usage?.output_tokens ?? 0,
        },
      };
    } finally {
      cleanup();
    }
  }
}

// ─── OpenAI-compatible provider (OpenRouter by default) ─────────────

interface OpenAICompatibleConfig {
  apiKey: string | undefined;
  baseUrl: string;
  timeoutMs?: number;
}

export class OpenAICompatibleProvider implements LLMProvider {
  readonly name = 'openrouter';
  private apiKey: string | undefined;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(config: OpenAICompatibleConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.timeoutMs = config.timeoutMs ?? 120_000;
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    if (!this.apiKey) {
      throw new Error('OPENROUTER_API_KEY environment variable is required when LLM_PROVIDER=openrouter');
    }
    const body = this.buildRequestBody(params);
    const { signal: combinedSignal, cleanup: cleanupCombinedSignal } = createCombinedAbortSignal(
      params.signal,
      this.timeoutMs,
    );
    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(body),
        signal: combinedSignal,
      });

      if (!response.ok) {
        const errText = await response.text().catch(() => '');
        throw new ProviderHttpError('OpenRouter', response.status, errText);
      }

      const data = await response.json() as OpenAIChatResponse;
      return {
        text: data.choices?.[0]?.message?.content ?? '',
        usage: {
          input_tokens: data.usage?.prompt_tokens ?? 0,
          output_tokens: data.usage?.completion_tokens ?? 0,
        },
      };
    } finally {
      cleanupCombinedSignal();
    }
  }

  private buildRequestBody(params: ChatParams): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: params.model,
      max_tokens: params.max_tokens,
      // System prompt travels as the first message
      messages: [{ role: 'system', content: params.system }, ...params.messages],
    };
    if (params.temperature !== undefined) {
      body.temperature = params.temperature;
    }
    if (params.json_mode) {
      body.response_format = { type: 'json_object' };
    }
    return body;
  }
}

interface OpenAIChatResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
  };
}
