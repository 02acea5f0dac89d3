import type { z } from 'zod';
import {
  AnthropicProvider,
  OpenAICompatibleProvider,
  type ChatMessage,
  type LLMProvider,
} from './llm-provider.js';
import { GatewayError, errorMessage } from './errors.js';
import { getStatusCode, withRetry } from './retry.js';
import { repairJSON } from './json-repair.js';
import logger from './logger.js';

// ─── Model constants ─────────────────────────────────────────────────

/** Writes the council synthesis and applicant feedback */
export const SYNTHESIS_MODEL = process.env.SYNTHESIS_MODEL ?? 'openai/gpt-4o-mini';

/** Turns freeform submissions into structured applications */
export const INTAKE_MODEL = process.env.INTAKE_MODEL ?? 'openai/gpt-4o-mini';

export const DEFAULT_MAX_TOKENS = 2048;

// ─── Provider factory ────────────────────────────────────────────────

function createProvider(): LLMProvider {
  const configured = process.env.LLM_PROVIDER?.toLowerCase();
  if (configured === 'anthropic') {
    return new AnthropicProvider();
  }
  return new OpenAICompatibleProvider({
    apiKey: process.env.OPENROUTER_API_KEY,
    baseUrl: process.env.OPENROUTER_BASE_URL ?? 'https://openrouter.ai/api/v1',
  });
}

/** Active LLM provider instance based on LLM_PROVIDER env var */
export const llm: LLMProvider = createProvider();

// ─── Gateway ─────────────────────────────────────────────────────────

export interface InferenceRequest {
  model: string;
  system: string;
  messages: ChatMessage[];
  temperature?: number;
  max_tokens?: number;
}

export interface InferenceGateway {
  invoke(request: InferenceRequest): Promise<string>;
  invokeStructured<S extends z.ZodTypeAny>(request: InferenceRequest, schema: S): Promise<z.infer<S>>;
}

export function toGatewayError(err: unknown, model: string): GatewayError {
  if (err instanceof GatewayError) return err;
  const message = errorMessage(err);
  const lower = message.toLowerCase();
  const name = err instanceof Error ? err.name : '';

  if (name === 'AbortError' || name === 'TimeoutError' || lower.includes('timed out')) {
    return new GatewayError('timeout', model, message, { cause: err });
  }
  if (getStatusCode(err) === 429 || lower.includes('rate limit')) {
    return new GatewayError('rate_limited', model, message, { cause: err });
  }
  return new GatewayError('upstream', model, message, { cause: err });
}

export class LLMGateway implements InferenceGateway {
  constructor(
    private readonly provider: LLMProvider,
    private readonly retryAttempts = 3,
  ) {}

  async invoke(request: InferenceRequest): Promise<string> {
    return this.call(request, false);
  }

  async invokeStructured<S extends z.ZodTypeAny>(
    request: InferenceRequest,
    schema: S,
  ): Promise<z.infer<S>> {
    const text = await this.call(request, true);
    const raw = repairJSON(text);
    if (raw === null) {
      throw new GatewayError('invalid_response', request.model, 'Model output contained no JSON');
    }
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown issue';
      throw new GatewayError('invalid_response', request.model, `Schema violation at ${where}`);
    }
    return parsed.data;
  }

  private async call(request: InferenceRequest, jsonMode: boolean): Promise<string> {
    try {
      const response = await withRetry(
        () => this.provider.chat({
          model: request.model,
          system: request.system,
          messages: request.messages,
          max_tokens: request.max_tokens ?? DEFAULT_MAX_TOKENS,
          ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
          json_mode: jsonMode,
        }),
        {
          maxAttempts: this.retryAttempts,
          onRetry: (attempt, error) => {
            logger.warn(
              { model: request.model, provider: this.provider.name, attempt, error: error.message },
              'Transient inference failure, retrying',
            );
          },
        },
      );
      return response.text;
    } catch (err) {
      throw toGatewayError(err, request.model);
    }
  }
}

export const gateway: InferenceGateway = new LLMGateway(llm);
