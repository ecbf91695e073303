/**
 * AI Provider Clients
 *
 * Two wire formats cover every registered provider: the OpenAI chat
 * completions format (OpenAI, Gemini's compatible endpoint, Mistral, Groq,
 * OpenRouter, Ollama) and Anthropic's messages format. Both share one HTTP
 * exchange that applies the caller's timeout and maps failures onto
 * AiErrorKind.
 */

import { z } from 'zod';
import type {
  AiErrorKind,
  AiFailure,
  AiProvider,
  AiRequest,
  AiResult,
  Message,
  ProviderConfig,
} from './types';

const DEFAULT_MAX_TOKENS = 800;

const openAIResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      })
    )
    .min(1),
});

const anthropicResponseSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    })
  ),
});

const errorBodySchema = z.union([
  z.object({ error: z.object({ message: z.string() }) }),
  z.object({ error: z.string() }),
  z.object({ message: z.string() }),
]);

const retryAfterBodySchema = z.object({ retry_after: z.number() });

function failure(
  providerId: string,
  errorKind: AiErrorKind,
  providerMessage: string,
  retryAfterMs?: number
): AiFailure {
  return {
    success: false,
    errorKind,
    providerMessage,
    providerId,
    ...(retryAfterMs !== undefined && { retryAfterMs }),
  };
}

/**
 * Extract a human-readable message from an error body, if it has one
 */
function readErrorMessage(body: unknown): string | undefined {
  const parsed = errorBodySchema.safeParse(body);
  if (!parsed.success) return undefined;
  const data = parsed.data;
  if ('message' in data) return data.message;
  return typeof data.error === 'string' ? data.error : data.error.message;
}

function readRetryAfterMs(headers: Headers, body: unknown): number {
  const header = Number(headers.get('retry-after'));
  if (Number.isFinite(header) && header > 0) return header * 1000;
  const parsed = retryAfterBodySchema.safeParse(body);
  return parsed.success ? parsed.data.retry_after * 1000 : 60000;
}

/**
 * Parse error response to determine error kind
 */
export function classifyHttpError(
  providerId: string,
  status: number,
  headers: Headers,
  body: unknown
): AiFailure {
  const detail = readErrorMessage(body);

  if (status === 401 || status === 403) {
    return failure(providerId, 'AuthError', detail ?? 'Invalid API key or unauthorized access');
  }

  if (status === 429) {
    return failure(providerId, 'RateLimited', detail ?? 'Rate limit exceeded', readRetryAfterMs(headers, body));
  }

  if (status === 408) {
    return failure(providerId, 'Timeout', detail ?? 'Provider timed out');
  }

  if (status >= 500) {
    return failure(providerId, 'NetworkError', `Server error: ${status}`);
  }

  return failure(providerId, 'ProviderError', detail ?? `Request failed with status ${status}`);
}

async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

interface Exchange {
  providerId: string;
  model: string;
  url: string;
  headers: Record<string, string>;
  body: unknown;
  timeoutMs: number;
  extractAnswer: (json: unknown) => string | null;
}

/**
 * Perform exactly one HTTP request. Never throws.
 */
async function exchange(spec: Exchange): Promise<AiResult> {
  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, spec.timeoutMs);

  try {
    const response = await fetch(spec.url, {
      method: 'POST',
      headers: spec.headers,
      body: JSON.stringify(spec.body),
      signal: controller.signal,
    });

    const body = await readBody(response);

    if (!response.ok) {
      return classifyHttpError(spec.providerId, response.status, response.headers, body);
    }

    const answer = spec.extractAnswer(body);
    if (answer === null) {
      return failure(spec.providerId, 'ProviderError', 'Malformed response from provider');
    }

    return { success: true, answerText: answer.trim(), providerId: spec.providerId, model: spec.model };
  } catch (error) {
    if (timedOut) {
      return failure(spec.providerId, 'Timeout', `Request timed out after ${spec.timeoutMs}ms`);
    }
    if (error instanceof Error) {
      return failure(spec.providerId, 'NetworkError', error.message);
    }
    return failure(spec.providerId, 'NetworkError', 'Unknown error occurred');
  } finally {
    clearTimeout(timeoutId);
  }
}

function userMessages(prompt: string): Message[] {
  return [{ role: 'user', content: prompt }];
}

abstract class HttpProvider implements AiProvider {
  constructor(
    protected readonly config: ProviderConfig,
    protected readonly apiKey: string | undefined
  ) {}

  get id(): string {
    return this.config.id;
  }

  async complete(request: AiRequest): Promise<AiResult> {
    if (this.config.requiresApiKey && !this.apiKey) {
      return failure(this.config.id, 'AuthError', `No API key configured for ${this.config.name}`);
    }

    return exchange({
      providerId: this.config.id,
      model: request.model,
      url: this.endpoint(),
      headers: {
        'Content-Type': 'application/json',
        ...this.authHeaders(),
        ...this.config.customHeaders,
      },
      body: this.requestBody(request),
      timeoutMs: request.requestConfig.timeoutMs,
      extractAnswer: (json) => this.extractAnswer(json),
    });
  }

  protected abstract endpoint(): string;
  protected abstract authHeaders(): Record<string, string>;
  protected abstract requestBody(request: AiRequest): unknown;
  protected abstract extractAnswer(json: unknown): string | null;
}

/**
 * OpenAI chat completions format
 */
export class OpenAICompatibleProvider extends HttpProvider {
  protected endpoint(): string {
    return `${this.config.baseURL}/chat/completions`;
  }

  protected authHeaders(): Record<string, string> {
    return this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {};
  }

  protected requestBody({ model, composedPrompt, requestConfig }: AiRequest): unknown {
    return {
      model,
      messages: userMessages(composedPrompt),
      ...(requestConfig.maxTokens !== undefined && { max_tokens: requestConfig.maxTokens }),
      ...(requestConfig.temperature !== undefined && { temperature: requestConfig.temperature }),
    };
  }

  protected extractAnswer(json: unknown): string | null {
    const parsed = openAIResponseSchema.safeParse(json);
    if (!parsed.success) return null;
    return parsed.data.choices[0].message.content ?? '';
  }
}

/**
 * Anthropic messages format: x-api-key auth, mandatory max_tokens, content blocks
 */
export class AnthropicProvider extends HttpProvider {
  protected endpoint(): string {
    return `${this.config.baseURL}/messages`;
  }

  protected authHeaders(): Record<string, string> {
    return this.apiKey ? { 'x-api-key': this.apiKey } : {};
  }

  protected requestBody({ model, composedPrompt, requestConfig }: AiRequest): unknown {
    return {
      model,
      max_tokens: requestConfig.maxTokens ?? DEFAULT_MAX_TOKENS,
      messages: userMessages(composedPrompt),
      ...(requestConfig.temperature !== undefined && { temperature: requestConfig.temperature }),
    };
  }

  protected extractAnswer(json: unknown): string | null {
    const parsed = anthropicResponseSchema.safeParse(json);
    if (!parsed.success) return null;
    return parsed.data.content
      .filter((block) => block.type === 'text' && block.text !== undefined)
      .map((block) => block.text)
      .join('\n');
  }
}

/**
 * Instantiate the provider variant matching a config's wire format
 */
export function createProvider(config: ProviderConfig, apiKey: string | undefined): AiProvider {
  switch (config.apiFormat) {
    case 'anthropic':
      return new AnthropicProvider(config, apiKey);
    case 'openai':
      return new OpenAICompatibleProvider(config, apiKey);
  }
}
