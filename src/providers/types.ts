/**
 * AI Provider System - Type Definitions
 *
 * Every provider sits behind the same AiProvider contract: one composed prompt
 * in, one AiResult out. Provider-specific failures are folded into a shared
 * error taxonomy so callers never branch on provider identity.
 */

export type ProviderTier = 'paid' | 'free' | 'local';

/** Wire format spoken by a provider's HTTP API */
export type ApiFormat = 'openai' | 'anthropic';

/** Provider configuration for the registry */
export interface ProviderConfig {
  /** Unique identifier, also the value of the PROVIDER setting */
  id: string;
  /** Display name */
  name: string;
  /** Base URL for API requests */
  baseURL: string;
  defaultModel: string;
  tier: ProviderTier;
  requiresApiKey: boolean;
  models: string[];
  apiFormat: ApiFormat;
  /** Custom headers required by some providers */
  customHeaders?: Record<string, string>;
  description: string;
}

export type MessageRole = 'system' | 'user' | 'assistant';

export interface Message {
  role: MessageRole;
  content: string;
}

export type AiErrorKind = 'AuthError' | 'RateLimited' | 'NetworkError' | 'ProviderError' | 'Timeout';

/** Generation parameters applied to one request */
export interface RequestConfig {
  temperature?: number;
  maxTokens?: number;
  /** Hard limit for the whole HTTP exchange; exceeding it yields `Timeout` */
  timeoutMs: number;
}

export interface AiRequest {
  provider: string;
  model: string;
  composedPrompt: string;
  requestConfig: RequestConfig;
}

/**
 * Result of one completion. Exactly one of answer or error is present.
 */
export type AiResult =
  | { success: true; answerText: string; providerId: string; model: string }
  | {
      success: false;
      errorKind: AiErrorKind;
      providerMessage: string;
      providerId: string;
      retryAfterMs?: number;
    };

export type AiFailure = Extract<AiResult, { success: false }>;

/**
 * One variant per provider wire format. Implementations make exactly one HTTP
 * call per invocation and never throw.
 */
export interface AiProvider {
  readonly id: string;
  complete(request: AiRequest): Promise<AiResult>;
}

export interface ProviderHealth {
  providerId: string;
  status: 'healthy' | 'degraded' | 'unhealthy' | 'unknown';
  latencyMs?: number;
  lastChecked: number;
  error?: string;
}
